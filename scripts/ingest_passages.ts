import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { loadConfig } from '../src/config/loader';
import { KnowledgeStore, PassageInputSchema } from '../src/services/knowledge/service';
import { createEmbeddingProvider } from '../src/services/knowledge/embedding';
import logger from '../src/utils/logger';

const log = logger.child({ module: 'Ingest' });

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: npm run ingest -- <passages.json>');
    process.exit(1);
  }

  const parsed = z.array(PassageInputSchema).safeParse(await fs.readJson(path.resolve(file)));
  if (!parsed.success) {
    throw new Error(`${file} must contain an array of {title, content}`);
  }

  const config = await loadConfig(process.env.FINSIGHT_CONFIG);
  const embedder = createEmbeddingProvider(config.knowledge_base.embedding);
  // Seeding would duplicate whatever is being imported into an empty store
  const store = await KnowledgeStore.open(config.knowledge_base, embedder, false);

  const passages = await store.ingest(parsed.data);
  await store.close();
  log.info(`Ingested ${passages.length} passages into ${store.metadataPath} (total ${store.size})`);
}

main().catch((err) => {
  log.error(`Ingest failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
