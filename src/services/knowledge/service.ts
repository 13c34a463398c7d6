import fs from 'fs-extra';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { EmbeddingProvider, KnowledgeSnapshot, Passage, PassageInput, SearchHit } from './types';
import { FlatL2Index, similarityFromDistance } from './vector_index';
import { EmbeddingError, IndexLoadError, IngestError } from './errors';
import { describeError } from '../../utils/errors';
import { KnowledgeBaseConfig } from '../../config/schema';
import { resolveConfiguredPath } from '../../config/loader';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge' });

const METADATA_VERSION = 1;

const PassageSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  created_at: z.number(),
});

const MetadataSchema = z.object({
  version: z.literal(METADATA_VERSION),
  embedding: z.object({ provider: z.string(), dimension: z.number().int().positive() }),
  passages: z.array(PassageSchema),
});

export const PassageInputSchema = z.object({
  title: z.string(),
  content: z.string(),
});

export interface KnowledgeStoreOptions {
  storagePath: string;
  indexFile: string;
  metadataFile: string;
  defaultK: number;
  seedFile?: string;
}

export interface KnowledgeStats {
  passages: number;
  vectors: number;
  dimension: number;
  embedder: string;
}

export function passageText(passage: PassageInput): string {
  return `${passage.title}\n${passage.content}`;
}

/**
 * Resident passage index. Reads go against an immutable snapshot; ingest builds
 * a replacement off to the side and swaps the reference once it is persisted.
 */
export class KnowledgeStore {
  private snapshot: KnowledgeSnapshot;
  // Serializes ingests against each other. Searches never wait on it.
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    private embedder: EmbeddingProvider,
    private options: KnowledgeStoreOptions
  ) {
    this.snapshot = { passages: [], index: new FlatL2Index(embedder.getDimension()) };
  }

  static async open(config: KnowledgeBaseConfig, embedder: EmbeddingProvider, seedOnEmpty = config.seed_on_empty): Promise<KnowledgeStore> {
    const store = new KnowledgeStore(embedder, {
      storagePath: resolveConfiguredPath(config.storage_path),
      indexFile: config.index_file,
      metadataFile: config.metadata_file,
      defaultK: config.default_k,
      seedFile: seedOnEmpty ? resolveConfiguredPath(config.seed_file) : undefined,
    });
    const found = await store.load();
    if (!found && store.options.seedFile) {
      await store.seed(store.options.seedFile);
    }
    return store;
  }

  get indexPath(): string {
    return path.join(this.options.storagePath, this.options.indexFile);
  }

  get metadataPath(): string {
    return path.join(this.options.storagePath, this.options.metadataFile);
  }

  get size(): number {
    return this.snapshot.passages.length;
  }

  get stats(): KnowledgeStats {
    const { passages, index } = this.snapshot;
    return {
      passages: passages.length,
      vectors: index.size,
      dimension: index.dimension,
      embedder: this.embedder.name,
    };
  }

  listPassages(): readonly Passage[] {
    return this.snapshot.passages;
  }

  /**
   * Loads persisted state. Returns false when nothing was persisted yet.
   * A half-present or inconsistent pair of files is an error, never an empty store.
   */
  private async load(): Promise<boolean> {
    const [hasIndex, hasMetadata] = await Promise.all([
      fs.pathExists(this.indexPath),
      fs.pathExists(this.metadataPath),
    ]);

    if (!hasIndex && !hasMetadata) {
      log.info(`No persisted knowledge base at ${this.options.storagePath}, starting empty`);
      return false;
    }
    if (hasIndex !== hasMetadata) {
      const missing = hasIndex ? this.metadataPath : this.indexPath;
      throw new IndexLoadError(`Knowledge base is incomplete: ${missing} is missing`);
    }

    let index = FlatL2Index.deserialize(await fs.readFile(this.indexPath));

    let raw: unknown;
    try {
      raw = await fs.readJson(this.metadataPath);
    } catch (err) {
      throw new IndexLoadError(`Passage metadata is unreadable: ${describeError(err)}`);
    }
    const parsed = MetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexLoadError(`Passage metadata is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    const metadata = parsed.data;

    // Metadata is written last and is the commit point. Rows are append-only, so
    // an index left ahead of it by an interrupted ingest still starts with the
    // committed rows.
    if (metadata.passages.length > index.size) {
      throw new IndexLoadError(
        `Index holds ${index.size} vectors but metadata lists ${metadata.passages.length} passages`
      );
    }
    if (metadata.passages.length < index.size) {
      log.warn(
        `Index holds ${index.size} vectors but metadata lists ${metadata.passages.length} passages; dropping uncommitted rows`
      );
      index = index.prefix(metadata.passages.length);
    }
    if (index.dimension !== this.embedder.getDimension()) {
      throw new IndexLoadError(
        `Index dimension ${index.dimension} does not match embedder '${this.embedder.name}' (${this.embedder.getDimension()})`
      );
    }

    this.snapshot = { passages: metadata.passages, index };
    log.info(`Loaded knowledge base with ${index.size} passages`);
    return true;
  }

  private async seed(seedFile: string): Promise<void> {
    if (!(await fs.pathExists(seedFile))) {
      log.warn(`Seed file ${seedFile} not found, knowledge base stays empty`);
      return;
    }
    const parsed = z.array(PassageInputSchema).safeParse(await fs.readJson(seedFile));
    if (!parsed.success) {
      throw new IngestError(`Seed file ${seedFile} is not a list of {title, content}`);
    }
    const passages = await this.ingest(parsed.data);
    log.info(`Initialized knowledge base with ${passages.length} seed passages`);
  }

  /**
   * Embeds and appends passages, all or nothing. Duplicates are kept:
   * de-duplication is the caller's concern.
   */
  ingest(inputs: readonly PassageInput[]): Promise<Passage[]> {
    const run = this.writeChain.then(() => this.applyIngest(inputs));
    // The caller receives the rejection through `run`; the chain only needs to stay usable.
    this.writeChain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyIngest(inputs: readonly PassageInput[]): Promise<Passage[]> {
    if (inputs.length === 0) return [];

    inputs.forEach((input, i) => {
      if (input.title.trim().length === 0 || input.content.trim().length === 0) {
        throw new IngestError(`Passage ${i} needs a non-empty title and content`);
      }
    });

    let vectors: number[][];
    try {
      vectors = await Promise.all(inputs.map((input) => this.embedder.getEmbedding(passageText(input))));
    } catch (err) {
      throw new IngestError(`Embedding failed, nothing was ingested: ${describeError(err)}`, err);
    }

    const current = this.snapshot;
    const index = current.index.clone();
    try {
      index.add(vectors);
    } catch (err) {
      throw new IngestError(`Embedding has the wrong shape: ${describeError(err)}`, err);
    }
    const now = Date.now();
    const added: Passage[] = inputs.map((input) => ({
      id: uuidv4(),
      title: input.title,
      content: input.content,
      created_at: now,
    }));
    const next: KnowledgeSnapshot = { passages: [...current.passages, ...added], index };

    try {
      await this.persist(next);
    } catch (err) {
      throw new IngestError(`Could not persist knowledge base: ${describeError(err)}`, err);
    }

    this.snapshot = next;
    log.info(`Ingested ${added.length} passages (total ${next.passages.length})`);
    return added;
  }

  private async persist(snapshot: KnowledgeSnapshot): Promise<void> {
    await fs.ensureDir(this.options.storagePath);
    const indexTmp = `${this.indexPath}.tmp`;
    const metadataTmp = `${this.metadataPath}.tmp`;

    await fs.writeFile(indexTmp, snapshot.index.serialize());
    await fs.writeJson(
      metadataTmp,
      {
        version: METADATA_VERSION,
        embedding: { provider: this.embedder.name, dimension: snapshot.index.dimension },
        passages: snapshot.passages,
      },
      { spaces: 2 }
    );
    // Index first: until the metadata lands, load() ignores the extra rows
    await fs.move(indexTmp, this.indexPath, { overwrite: true });
    await fs.move(metadataTmp, this.metadataPath, { overwrite: true });
  }

  /**
   * Top-k passages by descending similarity. An empty store answers with an
   * empty list; a query that cannot be embedded raises EmbeddingError.
   */
  async search(query: string, k: number = this.options.defaultK): Promise<SearchHit[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }

    // Pin the snapshot so a concurrent ingest cannot change it mid-query
    const snapshot = this.snapshot;
    if (snapshot.index.size === 0) return [];

    let vector: number[];
    try {
      vector = await this.embedder.getEmbedding(query);
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(`Query could not be embedded: ${describeError(err)}`, err);
    }

    return snapshot.index.search(vector, k).map((match) => ({
      passage: snapshot.passages[match.position],
      distance: match.distance,
      score: similarityFromDistance(match.distance),
    }));
  }

  /** Resolves once every queued ingest has settled. */
  async close(): Promise<void> {
    await this.writeChain;
  }
}
