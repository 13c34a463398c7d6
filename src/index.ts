/**
 * finsight-support - Main Entry Point
 *
 * Loads configuration, builds the application context (resident knowledge
 * index, tool registry, dispatcher with per-conversation call budgets) and
 * exposes the dispatcher over HTTP for the hosted reasoning agent.
 */

import { loadConfig } from './config/loader';
import { createAppContext } from './agent/context';
import { WebChannel } from './channels/web';
import logger from './utils/logger';

const log = logger.child({ module: 'System' });

async function main() {
  const config = await loadConfig(process.env.FINSIGHT_CONFIG);
  const context = await createAppContext(config);
  const web = new WebChannel(context);
  await web.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`Received ${signal}, shutting down`);
    try {
      await web.stop();
      await context.shutdown();
      process.exit(0);
    } catch (err) {
      log.error(`Shutdown failed: ${err}`);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err) => {
  log.fatal(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
