import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import { Config, ConfigSchema } from './schema';
import { getProjectRoot } from '../utils/paths';
import logger from '../utils/logger';

const log = logger.child({ module: 'Config' });

export function getConfigPaths(): string[] {
  return [
    path.join(process.cwd(), 'config.json'),
    path.join(getProjectRoot(), 'config.json'),
    path.join(os.homedir(), '.finsight', 'config.json'),
  ];
}

function parsePort(value: string): number | undefined {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 ? port : undefined;
}

/**
 * Environment variables win over file values. Only set keys are applied so
 * schema defaults survive for the rest.
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const next: Config = {
    ...config,
    knowledge_base: { ...config.knowledge_base, embedding: { ...config.knowledge_base.embedding } },
    web_search: { ...config.web_search },
    server: { ...config.server },
  };

  if (env.OPENAI_API_KEY) next.knowledge_base.embedding.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_API_BASE) next.knowledge_base.embedding.baseUrl = env.OPENAI_API_BASE;
  if (env.FINSIGHT_DATA_DIR) next.knowledge_base.storage_path = env.FINSIGHT_DATA_DIR;
  if (env.SEARCH_API_URL) next.web_search.baseUrl = env.SEARCH_API_URL;
  if (env.ENVIRONMENT) next.server.environment = env.ENVIRONMENT;
  if (env.PORT) {
    const port = parsePort(env.PORT);
    if (port === undefined) {
      log.warn(`Ignoring invalid PORT value: ${env.PORT}`);
    } else {
      next.server.port = port;
    }
  }
  return next;
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const paths = configPath ? [configPath] : getConfigPaths();

  for (const p of paths) {
    if (await fs.pathExists(p)) {
      try {
        const data: unknown = await fs.readJson(p);
        const config = ConfigSchema.parse(data);
        log.info(`Loaded config from ${p}`);
        return applyEnvOverrides(config);
      } catch (err) {
        log.warn(`Failed to load config from ${p}: ${err}`);
      }
    }
  }

  log.info('Using default configuration');
  return applyEnvOverrides(ConfigSchema.parse({}));
}

/**
 * Resolves a configured path against the project root unless it is already absolute.
 */
export function resolveConfiguredPath(value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(getProjectRoot(), value);
}
