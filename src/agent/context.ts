import { AxiosInstance } from 'axios';
import { Config } from '../config/schema';
import { KnowledgeStore } from '../services/knowledge/service';
import { createEmbeddingProvider } from '../services/knowledge/embedding';
import { EmbeddingProvider } from '../services/knowledge/types';
import { ToolRegistry } from './tools/registry';
import { KnowledgeSearchTool } from './tools/knowledge';
import { MarketDataTool, WebSearchTool } from './tools/web';
import { CompoundInterestTool, InvestmentReturnsTool } from './tools/finance';
import { CalculateTool } from './tools/calculator';
import { ToolDispatcher } from './dispatcher';
import logger from '../utils/logger';

const log = logger.child({ module: 'System' });

/**
 * Everything the process holds for its lifetime: the resident index, the tool
 * registry and the per-conversation budgets behind the dispatcher.
 */
export interface AppContext {
  config: Config;
  knowledge: KnowledgeStore;
  dispatcher: ToolDispatcher;
  shutdown(): Promise<void>;
}

export interface AppContextOverrides {
  embedder?: EmbeddingProvider;
  http?: AxiosInstance;
}

export function buildToolRegistry(config: Config, knowledge: KnowledgeStore, http?: AxiosInstance): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(new KnowledgeSearchTool(knowledge, config.knowledge_base.default_k));
  if (config.web_search.enabled) {
    registry.register(new WebSearchTool(config.web_search, http));
  }
  registry.register(new MarketDataTool());
  registry.register(new CompoundInterestTool(config.tools.defaultCompoundsPerYear));
  registry.register(new InvestmentReturnsTool());
  registry.register(new CalculateTool());
  return registry;
}

export async function createAppContext(config: Config, overrides: AppContextOverrides = {}): Promise<AppContext> {
  const embedder = overrides.embedder ?? createEmbeddingProvider(config.knowledge_base.embedding);
  log.info(`Using ${embedder.name} embeddings (dimension ${embedder.getDimension()})`);

  const knowledge = await KnowledgeStore.open(config.knowledge_base, embedder);
  const registry = buildToolRegistry(config, knowledge, overrides.http);
  const dispatcher = ToolDispatcher.fromConfig(registry, config.tools);
  log.info(`Registered tools: ${registry.toolNames.join(', ')}`);

  return {
    config,
    knowledge,
    dispatcher,
    async shutdown() {
      // Ingests persist as they commit; wait for any still in flight
      await knowledge.close();
      log.info('Context shut down');
    },
  };
}
