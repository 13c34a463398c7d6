import { z } from 'zod';

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(['hashing', 'openai']).default('hashing'),
  model: z.string().default('text-embedding-ada-002'),
  apiKey: z.string().optional(),
  baseUrl: z.string().optional(),
  // Hashing: bucket count. OpenAI: requested `dimensions`, else the model's native size
  dimension: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(30000),
});

export const KnowledgeBaseConfigSchema = z.object({
  storage_path: z.string().default('./data/knowledge'),
  index_file: z.string().default('passages.index'),
  metadata_file: z.string().default('passages.json'),
  default_k: z.number().int().positive().default(3),
  seed_file: z.string().default('./data/seed_passages.json'),
  seed_on_empty: z.boolean().default(true),
  embedding: EmbeddingConfigSchema.default({}),
});

export const ToolsConfigSchema = z.object({
  timeoutMs: z.number().int().positive().default(10000),
  maxCallsPerConversation: z.number().int().positive().default(12), // 单个会话的工具调用上限
  maxUnproductiveRetrievals: z.number().int().positive().default(3),
  similarityFloor: z.number().min(0).max(1).default(0.15),
  defaultCompoundsPerYear: z.number().int().positive().default(12),
  budgetIdleTtlMs: z.number().int().positive().default(30 * 60 * 1000),
});

export const WebSearchConfigSchema = z.object({
  enabled: z.boolean().default(true),
  baseUrl: z.string().default('https://api.duckduckgo.com/'),
  timeoutMs: z.number().int().positive().default(10000),
  maxRelatedTopics: z.number().int().min(0).default(3),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().default(8000),
  host: z.string().default('0.0.0.0'),
  allowed_origins: z.array(z.string()).default(['http://localhost:3000', 'http://localhost:8000']),
  environment: z.string().default('development'),
});

export const ConfigSchema = z.object({
  knowledge_base: KnowledgeBaseConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  web_search: WebSearchConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type KnowledgeBaseConfig = z.infer<typeof KnowledgeBaseConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type WebSearchConfig = z.infer<typeof WebSearchConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
