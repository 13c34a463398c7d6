import OpenAI from 'openai';
import { EmbeddingProvider } from './types';
import { EmbeddingError } from './errors';
import { describeError } from '../../utils/errors';
import { EmbeddingConfig } from '../../config/schema';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge:Embedding' });

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'but', 'of', 'to', 'in', 'on', 'for', 'with', 'at', 'by', 'from',
  'is', 'are', 'was', 'be', 'been', 'do', 'does', 'did', 'how', 'what', 'when', 'where', 'which',
  'who', 'why', 'i', 'me', 'my', 'you', 'your', 'we', 'our', 'it', 'its', 'this', 'that', 'can',
  'may', 'will', 'should', 'there', 'as', 'if', 'so',
]);

// Ordered: first match wins. [suffix, replacement, shortest stem kept]
const SUFFIXES: Array<[string, string, number]> = [
  ['ies', 'y', 3],
  ['ing', '', 3],
  ['ed', '', 3],
  // Past participles: withdrawn, drawn, known
  ['wn', 'w', 4],
  ['al', '', 3],
  ['s', '', 3],
];

export function stem(token: string): string {
  for (const [suffix, replacement, minLength] of SUFFIXES) {
    if (!token.endsWith(suffix)) continue;
    if (suffix === 's' && token.endsWith('ss')) return token;
    const base = token.slice(0, token.length - suffix.length) + replacement;
    if (base.length < minLength) return token;
    // Plural of an already-suffixed word, e.g. withdrawals
    return suffix === 's' ? stem(base) : base;
  }
  return token;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((t) => t.length > 0 && !STOP_WORDS.has(t))
    .map(stem);
}

/** 32-bit FNV-1a */
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Scales a vector to unit L2 length. A zero vector has no direction and cannot be compared.
 */
export function normalizeVector(vector: readonly number[]): number[] {
  let norm = 0;
  for (const v of vector) {
    norm += v * v;
  }
  norm = Math.sqrt(norm);
  if (!Number.isFinite(norm) || norm === 0) {
    throw new EmbeddingError('Embedding has zero magnitude');
  }
  return vector.map((v) => v / norm);
}

/**
 * Deterministic feature-hashing embedder. Runs offline; useful as the default
 * and in tests. Unigrams weigh 1, adjacent pairs 0.5.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hashing';

  constructor(private dimension: number = 512) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
  }

  async getEmbedding(text: string): Promise<number[]> {
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      throw new EmbeddingError('Text is empty after normalization');
    }

    const vector = new Array<number>(this.dimension).fill(0);
    const addFeature = (feature: string, weight: number) => {
      const hash = fnv1a(feature);
      const sign = (hash >>> 16) & 1 ? -1 : 1;
      vector[hash % this.dimension] += sign * weight;
    };

    for (let i = 0; i < tokens.length; i++) {
      addFeature(tokens[i], 1);
      if (i + 1 < tokens.length) {
        addFeature(`${tokens[i]}_${tokens[i + 1]}`, 0.5);
      }
    }
    return normalizeVector(vector);
  }

  getDimension(): number {
    return this.dimension;
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(
    apiKey: string,
    private model: string = 'text-embedding-ada-002',
    baseUrl?: string,
    private dimension?: number,
    timeoutMs: number = 30000,
    client?: OpenAI
  ) {
    this.client =
      client ??
      new OpenAI({
        apiKey,
        baseURL: baseUrl,
        timeout: timeoutMs,
        maxRetries: 1,
      });
  }

  async getEmbedding(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Text is empty after normalization');
    }

    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: text,
        // Only the text-embedding-3 family accepts a reduced size
        ...(this.dimension ? { dimensions: this.dimension } : {}),
      });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      log.error(`Failed to get embedding from OpenAI: ${describeError(error)}`);
      throw new EmbeddingError(`Embedding request failed: ${describeError(error)}`, error);
    }

    if (!embedding || embedding.length !== this.getDimension()) {
      throw new EmbeddingError('Invalid response format from OpenAI');
    }
    return normalizeVector(embedding);
  }

  getDimension(): number {
    if (this.dimension) return this.dimension;
    if (this.model.includes('large')) return 3072;
    return 1536;
  }
}

export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case 'hashing':
      return new HashingEmbeddingProvider(config.dimension ?? 512);
    case 'openai':
      if (!config.apiKey) throw new Error('API Key required for OpenAI embedding');
      return new OpenAIEmbeddingProvider(config.apiKey, config.model, config.baseUrl, config.dimension, config.timeoutMs);
  }
}
