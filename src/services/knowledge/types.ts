
export interface PassageInput {
  title: string;
  content: string;
}

export interface Passage extends PassageInput {
  id: string;
  created_at: number;
}

export interface SearchHit {
  passage: Passage;
  /** Cosine similarity in [0, 1] derived from the L2 distance of unit vectors */
  score: number;
  distance: number;
}

export interface EmbeddingProvider {
  readonly name: string;
  getEmbedding(text: string): Promise<number[]>;
  getDimension(): number;
}

/**
 * Immutable view of the store. Ingest builds a new one and swaps the reference.
 */
export interface KnowledgeSnapshot {
  readonly passages: readonly Passage[];
  readonly index: VectorIndex;
}

export interface IndexMatch {
  position: number;
  distance: number;
}

export interface VectorIndex {
  readonly dimension: number;
  readonly size: number;
  add(vectors: readonly (readonly number[])[]): void;
  search(query: readonly number[], k: number): IndexMatch[];
  clone(): VectorIndex;
  serialize(): Buffer;
}
