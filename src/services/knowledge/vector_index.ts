import { IndexMatch, VectorIndex } from './types';
import { IndexLoadError } from './errors';

const MAGIC = 'FLIX';
const FORMAT_VERSION = 1;
// magic(4) + version(4) + dimension(4) + count(4)
const HEADER_BYTES = 16;

/**
 * Exact nearest-neighbour index over squared Euclidean distance. Rows are kept
 * in one contiguous Float32Array in insertion order.
 */
export class FlatL2Index implements VectorIndex {
  private data: Float32Array;
  private count: number;

  constructor(readonly dimension: number, data?: Float32Array, count: number = 0) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Index dimension must be a positive integer, got ${dimension}`);
    }
    this.data = data ?? new Float32Array(0);
    this.count = count;
  }

  get size(): number {
    return this.count;
  }

  add(vectors: readonly (readonly number[])[]): void {
    for (const vector of vectors) {
      if (vector.length !== this.dimension) {
        throw new RangeError(`Vector has dimension ${vector.length}, index expects ${this.dimension}`);
      }
    }
    if (vectors.length === 0) return;

    const next = new Float32Array((this.count + vectors.length) * this.dimension);
    next.set(this.data.subarray(0, this.count * this.dimension));
    vectors.forEach((vector, i) => next.set(vector, (this.count + i) * this.dimension));
    this.data = next;
    this.count += vectors.length;
  }

  search(query: readonly number[], k: number): IndexMatch[] {
    if (query.length !== this.dimension) {
      throw new RangeError(`Query has dimension ${query.length}, index expects ${this.dimension}`);
    }
    const matches: IndexMatch[] = [];
    for (let position = 0; position < this.count; position++) {
      const offset = position * this.dimension;
      let distance = 0;
      for (let j = 0; j < this.dimension; j++) {
        const diff = this.data[offset + j] - query[j];
        distance += diff * diff;
      }
      matches.push({ position, distance });
    }
    // Array.prototype.sort is stable: equal distances keep insertion order
    matches.sort((a, b) => a.distance - b.distance);
    return matches.slice(0, k);
  }

  clone(): FlatL2Index {
    return new FlatL2Index(this.dimension, this.data.slice(0, this.count * this.dimension), this.count);
  }

  /** Copy holding only the first `count` rows. */
  prefix(count: number): FlatL2Index {
    if (!Number.isInteger(count) || count < 0 || count > this.count) {
      throw new RangeError(`Cannot take ${count} rows from an index of ${this.count}`);
    }
    return new FlatL2Index(this.dimension, this.data.slice(0, count * this.dimension), count);
  }

  serialize(): Buffer {
    const body = this.count * this.dimension * 4;
    const buffer = Buffer.alloc(HEADER_BYTES + body);
    buffer.write(MAGIC, 0, 'ascii');
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimension, 8);
    buffer.writeUInt32LE(this.count, 12);
    for (let i = 0; i < this.count * this.dimension; i++) {
      buffer.writeFloatLE(this.data[i], HEADER_BYTES + i * 4);
    }
    return buffer;
  }

  static deserialize(buffer: Buffer): FlatL2Index {
    if (buffer.length < HEADER_BYTES || buffer.toString('ascii', 0, 4) !== MAGIC) {
      throw new IndexLoadError('Index file is not a recognised vector index');
    }
    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new IndexLoadError(`Unsupported index format version ${version}`);
    }
    const dimension = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    if (dimension === 0) {
      throw new IndexLoadError('Index file declares a zero dimension');
    }
    const expected = HEADER_BYTES + count * dimension * 4;
    if (buffer.length !== expected) {
      throw new IndexLoadError(`Index file is ${buffer.length} bytes, expected ${expected} for ${count} vectors`);
    }

    const data = new Float32Array(count * dimension);
    for (let i = 0; i < data.length; i++) {
      data[i] = buffer.readFloatLE(HEADER_BYTES + i * 4);
    }
    return new FlatL2Index(dimension, data, count);
  }
}

/** Cosine similarity of unit vectors from their squared L2 distance, clamped to [0, 1]. */
export function similarityFromDistance(squaredDistance: number): number {
  return Math.min(1, Math.max(0, 1 - squaredDistance / 2));
}
