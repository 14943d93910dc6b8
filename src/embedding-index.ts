import { InvalidInputError } from "./errors";
import type { IndexMeta, ScoredChunk, Vector } from "./types";

/** Norms below this are clamped so zero rows do not divide by zero. */
const MIN_NORM = 1e-10;

/** Raw input accepted by {@link EmbeddingIndex.create}. */
export interface EmbeddingIndexInit {
  chunks: readonly string[];
  /** One vector per chunk, or a flat row-major buffer of `chunks.length * dimension` floats. */
  embeddings: readonly Vector[] | Float32Array;
  /** Required when `embeddings` is a flat buffer. */
  dimension?: number;
  meta: IndexMeta;
}

/**
 * Immutable in-memory vector index over document chunks.
 *
 * Row i of the embedding matrix belongs to chunk i. Unit-length copies of
 * every row are computed once in {@link create}; a query then costs one dot
 * product per chunk. Instances are never mutated after construction and may
 * be shared freely between concurrent readers.
 */
export class EmbeddingIndex {
  public readonly chunks: readonly string[];
  public readonly meta: IndexMeta;
  public readonly dimension: number;
  /** Flat row-major raw embeddings as produced by the provider. */
  private readonly raw: Float32Array;
  /** Flat row-major L2-normalized embeddings. */
  private readonly normalized: Float64Array;

  private constructor(
    chunks: readonly string[],
    raw: Float32Array,
    dimension: number,
    meta: IndexMeta,
  ) {
    this.chunks = Object.freeze([...chunks]);
    this.raw = raw;
    this.dimension = dimension;
    this.meta = Object.freeze({ ...meta });
    this.normalized = EmbeddingIndex.normalizeRows(raw, dimension);
  }

  /**
   * Validate the inputs and return a fully normalized index.
   *
   * @throws {InvalidInputError} If there are no chunks, the row count differs
   * from the chunk count, or rows differ in dimension.
   */
  public static create(init: EmbeddingIndexInit): EmbeddingIndex {
    const { chunks, meta } = init;
    if (chunks.length === 0) throw new InvalidInputError("Cannot build an index with no chunks");

    if (init.embeddings instanceof Float32Array) {
      const dimension = init.dimension ?? 0;
      if (!Number.isInteger(dimension) || dimension <= 0) {
        throw new InvalidInputError("A flat embedding buffer needs a positive dimension");
      }
      if (init.embeddings.length !== chunks.length * dimension) {
        throw new InvalidInputError(
          `Embedding buffer holds ${init.embeddings.length} floats, expected ${chunks.length} x ${dimension}`,
        );
      }
      return new EmbeddingIndex(chunks, Float32Array.from(init.embeddings), dimension, meta);
    }

    const rows = init.embeddings;
    if (rows.length !== chunks.length) {
      throw new InvalidInputError(
        `Chunk count (${chunks.length}) does not match embedding rows (${rows.length})`,
      );
    }
    const dimension = rows[0].length;
    if (dimension === 0) throw new InvalidInputError("Embeddings must not be empty");
    const raw = new Float32Array(rows.length * dimension);
    rows.forEach((row, i) => {
      if (row.length !== dimension) {
        throw new InvalidInputError(
          `Embedding ${i} has dimension ${row.length}, expected ${dimension}`,
        );
      }
      for (let j = 0; j < dimension; j++) raw[i * dimension + j] = row[j];
    });
    return new EmbeddingIndex(chunks, raw, dimension, meta);
  }

  /** Number of indexed chunks (= embedding rows). */
  public get size(): number {
    return this.chunks.length;
  }

  /** Copy of the raw embedding buffer, for serialization. */
  public rawEmbeddings(): Float32Array {
    return Float32Array.from(this.raw);
  }

  /** Copy of row `i` of the raw embeddings. */
  public embeddingAt(i: number): Float32Array {
    if (!Number.isInteger(i) || i < 0 || i >= this.size) {
      throw new RangeError(`Row ${i} out of range (size ${this.size})`);
    }
    return this.raw.slice(i * this.dimension, (i + 1) * this.dimension);
  }

  /**
   * Return the `k` chunks most similar to `query`, best first.
   *
   * A zero-norm query has no defined cosine similarity and yields `[]`.
   * Equal scores keep document order.
   *
   * @throws {InvalidInputError} If a non-zero query's length differs from the index dimension.
   */
  public topK(query: Vector, k: number): ScoredChunk[] {
    const limit = Math.min(Math.floor(k), this.size);
    if (!(limit > 0)) return [];

    let sumSq = 0;
    for (let j = 0; j < query.length; j++) sumSq += query[j] * query[j];
    const norm = Math.sqrt(sumSq);
    if (norm === 0) return [];
    if (query.length !== this.dimension) {
      throw new InvalidInputError(
        `Query has dimension ${query.length}, index has ${this.dimension}`,
      );
    }

    const scores = new Float64Array(this.size);
    for (let i = 0; i < this.size; i++) {
      const offset = i * this.dimension;
      let dot = 0;
      for (let j = 0; j < this.dimension; j++) dot += this.normalized[offset + j] * query[j];
      scores[i] = dot / norm;
    }

    const order = Array.from({ length: this.size }, (_, i) => i);
    order.sort((a, b) => scores[b] - scores[a] || a - b);
    return order.slice(0, limit).map((i) => ({ text: this.chunks[i], score: scores[i] }));
  }

  private static normalizeRows(raw: Float32Array, dimension: number): Float64Array {
    const out = new Float64Array(raw.length);
    for (let offset = 0; offset < raw.length; offset += dimension) {
      let sumSq = 0;
      for (let j = 0; j < dimension; j++) sumSq += raw[offset + j] * raw[offset + j];
      const norm = Math.max(Math.sqrt(sumSq), MIN_NORM);
      for (let j = 0; j < dimension; j++) out[offset + j] = raw[offset + j] / norm;
    }
    return out;
  }
}
