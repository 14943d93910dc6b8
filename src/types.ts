/**
 * Metadata carried by every embedding index. `docHash` and `model` together
 * form the cache-validity key; `sourcePath` is informational only.
 */
export interface IndexMeta {
  /** SHA-256 hex digest of the document paragraphs joined by newlines. */
  readonly docHash: string;
  /** Embedding model identifier the vectors were produced with. */
  readonly model: string;
  /** Path of the document the index was built from. */
  readonly sourcePath: string;
}

/** Key a cached index must match to be reused. */
export type CacheKey = Pick<IndexMeta, "docHash" | "model">;

/** A single retrieval hit. */
export interface ScoredChunk {
  readonly text: string;
  /** Cosine similarity in [-1, 1]. */
  readonly score: number;
}

/** Vector input accepted by the index and query paths. */
export type Vector = ArrayLike<number>;
