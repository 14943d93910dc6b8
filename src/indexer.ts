import { createHash } from "node:crypto";
import { chunkParagraphs, DEFAULT_MAX_CHARS, DEFAULT_OVERLAP } from "./chunker";
import { mapWithConcurrency } from "./concurrency";
import { readParagraphs as readParagraphsFromDisk, type ParagraphReader } from "./document";
import { EmbeddingIndex } from "./embedding-index";
import type { EmbeddingProvider } from "./embeddings";
import { IndexNotReadyError, ProviderError, describeError } from "./errors";
import type { IndexCache } from "./persistence";
import type { StatusManager } from "./status";

/**
 * Options for building (or restoring) an index. Only `docPath` and
 * `embeddings` are required.
 */
export interface BuildIndexOptions {
  docPath: string; // source document
  embeddings: EmbeddingProvider; // provides vectors + the model id for the cache key
  cache?: IndexCache; // omit to always build and never persist
  maxChars?: number; // chunk budget (default 1200)
  overlap?: number; // chunk overlap (default 150)
  concurrency?: number; // max parallel embedding calls (default 4)
  verbose?: boolean; // extra logging
  readParagraphs?: ParagraphReader; // defaults to the on-disk reader
  status?: StatusManager; // progress sink
}

/** SHA-256 hex digest of the paragraphs joined by newlines. */
export function hashDocument(paragraphs: readonly string[]): string {
  return createHash("sha256").update(paragraphs.join("\n"), "utf8").digest("hex");
}

/**
 * Chunk `paragraphs`, then return the cached index for this document + model
 * or embed every chunk and persist a fresh one.
 *
 * Embedding calls run through a bounded pool; row order always follows chunk
 * order. The first failed call aborts the build and nothing is cached.
 *
 * @throws {InvalidInputError} If there are no paragraphs.
 * @throws {ProviderError} If any embedding call fails or vectors disagree in dimension.
 */
export async function buildIndex(
  paragraphs: readonly string[],
  opts: BuildIndexOptions,
): Promise<EmbeddingIndex> {
  const { embeddings, cache, verbose = false, status } = opts;
  const chunks = chunkParagraphs(
    paragraphs,
    opts.maxChars ?? DEFAULT_MAX_CHARS,
    opts.overlap ?? DEFAULT_OVERLAP,
  );
  const model = embeddings.getModelName();
  const docHash = hashDocument(paragraphs);
  status?.beginBuild(chunks.length);

  const cached = cache ? await cache.load({ docHash, model }) : null;
  if (cached) {
    console.error(`[RAG] Loaded cached embeddings: ${cached.size} chunks (${model}).`);
    status?.markFromCache();
    status?.markReady();
    return cached;
  }

  console.error(
    `[RAG] No valid cache found. Embedding ${chunks.length} chunks from ${opts.docPath} ...`,
  );
  const concurrency = opts.concurrency ?? 4;
  let done = 0;
  let failed = false;
  const vectors = await mapWithConcurrency(chunks, concurrency, async (chunk) => {
    let vec: Float32Array;
    try {
      vec = await embeddings.embed(chunk);
    } catch (e) {
      failed = true;
      throw e;
    }
    // calls still in flight after the pool rejected do not count
    if (failed) return vec;
    done++;
    status?.incEmbedded();
    if (verbose && done % 50 === 0) {
      const pct = ((done / chunks.length) * 100).toFixed(1);
      console.error(`[RAG][verbose] Embedding progress: ${done}/${chunks.length} (${pct}%)`);
    }
    return vec;
  });

  const dimension = vectors[0].length;
  vectors.forEach((vec, i) => {
    if (vec.length !== dimension) {
      throw new ProviderError(
        `Embedding for chunk ${i} has dimension ${vec.length}, expected ${dimension}`,
      );
    }
  });

  const index = EmbeddingIndex.create({
    chunks,
    embeddings: vectors,
    meta: { docHash, model, sourcePath: opts.docPath },
  });
  if (cache) await cache.save(index);
  console.error(`[RAG] Embeddings ready (${index.size} x ${index.dimension}).`);
  status?.markReady();
  return index;
}

/**
 * Read the document at `opts.docPath` and build or restore its index.
 *
 * @throws {DocumentNotFoundError} If the document is missing.
 * @throws {InvalidInputError} If it has no non-blank paragraphs.
 * @throws {ProviderError} If embedding fails.
 */
export async function buildOrLoadIndex(opts: BuildIndexOptions): Promise<EmbeddingIndex> {
  const read = opts.readParagraphs ?? readParagraphsFromDisk;
  const paragraphs = await read(opts.docPath);
  return buildIndex(paragraphs, opts);
}

/**
 * Holds the one index a server process answers from. {@link build} may be
 * called again after the document changes; readers keep the previous index
 * until the new one is complete.
 */
export class Indexer {
  private readonly opts: BuildIndexOptions;
  private index: EmbeddingIndex | null = null;

  public constructor(opts: BuildIndexOptions) {
    this.opts = opts;
    opts.status?.setDocument(opts.docPath, opts.embeddings.getModelName());
  }

  /** Whether {@link build} has completed successfully at least once. */
  public isReady(): boolean {
    return this.index !== null;
  }

  /** @throws {IndexNotReadyError} Before the first successful build. */
  public getIndex(): EmbeddingIndex {
    if (!this.index) throw new IndexNotReadyError();
    return this.index;
  }

  public async build(): Promise<EmbeddingIndex> {
    const { status } = this.opts;
    const previous = status?.getStatus().indexing;
    try {
      this.index = await buildOrLoadIndex(this.opts);
      return this.index;
    } catch (e) {
      status?.markFailed(describeError(e));
      // the previous index is still being served
      if (this.index && previous) {
        status?.restoreIndexing(previous);
        status?.markReady();
      }
      throw e;
    }
  }
}
