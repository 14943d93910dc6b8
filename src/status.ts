import { APP_VERSION } from "./config";

/** Counters for the chunk + embedding pipeline. */
export interface IndexingStatus {
  /** Chunks produced from the document. */
  chunksTotal: number;
  /** Chunks with an embedding so far (all of them once loaded from cache). */
  chunksEmbedded: number;
  /** True when the index was restored from the embeddings cache. */
  fromCache: boolean;
}

/**
 * In-memory snapshot of server lifecycle + indexing progress.
 *
 * ready = true ONLY after every chunk has an embedding and the index is
 * queryable.
 */
export interface ServerStatus {
  version: string;
  /** Document being indexed. */
  docPath: string;
  /** Embedding model identifier (may be empty pre-init). */
  modelName: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  /** Message of the last failed build, if any. */
  lastError: string | null;
  indexing: IndexingStatus;
}

/**
 * Class wrapper around mutable server status state, so updates go through
 * one place.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? APP_VERSION,
      docPath: initial?.docPath ?? "",
      modelName: initial?.modelName ?? "",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      lastError: initial?.lastError ?? null,
      indexing: initial?.indexing ?? { chunksTotal: 0, chunksEmbedded: 0, fromCache: false },
    };
  }

  public setDocument(docPath: string, modelName: string) {
    this.data.docPath = docPath;
    this.data.modelName = modelName;
  }

  /** Start a (re)build: clears readiness and counters. */
  public beginBuild(chunksTotal: number) {
    this.data.ready = false;
    this.data.lastError = null;
    this.data.indexing = { chunksTotal, chunksEmbedded: 0, fromCache: false };
  }

  public incEmbedded(count = 1) {
    this.data.indexing.chunksEmbedded += count;
  }

  public markFromCache() {
    this.data.indexing.fromCache = true;
    this.data.indexing.chunksEmbedded = this.data.indexing.chunksTotal;
  }

  /** Put back counters saved before a build that did not complete. */
  public restoreIndexing(indexing: IndexingStatus) {
    this.data.indexing = { ...indexing };
  }

  public markReady() {
    this.data.ready = true;
  }

  public markFailed(message: string) {
    this.data.lastError = message;
  }

  /** Deep copy of the current status. */
  public getStatus(): ServerStatus {
    return { ...this.data, indexing: { ...this.data.indexing } };
  }

  public toJSON() {
    return this.getStatus();
  }
}

// Singleton used by the entry point; tests construct their own.
export const statusManager = new StatusManager();
