/** Stable machine-readable error codes surfaced by the index and QA layers. */
export type RagErrorCode =
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "PROVIDER_ERROR"
  | "CACHE_CORRUPT"
  | "CONFIG_ERROR"
  | "NOT_READY";

/** Base class for every error this package throws on purpose. */
export class RagError extends Error {
  public readonly code: RagErrorCode;

  public constructor(code: RagErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RagError";
    this.code = code;
  }
}

/** Thrown when the source document does not exist. */
export class DocumentNotFoundError extends RagError {
  public readonly path: string;

  public constructor(path: string) {
    super("NOT_FOUND", `Document not found at ${path}`);
    this.name = "DocumentNotFoundError";
    this.path = path;
  }
}

/** Empty documents, bad chunker parameters, mismatched query vectors. */
export class InvalidInputError extends RagError {
  public constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/** Embedding or generation call failed, or returned something unusable. */
export class ProviderError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("PROVIDER_ERROR", message, options);
    this.name = "ProviderError";
  }
}

/**
 * Cache file present but unreadable or inconsistent. Only ever thrown and
 * caught inside the persistence layer; callers see a cache miss.
 */
export class CacheCorruptError extends RagError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("CACHE_CORRUPT", message, options);
    this.name = "CacheCorruptError";
  }
}

export class ConfigError extends RagError {
  public constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

/** Thrown when attempting to query before the index has been built. */
export class IndexNotReadyError extends RagError {
  public constructor() {
    super("NOT_READY", "Index not ready. Call build() first.");
    this.name = "IndexNotReadyError";
  }
}

/** Render any thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
