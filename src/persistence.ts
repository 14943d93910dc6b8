import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { EmbeddingIndex } from "./embedding-index";
import { CacheCorruptError, InvalidInputError, describeError } from "./errors";
import type { CacheKey } from "./types";

/** Identifies the file as ours; a different value is never read as an index. */
export const CACHE_FORMAT = "doc-qa-embeddings";
/** Bumped on any incompatible change to the record layout. */
export const CACHE_VERSION = 2;
const EMB_ENCODING = "f32le-base64";

/**
 * Durable store for a built index, keyed by `(docHash, model)`.
 * `load` resolves to null on a miss; it never throws for a bad cache.
 */
export interface IndexCache {
  load(key: CacheKey): Promise<EmbeddingIndex | null>;
  save(index: EmbeddingIndex): Promise<void>;
}

const headerSchema = z.object({
  format: z.string(),
  version: z.number(),
});

const recordSchema = z.object({
  format: z.literal(CACHE_FORMAT),
  version: z.literal(CACHE_VERSION),
  meta: z.object({
    docHash: z.string().min(1),
    model: z.string().min(1),
    sourcePath: z.string(),
    savedAt: z.string(),
  }),
  chunkCount: z.number().int().positive(),
  dimension: z.number().int().positive(),
  embEncoding: z.literal(EMB_ENCODING),
  chunks: z.array(z.string()),
  embeddings: z.string(),
});

/** On-disk shape of a cached index. */
export type CacheRecord = z.infer<typeof recordSchema>;

/** Encode floats as little-endian float32 bytes in base64. */
export function encodeFloats(values: Float32Array): string {
  const buf = Buffer.alloc(values.length * 4);
  values.forEach((v, i) => buf.writeFloatLE(v, i * 4));
  return buf.toString("base64");
}

/** Inverse of {@link encodeFloats}. */
export function decodeFloats(encoded: string): Float32Array {
  const buf = Buffer.from(encoded, "base64");
  if (buf.byteLength % 4 !== 0) {
    throw new CacheCorruptError(`Embedding payload is ${buf.byteLength} bytes, not a multiple of 4`);
  }
  const out = new Float32Array(buf.byteLength / 4);
  for (let i = 0; i < out.length; i++) out[i] = buf.readFloatLE(i * 4);
  return out;
}

/** Serialize an index into its cache record. */
export function toRecord(index: EmbeddingIndex, savedAt = new Date()): CacheRecord {
  return {
    format: CACHE_FORMAT,
    version: CACHE_VERSION,
    meta: { ...index.meta, savedAt: savedAt.toISOString() },
    chunkCount: index.size,
    dimension: index.dimension,
    embEncoding: EMB_ENCODING,
    chunks: [...index.chunks],
    embeddings: encodeFloats(index.rawEmbeddings()),
  };
}

/**
 * Parse and structurally check a cache record.
 *
 * @throws {CacheCorruptError} If the record is malformed, of another format or
 * version, or its counts disagree with its payload.
 */
export function fromRecord(input: unknown): EmbeddingIndex {
  const header = headerSchema.safeParse(input);
  if (!header.success) throw new CacheCorruptError("Missing format header");
  if (header.data.format !== CACHE_FORMAT || header.data.version !== CACHE_VERSION) {
    throw new CacheCorruptError(
      `Incompatible cache format ${header.data.format} v${header.data.version} (expected ${CACHE_FORMAT} v${CACHE_VERSION})`,
    );
  }
  const parsed = recordSchema.safeParse(input);
  if (!parsed.success) {
    throw new CacheCorruptError(`Malformed cache record: ${parsed.error.message}`);
  }
  const record = parsed.data;
  if (record.chunks.length !== record.chunkCount) {
    throw new CacheCorruptError(
      `Cache lists ${record.chunks.length} chunks but declares ${record.chunkCount}`,
    );
  }
  const embeddings = decodeFloats(record.embeddings);
  try {
    return EmbeddingIndex.create({
      chunks: record.chunks,
      embeddings,
      dimension: record.dimension,
      meta: {
        docHash: record.meta.docHash,
        model: record.meta.model,
        sourcePath: record.meta.sourcePath,
      },
    });
  } catch (e) {
    if (e instanceof InvalidInputError) throw new CacheCorruptError(e.message, { cause: e });
    throw e;
  }
}

/**
 * JSON-file implementation of {@link IndexCache}. A missing file, a stale
 * key, or a corrupt record all read as a miss so the caller rebuilds.
 */
export class Persistence implements IndexCache {
  private readonly storePath: string;
  private readonly verbose: boolean;

  /**
   * @param storePath File the index is stored in / read from.
   * @param verbose   Emit verbose logging.
   */
  public constructor(storePath: string, verbose = false) {
    this.storePath = storePath;
    this.verbose = verbose;
  }

  public async load(key: CacheKey): Promise<EmbeddingIndex | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch (e) {
      if (isMissingFile(e)) {
        if (this.verbose) console.error(`[RAG][verbose] No embeddings cache at ${this.storePath}`);
        return null;
      }
      console.error(`[RAG] Failed to read embeddings cache at ${this.storePath}:`, e);
      return null;
    }

    let index: EmbeddingIndex;
    try {
      index = fromRecord(JSON.parse(raw));
    } catch (e) {
      if (!(e instanceof CacheCorruptError) && !(e instanceof SyntaxError)) throw e;
      console.error(`[RAG] Ignoring unusable embeddings cache at ${this.storePath}: ${describeError(e)}`);
      return null;
    }

    if (index.meta.docHash !== key.docHash || index.meta.model !== key.model) {
      if (this.verbose) {
        console.error(`[RAG][verbose] Embeddings cache is stale (document or model changed)`);
      }
      return null;
    }
    return index;
  }

  /**
   * Write the index atomically: a sibling temp file is renamed over the
   * target, so readers see either the old record or the new one.
   */
  public async save(index: EmbeddingIndex): Promise<void> {
    const tmpPath = `${this.storePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(toRecord(index)), "utf8");
      await fs.rename(tmpPath, this.storePath);
      if (this.verbose) console.error(`[RAG][verbose] Persisted index to ${this.storePath}`);
    } catch (e) {
      console.error(`[RAG] Failed to save embeddings cache:`, e);
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        if (this.verbose) console.error(`[RAG][verbose] Could not remove ${tmpPath}:`, rmErr);
      });
    }
  }
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
