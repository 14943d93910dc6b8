import { embed, type EmbeddingModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { ProviderError, describeError } from "./errors";

/**
 * Anything that turns text into a vector for one fixed model. The indexer and
 * QA engine only depend on this interface, so tests can supply a fake.
 */
export interface EmbeddingProvider {
  /** Model identifier; part of the cache-validity key. */
  getModelName(): string;
  embed(text: string): Promise<Float32Array>;
}

export interface EmbeddingsOptions {
  modelName: string;
  apiKey?: string;
  /** Alternative OpenAI-compatible endpoint. */
  baseUrl?: string;
  /** Retries per call for transient failures (rate limit, 5xx, timeout). Default 2. */
  maxRetries?: number;
  /** Prebuilt SDK model; when set, apiKey and baseUrl are not used. */
  model?: EmbeddingModel<string>;
}

/**
 * Remote embedding provider backed by the OpenAI embeddings endpoint.
 * A single instance can be reused for any number of embed() calls.
 */
export class Embeddings implements EmbeddingProvider {
  private readonly modelName: string;
  private readonly model: EmbeddingModel<string>;
  private readonly maxRetries: number;

  public constructor(opts: EmbeddingsOptions) {
    this.modelName = opts.modelName;
    this.maxRetries = opts.maxRetries ?? 2;
    this.model =
      opts.model ??
      createOpenAI({ apiKey: opts.apiKey, baseURL: opts.baseUrl }).textEmbeddingModel(this.modelName);
  }

  public getModelName(): string {
    return this.modelName;
  }

  /**
   * Embed a single text. Retryable API errors are retried by the SDK with
   * exponential backoff before giving up.
   *
   * @throws {ProviderError} If the call fails or returns an unusable vector.
   */
  public async embed(text: string): Promise<Float32Array> {
    let values: number[];
    try {
      const result = await embed({ model: this.model, value: text, maxRetries: this.maxRetries });
      values = result.embedding;
    } catch (e) {
      throw new ProviderError(`Embedding request failed: ${describeError(e)}`, { cause: e });
    }
    return toVector(values);
  }
}

/**
 * Validate a provider response and convert it to a Float32Array.
 *
 * @throws {ProviderError} If the vector is empty or holds non-finite values.
 */
export function toVector(values: readonly number[]): Float32Array {
  if (values.length === 0) throw new ProviderError("Provider returned an empty embedding");
  if (!values.every(Number.isFinite)) {
    throw new ProviderError("Provider returned a non-finite embedding value");
  }
  return Float32Array.from(values);
}

