import { describe, it, expect, vi } from "vitest";
import { APICallError } from "ai";
import { MockEmbeddingModelV1 } from "ai/test";
import { Embeddings, toVector } from "../../src/embeddings";
import { ProviderError } from "../../src/errors";

function rateLimited(): APICallError {
  return new APICallError({
    message: "rate limited",
    url: "https://api.test/v1/embeddings",
    requestBodyValues: {},
    statusCode: 429,
    isRetryable: true,
  });
}

describe("toVector", () => {
  it("converts a provider response", () => {
    const vec = toVector([0.5, -1, 2]);
    expect(vec).toBeInstanceOf(Float32Array);
    expect(Array.from(vec)).toEqual([0.5, -1, 2]);
  });

  it("rejects malformed responses", () => {
    expect(() => toVector([])).toThrow(ProviderError);
    expect(() => toVector([1, Number.NaN])).toThrow("Provider returned a non-finite embedding value");
    expect(() => toVector([Number.POSITIVE_INFINITY])).toThrow(ProviderError);
  });
});

describe("Embeddings", () => {
  it("returns the model's vector as float32", async () => {
    const doEmbed = vi.fn(async () => ({ embeddings: [[0.25, -1]] }));
    const provider = new Embeddings({
      modelName: "mock-embed",
      model: new MockEmbeddingModelV1<string>({ doEmbed }),
    });

    const vec = await provider.embed("hello");

    expect(vec).toBeInstanceOf(Float32Array);
    expect(Array.from(vec)).toEqual([0.25, -1]);
    expect(doEmbed).toHaveBeenCalledWith(expect.objectContaining({ values: ["hello"] }));
    expect(provider.getModelName()).toBe("mock-embed");
  });

  it("wraps a failed request in ProviderError", async () => {
    const doEmbed = vi.fn(async (): Promise<{ embeddings: number[][] }> => {
      throw rateLimited();
    });
    const provider = new Embeddings({
      modelName: "mock-embed",
      model: new MockEmbeddingModelV1<string>({ doEmbed }),
      maxRetries: 0,
    });

    const err = await provider.embed("hello").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ code: "PROVIDER_ERROR", message: "Embedding request failed: rate limited" });
    expect(doEmbed).toHaveBeenCalledTimes(1);
  });

  it("retries a retryable failure up to maxRetries", async () => {
    const doEmbed = vi.fn(async (): Promise<{ embeddings: number[][] }> => {
      throw rateLimited();
    });
    const provider = new Embeddings({
      modelName: "mock-embed",
      model: new MockEmbeddingModelV1<string>({ doEmbed }),
      maxRetries: 1,
    });

    await expect(provider.embed("hello")).rejects.toBeInstanceOf(ProviderError);
    expect(doEmbed).toHaveBeenCalledTimes(2);
  });

  it("rejects a non-finite vector from the model", async () => {
    const provider = new Embeddings({
      modelName: "mock-embed",
      model: new MockEmbeddingModelV1<string>({
        doEmbed: async () => ({ embeddings: [[1, Number.NaN]] }),
      }),
    });

    await expect(provider.embed("hello")).rejects.toThrow(
      "Provider returned a non-finite embedding value",
    );
  });
});
