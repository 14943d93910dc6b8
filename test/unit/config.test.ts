import path from "node:path";
import { describe, it, expect } from "vitest";
import { getConfig } from "../../src/config";
import { ConfigError } from "../../src/errors";

const base = { OPENAI_API_KEY: "test-key" };

describe("getConfig", () => {
  it("requires an API key", () => {
    expect(() => getConfig({})).toThrow(ConfigError);
    expect(() => getConfig({ OPENAI_API_KEY: "   " })).toThrow("OPENAI_API_KEY is required.");
  });

  it("applies defaults", () => {
    expect(getConfig(base)).toEqual({
      OPENAI_API_KEY: "test-key",
      OPENAI_BASE_URL: undefined,
      DOC_PATH: path.resolve("project.docx"),
      EMBEDDING_MODEL: "text-embedding-3-large",
      QA_MODEL: "gpt-4o",
      TRANSLATION_MODEL: "gpt-4o-mini",
      TOP_K: 4,
      MAX_CONTEXT_CHARS: 1500,
      CHUNK_OVERLAP: 150,
      EMBEDDINGS_CACHE: path.resolve("data/embeddings.json"),
      EMBED_CONCURRENCY: 4,
      EMBED_MAX_RETRIES: 2,
      ANSWER_LANGUAGE: "uz",
      PROJECT_NAME: "the project",
      VERBOSE: false,
    });
  });

  it("reads overrides", () => {
    const config = getConfig({
      ...base,
      DOC_PATH: "/srv/docs/plan.pdf",
      EMBEDDING_MODEL: " text-embedding-3-small ",
      TOP_K: "8",
      MAX_CONTEXT_CHARS: "900",
      CHUNK_OVERLAP: "0",
      EMBED_CONCURRENCY: "16",
      ANSWER_LANGUAGE: "EN",
      VERBOSE: "yes",
    });

    expect(config).toMatchObject({
      DOC_PATH: "/srv/docs/plan.pdf",
      EMBEDDING_MODEL: "text-embedding-3-small",
      TOP_K: 8,
      MAX_CONTEXT_CHARS: 900,
      CHUNK_OVERLAP: 0,
      EMBED_CONCURRENCY: 16,
      ANSWER_LANGUAGE: "en",
      VERBOSE: true,
    });
  });

  it("rejects malformed numbers", () => {
    expect(() => getConfig({ ...base, TOP_K: "four" })).toThrow(ConfigError);
    expect(() => getConfig({ ...base, TOP_K: "2.5" })).toThrow(ConfigError);
    expect(() => getConfig({ ...base, EMBED_CONCURRENCY: "0" })).toThrow(
      'EMBED_CONCURRENCY must be an integer between 1 and 32 (got "0")',
    );
  });

  it("rejects an overlap as large as the chunk budget", () => {
    expect(() => getConfig({ ...base, MAX_CONTEXT_CHARS: "100", CHUNK_OVERLAP: "100" })).toThrow(
      ConfigError,
    );
  });

  it("rejects an unknown answer language", () => {
    expect(() => getConfig({ ...base, ANSWER_LANGUAGE: "fr" })).toThrow(/ANSWER_LANGUAGE/);
  });
});
