import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, describeError } from "./errors";
import { parseLanguage, type Language } from "./languages";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Single dotenv.config() call. Prefer the project-root .env when running from
// src/ (or any sibling directory); otherwise fall back to the cwd.
(() => {
  const __filename = fileURLToPath(import.meta.url);
  const rootEnv = path.resolve(path.dirname(__filename), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL: string | undefined;
  DOC_PATH: string;
  EMBEDDING_MODEL: string;
  QA_MODEL: string;
  TRANSLATION_MODEL: string;
  TOP_K: number;
  MAX_CONTEXT_CHARS: number;
  CHUNK_OVERLAP: number;
  EMBEDDINGS_CACHE: string;
  EMBED_CONCURRENCY: number;
  EMBED_MAX_RETRIES: number;
  ANSWER_LANGUAGE: Language;
  PROJECT_NAME: string;
  VERBOSE: boolean;
}

type Env = Record<string, string | undefined>;

function str(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

/** Integer variable within [min, max]; unset or blank means `fallback`. */
function int(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new ConfigError(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
  }
  return n;
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws {ConfigError} If OPENAI_API_KEY is missing or any value is out of range.
 */
export function getConfig(env: Env = process.env): Config {
  const OPENAI_API_KEY = env.OPENAI_API_KEY?.trim();
  if (!OPENAI_API_KEY) throw new ConfigError("OPENAI_API_KEY is required.");

  const MAX_CONTEXT_CHARS = int(env, "MAX_CONTEXT_CHARS", 1500, 1, 100_000);
  const CHUNK_OVERLAP = int(env, "CHUNK_OVERLAP", 150, 0, 100_000);
  if (CHUNK_OVERLAP >= MAX_CONTEXT_CHARS) {
    throw new ConfigError(
      `CHUNK_OVERLAP (=${CHUNK_OVERLAP}) must be smaller than MAX_CONTEXT_CHARS (=${MAX_CONTEXT_CHARS})`,
    );
  }

  let ANSWER_LANGUAGE: Language;
  try {
    ANSWER_LANGUAGE = parseLanguage(str(env, "ANSWER_LANGUAGE", "uz"));
  } catch (e) {
    throw new ConfigError(`ANSWER_LANGUAGE: ${describeError(e)}`);
  }

  // Tolerant truthy parsing (supports several common forms).
  const VERBOSE = (() => {
    const v = (env.VERBOSE ?? "").trim().toLowerCase();
    return v === "1" || v === "true" || v === "yes" || v === "on";
  })();

  return {
    OPENAI_API_KEY,
    OPENAI_BASE_URL: env.OPENAI_BASE_URL?.trim() || undefined,
    DOC_PATH: path.resolve(str(env, "DOC_PATH", "project.docx")),
    EMBEDDING_MODEL: str(env, "EMBEDDING_MODEL", "text-embedding-3-large"),
    QA_MODEL: str(env, "QA_MODEL", "gpt-4o"),
    TRANSLATION_MODEL: str(env, "TRANSLATION_MODEL", "gpt-4o-mini"),
    TOP_K: int(env, "TOP_K", 4, 1, 50),
    MAX_CONTEXT_CHARS,
    CHUNK_OVERLAP,
    EMBEDDINGS_CACHE: path.resolve(str(env, "EMBEDDINGS_CACHE", "data/embeddings.json")),
    EMBED_CONCURRENCY: int(env, "EMBED_CONCURRENCY", 4, 1, 32),
    EMBED_MAX_RETRIES: int(env, "EMBED_MAX_RETRIES", 2, 0, 10),
    ANSWER_LANGUAGE,
    PROJECT_NAME: str(env, "PROJECT_NAME", "the project"),
    VERBOSE,
  };
}
