/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load and validate environment configuration (see config.ts).
 * 2. Create the OpenAI-backed embedding and completion clients.
 * 3. Read the project document, chunk it, and restore its embeddings from the
 *    cache at EMBEDDINGS_CACHE, or embed every chunk and write the cache.
 * 4. Serve the MCP tools over stdio.
 *
 * ENVIRONMENT VARIABLES (all optional unless marked required):
 *  - OPENAI_API_KEY      (required) Provider API key.
 *  - OPENAI_BASE_URL     Alternative OpenAI-compatible endpoint.
 *  - DOC_PATH            Document to answer from (.docx, .pdf, .txt, .md). Default project.docx.
 *  - EMBEDDING_MODEL     Embedding model id. Default text-embedding-3-large.
 *  - QA_MODEL            Answer model id. Default gpt-4o.
 *  - TRANSLATION_MODEL   Translation model id. Default gpt-4o-mini.
 *  - TOP_K               Chunks of context per question (1-50, default 4).
 *  - MAX_CONTEXT_CHARS   Advisory characters per chunk (default 1500).
 *  - CHUNK_OVERLAP       Characters carried into the next chunk (default 150).
 *  - EMBEDDINGS_CACHE    Cache file path. Default data/embeddings.json.
 *  - EMBED_CONCURRENCY   Parallel embedding requests while building (1-32, default 4).
 *  - EMBED_MAX_RETRIES   Retries for transient provider failures (0-10, default 2).
 *  - ANSWER_LANGUAGE     Language the document is searched and answered in (uz|ru|en, default uz).
 *  - PROJECT_NAME        Subject named in the answer prompt.
 *  - VERBOSE             '1'/'true'/etc enables extra logging.
 */
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getConfig, type Config } from "./config";
import { Embeddings } from "./embeddings";
import { OpenAITextGenerator } from "./generation";
import { Indexer } from "./indexer";
import { Persistence } from "./persistence";
import { QAEngine } from "./qa";
import { createServer } from "./server";
import { statusManager } from "./status";
import { TranslationService } from "./translation";

const config: Config = getConfig();
const {
  OPENAI_API_KEY,
  OPENAI_BASE_URL,
  DOC_PATH,
  EMBEDDING_MODEL,
  QA_MODEL,
  TRANSLATION_MODEL,
  TOP_K,
  MAX_CONTEXT_CHARS,
  CHUNK_OVERLAP,
  EMBEDDINGS_CACHE,
  EMBED_CONCURRENCY,
  EMBED_MAX_RETRIES,
  ANSWER_LANGUAGE,
  PROJECT_NAME,
  VERBOSE,
} = config;

const client = { apiKey: OPENAI_API_KEY, baseUrl: OPENAI_BASE_URL, maxRetries: EMBED_MAX_RETRIES };
const embeddings = new Embeddings({ ...client, modelName: EMBEDDING_MODEL });

const indexer = new Indexer({
  docPath: DOC_PATH,
  embeddings,
  cache: new Persistence(EMBEDDINGS_CACHE, VERBOSE),
  maxChars: MAX_CONTEXT_CHARS,
  overlap: CHUNK_OVERLAP,
  concurrency: EMBED_CONCURRENCY,
  verbose: VERBOSE,
  status: statusManager,
});

const translator = new TranslationService(
  new OpenAITextGenerator({ ...client, modelName: TRANSLATION_MODEL }),
  ANSWER_LANGUAGE,
);
const qa = new QAEngine({
  embeddings,
  generator: new OpenAITextGenerator({ ...client, modelName: QA_MODEL }),
  translator,
  getIndex: () => indexer.getIndex(),
  topK: TOP_K,
  projectName: PROJECT_NAME,
});

// A missing or empty document stops the process before it serves anything.
console.error(`[RAG] Loading embeddings for ${DOC_PATH}`);
await indexer.build();

const server = createServer({ indexer, qa, status: statusManager, defaultLanguage: ANSWER_LANGUAGE });
await server.connect(new StdioServerTransport());
console.error(`[RAG] MCP server ready on stdio.`);
