import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import { RagError, describeError } from "./errors";
import type { Indexer } from "./indexer";
import { LANGUAGES, LANGUAGE_SETTINGS, type Language } from "./languages";
import type { QAEngine } from "./qa";
import type { StatusManager } from "./status";

/** Shared state the tool handlers close over. */
export interface ServerDeps {
  indexer: Pick<Indexer, "isReady">;
  qa: QAEngine;
  status: StatusManager;
  /** Language used when a caller does not name one. */
  defaultLanguage: Language;
}

export const COULD_NOT_ANSWER = "Sorry, I could not answer right now. Please try again.";
export const INDEX_NOT_READY = "The document index is still being built. Please try again shortly.";

const askArgs = z.object({
  question: z.string().trim().min(1),
  language: z.enum(LANGUAGES).optional(),
});

const searchArgs = z.object({
  query: z.string().trim().min(1),
  top_k: z.number().int().min(1).max(50).default(5),
});

function textResult(text: string, isError = false): CallToolResult {
  return { content: [{ type: "text", text }], isError };
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, issues);
  }
  return parsed.data;
}

/**
 * Build an MCP Server exposing the document QA tools. The index and engines
 * are shared; nothing expensive happens per server instance.
 *
 * Tool contracts:
 *  ask_question     { question, language? } -> answer text in that language,
 *                                             followed by a follow-up prompt
 *  search_document  { query, top_k? }       -> { matches: [{ rank, score, text }] }
 *  index_status     {}                      -> status snapshot JSON
 *
 * Provider and index failures come back as `isError` tool results so one
 * failed question never takes the server down.
 */
export function createServer(deps: ServerDeps): Server {
  const { indexer, qa, status, defaultLanguage } = deps;
  const server = new Server(
    { name: "doc-qa-server", version: APP_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "ask_question",
        description:
          "Answer a question about the project document using retrieval-augmented generation. " +
          "The answer is written in the requested language.",
        inputSchema: {
          type: "object",
          properties: {
            question: { type: "string", description: "The user's question." },
            language: {
              type: "string",
              enum: [...LANGUAGES],
              description: `Answer language (${LANGUAGES.map((l) => `${l} = ${LANGUAGE_SETTINGS[l].label}`).join(", ")}). Defaults to ${defaultLanguage}.`,
            },
          },
          required: ["question"],
        },
      },
      {
        name: "search_document",
        description: "Return the document chunks most similar to a query, with cosine scores.",
        inputSchema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Search text." },
            top_k: {
              type: "number",
              description: "Maximum number of matches (1-50). Defaults to 5.",
              minimum: 1,
              maximum: 50,
            },
          },
          required: ["query"],
        },
      },
      {
        name: "index_status",
        description: "Report document, model and indexing progress.",
        inputSchema: { type: "object", properties: {} },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const { name, arguments: args } = req.params;

    if (name === "index_status") return textResult(JSON.stringify(status));

    if (name === "ask_question") {
      const { question, language = defaultLanguage } = parseArgs(askArgs, args);
      if (!indexer.isReady()) return textResult(INDEX_NOT_READY, true);
      try {
        const answer = await qa.ask(question, language);
        return textResult(`${answer}\n\n${LANGUAGE_SETTINGS[language].askMore}`);
      } catch (e) {
        if (!(e instanceof RagError)) throw e;
        console.error(`[RAG] Failed to answer question: ${describeError(e)}`);
        return textResult(COULD_NOT_ANSWER, true);
      }
    }

    if (name === "search_document") {
      const { query, top_k } = parseArgs(searchArgs, args);
      if (!indexer.isReady()) return textResult(INDEX_NOT_READY, true);
      try {
        const hits = await qa.retrieve(query, top_k);
        const matches = hits.map((h, i) => ({
          rank: i + 1,
          score: Number(h.score.toFixed(4)),
          text: h.text,
        }));
        return textResult(JSON.stringify({ matches }));
      } catch (e) {
        if (!(e instanceof RagError)) throw e;
        console.error(`[RAG] Search failed: ${describeError(e)}`);
        return textResult(`Search failed: ${describeError(e)}`, true);
      }
    }

    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  });

  return server;
}
