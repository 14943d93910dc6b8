import type { EmbeddingIndex } from "./embedding-index";
import type { EmbeddingProvider } from "./embeddings";
import type { TextGenerator } from "./generation";
import { LANGUAGE_SETTINGS, type Language } from "./languages";
import type { TranslationService } from "./translation";
import type { ScoredChunk } from "./types";

export interface QAEngineOptions {
  embeddings: EmbeddingProvider;
  generator: TextGenerator;
  translator: TranslationService;
  /** Current index; called per question so a rebuilt index is picked up. */
  getIndex: () => EmbeddingIndex;
  /** Chunks retrieved per question (default 4). */
  topK?: number;
  /** How the system prompt names the document's subject. */
  projectName?: string;
}

/** Shown to the model when retrieval finds nothing. */
export const NO_CONTEXT_TEXT = "No matching information was found in the document.";

/** Render retrieval hits as numbered context blocks for the prompt. */
export function formatContext(hits: readonly ScoredChunk[]): string {
  if (hits.length === 0) return NO_CONTEXT_TEXT;
  return hits
    .map((hit, i) => `Excerpt ${i + 1} (score ${hit.score.toFixed(3)}):\n${hit.text}`)
    .join("\n\n");
}

/**
 * Retrieval-augmented question answering over the document index. Retrieval
 * and answering happen in the translator's pivot language.
 */
export class QAEngine {
  private readonly opts: QAEngineOptions;
  private readonly topK: number;
  private readonly projectName: string;

  public constructor(opts: QAEngineOptions) {
    this.opts = opts;
    this.topK = opts.topK ?? 4;
    this.projectName = opts.projectName ?? "the project";
  }

  /**
   * Embed `question` and return the closest chunks.
   *
   * @param k Defaults to the engine's configured top-k.
   */
  public async retrieve(question: string, k = this.topK): Promise<ScoredChunk[]> {
    const queryEmbedding = await this.opts.embeddings.embed(question);
    return this.opts.getIndex().topK(queryEmbedding, k);
  }

  /** Answer a question already phrased in the pivot language. */
  public async answer(question: string): Promise<string> {
    const hits = await this.retrieve(question);
    const pivot = this.opts.translator.getPivotLanguage();

    const system =
      `You are an assistant answering questions about ${this.projectName}. ` +
      `Use only the provided context and write the answer in ${LANGUAGE_SETTINGS[pivot].label}, clearly and in detail. ` +
      "If the context does not contain the information, say so honestly and do not make anything up.";
    const prompt =
      `Context:\n${formatContext(hits)}\n\n` +
      `Question: ${question}\n\n` +
      "Answer based on the context shown.";

    const answer = await this.opts.generator.generate({ system, prompt, temperature: 0.2 });
    console.error(`[RAG] Answered question (${hits.length} chunks of context).`);
    return answer;
  }

  /**
   * Full round trip for a user: translate the question into the pivot
   * language, answer it, and translate the answer back.
   */
  public async ask(question: string, language: Language): Promise<string> {
    const { translator } = this.opts;
    const pivot = translator.getPivotLanguage();
    const pivotQuestion = await translator.toPivot(question, language);
    const pivotAnswer = await this.answer(pivotQuestion);
    if (language === pivot) return pivotAnswer;
    return translator.translate(pivotAnswer, language, pivot);
  }
}
