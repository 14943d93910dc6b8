import type { TextGenerator } from "./generation";
import { LANGUAGE_SETTINGS, type Language } from "./languages";

/**
 * Translates questions into the pivot language the document is searched in,
 * and answers back into the user's language.
 */
export class TranslationService {
  private readonly generator: TextGenerator;
  private readonly pivot: Language;

  /**
   * @param generator Completion model used for translation.
   * @param pivot     Language retrieval and answering happen in.
   */
  public constructor(generator: TextGenerator, pivot: Language) {
    this.generator = generator;
    this.pivot = pivot;
  }

  public getPivotLanguage(): Language {
    return this.pivot;
  }

  /**
   * Translate `text` into `target`. Blank text, and text whose source already
   * equals the target, come back unchanged without a model call.
   */
  public async translate(text: string, target: Language, source?: Language): Promise<string> {
    if (!text.trim()) return text;
    if (source && source === target) return text;

    let system =
      `You are a precise translator. Translate the user message to ${LANGUAGE_SETTINGS[target].label}. ` +
      "Return only the translation without extra commentary.";
    if (source) system += `\nThe source language is ${LANGUAGE_SETTINGS[source].label}.`;

    return this.generator.generate({ system, prompt: text.trim(), temperature: 0 });
  }

  /** Translate into the pivot language. */
  public async toPivot(text: string, source?: Language): Promise<string> {
    return this.translate(text, this.pivot, source);
  }
}
