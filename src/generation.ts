import { generateText, type LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { ProviderError, describeError } from "./errors";

export interface GenerateRequest {
  system: string;
  prompt: string;
  temperature?: number;
}

/** Single-shot chat completion for one fixed model. */
export interface TextGenerator {
  generate(req: GenerateRequest): Promise<string>;
}

export interface OpenAITextGeneratorOptions {
  modelName: string;
  apiKey?: string;
  baseUrl?: string;
  maxRetries?: number;
  /** Prebuilt SDK model; when set, apiKey and baseUrl are not used. */
  model?: LanguageModel;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly modelName: string;
  private readonly model: LanguageModel;
  private readonly maxRetries: number;

  public constructor(opts: OpenAITextGeneratorOptions) {
    this.modelName = opts.modelName;
    this.maxRetries = opts.maxRetries ?? 2;
    this.model = opts.model ?? createOpenAI({ apiKey: opts.apiKey, baseURL: opts.baseUrl })(this.modelName);
  }

  /** @throws {ProviderError} On request failure or an empty completion. */
  public async generate(req: GenerateRequest): Promise<string> {
    let text: string;
    try {
      const result = await generateText({
        model: this.model,
        system: req.system,
        prompt: req.prompt,
        temperature: req.temperature,
        maxRetries: this.maxRetries,
      });
      text = result.text;
    } catch (e) {
      throw new ProviderError(`Completion request failed: ${describeError(e)}`, { cause: e });
    }
    const trimmed = text.trim();
    if (!trimmed) throw new ProviderError(`Model ${this.modelName} returned an empty completion`);
    return trimmed;
  }
}
