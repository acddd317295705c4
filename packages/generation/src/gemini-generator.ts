import { GoogleGenAI } from "@google/genai";
import type { GenerateContentParameters } from "@google/genai";
import { ExternalServiceError, errorMessage } from "@manualrag/errors";
import type { IAnswerGenerator } from "./answer-generator.interface.js";

const DEFAULT_MODEL = "gemini-2.5-flash";
const SERVICE = "gemini-generation";

/**
 * The slice of `GoogleGenAI.models` used for text generation.
 */
export interface GenerateContentClient {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface GeminiGeneratorConfig {
  apiKey: string;
  model?: string;
  client?: GenerateContentClient;
}

export class GeminiAnswerGenerator implements IAnswerGenerator {
  readonly model: string;
  private client: GenerateContentClient;

  constructor(config: GeminiGeneratorConfig) {
    this.client = config.client ?? new GoogleGenAI({ apiKey: config.apiKey }).models;
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async generate(prompt: string): Promise<string> {
    let text: string | undefined;
    try {
      const response = await this.client.generateContent({ model: this.model, contents: prompt });
      text = response.text;
    } catch (err: unknown) {
      throw new ExternalServiceError(`Generation request failed: ${errorMessage(err)}`, SERVICE, {
        cause: err,
      });
    }

    const trimmed = text?.trim();
    if (!trimmed) {
      throw new ExternalServiceError("Generation response contained no text", SERVICE);
    }
    return trimmed;
  }
}
