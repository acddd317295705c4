import { GoogleGenAI } from "@google/genai";
import type { EmbedContentParameters } from "@google/genai";
import type { EmbeddingResult } from "@manualrag/types";
import { AppError, ExternalServiceError, errorMessage } from "@manualrag/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "gemini-embedding-001";
const DEFAULT_DIMENSIONS = 768;
const SERVICE = "gemini-embedding";

/**
 * The slice of `GoogleGenAI.models` used for embeddings.
 */
export interface EmbedContentClient {
  embedContent(
    params: EmbedContentParameters,
  ): Promise<{ embeddings?: Array<{ values?: number[] }> }>;
}

export interface GeminiProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Replaces the SDK client, e.g. with an in-process fake. */
  client?: EmbedContentClient;
}

export class GeminiEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "gemini";
  readonly dimensions: number;
  private client: EmbedContentClient;
  private model: string;

  constructor(config: GeminiProviderConfig) {
    this.client = config.client ?? new GoogleGenAI({ apiKey: config.apiKey }).models;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    let values: number[] | undefined;
    try {
      const response = await this.client.embedContent({
        model: this.model,
        contents: text,
        config: { outputDimensionality: this.dimensions },
      });
      values = response.embeddings?.[0]?.values;
    } catch (err: unknown) {
      if (AppError.isAppError(err)) throw err;
      throw new ExternalServiceError(`Embedding request failed: ${errorMessage(err)}`, SERVICE, {
        cause: err,
      });
    }

    if (!values || values.length === 0) {
      throw new ExternalServiceError("Embedding response contained no vector", SERVICE);
    }
    // The store's vector column has a fixed width
    if (values.length !== this.dimensions) {
      throw new ExternalServiceError(
        `Embedding has ${String(values.length)} dimensions, expected ${String(this.dimensions)}`,
        SERVICE,
        { details: { model: this.model } },
      );
    }

    return {
      embedding: values,
      model: this.model,
      dimensions: this.dimensions,
    };
  }
}
