import type { EmbeddingResult } from "@manualrag/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** One request against the provider; callers account quota per call. */
  embed(text: string): Promise<EmbeddingResult>;
}
