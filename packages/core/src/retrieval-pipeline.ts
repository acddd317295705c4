import type { ScoredChunk, SolutionAnswer } from "@manualrag/types";
import type { IEmbeddingProvider } from "@manualrag/embeddings";
import type { IAnswerGenerator } from "@manualrag/generation";
import type { IVectorStore } from "@manualrag/vector-store";
import type { Logger } from "@manualrag/logger";
import { AppError } from "@manualrag/errors";
import { assembleContext } from "./context-assembler.js";
import { buildSolutionCardPrompt } from "./solution-card.js";

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  topK: number;
  logger?: Logger;
}

export interface AnswerDependencies extends RetrievalDependencies {
  generator: IAnswerGenerator;
}

function requireQuery(query: string): string {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new AppError({ message: "Query must not be empty", code: "INVALID_QUERY" });
  }
  return trimmed;
}

/**
 * Retrieval pipeline: Query -> Embed -> Nearest chunks by cosine distance
 *
 * Query embeddings are not charged to the ingestion quota ledger.
 */
export async function searchManual(
  query: string,
  deps: RetrievalDependencies,
): Promise<ScoredChunk[]> {
  const text = requireQuery(query);
  const { embedding } = await deps.embeddingProvider.embed(text);
  const matches = await deps.vectorStore.search(embedding, deps.topK);

  deps.logger?.debug({ matches: matches.length, topK: deps.topK }, "Manual searched");
  return matches;
}

/**
 * Search the manual and turn the best matches into a solution card.
 * No generation call is made when nothing matched.
 */
export async function answerQuery(
  query: string,
  deps: AnswerDependencies,
): Promise<SolutionAnswer> {
  const matches = await searchManual(query, deps);
  if (matches.length === 0) {
    deps.logger?.info("No manual excerpts matched the query");
    return { matches, card: null };
  }

  const prompt = buildSolutionCardPrompt(query.trim(), assembleContext(matches));
  const card = await deps.generator.generate(prompt);

  return { matches, card };
}
