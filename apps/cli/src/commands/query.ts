import { createInterface } from "node:readline/promises";
import type { ScoredChunk, SolutionAnswer } from "@manualrag/types";
import { answerQuery } from "@manualrag/core";
import type { Container } from "../container.js";

const PREVIEW_LENGTH = 500;
const RULE = "-".repeat(60);

export async function promptForQuery(): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question("Enter search query: ");
  } finally {
    rl.close();
  }
}

export async function runQuery(container: Container, query: string): Promise<SolutionAnswer> {
  try {
    return await answerQuery(query, {
      embeddingProvider: container.embeddingProvider,
      vectorStore: container.vectorStore,
      generator: container.generator,
      topK: container.config.search.topK,
      logger: container.logger,
    });
  } finally {
    await container.close();
  }
}

export function formatMatch(match: ScoredChunk, position: number): string {
  return [
    `Result ${String(position)}`,
    `Section: ${match.section}`,
    `Pages: ${String(match.pageStart)}-${String(match.pageEnd)}`,
    `Distance: ${match.distance.toFixed(4)}`,
    match.content.slice(0, PREVIEW_LENGTH),
    RULE,
  ].join("\n");
}

export function formatAnswer(answer: SolutionAnswer): string {
  if (answer.matches.length === 0) {
    return "No matching manual sections found.";
  }
  const matches = answer.matches.map((match, i) => formatMatch(match, i + 1));
  return ["Top Matches:", "", ...matches, "", "Solution Card:", "", answer.card ?? ""].join("\n");
}
