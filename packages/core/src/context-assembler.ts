import type { ScoredChunk } from "@manualrag/types";

function pageLabel(chunk: ScoredChunk): string {
  return `Pages ${String(chunk.pageStart)}-${String(chunk.pageEnd)}`;
}

/**
 * Format retrieved chunks as labelled manual excerpts for a generation prompt.
 */
export function assembleContext(chunks: readonly ScoredChunk[]): string {
  return chunks
    .map((chunk) => `Section: ${chunk.section} (${pageLabel(chunk)})\n${chunk.content}`)
    .join("\n\n");
}
