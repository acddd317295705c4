import type { IngestionResult } from "@manualrag/types";
import { IngestionOrchestrator } from "@manualrag/core";
import { PdfPageSource } from "@manualrag/parser";
import type { Container } from "../container.js";

/**
 * Ingest command.
 *
 * The manual PDF is opened by the pipeline itself, after the quota check,
 * so an exhausted day never touches the document. The database pool is
 * closed whatever the outcome.
 */
export async function runIngest(container: Container): Promise<IngestionResult> {
  const { config, logger } = container;

  try {
    const orchestrator = new IngestionOrchestrator({
      openPageSource: async () => {
        const source = await PdfPageSource.open(config.manual.pdfPath);
        logger.info({ path: config.manual.pdfPath, pages: source.pageCount }, "Manual opened");
        return source;
      },
      pageRange: { start: config.manual.startPage, end: config.manual.endPage },
      chunker: container.chunker,
      embeddingProvider: container.embeddingProvider,
      vectorStore: container.vectorStore,
      quotaTracker: container.quotaTracker,
      logger,
      delayMs: config.ingestion.delayMs,
    });

    return await orchestrator.run();
  } finally {
    await container.close();
  }
}

export function summarizeIngestion(result: IngestionResult): string {
  if (result.status === "quota-exhausted") {
    return `Daily quota reached (${String(result.quotaUsed)} used). Try again tomorrow.`;
  }
  return [
    `Chunks found: ${String(result.chunksFound)}`,
    `Chunks attempted: ${String(result.chunksAttempted)}`,
    `Inserted: ${String(result.inserted)}`,
    `Skipped: ${String(result.skipped)}`,
    `Quota used today: ${String(result.quotaUsed)}`,
  ].join("\n");
}
