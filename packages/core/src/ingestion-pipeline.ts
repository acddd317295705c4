import { setTimeout as delay } from "node:timers/promises";
import type { Chunk, IngestionResult, PageRange, PageText, QuotaState } from "@manualrag/types";
import type { IPageSource } from "@manualrag/parser";
import { clampRange, collectPages } from "@manualrag/parser";
import type { IEmbeddingProvider } from "@manualrag/embeddings";
import type { IVectorStore } from "@manualrag/vector-store";
import type { QuotaTracker } from "@manualrag/quota";
import type { Logger } from "@manualrag/logger";
import { errorMessage } from "@manualrag/errors";

export interface ChunkExtractor {
  extractChunks(pages: readonly PageText[]): Chunk[];
}

export interface IngestionDependencies {
  /** Opened only once the quota allows work; closed by the orchestrator. */
  openPageSource: () => Promise<IPageSource>;
  /** 0-indexed, end exclusive; clamped to the document. */
  pageRange: PageRange;
  chunker: ChunkExtractor;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  quotaTracker: QuotaTracker;
  logger: Logger;
  /** Pause after every embedding attempt. */
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

type ChunkOutcome = "inserted" | "skipped";

/**
 * Ingestion pipeline: Quota -> Schema -> Parse -> Chunk -> Embed -> Store
 *
 * Each run replaces the stored manual. Chunks are embedded one at a time and
 * every completed embedding call is charged to the quota ledger before its
 * row is written, so a failed insert still counts against the daily budget.
 * Per-chunk failures are logged and skipped; nothing is retried in-run.
 */
export class IngestionOrchestrator {
  private readonly deps: IngestionDependencies;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private quota: QuotaState = { date: "", used: 0 };

  constructor(deps: IngestionDependencies) {
    this.deps = deps;
    this.log = deps.logger.child({ component: "ingestion" });
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
  }

  async run(): Promise<IngestionResult> {
    const { quotaTracker, vectorStore } = this.deps;

    this.quota = await quotaTracker.load();
    const remaining = quotaTracker.remaining(this.quota);

    if (remaining <= 0) {
      this.log.warn(
        { used: this.quota.used, limit: quotaTracker.limit },
        "Daily embedding quota reached, nothing to do",
      );
      return this.result("quota-exhausted", 0, 0, 0, 0);
    }

    this.log.info({ used: this.quota.used, remaining }, "Quota loaded");

    await vectorStore.ensureSchema();
    await vectorStore.clear();
    this.log.info("Existing manual embeddings cleared");

    const chunks = await this.extract();
    const batch = chunks.slice(0, remaining);

    if (batch.length < chunks.length) {
      this.log.warn(
        { chunksFound: chunks.length, chunksAttempted: batch.length },
        "Quota covers only part of the manual, later chunks are left out",
      );
    }

    let inserted = 0;
    let skipped = 0;

    for (const [index, chunk] of batch.entries()) {
      const outcome = await this.processChunk(chunk, index, batch.length);
      if (outcome === "inserted") inserted++;
      else skipped++;

      await this.sleep(this.deps.delayMs);
    }

    this.log.info(
      { inserted, skipped, quotaUsed: this.quota.used },
      "Ingestion finished",
    );

    return this.result("completed", inserted, skipped, chunks.length, batch.length);
  }

  private async extract(): Promise<Chunk[]> {
    const { pageRange, chunker } = this.deps;
    const pageSource = await this.deps.openPageSource();

    let range: PageRange;
    let pages: PageText[];
    try {
      range = clampRange(pageRange, pageSource.pageCount);
      pages = await collectPages(pageSource, range);
    } finally {
      await pageSource.close();
    }

    const chunks = chunker.extractChunks(pages);

    this.log.info(
      { pageStart: range.start, pageEnd: range.end, pages: pages.length, chunks: chunks.length },
      "Chunks extracted",
    );
    return chunks;
  }

  private async processChunk(chunk: Chunk, index: number, total: number): Promise<ChunkOutcome> {
    const log = this.log.child({ chunk: index + 1, of: total, section: chunk.section });

    let embedding: number[];
    try {
      const result = await this.deps.embeddingProvider.embed(chunk.content);
      embedding = result.embedding;
    } catch (err: unknown) {
      log.error({ err: errorMessage(err) }, "Embedding failed, chunk skipped");
      return "skipped";
    }

    // Ledger write failures propagate: the run cannot continue uncounted
    this.quota = await this.deps.quotaTracker.recordUse(this.quota);

    try {
      await this.deps.vectorStore.insert(chunk, embedding);
    } catch (err: unknown) {
      log.error({ err: errorMessage(err) }, "Insert failed, chunk skipped");
      return "skipped";
    }

    log.debug({ pageStart: chunk.pageStart, pageEnd: chunk.pageEnd }, "Chunk stored");
    return "inserted";
  }

  private result(
    status: IngestionResult["status"],
    inserted: number,
    skipped: number,
    chunksFound: number,
    chunksAttempted: number,
  ): IngestionResult {
    return { status, inserted, skipped, chunksFound, chunksAttempted, quotaUsed: this.quota.used };
  }
}
