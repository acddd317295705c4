import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Chunk, PageRange } from "@manualrag/types";
import { ManualChunker } from "@manualrag/chunker";
import { InMemoryPageSource } from "@manualrag/parser";
import { InMemoryVectorStore } from "@manualrag/vector-store";
import { QuotaTracker } from "@manualrag/quota";
import { QuotaStateError } from "@manualrag/errors";
import { createLogger } from "@manualrag/logger";
import type { IEmbeddingProvider } from "@manualrag/embeddings";
import { IngestionOrchestrator } from "./ingestion-pipeline.js";

const TODAY = new Date(2026, 9, 18, 9, 0);

function body(n: number): string {
  return (
    `Alarm 10${String(n)} appears when the spindle drive reports an overload. ` +
    "Stop the machine, wait for the drive to cool down and check the cooling fan before restarting the job."
  );
}

// One heading and one 164-character body per page, so one chunk per page
const PAGES = [0, 1, 2, 3].map((n) => `${String(n + 1)}.1 Drive Alarms\n${body(n)}`);

class FlakyStore extends InMemoryVectorStore {
  constructor(private readonly failingSection: string) {
    super();
  }

  override async insert(chunk: Chunk, embedding: number[]): Promise<void> {
    if (chunk.section === this.failingSection) {
      throw new Error("connection reset");
    }
    await super.insert(chunk, embedding);
  }
}

function fakeEmbedder(failOn?: string) {
  const embed = vi.fn(async (text: string) => {
    if (failOn !== undefined && text.includes(failOn)) {
      throw new Error("503 Service Unavailable");
    }
    return { embedding: [text.length, 1], model: "fake", dimensions: 2 };
  });
  return { name: "fake", dimensions: 2, embed } satisfies IEmbeddingProvider;
}

describe("IngestionOrchestrator", () => {
  let dir: string;
  let quotaFile: string;
  let tracker: QuotaTracker;
  let store: InMemoryVectorStore;
  let sleep: Mock<(ms: number) => Promise<void>>;

  function orchestrator(
    overrides: {
      embeddingProvider?: IEmbeddingProvider;
      vectorStore?: InMemoryVectorStore;
      pageSource?: InMemoryPageSource;
      pageRange?: PageRange;
    } = {},
  ): IngestionOrchestrator {
    return new IngestionOrchestrator({
      openPageSource: async () => overrides.pageSource ?? new InMemoryPageSource(PAGES),
      pageRange: overrides.pageRange ?? { start: 0, end: 4 },
      chunker: new ManualChunker({ maxWords: 350, minChunkLength: 150, keywords: ["alarm"] }),
      embeddingProvider: overrides.embeddingProvider ?? fakeEmbedder(),
      vectorStore: overrides.vectorStore ?? store,
      quotaTracker: tracker,
      logger: createLogger({ level: "silent" }),
      delayMs: 1200,
      sleep,
    });
  }

  async function writeLedger(used: number): Promise<void> {
    await writeFile(quotaFile, JSON.stringify({ date: "2026-10-18", used }));
  }

  async function readLedger(): Promise<unknown> {
    return JSON.parse(await readFile(quotaFile, "utf8"));
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "ingest-"));
    quotaFile = join(dir, ".gemini_quota.json");
    tracker = new QuotaTracker({
      filePath: quotaFile,
      dailyLimit: 1500,
      safetyBuffer: 50,
      now: () => TODAY,
    });
    store = new InMemoryVectorStore();
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("embeds and stores every chunk with its section and pages", async () => {
    const result = await orchestrator().run();

    expect(result).toEqual({
      status: "completed",
      inserted: 4,
      skipped: 0,
      chunksFound: 4,
      chunksAttempted: 4,
      quotaUsed: 4,
    });
    expect(store.schemaReady).toBe(true);
    expect(store.rows.map((r) => r.chunk)).toEqual([
      { content: body(0), pageStart: 1, pageEnd: 1, section: "1.1 Drive Alarms" },
      { content: body(1), pageStart: 2, pageEnd: 2, section: "2.1 Drive Alarms" },
      { content: body(2), pageStart: 3, pageEnd: 3, section: "3.1 Drive Alarms" },
      { content: body(3), pageStart: 4, pageEnd: 4, section: "4.1 Drive Alarms" },
    ]);
    expect(store.rows[0]?.embedding).toEqual([164, 1]);
    expect(await readLedger()).toEqual({ date: "2026-10-18", used: 4 });
  });

  it("pauses after every attempt", async () => {
    await orchestrator({ embeddingProvider: fakeEmbedder("Alarm 101") }).run();

    expect(sleep).toHaveBeenCalledTimes(4);
    expect(sleep).toHaveBeenCalledWith(1200);
  });

  it("does no work at all once the daily quota is reached", async () => {
    await writeLedger(1450);
    const embedder = fakeEmbedder();
    const openPageSource = vi.fn(async () => new InMemoryPageSource(PAGES));
    const ensureSchema = vi.spyOn(store, "ensureSchema");
    const clear = vi.spyOn(store, "clear");

    const result = await new IngestionOrchestrator({
      openPageSource,
      pageRange: { start: 0, end: 4 },
      chunker: new ManualChunker({ maxWords: 350, minChunkLength: 150, keywords: ["alarm"] }),
      embeddingProvider: embedder,
      vectorStore: store,
      quotaTracker: tracker,
      logger: createLogger({ level: "silent" }),
      delayMs: 1200,
      sleep,
    }).run();

    expect(result).toEqual({
      status: "quota-exhausted",
      inserted: 0,
      skipped: 0,
      chunksFound: 0,
      chunksAttempted: 0,
      quotaUsed: 1450,
    });
    expect(embedder.embed).not.toHaveBeenCalled();
    expect(openPageSource).not.toHaveBeenCalled();
    expect(ensureSchema).not.toHaveBeenCalled();
    expect(clear).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it("attempts only as many chunks as the quota allows, earliest first", async () => {
    await writeLedger(1448);

    const result = await orchestrator().run();

    expect(result).toMatchObject({ chunksFound: 4, chunksAttempted: 2, inserted: 2, quotaUsed: 1450 });
    expect(store.rows.map((r) => r.chunk.section)).toEqual(["1.1 Drive Alarms", "2.1 Drive Alarms"]);
  });

  it("stores one chunk on the last allowed call, then the next run stops", async () => {
    await writeLedger(1500 - 50 - 1);

    const first = await orchestrator().run();
    const embedder = fakeEmbedder();
    const second = await orchestrator({ embeddingProvider: embedder }).run();

    expect(first).toMatchObject({ status: "completed", inserted: 1, quotaUsed: 1450 });
    expect(second).toMatchObject({ status: "quota-exhausted", inserted: 0, quotaUsed: 1450 });
    expect(embedder.embed).not.toHaveBeenCalled();
    expect(store.rows).toHaveLength(1);
  });

  it("skips a chunk whose embedding fails and keeps going", async () => {
    const embedder = fakeEmbedder("Alarm 101");

    const result = await orchestrator({ embeddingProvider: embedder }).run();

    expect(embedder.embed).toHaveBeenCalledTimes(4);
    expect(result).toMatchObject({ inserted: 3, skipped: 1, chunksAttempted: 4, quotaUsed: 3 });
    expect(store.rows.map((r) => r.chunk.section)).toEqual([
      "1.1 Drive Alarms",
      "3.1 Drive Alarms",
      "4.1 Drive Alarms",
    ]);
  });

  it("still charges quota when storing a chunk fails", async () => {
    const flaky = new FlakyStore("3.1 Drive Alarms");

    const result = await orchestrator({ vectorStore: flaky }).run();

    expect(result).toMatchObject({ inserted: 3, skipped: 1, quotaUsed: 4 });
    expect(await readLedger()).toEqual({ date: "2026-10-18", used: 4 });
  });

  it("aborts the run when the quota ledger cannot be written", async () => {
    const embedder = fakeEmbedder();
    vi.spyOn(tracker, "recordUse").mockRejectedValue(
      new QuotaStateError("Cannot write quota file: EACCES", quotaFile),
    );

    await expect(orchestrator({ embeddingProvider: embedder }).run()).rejects.toBeInstanceOf(
      QuotaStateError,
    );
    expect(embedder.embed).toHaveBeenCalledTimes(1);
    expect(store.rows).toHaveLength(0);
  });

  it("replaces whatever an earlier run stored", async () => {
    await store.insert(
      { content: "stale", pageStart: 1, pageEnd: 1, section: "Old" },
      [1, 1],
    );

    await orchestrator().run();

    expect(store.rows.map((r) => r.chunk.section)).not.toContain("Old");
    expect(store.rows).toHaveLength(4);
  });

  it("reads the configured page range, clamped to the document", async () => {
    const result = await orchestrator({ pageRange: { start: 1, end: 99 } }).run();

    expect(result).toMatchObject({ chunksFound: 3, inserted: 3 });
    expect(store.rows.map((r) => r.chunk.pageStart)).toEqual([2, 3, 4]);
  });

  it("closes the page source once pages are read", async () => {
    const pageSource = new InMemoryPageSource(PAGES);
    const close = vi.spyOn(pageSource, "close");

    await orchestrator({ pageSource }).run();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it("closes the page source when reading fails", async () => {
    const pageSource = new InMemoryPageSource(PAGES);
    const close = vi.spyOn(pageSource, "close");
    vi.spyOn(pageSource, "readPages").mockImplementation(async function* () {
      yield* [];
      throw new Error("corrupt page stream");
    });

    await expect(orchestrator({ pageSource }).run()).rejects.toThrow("corrupt page stream");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("completes with nothing stored when the range holds no chunks", async () => {
    const result = await orchestrator({ pageRange: { start: 10, end: 20 } }).run();

    expect(result).toEqual({
      status: "completed",
      inserted: 0,
      skipped: 0,
      chunksFound: 0,
      chunksAttempted: 0,
      quotaUsed: 0,
    });
    expect(sleep).not.toHaveBeenCalled();
  });
});
