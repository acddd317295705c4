import type { AppConfig } from "@manualrag/types";
import { ManualChunker } from "@manualrag/chunker";
import { GeminiEmbeddingProvider } from "@manualrag/embeddings";
import { GeminiAnswerGenerator } from "@manualrag/generation";
import { EMBEDDING_DIMENSIONS } from "@manualrag/db";
import { PgVectorStore } from "@manualrag/vector-store";
import { QuotaTracker } from "@manualrag/quota";
import { createLogger, redactConnectionString } from "@manualrag/logger";
import type { Logger } from "@manualrag/logger";

export const SERVICE_NAME = "manual-rag-cli";

export interface Container {
  config: AppConfig;
  logger: Logger;
  chunker: ManualChunker;
  embeddingProvider: GeminiEmbeddingProvider;
  generator: GeminiAnswerGenerator;
  vectorStore: PgVectorStore;
  quotaTracker: QuotaTracker;
  close(): Promise<void>;
}

/**
 * Wire every collaborator from validated configuration. Nothing here opens a
 * connection; postgres.js and the Gemini client connect on first use.
 */
export function createContainer(config: AppConfig, logger?: Logger): Container {
  const log =
    logger ??
    createLogger({
      level: config.logLevel,
      service: SERVICE_NAME,
      pretty: config.nodeEnv === "development",
    });

  const vectorStore = PgVectorStore.connect(config.database.url);

  log.debug(
    {
      database: redactConnectionString(config.database.url),
      embedModel: config.gemini.embedModel,
      generationModel: config.gemini.generationModel,
    },
    "Container created",
  );

  return {
    config,
    logger: log,
    chunker: new ManualChunker({
      maxWords: config.chunking.maxWords,
      minChunkLength: config.chunking.minChunkLength,
      keywords: config.chunking.keywords,
    }),
    embeddingProvider: new GeminiEmbeddingProvider({
      apiKey: config.gemini.apiKey,
      model: config.gemini.embedModel,
      dimensions: EMBEDDING_DIMENSIONS,
    }),
    generator: new GeminiAnswerGenerator({
      apiKey: config.gemini.apiKey,
      model: config.gemini.generationModel,
    }),
    vectorStore,
    quotaTracker: new QuotaTracker({
      filePath: config.quota.filePath,
      dailyLimit: config.quota.dailyLimit,
      safetyBuffer: config.quota.safetyBuffer,
    }),
    close: () => vectorStore.close(),
  };
}
