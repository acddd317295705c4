export type NodeEnv = "development" | "test" | "production";
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  database: DatabaseConfig;
  gemini: GeminiConfig;
  manual: ManualConfig;
  chunking: ChunkingSettings;
  quota: QuotaConfig;
  ingestion: IngestionSettings;
  search: SearchConfig;
}

export interface DatabaseConfig {
  url: string;
}

export interface GeminiConfig {
  apiKey: string;
  embedModel: string;
  generationModel: string;
}

export interface ManualConfig {
  pdfPath: string;
  startPage: number;
  endPage: number;
}

export interface ChunkingSettings {
  maxWords: number;
  minChunkLength: number;
  keywords: string[];
}

export interface QuotaConfig {
  dailyLimit: number;
  safetyBuffer: number;
  filePath: string;
}

export interface IngestionSettings {
  delayMs: number;
}

export interface SearchConfig {
  topK: number;
}
