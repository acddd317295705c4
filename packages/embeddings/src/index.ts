export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { GeminiEmbeddingProvider } from "./gemini-provider.js";
export type { GeminiProviderConfig, EmbedContentClient } from "./gemini-provider.js";
