export { IngestionOrchestrator } from "./ingestion-pipeline.js";
export type { IngestionDependencies, ChunkExtractor } from "./ingestion-pipeline.js";

export { searchManual, answerQuery } from "./retrieval-pipeline.js";
export type { RetrievalDependencies, AnswerDependencies } from "./retrieval-pipeline.js";

export { assembleContext } from "./context-assembler.js";
export { buildSolutionCardPrompt } from "./solution-card.js";
