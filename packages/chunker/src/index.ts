export { normalizeText } from "./text-normalizer.js";
export { classifyHeading, isHeading, HEADING_MATCHERS } from "./heading-classifier.js";
export type { HeadingKind, HeadingMatcher } from "./heading-classifier.js";
export { ManualChunker, createAccumulator } from "./manual-chunker.js";
export type { ChunkAccumulator } from "./manual-chunker.js";
