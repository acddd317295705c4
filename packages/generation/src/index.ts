export type { IAnswerGenerator } from "./answer-generator.interface.js";
export { GeminiAnswerGenerator } from "./gemini-generator.js";
export type { GeminiGeneratorConfig, GenerateContentClient } from "./gemini-generator.js";
