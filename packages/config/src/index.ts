export { parseEnv, envSchema, DEFAULT_RELEVANCE_KEYWORDS, MAX_CHUNK_WORDS } from "./env.js";
