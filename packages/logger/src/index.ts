export { createLogger } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, REDACTED, redactConnectionString } from "./redaction.js";
