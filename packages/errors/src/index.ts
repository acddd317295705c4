export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  ExternalServiceError,
  StorageError,
  QuotaStateError,
  DocumentSourceError,
} from "./errors.js";
