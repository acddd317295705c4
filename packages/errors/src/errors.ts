import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * Missing or invalid startup configuration. Never operational: the process
 * cannot do anything useful until the environment is fixed.
 */
export class ConfigurationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Invalid configuration",
    fields: Record<string, string> = {},
    options?: ErrorExtras,
  ) {
    super({
      message,
      code: "CONFIGURATION_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({
      message,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class StorageError extends AppError {
  public readonly operation: string;

  constructor(message = "Storage error", operation: string, options?: ErrorExtras) {
    super({
      message,
      code: "STORAGE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.operation = operation;
  }
}

export class QuotaStateError extends AppError {
  public readonly filePath: string;

  constructor(message = "Quota state unavailable", filePath: string, options?: ErrorExtras) {
    super({
      message,
      code: "QUOTA_STATE_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.filePath = filePath;
  }
}

export class DocumentSourceError extends AppError {
  public readonly source: string;

  constructor(message = "Document source unavailable", source: string, options?: ErrorExtras) {
    super({
      message,
      code: "DOCUMENT_SOURCE_ERROR",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.source = source;
  }
}
