import { AppError } from "./app-error.js";

export interface ErrorInit {
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Invalid static configuration. Fatal and surfaced before any work starts. */
export class ConfigurationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(
    message = "Invalid configuration",
    fields: Record<string, string> = {},
    options?: ErrorInit,
  ) {
    super({
      message,
      statusCode: 500,
      code: "CONFIGURATION_ERROR",
      kind: "ConfigurationError",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

interface TransientErrorInit extends ErrorInit {
  statusCode?: number;
  code?: string;
}

/**
 * A failure of an external system that may succeed when tried again
 * (timeouts, rate limits, unavailable services).
 */
export class TransientExternalError extends AppError {
  public readonly service: string;

  constructor(
    message = "Transient external error",
    service: string,
    options?: TransientErrorInit,
  ) {
    super({
      message,
      statusCode: options?.statusCode ?? 503,
      code: options?.code ?? "TRANSIENT_EXTERNAL_ERROR",
      kind: "TransientExternalError",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class RateLimitedError extends TransientExternalError {
  /** Seconds the service asked us to wait, 0 when it did not say. */
  public readonly retryAfter: number;

  constructor(
    message = "Rate limited",
    service: string,
    retryAfter = 0,
    options?: ErrorInit,
  ) {
    super(message, service, { ...options, statusCode: 429, code: "RATE_LIMITED" });
    this.retryAfter = retryAfter;
  }
}

export class ServiceUnavailableError extends TransientExternalError {
  constructor(message = "Service unavailable", service: string, options?: ErrorInit) {
    super(message, service, { ...options, statusCode: 503, code: "SERVICE_UNAVAILABLE" });
  }
}

export class TimeoutError extends TransientExternalError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: ErrorInit) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`, operation, {
      ...options,
      statusCode: 504,
      code: "TIMEOUT",
    });
    this.timeoutMs = timeoutMs;
  }
}

/** An external service rejected the request outright; retrying will not help. */
export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorInit) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/** Input that is structurally invalid for the consumer. Deterministic, never retried. */
export class UnparseableInputError extends AppError {
  constructor(message = "Unparseable input", options?: ErrorInit & { code?: string }) {
    super({
      message,
      statusCode: 422,
      code: options?.code ?? "UNPARSEABLE_INPUT",
      kind: "UnparseableInput",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class UnreadablePdfError extends UnparseableInputError {
  constructor(message = "File is not a readable PDF", options?: ErrorInit) {
    super(message, { ...options, code: "UNREADABLE_PDF" });
  }
}

export class PersistenceConflictError extends AppError {
  constructor(message = "Conflicting write", options?: ErrorInit) {
    super({
      message,
      statusCode: 409,
      code: "PERSISTENCE_CONFLICT",
      kind: "PersistenceConflict",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorInit) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      kind: "NotFound",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorInit) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      kind: "Validation",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class IngestionCancelledError extends AppError {
  constructor(message = "Ingestion cancelled", options?: ErrorInit) {
    super({
      message,
      statusCode: 409,
      code: "INGESTION_CANCELLED",
      kind: "Cancelled",
      details: options?.details,
      cause: options?.cause,
    });
  }
}
