export { AppError, errorKindOf, errorMessageOf } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ConfigurationError,
  TransientExternalError,
  RateLimitedError,
  ServiceUnavailableError,
  TimeoutError,
  ExternalServiceError,
  UnparseableInputError,
  UnreadablePdfError,
  PersistenceConflictError,
  NotFoundError,
  ValidationError,
  IngestionCancelledError,
} from "./errors.js";
export type { ErrorInit } from "./errors.js";

export { withRetry } from "./retry.js";
export type { RetryOptions, RetryInfo } from "./retry.js";

export { withTimeout } from "./timeout.js";

export { mapExternalError } from "./external-error.js";
