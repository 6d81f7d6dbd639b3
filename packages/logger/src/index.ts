/**
 * @sitedocs/logger
 *
 * Structured logging with secret redaction for the ingestion services.
 */

export { createLogger, createChildLogger, serializeError } from "./logger.js";
export type { Logger, CreateLoggerOptions } from "./logger.js";
export { redactValue, scrubSecrets, REDACT_PATHS } from "./secret-redactor.js";
