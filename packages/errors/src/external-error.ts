import { AppError, errorMessageOf } from "./app-error.js";
import { ExternalServiceError, RateLimitedError, ServiceUnavailableError } from "./errors.js";

const CONNECTION_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "ENOTFOUND", "EAI_AGAIN"]);

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

/** Seconds from a `retry-after` header, 0 when absent or not a number. */
function readRetryAfter(error: unknown): number {
  if (typeof error !== "object" || error === null || !("headers" in error)) return 0;
  const headers = error.headers;

  let value: unknown;
  if (headers instanceof Headers) {
    value = headers.get("retry-after");
  } else if (typeof headers === "object" && headers !== null && "retry-after" in headers) {
    value = headers["retry-after"];
  }

  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (/Connection|Timeout/.test(error.name)) return true;
  if ("code" in error && typeof error.code === "string" && CONNECTION_CODES.has(error.code)) {
    return true;
  }
  return error instanceof TypeError && error.message === "fetch failed";
}

/**
 * Map an HTTP client or SDK error to the error taxonomy: 429 is rate
 * limiting, 5xx, 408 and connection failures are transient, any other
 * response is a permanent rejection. AppErrors pass through unchanged.
 */
export function mapExternalError(error: unknown, service: string, action: string): AppError {
  if (AppError.isAppError(error)) return error;

  const message = `${service} ${action} failed: ${errorMessageOf(error)}`;
  const status = readStatus(error);

  if (status === 429) {
    return new RateLimitedError(message, service, readRetryAfter(error), { cause: error });
  }
  if (status !== undefined && (status >= 500 || status === 408)) {
    return new ServiceUnavailableError(message, service, {
      cause: error,
      details: { status },
    });
  }
  if (status === undefined && isConnectionFailure(error)) {
    return new ServiceUnavailableError(message, service, { cause: error });
  }
  return new ExternalServiceError(message, service, {
    cause: error,
    details: status === undefined ? undefined : { status },
  });
}
