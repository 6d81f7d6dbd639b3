import { AppError } from "./app-error.js";
import { RateLimitedError } from "./errors.js";

export interface RetryOptions {
  /** Maximum number of retry attempts after the first call. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each wait. Defaults to a console warning. */
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/**
 * Determines whether an error is retryable.
 * Only transient external failures and non-AppError failures (network
 * errors, unexpected exceptions) are retried.
 */
function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (error.kind !== "TransientExternalError") {
      return false;
    }

    // If retryableErrors list is specified, only retry matching codes
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return true;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    return typeof code === "string" && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 * A rate-limit response that names a wait time raises the delay to at least
 * that long (still capped by maxDelay).
 */
function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  error: unknown,
): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  const delay = Math.floor(cappedDelay * jitter);

  if (error instanceof RateLimitedError && error.retryAfter > 0) {
    return Math.min(maxDelayMs, Math.max(delay, error.retryAfter * 1_000));
  }
  return delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function defaultOnRetry({ attempt, maxRetries, delayMs }: RetryInfo): void {
  console.warn(
    `[retry] Attempt ${String(attempt)}/${String(maxRetries)} failed, retrying in ${String(delayMs)}ms...`,
  );
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * Deterministic failures (configuration, unparseable input, conflicts) are
 * rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs } = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const retryableErrors = options?.retryableErrors;
  const onRetry = options?.onRetry ?? defaultOnRetry;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries) {
        break;
      }

      if (!isRetryable(error, retryableErrors)) {
        break;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs, error);
      onRetry({ attempt: attempt + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
