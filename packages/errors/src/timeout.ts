import { TimeoutError } from "./errors.js";

/**
 * Race `fn` against a timer. The timer is always cleared, so a settled call
 * leaves nothing scheduled behind it.
 *
 * The signal handed to `fn` is aborted when the timer fires; calls that
 * honour it stop early.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
