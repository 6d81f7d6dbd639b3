import { describe, it, expect } from "vitest";
import { withTimeout } from "./timeout.js";
import { TimeoutError } from "./errors.js";

describe("withTimeout", () => {
  it("resolves when the call settles in time", async () => {
    const result = await withTimeout("fast call", 1_000, async () => "done");
    expect(result).toBe("done");
  });

  it("rejects with TimeoutError when the call is too slow", async () => {
    const slow = (): Promise<string> =>
      new Promise((resolve) => setTimeout(() => resolve("late"), 200));

    const promise = withTimeout("slow call", 10, slow);

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await expect(promise).rejects.toThrow("slow call timed out after 10ms");
  });

  it("aborts the signal handed to the call on timeout", async () => {
    let captured: AbortSignal | undefined;

    await expect(
      withTimeout("aborting call", 5, (signal) => {
        captured = signal;
        return new Promise<void>((resolve) => setTimeout(resolve, 100));
      }),
    ).rejects.toThrow(TimeoutError);

    expect(captured?.aborted).toBe(true);
  });

  it("propagates the call's own rejection", async () => {
    await expect(
      withTimeout("failing call", 1_000, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });
});
