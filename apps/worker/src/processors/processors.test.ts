import { describe, it, expect, vi } from "vitest";
import { ValidationError } from "@sitedocs/errors";
import { createLogger } from "@sitedocs/logger";
import type { IngestionOutcome } from "@sitedocs/types";
import { createIngestProcessor } from "./ingest.js";
import { createReconcileProcessor } from "./reconcile.js";
import { handleFailedJob } from "./dead-letter.js";

const logger = createLogger({ level: "silent" });

const complete: IngestionOutcome = {
  documentId: "doc-1",
  status: "complete",
  stageReached: "persist_vectors",
  entityCount: 3,
  chunkCount: 2,
};

describe("createIngestProcessor", () => {
  it("runs the orchestrator for the job's document", async () => {
    const startIngestion = vi.fn().mockResolvedValue(complete);
    const run = createIngestProcessor({ startIngestion }, logger);

    const outcome = await run({ id: "job-1", data: { type: "ingest", documentId: "doc-1" } });

    expect(startIngestion).toHaveBeenCalledWith("doc-1");
    expect(outcome).toEqual(complete);
  });

  it("returns a failed outcome instead of throwing", async () => {
    const failed: IngestionOutcome = {
      ...complete,
      status: "failed",
      stageReached: "extract_text",
      entityCount: 0,
      chunkCount: 0,
      error: { stage: "extract_text", kind: "UnparseableInput", code: "UNREADABLE_PDF", message: "bad" },
    };
    const run = createIngestProcessor(
      { startIngestion: vi.fn().mockResolvedValue(failed) },
      logger,
    );

    await expect(run({ data: { type: "ingest", documentId: "doc-1" } })).resolves.toEqual(failed);
  });

  it("rejects malformed payloads", async () => {
    const startIngestion = vi.fn();
    const run = createIngestProcessor({ startIngestion }, logger);

    await expect(run({ data: { type: "ingest", documentId: "" } })).rejects.toThrow(
      ValidationError,
    );
    await expect(run({ data: { documentId: "doc-1" } })).rejects.toThrow(
      "Invalid ingest job payload",
    );
    expect(startIngestion).not.toHaveBeenCalled();
  });

  it("lets infrastructure failures propagate so the job is retried", async () => {
    const run = createIngestProcessor(
      { startIngestion: vi.fn().mockRejectedValue(new Error("connection refused")) },
      logger,
    );

    await expect(run({ data: { type: "ingest", documentId: "doc-1" } })).rejects.toThrow(
      "connection refused",
    );
  });
});

describe("createReconcileProcessor", () => {
  it("reconciles the job's document", async () => {
    const reconcile = vi.fn().mockResolvedValue(complete);
    const run = createReconcileProcessor({ reconcile }, logger);

    await run({ data: { type: "reconcile", documentId: "doc-1", reason: "vectors missing" } });

    expect(reconcile).toHaveBeenCalledWith("doc-1");
  });

  it("accepts a payload without a reason", async () => {
    const reconcile = vi.fn().mockResolvedValue(complete);
    const run = createReconcileProcessor({ reconcile }, logger);

    await expect(run({ data: { type: "reconcile", documentId: "doc-1" } })).resolves.toEqual(
      complete,
    );
  });
});

describe("handleFailedJob", () => {
  const data = { type: "ingest" as const, documentId: "doc-1" };

  it("leaves jobs with attempts remaining to bullmq", async () => {
    const add = vi.fn().mockResolvedValue(undefined);

    const moved = await handleFailedJob(
      { id: "job-1", data, attemptsMade: 1, opts: { attempts: 3 } },
      new Error("redis timeout"),
      "sitedocs-ingest",
      { add },
      logger,
    );

    expect(moved).toBe(false);
    expect(add).not.toHaveBeenCalled();
  });

  it("dead-letters jobs that used every attempt", async () => {
    const add = vi.fn().mockResolvedValue(undefined);

    const moved = await handleFailedJob(
      { id: "job-1", data, attemptsMade: 3, opts: { attempts: 3 } },
      new Error("redis timeout"),
      "sitedocs-ingest",
      { add },
      logger,
    );

    expect(moved).toBe(true);
    expect(add).toHaveBeenCalledWith("ingest", {
      type: "ingest",
      documentId: "doc-1",
      originalQueue: "sitedocs-ingest",
      failureReason: "redis timeout",
    });
  });
});
