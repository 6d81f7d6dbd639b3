import type { IngestionOrchestrator } from "@sitedocs/core";
import type { Logger } from "@sitedocs/logger";
import type { IngestionOutcome } from "@sitedocs/types";
import { parseIngestJob } from "./job-schema.js";

export interface JobLike {
  id?: string;
  data: unknown;
}

/**
 * Ingest job processor.
 *
 * Stage failures come back as a `failed` outcome and complete the job; the
 * document row carries the error. Only infrastructure failures (the row
 * could not be read or written) throw, so bullmq retries the job.
 */
export function createIngestProcessor(
  orchestrator: Pick<IngestionOrchestrator, "startIngestion">,
  logger: Logger,
): (job: JobLike) => Promise<IngestionOutcome> {
  return async (job) => {
    const { documentId } = parseIngestJob(job.data);
    const log = logger.child({ jobId: job.id, documentId });

    log.info("Processing ingest job");
    const outcome = await orchestrator.startIngestion(documentId);

    if (outcome.status === "failed") {
      log.warn(
        { stage: outcome.error?.stage, errorKind: outcome.error?.kind },
        "Document ingestion failed",
      );
    } else {
      log.info(
        { entityCount: outcome.entityCount, chunkCount: outcome.chunkCount },
        "Document ingested",
      );
    }
    return outcome;
  };
}
