import type { IngestionOrchestrator } from "@sitedocs/core";
import type { Logger } from "@sitedocs/logger";
import type { IngestionOutcome } from "@sitedocs/types";
import { parseReconcileJob } from "./job-schema.js";
import type { JobLike } from "./ingest.js";

/** Re-runs the missing stages of a partially ingested document. */
export function createReconcileProcessor(
  orchestrator: Pick<IngestionOrchestrator, "reconcile">,
  logger: Logger,
): (job: JobLike) => Promise<IngestionOutcome> {
  return async (job) => {
    const { documentId, reason } = parseReconcileJob(job.data);
    const log = logger.child({ jobId: job.id, documentId });

    log.info({ reason }, "Processing reconcile job");
    const outcome = await orchestrator.reconcile(documentId);
    log.info({ status: outcome.status, stageReached: outcome.stageReached }, "Reconcile finished");
    return outcome;
  };
}
