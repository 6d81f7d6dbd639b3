import { Queue } from "bullmq";
import type { ConnectionOptions, JobsOptions } from "bullmq";
import type { IngestJobData, ReconcileJobData } from "@sitedocs/types";

export const QUEUE_NAMES = {
  INGEST: "sitedocs-ingest",
  RECONCILE: "sitedocs-reconcile",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: "exponential" as const,
    delay: 1000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};

export function createQueues(config: QueueConfig) {
  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    connection: config.connection,
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });

  const reconcileQueue = new Queue<ReconcileJobData>(QUEUE_NAMES.RECONCILE, {
    connection: config.connection,
    defaultJobOptions: {
      ...DEFAULT_JOB_OPTIONS,
      // Reconcile may be requested again for the same document later.
      removeOnComplete: true,
    },
  });

  return { ingestQueue, reconcileQueue };
}

export type Queues = ReturnType<typeof createQueues>;

/** One ingest job per document: re-enqueueing the same id is a no-op while the job exists. */
export function ingestJobOptions(documentId: string): JobsOptions {
  return { jobId: documentId };
}

export function reconcileJobOptions(documentId: string): JobsOptions {
  return { jobId: `reconcile-${documentId}` };
}

export async function enqueueIngestion(queues: Queues, documentId: string): Promise<void> {
  const data: IngestJobData = { type: "ingest", documentId };
  await queues.ingestQueue.add("ingest", data, ingestJobOptions(documentId));
}

export async function enqueueReconcile(
  queues: Queues,
  documentId: string,
  reason: string,
): Promise<void> {
  const data: ReconcileJobData = { type: "reconcile", documentId, reason };
  await queues.reconcileQueue.add("reconcile", data, reconcileJobOptions(documentId));
}
