import { toDeadLetter, type DeadLetterJobData } from "@sitedocs/queue";
import type { Logger } from "@sitedocs/logger";
import type { AnyJobData } from "@sitedocs/types";

export interface FailedJobLike {
  id?: string;
  data: AnyJobData;
  attemptsMade: number;
  opts: { attempts?: number };
}

export interface DeadLetterSink {
  add(name: string, data: DeadLetterJobData): Promise<unknown>;
}

/**
 * Moves a job to the dead-letter queue once bullmq has no attempts left.
 * Returns true when the job was dead-lettered.
 */
export async function handleFailedJob(
  job: FailedJobLike,
  error: Error,
  queueName: string,
  deadLetters: DeadLetterSink,
  logger: Logger,
): Promise<boolean> {
  const maxAttempts = job.opts.attempts ?? 1;
  if (job.attemptsMade < maxAttempts) {
    logger.warn(
      { jobId: job.id, attemptsMade: job.attemptsMade, maxAttempts, err: error.message },
      "Job attempt failed",
    );
    return false;
  }

  await deadLetters.add(job.data.type, toDeadLetter(job.data, queueName, error.message));
  logger.error(
    { jobId: job.id, documentId: job.data.documentId, queue: queueName, err: error.message },
    "Job moved to dead-letter queue",
  );
  return true;
}
