import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import { parseEnv } from "@sitedocs/config";
import { createLogger, type Logger } from "@sitedocs/logger";
import { QUEUE_NAMES, createDeadLetterQueue, parseRedisConnection } from "@sitedocs/queue";
import type { DeadLetterQueue } from "@sitedocs/queue";
import type { AnyJobData, IngestionOutcome } from "@sitedocs/types";
import type { IngestionOrchestrator } from "@sitedocs/core";
import { createContainer } from "./container.js";
import { createIngestProcessor } from "./processors/ingest.js";
import { createReconcileProcessor } from "./processors/reconcile.js";
import { handleFailedJob } from "./processors/dead-letter.js";

function createWorkers(
  connection: ConnectionOptions,
  orchestrator: IngestionOrchestrator,
  deadLetters: DeadLetterQueue,
  concurrency: number,
  logger: Logger,
): Worker<AnyJobData, IngestionOutcome>[] {
  const ingest = createIngestProcessor(orchestrator, logger);
  const reconcile = createReconcileProcessor(orchestrator, logger);

  const ingestWorker = new Worker<AnyJobData, IngestionOutcome>(QUEUE_NAMES.INGEST, ingest, {
    connection,
    concurrency,
  });
  const reconcileWorker = new Worker<AnyJobData, IngestionOutcome>(
    QUEUE_NAMES.RECONCILE,
    reconcile,
    { connection, concurrency: Math.max(1, Math.floor(concurrency / 2)) },
  );

  const workers = [ingestWorker, reconcileWorker];
  for (const worker of workers) {
    worker.on("failed", (job, error) => {
      if (!job) return;
      handleFailedJob(job, error, worker.name, deadLetters, logger).catch((dlqError: unknown) => {
        logger.error({ err: dlqError, jobId: job.id }, "Could not dead-letter job");
      });
    });
    worker.on("error", (error) => {
      logger.error({ err: error, queue: worker.name }, "Worker error");
    });
  }
  return workers;
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "sitedocs-worker" });

  const { orchestrator, db } = createContainer(config, logger);
  await orchestrator.initialize();

  const connection = parseRedisConnection(config.redis.url);
  const deadLetters = createDeadLetterQueue(connection);
  const workers = createWorkers(
    connection,
    orchestrator,
    deadLetters,
    config.worker.concurrency,
    logger,
  );

  logger.info(
    { queues: Object.values(QUEUE_NAMES), concurrency: config.worker.concurrency },
    "Workers started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await deadLetters.close();
    await db.close();
    logger.info("All workers closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  createLogger({ service: "sitedocs-worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
