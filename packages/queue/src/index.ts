export {
  QUEUE_NAMES,
  createQueues,
  enqueueIngestion,
  enqueueReconcile,
  ingestJobOptions,
  reconcileJobOptions,
  type QueueConfig,
  type Queues,
} from "./queues.js";
export {
  DLQ_NAME,
  createDeadLetterQueue,
  toDeadLetter,
  type DeadLetterQueue,
  type DeadLetterJobData,
} from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
