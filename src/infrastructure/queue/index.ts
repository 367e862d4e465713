export { PersistentQueue, QueueFullError, QueueClosedError, queueDirectory } from './persistent-queue.js';
export type {
  PersistentQueueOptions,
  DeadLetterRecord,
  Delivery,
  NackResult,
  QueueStats,
} from './persistent-queue.js';
