export { createRedisClient } from './client.js';
export {
  RedisMonitorKeeper,
  NoopMonitorKeeper,
  DEFAULT_MONITOR_OPTIONS,
  lockKey,
} from './monitor-keeper.js';
export type { RedisMonitorKeeperOptions } from './monitor-keeper.js';
export {
  DEAD_LETTER_CHANNEL,
  publishDeadLetter,
  createDeadLetterNotifier,
  toDeadLetterPayload,
} from './dead-letter-notifier.js';
export type { DeadLetterNotificationPayload } from './dead-letter-notifier.js';
