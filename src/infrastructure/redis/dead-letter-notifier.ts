import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { DeadLetterRecord } from '../queue/index.js';

export const DEAD_LETTER_CHANNEL = 'dead_letters';

export interface DeadLetterNotificationPayload {
  queue: string;
  destination: string;
  event_id: string;
  table_name: string;
  retries: number;
  error: string;
  dead_lettered_at: string;
}

export function toDeadLetterPayload(record: DeadLetterRecord): DeadLetterNotificationPayload {
  return {
    queue: record.queue,
    destination: record.entry.destination,
    event_id: record.entry.row.event_id,
    table_name: record.entry.row.table_name,
    retries: record.entry.retries,
    error: record.error,
    dead_lettered_at: record.dead_lettered_at,
  };
}

/**
 * Publishes a dead-letter report to the "dead_letters" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never reach the delivery path.
 */
export async function publishDeadLetter(
  redis: Redis,
  log: Logger,
  record: DeadLetterRecord,
): Promise<void> {
  const payload = toDeadLetterPayload(record);
  try {
    await redis.publish(DEAD_LETTER_CHANNEL, JSON.stringify(payload));
    log.debug(
      { channel: DEAD_LETTER_CHANNEL, destination: payload.destination, event_id: payload.event_id },
      'Published dead-letter notification',
    );
  } catch (err: unknown) {
    log.warn({ err, event_id: payload.event_id }, 'Failed to publish dead-letter notification');
  }
}

/** Adapts {@link publishDeadLetter} to the queue's synchronous `onDeadLetter` hook. */
export function createDeadLetterNotifier(redis: Redis, log: Logger): (record: DeadLetterRecord) => void {
  return (record) => {
    void publishDeadLetter(redis, log, record);
  };
}
