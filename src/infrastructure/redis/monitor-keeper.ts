import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Lock, MonitorKeeper } from '../../domain/index.js';
import { DestinationError } from '../../domain/index.js';

const KEY_PREFIX = 'sinkflow:lock';

/** Deletes the key only while it still holds our token. */
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export interface RedisMonitorKeeperOptions {
  /** Lock expiry, so a crashed holder cannot block the destination forever. */
  readonly ttl_ms: number;
  readonly acquire_timeout_ms: number;
  readonly poll_interval_ms: number;
}

export const DEFAULT_MONITOR_OPTIONS: RedisMonitorKeeperOptions = {
  ttl_ms: 30_000,
  acquire_timeout_ms: 10_000,
  poll_interval_ms: 100,
};

export function lockKey(destination: string, resource: string): string {
  return `${KEY_PREFIX}:${destination}:${resource}`;
}

/**
 * Cross-process destination locks on Redis.
 *
 * Acquire polls `SET key token PX ttl NX` until it wins or
 * `acquire_timeout_ms` passes. A timeout surfaces as a retryable
 * DestinationError so the delivery path backs off and tries again.
 */
export class RedisMonitorKeeper implements MonitorKeeper {
  private readonly redis: Redis;
  private readonly options: RedisMonitorKeeperOptions;
  private readonly log: Logger;

  constructor(redis: Redis, log: Logger, options: Partial<RedisMonitorKeeperOptions> = {}) {
    this.redis = redis;
    this.log = log;
    this.options = { ...DEFAULT_MONITOR_OPTIONS, ...options };
  }

  async lock(destination: string, resource: string): Promise<Lock> {
    const key = lockKey(destination, resource);
    const token = randomUUID();
    const deadline = Date.now() + this.options.acquire_timeout_ms;

    for (;;) {
      const acquired = await this.redis.set(key, token, 'PX', this.options.ttl_ms, 'NX');
      if (acquired === 'OK') break;

      if (Date.now() >= deadline) {
        throw new DestinationError(
          `timed out acquiring lock ${key} after ${this.options.acquire_timeout_ms}ms`,
          true,
        );
      }
      await delay(this.options.poll_interval_ms);
    }

    this.log.debug({ key }, 'Lock acquired');

    let released = false;
    return {
      release: async () => {
        if (released) return;
        released = true;
        const removed = await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
        if (removed !== 1) {
          this.log.warn({ key }, 'Lock expired before release');
        }
      },
    };
  }
}

/** Used when no Redis is configured: every lock is granted immediately. */
export class NoopMonitorKeeper implements MonitorKeeper {
  async lock(): Promise<Lock> {
    return { release: async () => undefined };
  }
}
