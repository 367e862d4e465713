import { Redis } from 'ioredis';

/**
 * Builds an ioredis connection. `lazyConnect` defers the socket until
 * `connect()` so startup can log and fail in one place.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}
