import pino from 'pino';
import type { Redis } from 'ioredis';

import { DestinationService, OutcomeCache } from './application/index.js';
import type { MonitorKeeper } from './domain/index.js';
import {
  createDeadLetterNotifier,
  createDefaultRegistry,
  createGeoResolver,
  createRedisClient,
  loadAppConfig,
  NoopMonitorKeeper,
  RedisMonitorKeeper,
} from './infrastructure/index.js';
import type { DeadLetterRecord } from './infrastructure/index.js';
import { buildServer } from './server.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Configuration
 * 2) Shared collaborators (Redis locks, geo database, outcome cache)
 * 3) Destinations
 * 4) HTTP server, listen()
 * 5) Shutdown hooks
 */
async function main(): Promise<void> {
  const config = loadAppConfig();
  const log = pino({ level: config.log_level });

  // --------------------------------------------------
  // Shared collaborators
  // --------------------------------------------------

  let redis: Redis | null = null;
  let monitorKeeper: MonitorKeeper = new NoopMonitorKeeper();
  let onDeadLetter: ((record: DeadLetterRecord) => void) | undefined;

  if (config.redis.url !== undefined) {
    redis = createRedisClient(config.redis.url);
    await redis.connect();
    log.info('Redis connected');

    monitorKeeper = new RedisMonitorKeeper(redis, log.child({ component: 'monitor-keeper' }), {
      ttl_ms: config.redis.lock_ttl_ms,
      acquire_timeout_ms: config.redis.acquire_timeout_ms,
    });
    onDeadLetter = createDeadLetterNotifier(redis, log);
  } else {
    log.warn('REDIS_URL not set, destination locks are process-local');
  }

  const geo = await createGeoResolver(config.geo.maxmind_db_path, log);
  const outcomes = new OutcomeCache(config.outcome_cache_capacity);

  // --------------------------------------------------
  // Destinations
  // --------------------------------------------------

  const service = new DestinationService(createDefaultRegistry(), {
    event_log_dir: config.event_log_dir,
    outcomes,
    monitorKeeper,
    geo,
    log,
    onDeadLetter,
  });

  await service.init(config.destinations);

  // --------------------------------------------------
  // HTTP
  // --------------------------------------------------

  const fastify = await buildServer({ service, outcomes, log_level: config.log_level });

  await fastify.listen({
    host: config.server.host,
    port: config.server.port,
  });

  // --------------------------------------------------
  // Graceful shutdown on SIGINT / SIGTERM
  // --------------------------------------------------

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, 'Shutting down');

    await fastify.close();
    if (redis !== null) {
      await redis.quit();
      log.info('Redis disconnected');
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'Shutdown failed');
          process.exit(1);
        },
      );
    });
  }
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
