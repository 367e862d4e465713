import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { DestinationService, OutcomeCache } from './application/index.js';
import {
  destinationsPlugin,
  eventRoutes,
  cacheRoutes,
  destinationRoutes,
} from './interfaces/http/index.js';

export interface ServerOptions {
  service: DestinationService;
  outcomes: OutcomeCache;
  /** Omit to run without request logging. */
  log_level?: string;
}

/**
 * Builds the HTTP server without listening.
 *
 * Order:
 * 1) Destination service plugin
 * 2) HTTP routes
 */
export async function buildServer(opts: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: opts.log_level === undefined ? false : { level: opts.log_level },
  });

  await fastify.register(destinationsPlugin, { service: opts.service, outcomes: opts.outcomes });

  await fastify.register(eventRoutes);
  await fastify.register(cacheRoutes);
  await fastify.register(destinationRoutes);

  return fastify;
}
