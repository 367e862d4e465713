import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { DeliveryOutcome } from '../../domain/index.js';

export const DEFAULT_CACHE_LIMIT = 20;

/**
 * Parses `limit`, clamped to 1..max. Returns NaN for non-integers.
 */
export function parseLimit(value: string | undefined, max: number): number {
  if (value === undefined || value === '') return Math.min(DEFAULT_CACHE_LIMIT, max);
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return Math.min(Math.max(n, 1), max);
}

/**
 * Outcome cache API.
 *
 * GET /api/v1/events/cache: recent delivery outcomes per destination
 */
async function cacheRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Query params: destination_ids (comma separated, default all), limit.
   */
  fastify.get(
    '/api/v1/events/cache',
    async (
      request: FastifyRequest<{ Querystring: { destination_ids?: string; limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const cache = fastify.outcomes;
      const limit = parseLimit(request.query.limit, cache.maxEntries);
      if (Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const requested = request.query.destination_ids
        ?.split(',')
        .map((id) => id.trim())
        .filter((id) => id !== '');
      const ids = requested !== undefined && requested.length > 0
        ? requested
        : [...new Set([...fastify.destinations.names(), ...cache.destinations()])];

      const destinations: Record<string, DeliveryOutcome[]> = {};
      for (const id of ids) {
        destinations[id] = cache.recent(id, limit);
      }

      return reply.status(200).send({ limit, destinations });
    },
  );
}

export default fp(cacheRoutes, {
  name: 'cache-routes',
  dependencies: ['destinations'],
  fastify: '5.x',
});
