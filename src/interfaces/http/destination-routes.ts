import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';

/**
 * GET /api/v1/destinations: configured destinations with live state
 * GET /api/v1/health: process liveness plus per-destination state
 */
async function destinationRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/api/v1/destinations', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({ destinations: fastify.destinations.list() });
  });

  fastify.get('/api/v1/health', async (_request, reply: FastifyReply) => {
    const states = Object.fromEntries(
      fastify.destinations.list().map((d) => [d.name, d.state]),
    );
    const degraded = Object.values(states).some((s) => s === 'retrying');
    return reply.status(200).send({ status: degraded ? 'degraded' : 'ok', destinations: states });
  });
}

export default fp(destinationRoutes, {
  name: 'destination-routes',
  dependencies: ['destinations'],
  fastify: '5.x',
});
