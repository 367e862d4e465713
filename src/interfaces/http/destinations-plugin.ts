import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { DestinationService, OutcomeCache } from '../../application/index.js';

export interface DestinationsPluginOptions {
  service: DestinationService;
  outcomes: OutcomeCache;
}

/**
 * Fastify plugin exposing the destination service to routes.
 *
 * - Decorates `fastify.destinations` and `fastify.outcomes`.
 * - Closes every destination on server close, draining batches and queues.
 */
async function destinationsPlugin(
  fastify: FastifyInstance,
  opts: DestinationsPluginOptions,
): Promise<void> {
  fastify.decorate('destinations', opts.service);
  fastify.decorate('outcomes', opts.outcomes);

  fastify.addHook('onClose', async () => {
    await opts.service.close();
    fastify.log.info('Destinations closed');
  });
}

export default fp(destinationsPlugin, {
  name: 'destinations',
  fastify: '5.x',
});

/** Extend Fastify's type system so the service is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    destinations: DestinationService;
    outcomes: OutcomeCache;
  }
}
