import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, eventBatchSchema } from '../../application/index.js';
import type { EventInput, IngestResult } from '../../application/index.js';
import type { RawEvent } from '../../domain/index.js';

type IngestRequest = FastifyRequest<{ Querystring: { token?: string } }>;

/** Ingestion token from `?token=` or the `x-auth-token` header. */
export function readToken(request: IngestRequest): string | undefined {
  const fromQuery = request.query.token;
  if (fromQuery !== undefined && fromQuery !== '') return fromQuery;
  const header = request.headers['x-auth-token'];
  const fromHeader = Array.isArray(header) ? header[0] : header;
  return fromHeader !== undefined && fromHeader !== '' ? fromHeader : undefined;
}

function toRawEvent(input: EventInput, token: string): RawEvent {
  const supplied = input['event_id'];
  const eventId = typeof supplied === 'string' ? supplied : randomUUID();
  return {
    event_id: eventId,
    token,
    payload: { ...input, event_id: eventId },
    received_at: new Date().toISOString(),
  };
}

type IngestHttpStatus = 200 | 400 | 500 | 503;

/**
 * Worst result across destinations: backpressure, then a failed hand-off
 * (the event was not buffered or queued), then break_on_error rejections.
 */
export function httpStatusFor(results: readonly IngestResult[]): IngestHttpStatus {
  if (results.some((r) => r.status === 'backpressure')) return 503;
  if (results.some((r) => r.status === 'failed')) return 500;
  if (results.some((r) => r.status === 'rejected')) return 400;
  return 200;
}

const STATUS_LABELS = {
  200: 'ok',
  400: 'rejected',
  500: 'failed',
  503: 'backpressure',
} as const satisfies Record<IngestHttpStatus, string>;

type IngestStatusLabel = (typeof STATUS_LABELS)[IngestHttpStatus];

function failures(results: readonly IngestResult[]): IngestResult[] {
  return results.filter((r) => r.status === 'backpressure' || r.status === 'failed' || r.status === 'rejected');
}

/**
 * Registers the event ingestion routes.
 *
 * POST /api/v1/event: single event ingestion
 * POST /api/v1/events/batch: batch ingestion (array of events)
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Single event ingestion.
   *
   * Validates → assigns event_id if missing → routes to destinations.
   * Returns once every destination has buffered or durably queued the event.
   */
  fastify.post(
    '/api/v1/event',
    async (request: IngestRequest, reply: FastifyReply) => {
      const token = readToken(request);
      if (token === undefined) {
        return reply.status(401).send({ error: 'Missing ingestion token' });
      }

      const parsed = eventSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = toRawEvent(parsed.data, token);
      const results = await fastify.destinations.ingest(event);
      const status = httpStatusFor(results);

      if (status !== 200) {
        return reply.status(status).send({
          status: STATUS_LABELS[status],
          event_id: event.event_id,
          errors: failures(results),
        });
      }

      return reply.status(200).send({ status: 'ok', event_id: event.event_id });
    },
  );

  /**
   * Batch event ingestion.
   *
   * The array is validated up front; an invalid item rejects the whole batch.
   * Events are then routed one at a time and the reply carries each result.
   */
  fastify.post(
    '/api/v1/events/batch',
    async (request: IngestRequest, reply: FastifyReply) => {
      const token = readToken(request);
      if (token === undefined) {
        return reply.status(401).send({ error: 'Missing ingestion token' });
      }

      const parsed = eventBatchSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const all: IngestResult[] = [];
      const events: { event_id: string; status: IngestStatusLabel }[] = [];
      for (const input of parsed.data) {
        const event = toRawEvent(input, token);
        const results = await fastify.destinations.ingest(event);
        all.push(...results);
        events.push({ event_id: event.event_id, status: STATUS_LABELS[httpStatusFor(results)] });
      }

      return reply.status(httpStatusFor(all)).send({
        count: events.length,
        events,
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['destinations'],
  fastify: '5.x',
});
