import { z } from 'zod';

/**
 * Zod schema for a single inbound event body.
 *
 * Events are open-ended JSON objects: destinations decide which fields
 * they keep through their mapping rules. Only `event_id`, when present,
 * has a fixed shape; it is assigned by the handler if absent.
 */
export const eventSchema = z.record(z.string(), z.unknown()).superRefine((body, ctx) => {
  const id = body['event_id'];
  if (id !== undefined && (typeof id !== 'string' || id.trim() === '' || id.length > 255)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['event_id'],
      message: 'event_id must be a non-empty string of at most 255 characters',
    });
  }
});

export type EventInput = z.infer<typeof eventSchema>;

/** Batch ingestion: at least one event, validated all-or-nothing. */
export const eventBatchSchema = z.array(eventSchema).min(1, 'Batch must contain at least one event');
