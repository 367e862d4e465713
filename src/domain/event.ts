/**
 * Core domain types for the sinkflow event model.
 *
 * These types define the canonical shape of an event as it flows
 * from ingestion to a destination. They carry no framework dependencies.
 */

/** Free-form key/value document received from a producer. */
export type EventPayload = Record<string, unknown>;

/**
 * Raw event as accepted by the ingestion layer.
 *
 * `event_id` is assigned at ingestion time if the producer does not
 * supply one, so every delivery outcome is addressable.
 */
export interface RawEvent {
  readonly event_id: string;
  readonly token: string;
  readonly payload: EventPayload;
  readonly received_at: string; // ISO-8601
}

/** Scalar values a destination column can hold. */
export type ColumnValue = string | number | boolean | null;

/**
 * A transformed event, ready for a destination write.
 *
 * Produced once per RawEvent per destination. `columns` preserves the
 * insertion order of the flattened event fields.
 */
export interface ProcessedRow {
  readonly event_id: string;
  readonly table_name: string;
  readonly columns: Readonly<Record<string, ColumnValue>>;
  readonly primary_keys: readonly string[];
  /** Explicit column type casts declared by structured mapping rules. */
  readonly column_types: Readonly<Record<string, string>>;
}

/** Envelope persisted by the durable queue of a stream-mode destination. */
export interface QueueEntry {
  readonly destination: string;
  readonly enqueued_at: string; // ISO-8601
  readonly retries: number;
  readonly row: ProcessedRow;
}
