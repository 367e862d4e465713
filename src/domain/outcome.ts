/**
 * Terminal (or latest) state of an event's delivery to one destination.
 *
 * `skipped` marks events the transform pipeline dropped before delivery.
 */
export type DeliveryStatus = 'success' | 'retryable-error' | 'permanent-error' | 'skipped';

export interface DeliveryOutcome {
  readonly event_id: string;
  readonly destination: string;
  readonly status: DeliveryStatus;
  readonly table_name: string | null;
  readonly error: string | null;
  readonly retries: number;
  readonly timestamp: string; // ISO-8601
}
