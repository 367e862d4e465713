import type { DeliveryOutcome, DeliveryStatus } from '../domain/index.js';

export const DEFAULT_OUTCOME_CAPACITY = 100;

/**
 * Bounded, per-destination history of recent delivery outcomes.
 *
 * One entry per (destination, event): a newer outcome for the same event
 * replaces the older one and becomes the newest. Once a destination holds
 * `capacity` events the oldest is evicted. `record` is O(1); it never
 * blocks or fails the delivery path.
 *
 * Observability only; the durable queue is authoritative for delivery.
 * Node runs every writer on one thread, so each synchronous call is atomic.
 */
export class OutcomeCache {
  private readonly capacity: number;
  private readonly byDestination = new Map<string, Map<string, DeliveryOutcome>>();

  constructor(capacity: number = DEFAULT_OUTCOME_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Outcome cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get maxEntries(): number {
    return this.capacity;
  }

  record(outcome: DeliveryOutcome): void {
    let entries = this.byDestination.get(outcome.destination);
    if (entries === undefined) {
      entries = new Map();
      this.byDestination.set(outcome.destination, entries);
    }

    // Map iteration order is insertion order: delete + set moves the event to the newest slot.
    entries.delete(outcome.event_id);
    entries.set(outcome.event_id, outcome);

    if (entries.size > this.capacity) {
      const oldest = entries.keys().next();
      if (oldest.done !== true) entries.delete(oldest.value);
    }
  }

  /** Most recent outcomes for a destination, newest first. */
  recent(destination: string, limit: number = this.capacity): DeliveryOutcome[] {
    const entries = this.byDestination.get(destination);
    if (entries === undefined || limit <= 0) return [];
    return [...entries.values()].reverse().slice(0, limit);
  }

  /** Latest known status of an event at a destination, if still cached. */
  lastStatus(destination: string, eventId: string): DeliveryStatus | undefined {
    return this.byDestination.get(destination)?.get(eventId)?.status;
  }

  destinations(): string[] {
    return [...this.byDestination.keys()];
  }

  /** Drops the history of a destination that was removed or rebuilt. */
  clear(destination: string): void {
    this.byDestination.delete(destination);
  }
}
