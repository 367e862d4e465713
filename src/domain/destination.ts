import type { ProcessedRow } from './event.js';

export const BATCH_MODE = 'batch';
export const STREAM_MODE = 'stream';

export type DeliveryMode = typeof BATCH_MODE | typeof STREAM_MODE;

/**
 * Capability every destination type supplies.
 *
 * `write` either persists every row or throws. Failures should be thrown as
 * {@link DestinationError} so the orchestrator knows whether to retry;
 * anything else is treated as retryable.
 */
export interface DestinationAdapter {
  write(rows: readonly ProcessedRow[]): Promise<void>;
  close(): Promise<void>;
}

/** Adapter write failure, classified by the adapter itself. */
export class DestinationError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DestinationError';
    this.retryable = retryable;
  }
}

/** Held lock on a destination resource, shared across processes. */
export interface Lock {
  release(): Promise<void>;
}

/**
 * Distributed coordination for destinations written by several processes.
 */
export interface MonitorKeeper {
  lock(destination: string, resource: string): Promise<Lock>;
}
