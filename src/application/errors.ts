/**
 * Error taxonomy of the delivery core.
 *
 * - ConfigurationError: fatal for one destination at construction time.
 * - TransformError: one event could not be turned into a row.
 * - BackpressureError: a queue or buffer is at capacity; the caller should back off.
 */

export type ConfigurationErrorCode =
  | 'unknown_type'
  | 'invalid_mode'
  | 'invalid_enrichment'
  | 'invalid_mapping'
  | 'invalid_config';

export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
    this.code = code;
  }
}

export type TransformStage = 'enrichment' | 'table_name' | 'mapping' | 'flatten';

export class TransformError extends Error {
  readonly stage: TransformStage;
  readonly event_id: string;

  constructor(stage: TransformStage, eventId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransformError';
    this.stage = stage;
    this.event_id = eventId;
  }
}

export class BackpressureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BackpressureError';
  }
}

/** The in-memory buffer of a batch-mode destination is full. */
export class BufferFullError extends BackpressureError {
  constructor(destination: string, capacity: number) {
    super(`[${destination}] batch buffer is full (${capacity} rows)`);
    this.name = 'BufferFullError';
  }
}

/** Returns a printable message for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
