import { DestinationError } from '../domain/index.js';
import type { RetrySettings } from './destination-schema.js';

/**
 * Exponential backoff: base * 2^(attempt - 1), capped at max_delay_ms.
 * `attempt` is 1 for the first retry.
 */
export function backoffDelay(settings: RetrySettings, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = settings.base_delay_ms * 2 ** exponent;
  return Math.min(delay, settings.max_delay_ms);
}

/**
 * Adapters classify their own failures. Anything unclassified is retried,
 * bounded by the destination's retry budget.
 */
export function isRetryable(err: unknown): boolean {
  return err instanceof DestinationError ? err.retryable : true;
}

/** Resolves after `ms`, or immediately once `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
