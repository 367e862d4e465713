import type { Logger } from 'pino';
import type {
  DeliveryMode,
  DeliveryStatus,
  DestinationAdapter,
  MonitorKeeper,
  ProcessedRow,
  QueueEntry,
  RawEvent,
} from '../domain/index.js';
import type { Delivery, QueueStats } from '../infrastructure/queue/index.js';
import type { BatchSettings, RetrySettings } from './destination-schema.js';
import type { OutcomeCache } from './outcome-cache.js';
import type { TransformPipeline } from './transform-pipeline.js';
import type { TransformError } from './errors.js';
import { BufferFullError, errorMessage } from './errors.js';
import { backoffDelay, isRetryable, sleep } from './retry-policy.js';

const DEQUEUE_ERROR_DELAY_MS = 1_000;
const WRITE_LOCK_RESOURCE = 'write';

/** The slice of the durable queue the orchestrator relies on. */
export interface DurableQueue {
  readonly name: string;
  readonly isClosed: boolean;
  enqueue(entry: QueueEntry): Promise<void>;
  dequeue(signal?: AbortSignal): Promise<Delivery | null>;
  close(): Promise<void>;
  stats(): QueueStats;
}

/**
 * Batch mode: idle → flushing → idle.
 * Stream mode: idle → consuming ⇄ retrying → idle.
 * Any state → closed on shutdown.
 */
export type ProxyState = 'idle' | 'flushing' | 'consuming' | 'retrying' | 'closed';

export interface StorageProxyOptions {
  readonly name: string;
  readonly type: string;
  readonly mode: DeliveryMode;
  readonly pipeline: TransformPipeline;
  readonly adapter: DestinationAdapter;
  /** Required in stream mode, null in batch mode. */
  readonly queue: DurableQueue | null;
  readonly outcomes: OutcomeCache;
  readonly monitorKeeper: MonitorKeeper;
  readonly batch: BatchSettings;
  readonly retry: RetrySettings;
  readonly shutdown_timeout_ms: number;
  readonly log: Logger;
}

export type ConsumeResult =
  | { readonly status: 'accepted'; readonly table_name: string }
  | { readonly status: 'skipped'; readonly error: TransformError };

export interface ProxySummary {
  readonly name: string;
  readonly type: string;
  readonly mode: DeliveryMode;
  readonly state: ProxyState;
  readonly buffered: number;
  readonly queue: QueueStats | null;
}

/**
 * Per-destination delivery orchestrator.
 *
 * Owns the transform pipeline output and decides how rows reach the adapter:
 * an in-memory batch flushed on a timer or size threshold, or a durable queue
 * drained by a single retrying consumer. Every terminal result lands in the
 * outcome cache; adapter failures never escape the delivery loop.
 */
export class StorageProxy {
  private readonly options: StorageProxyOptions;
  private readonly log: Logger;
  private readonly abort = new AbortController();

  private currentState: ProxyState = 'idle';
  private buffer: ProcessedRow[] = [];
  private flushing: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private worker: Promise<void> | null = null;
  private closing = false;

  constructor(options: StorageProxyOptions) {
    if (options.mode === 'stream' && options.queue === null) {
      throw new Error(`[${options.name}] stream mode requires a durable queue`);
    }
    this.options = options;
    this.log = options.log;
  }

  get name(): string {
    return this.options.name;
  }

  get mode(): DeliveryMode {
    return this.options.mode;
  }

  get state(): ProxyState {
    return this.currentState;
  }

  /** Starts the flush timer (batch) or the queue consumer (stream). */
  start(): void {
    if (this.closing || this.timer !== null || this.worker !== null) return;

    if (this.options.mode === 'batch') {
      this.timer = setInterval(() => this.scheduleFlush(), this.options.batch.flush_interval_ms);
      this.timer.unref();
      this.log.info({ flush_interval_ms: this.options.batch.flush_interval_ms }, 'Batch flush timer started');
      return;
    }

    this.worker = this.runConsumer();
  }

  /**
   * Transforms an event and hands the row to the delivery path.
   *
   * Throws BackpressureError when the buffer/queue is at capacity and,
   * with break_on_error, the TransformError of a failed event.
   */
  async consume(event: RawEvent): Promise<ConsumeResult> {
    if (this.closing) {
      throw new Error(`[${this.name}] destination is closed`);
    }

    const result = this.options.pipeline.process(event);

    if (!result.ok) {
      this.recordOutcome(event.event_id, null, 'skipped', result.error.message, 0);
      if (this.options.pipeline.breakOnError) {
        this.log.error({ err: result.error, event_id: event.event_id }, 'Event processing aborted');
        throw result.error;
      }
      this.log.warn({ err: result.error, event_id: event.event_id }, 'Event skipped');
      return { status: 'skipped', error: result.error };
    }

    const { row } = result;

    if (this.options.queue !== null) {
      await this.options.queue.enqueue({
        destination: this.name,
        enqueued_at: new Date().toISOString(),
        retries: 0,
        row,
      });
      return { status: 'accepted', table_name: row.table_name };
    }

    if (this.buffer.length >= this.options.batch.max_buffered_rows) {
      throw new BufferFullError(this.name, this.options.batch.max_buffered_rows);
    }

    this.buffer.push(row);
    if (this.buffer.length >= this.options.batch.batch_size) {
      this.scheduleFlush();
    }

    return { status: 'accepted', table_name: row.table_name };
  }

  /**
   * Writes the buffered batch. Concurrent calls share the flush in progress.
   * Never rejects: failures end up in the outcome cache.
   */
  flush(): Promise<void> {
    if (this.flushing !== null) return this.flushing;
    if (this.buffer.length === 0) return Promise.resolve();

    const rows = this.buffer;
    this.buffer = [];

    this.flushing = this.writeBatch(rows).finally(() => {
      this.flushing = null;
      if (!this.closing && this.buffer.length >= this.options.batch.batch_size) {
        this.scheduleFlush();
      }
    });

    return this.flushing;
  }

  summary(): ProxySummary {
    return {
      name: this.name,
      type: this.options.type,
      mode: this.mode,
      state: this.currentState,
      buffered: this.buffer.length,
      queue: this.options.queue?.stats() ?? null,
    };
  }

  /**
   * Stops accepting events, drains in-flight work within the shutdown
   * timeout, then closes the queue and the adapter.
   */
  async close(): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    // The final batch flush keeps its backoff; the signal only cuts it short at the timeout.
    if (this.options.mode === 'stream') this.abort.abort();

    const drain = this.options.mode === 'batch' ? this.drainBatch() : (this.worker ?? Promise.resolve());
    const drained = await settleWithin(drain, this.options.shutdown_timeout_ms);
    if (!drained) {
      this.log.warn({ shutdown_timeout_ms: this.options.shutdown_timeout_ms }, 'Shutdown timeout reached, abandoning in-flight delivery');
    }
    this.abort.abort();

    if (this.buffer.length > 0) {
      const dropped = this.buffer;
      this.buffer = [];
      for (const row of dropped) {
        this.recordOutcome(row.event_id, row.table_name, 'permanent-error', 'destination closed before flush', 0);
      }
      this.log.error({ rows: dropped.length }, 'Buffered rows dropped on shutdown');
    }

    if (this.options.queue !== null) {
      await this.options.queue.close();
    }

    try {
      await this.options.adapter.close();
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to close destination adapter');
    }

    this.currentState = 'closed';
    this.log.info('Destination closed');
  }

  // ─── batch ──────────────────────────────────────────────────

  private scheduleFlush(): void {
    this.flush().catch((err: unknown) => {
      this.log.error({ err }, 'Unexpected flush failure');
    });
  }

  private async drainBatch(): Promise<void> {
    await this.flush();
    await this.flush();
  }

  private async writeBatch(rows: ProcessedRow[]): Promise<void> {
    const { retry } = this.options;
    this.setState('flushing');

    for (let attempt = 1; ; attempt++) {
      try {
        await this.write(rows);
        for (const row of rows) {
          this.recordOutcome(row.event_id, row.table_name, 'success', null, attempt - 1);
        }
        this.log.info({ rows: rows.length, attempt }, 'Batch flushed');
        break;
      } catch (err: unknown) {
        if (!isRetryable(err) || attempt >= retry.max_attempts) {
          const reason = isRetryable(err)
            ? `retries exhausted after ${attempt} attempts: ${errorMessage(err)}`
            : errorMessage(err);
          for (const row of rows) {
            this.recordOutcome(row.event_id, row.table_name, 'permanent-error', reason, attempt - 1);
          }
          this.log.error({ err, rows: rows.length, attempts: attempt }, 'Batch dropped after failed delivery');
          break;
        }

        const delay = backoffDelay(retry, attempt);
        this.log.warn({ err, rows: rows.length, attempt, retry_in_ms: delay }, 'Batch flush failed, retrying');
        await sleep(delay, this.abort.signal);

        if (this.abort.signal.aborted) {
          const reason = `destination closed during retry: ${errorMessage(err)}`;
          for (const row of rows) {
            this.recordOutcome(row.event_id, row.table_name, 'permanent-error', reason, attempt - 1);
          }
          this.log.error({ err, rows: rows.length, attempts: attempt }, 'Batch dropped on shutdown');
          break;
        }
      }
    }

    this.setState('idle');
  }

  // ─── stream ─────────────────────────────────────────────────

  /**
   * Single consumer of the destination queue. Runs until close().
   */
  private async runConsumer(): Promise<void> {
    const { queue } = this.options;
    if (queue === null) return;

    const { signal } = this.abort;
    this.log.info({ queue: queue.name }, 'Stream consumer started');

    while (!signal.aborted) {
      let delivery: Delivery | null;
      try {
        delivery = await queue.dequeue(signal);
      } catch (err: unknown) {
        this.log.error({ err, queue: queue.name }, 'Dequeue failed, retrying in 1s');
        await sleep(DEQUEUE_ERROR_DELAY_MS, signal);
        continue;
      }

      if (delivery === null) break;
      await this.deliver(delivery);
    }

    this.log.info({ queue: queue.name }, 'Stream consumer stopped');
  }

  /**
   * Order: write → record success → ack. If the ack itself fails the entry
   * is replayed later and the cached success turns the replay into an ack.
   */
  private async deliver(delivery: Delivery): Promise<void> {
    const { row, retries } = delivery.entry;

    try {
      if (this.options.outcomes.lastStatus(this.name, row.event_id) === 'success') {
        await delivery.ack();
        this.log.debug({ event_id: row.event_id }, 'Already delivered, acknowledging duplicate');
        return;
      }

      this.setState('consuming');
      try {
        await this.write([row]);
      } catch (err: unknown) {
        await this.handleStreamFailure(delivery, err);
        return;
      }

      this.recordOutcome(row.event_id, row.table_name, 'success', null, retries);
      await delivery.ack();
      this.setState('idle');
      this.log.debug({ event_id: row.event_id, table: row.table_name, retries }, 'Event delivered');
    } catch (err: unknown) {
      this.log.error({ err, event_id: row.event_id }, 'Failed to settle queue entry');
    }
  }

  private async handleStreamFailure(delivery: Delivery, err: unknown): Promise<void> {
    const { row } = delivery.entry;

    if (!isRetryable(err)) {
      await delivery.reject(err);
      this.recordOutcome(row.event_id, row.table_name, 'permanent-error', errorMessage(err), delivery.entry.retries);
      this.setState('idle');
      return;
    }

    const result = await delivery.nack(err);
    if (result.dead_lettered) {
      this.recordOutcome(
        row.event_id,
        row.table_name,
        'permanent-error',
        `retries exhausted after ${result.retries + 1} attempts: ${errorMessage(err)}`,
        result.retries,
      );
      this.setState('idle');
      return;
    }

    this.recordOutcome(row.event_id, row.table_name, 'retryable-error', errorMessage(err), delivery.entry.retries);
    this.setState('retrying');

    const delay = backoffDelay(this.options.retry, result.retries);
    this.log.warn({ err, event_id: row.event_id, retries: result.retries, retry_in_ms: delay }, 'Delivery failed, requeued');
    await sleep(delay, this.abort.signal);
  }

  // ─── shared ─────────────────────────────────────────────────

  /** Adapter write under the destination's monitor lock, released unconditionally. */
  private async write(rows: readonly ProcessedRow[]): Promise<void> {
    const lock = await this.options.monitorKeeper.lock(this.name, WRITE_LOCK_RESOURCE);
    try {
      await this.options.adapter.write(rows);
    } finally {
      await lock.release().catch((err: unknown) => {
        this.log.warn({ err }, 'Failed to release destination lock');
      });
    }
  }

  private recordOutcome(
    eventId: string,
    tableName: string | null,
    status: DeliveryStatus,
    error: string | null,
    retries: number,
  ): void {
    this.options.outcomes.record({
      event_id: eventId,
      destination: this.name,
      status,
      table_name: tableName,
      error,
      retries,
      timestamp: new Date().toISOString(),
    });
  }

  private setState(next: ProxyState): void {
    if (this.currentState !== 'closed') this.currentState = next;
  }
}

/** Resolves true if `task` settles within `ms`, false on timeout. */
async function settleWithin(task: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([task.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
