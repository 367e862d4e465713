import { mkdir, open, readdir, readFile, rename, stat, truncate, unlink, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { QueueEntry } from '../../domain/index.js';
import { BackpressureError, errorMessage } from '../../application/errors.js';

const CURSOR_FILE = 'cursor.json';
const DEAD_LETTER_FILE = 'dead-letter.log';
const SEGMENT_PATTERN = /^segment-(\d+)\.log$/;
const NEWLINE = 0x0a;

/** `enqueue` would grow the queue past its disk budget. */
export class QueueFullError extends BackpressureError {
  constructor(queue: string, maxBytes: number) {
    super(`Queue ${queue} is full (max ${maxBytes} bytes on disk)`);
    this.name = 'QueueFullError';
  }
}

export class QueueClosedError extends Error {
  constructor(queue: string) {
    super(`Queue ${queue} is closed`);
    this.name = 'QueueClosedError';
  }
}

export interface PersistentQueueOptions {
  /** Disk budget for live segments; `enqueue` fails beyond it. */
  readonly max_bytes: number;
  /** A new segment starts once the current one would exceed this size. */
  readonly segment_bytes: number;
  /** Redeliveries allowed before an entry is dead-lettered. */
  readonly max_retries: number;
  /** The dead-letter log is rotated to `dead-letter.log.1` past this size. */
  readonly dead_letter_max_bytes?: number;
  readonly onDeadLetter?: (record: DeadLetterRecord) => void;
}

export interface DeadLetterRecord {
  readonly queue: string;
  readonly entry: QueueEntry;
  readonly error: string;
  readonly dead_lettered_at: string; // ISO-8601
}

export interface NackResult {
  readonly dead_lettered: boolean;
  /** Retry count the entry will carry on its next delivery. */
  readonly retries: number;
}

/**
 * A dequeued entry. Exactly one of ack / nack / reject must be called.
 */
export interface Delivery {
  readonly entry: QueueEntry;
  /** Destination write succeeded: the entry is gone for good. */
  ack(): Promise<void>;
  /** Transient failure: requeue at the tail with retries + 1, or dead-letter past max_retries. */
  nack(error: unknown): Promise<NackResult>;
  /** Permanent failure: dead-letter now. */
  reject(error: unknown): Promise<void>;
}

export interface QueueStats {
  readonly pending: number;
  readonly in_flight: number;
  readonly disk_bytes: number;
  readonly dead_lettered: number;
}

interface Position {
  readonly segment: number;
  readonly offset: number;
}

interface StoredRecord {
  readonly seq: number;
  readonly segment: number;
  readonly start: number;
  readonly entry: QueueEntry;
}

const positionSchema = z.object({
  segment: z.number().int().min(1),
  offset: z.number().int().min(0),
});

const columnValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const queueEntrySchema = z.object({
  destination: z.string(),
  enqueued_at: z.string(),
  retries: z.number().int().min(0),
  row: z.object({
    event_id: z.string(),
    table_name: z.string().min(1),
    columns: z.record(z.string(), columnValueSchema),
    primary_keys: z.array(z.string()),
    column_types: z.record(z.string(), z.string()),
  }),
});

function segmentFile(id: number): string {
  return `segment-${String(id).padStart(6, '0')}.log`;
}

function serialize(value: unknown): Buffer {
  return Buffer.from(`${JSON.stringify(value)}\n`, 'utf8');
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Directory holding one destination's queue, unique per destination name. */
export function queueDirectory(baseDir: string, destination: string): string {
  return join(baseDir, encodeURIComponent(`queue.dst=${destination}`));
}

/**
 * On-disk FIFO backing a stream-mode destination.
 *
 * Layout: append-only JSON-lines segments plus a cursor file naming the
 * first unresolved record. `enqueue` resolves only after the record is
 * fsynced. Unacknowledged entries sit behind the cursor and are replayed
 * on the next open (at-least-once). Segments wholly behind the cursor are
 * deleted, and a drained queue rotates so its last segment goes too, which
 * bounds disk usage together with `max_bytes`.
 *
 * Any task may enqueue; one consumer dequeues.
 */
export class PersistentQueue {
  readonly name: string;
  readonly directory: string;

  private readonly options: PersistentQueueOptions;
  private readonly log: Logger;

  private readonly pending: StoredRecord[];
  private readonly inFlight = new Map<number, StoredRecord>();
  private readonly segmentSizes: Map<number, number>;

  private handle: FileHandle;
  private writeSegment: number;
  private writeOffset: number;
  private cursor: Position;
  private nextSeq: number;
  private deadLetterBytes: number;
  private deadLettered = 0;

  private waiter: (() => void) | null = null;
  private chain: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(init: {
    name: string;
    directory: string;
    options: PersistentQueueOptions;
    log: Logger;
    pending: StoredRecord[];
    segmentSizes: Map<number, number>;
    handle: FileHandle;
    writeSegment: number;
    cursor: Position;
    deadLetterBytes: number;
  }) {
    this.name = init.name;
    this.directory = init.directory;
    this.options = init.options;
    this.log = init.log;
    this.pending = init.pending;
    this.segmentSizes = init.segmentSizes;
    this.handle = init.handle;
    this.writeSegment = init.writeSegment;
    this.writeOffset = init.segmentSizes.get(init.writeSegment) ?? 0;
    this.cursor = init.cursor;
    this.nextSeq = init.pending.length;
    this.deadLetterBytes = init.deadLetterBytes;
  }

  /**
   * Opens (or creates) the queue of a destination and replays every record
   * from the persisted cursor onwards.
   */
  static async open(
    destination: string,
    baseDir: string,
    options: PersistentQueueOptions,
    log: Logger,
  ): Promise<PersistentQueue> {
    const name = `queue.dst=${destination}`;
    const directory = queueDirectory(baseDir, destination);
    await mkdir(directory, { recursive: true });

    const segments = (await readdir(directory))
      .map((file) => SEGMENT_PATTERN.exec(file)?.[1])
      .filter((id): id is string => id !== undefined)
      .map(Number)
      .sort((a, b) => a - b);

    const cursor = (await readCursor(directory, log)) ?? { segment: segments[0] ?? 1, offset: 0 };

    const pending: StoredRecord[] = [];
    const segmentSizes = new Map<number, number>();

    for (const id of segments) {
      const path = join(directory, segmentFile(id));

      if (id < cursor.segment) {
        await unlink(path);
        continue;
      }

      const buf = await readFile(path);
      let pos = id === cursor.segment ? Math.min(cursor.offset, buf.length) : 0;
      let validEnd = buf.length;

      while (pos < buf.length) {
        const newline = buf.indexOf(NEWLINE, pos);
        if (newline === -1) {
          validEnd = pos;
          break;
        }
        const line = buf.subarray(pos, newline).toString('utf8');
        try {
          const entry = queueEntrySchema.parse(JSON.parse(line));
          pending.push({ seq: pending.length, segment: id, start: pos, entry });
        } catch (err: unknown) {
          log.error({ err, queue: name, segment: id, offset: pos }, 'Skipping unreadable queue record');
        }
        pos = newline + 1;
      }

      if (validEnd < buf.length) {
        // Torn write from a crash mid-append: the record was never acknowledged to the producer.
        await truncate(path, validEnd);
        log.warn({ queue: name, segment: id, truncated_bytes: buf.length - validEnd }, 'Truncated partial queue record');
      }

      segmentSizes.set(id, validEnd);
    }

    const writeSegment = Math.max(segments.at(-1) ?? 1, cursor.segment);
    if (!segmentSizes.has(writeSegment)) segmentSizes.set(writeSegment, 0);
    const handle = await open(join(directory, segmentFile(writeSegment)), 'a');

    let deadLetterBytes = 0;
    try {
      deadLetterBytes = (await stat(join(directory, DEAD_LETTER_FILE))).size;
    } catch (err: unknown) {
      if (!isNotFound(err)) {
        await handle.close();
        throw err;
      }
    }

    const queue = new PersistentQueue({
      name,
      directory,
      options,
      log,
      pending,
      segmentSizes,
      handle,
      writeSegment,
      cursor,
      deadLetterBytes,
    });

    log.info(
      { queue: name, directory, replayed: pending.length, disk_bytes: queue.diskBytes },
      'Persistent queue opened',
    );

    return queue;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.pending.length + this.inFlight.size;
  }

  private get diskBytes(): number {
    let total = 0;
    for (const size of this.segmentSizes.values()) total += size;
    return total;
  }

  stats(): QueueStats {
    return {
      pending: this.pending.length,
      in_flight: this.inFlight.size,
      disk_bytes: this.diskBytes,
      dead_lettered: this.deadLettered,
    };
  }

  /**
   * Appends an entry durably. Throws QueueFullError when the disk budget
   * is exhausted and QueueClosedError after close().
   */
  async enqueue(entry: QueueEntry): Promise<void> {
    const line = serialize(entry);

    await this.exclusive(async () => {
      if (this.closed) throw new QueueClosedError(this.name);
      if (this.diskBytes + line.length > this.options.max_bytes) {
        throw new QueueFullError(this.name, this.options.max_bytes);
      }
      await this.append(line, entry);
    });

    this.wake();
  }

  /**
   * Next entry in FIFO order. Waits while the queue is empty; resolves
   * `null` once the queue is closed or `signal` aborts.
   */
  async dequeue(signal?: AbortSignal): Promise<Delivery | null> {
    for (;;) {
      if (this.closed || signal?.aborted === true) return null;

      const record = this.pending.shift();
      if (record !== undefined) {
        this.inFlight.set(record.seq, record);
        return this.toDelivery(record);
      }

      if (this.waiter !== null) {
        throw new Error(`Queue ${this.name} already has an active consumer`);
      }

      await new Promise<void>((resolve) => {
        const onAbort = (): void => this.wake();
        this.waiter = () => {
          this.waiter = null;
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }
  }

  /**
   * Stops deliveries and releases the segment file. Unresolved entries stay
   * on disk and are replayed by the next open().
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.wake();

    await this.exclusive(() => this.handle.close());

    this.log.info({ queue: this.name, unresolved: this.size }, 'Persistent queue closed');
  }

  // ─── internals ──────────────────────────────────────────────

  private toDelivery(record: StoredRecord): Delivery {
    let settled = false;
    const settle = (): void => {
      if (settled) throw new Error(`Queue entry ${record.entry.row.event_id} already settled`);
      settled = true;
    };

    return {
      entry: record.entry,
      ack: async () => {
        settle();
        this.inFlight.delete(record.seq);
        await this.exclusive(() => this.commitCursor());
      },
      nack: async (error) => {
        settle();
        return this.retry(record, error);
      },
      reject: async (error) => {
        settle();
        await this.deadLetter(record, error);
      },
    };
  }

  private async retry(record: StoredRecord, error: unknown): Promise<NackResult> {
    if (this.closed) {
      // Left behind the cursor; replayed with its current retry count on the next open.
      return { dead_lettered: false, retries: record.entry.retries };
    }

    const retries = record.entry.retries + 1;
    if (retries > this.options.max_retries) {
      await this.deadLetter(record, error);
      return { dead_lettered: true, retries: record.entry.retries };
    }

    const entry: QueueEntry = { ...record.entry, retries };
    await this.exclusive(async () => {
      // Requeued entries bypass max_bytes: an accepted entry is never dropped.
      await this.append(serialize(entry), entry);
      this.inFlight.delete(record.seq);
      await this.commitCursor();
    });

    this.wake();
    return { dead_lettered: false, retries };
  }

  private async deadLetter(record: StoredRecord, error: unknown): Promise<void> {
    const dead: DeadLetterRecord = {
      queue: this.name,
      entry: record.entry,
      error: errorMessage(error),
      dead_lettered_at: new Date().toISOString(),
    };

    await this.exclusive(async () => {
      await this.appendDeadLetter(serialize(dead));
      this.inFlight.delete(record.seq);
      this.deadLettered++;
      await this.commitCursor();
    });

    this.log.error(
      { queue: this.name, event_id: record.entry.row.event_id, retries: record.entry.retries, error: dead.error },
      'Queue entry moved to dead-letter log',
    );

    try {
      this.options.onDeadLetter?.(dead);
    } catch (err: unknown) {
      this.log.warn({ err, queue: this.name }, 'Dead-letter report failed');
    }
  }

  private async append(line: Buffer, entry: QueueEntry): Promise<void> {
    if (this.writeOffset > 0 && this.writeOffset + line.length > this.options.segment_bytes) {
      await this.rotate();
    }

    const start = this.writeOffset;
    try {
      await this.handle.appendFile(line);
      await this.handle.datasync();
    } catch (err: unknown) {
      await this.handle.truncate(start).catch((truncErr: unknown) => {
        this.log.error({ err: truncErr, queue: this.name }, 'Failed to roll back partial queue write');
      });
      throw err;
    }

    this.writeOffset += line.length;
    this.segmentSizes.set(this.writeSegment, this.writeOffset);
    this.pending.push({ seq: this.nextSeq++, segment: this.writeSegment, start, entry });
  }

  private async rotate(): Promise<void> {
    await this.handle.close();
    this.writeSegment++;
    this.writeOffset = 0;
    this.segmentSizes.set(this.writeSegment, 0);
    this.handle = await open(join(this.directory, segmentFile(this.writeSegment)), 'a');
    this.log.debug({ queue: this.name, segment: this.writeSegment }, 'Queue segment rotated');
  }

  private async appendDeadLetter(line: Buffer): Promise<void> {
    const path = join(this.directory, DEAD_LETTER_FILE);
    const limit = this.options.dead_letter_max_bytes;

    if (limit !== undefined && this.deadLetterBytes > 0 && this.deadLetterBytes + line.length > limit) {
      await rename(path, `${path}.1`);
      this.deadLetterBytes = 0;
    }

    const fh = await open(path, 'a');
    try {
      await fh.appendFile(line);
      await fh.datasync();
    } finally {
      await fh.close();
    }
    this.deadLetterBytes += line.length;
  }

  /** Earliest record not yet acked or dead-lettered, or the write head. */
  private earliestUnresolved(): Position {
    let earliest: StoredRecord | undefined = this.pending[0];
    for (const record of this.inFlight.values()) {
      if (earliest === undefined || record.seq < earliest.seq) earliest = record;
    }
    return earliest === undefined
      ? { segment: this.writeSegment, offset: this.writeOffset }
      : { segment: earliest.segment, offset: earliest.start };
  }

  private async commitCursor(): Promise<void> {
    if (!this.closed && this.size === 0 && this.writeOffset > 0) {
      // Drained: start a fresh segment so the fully consumed one can be deleted.
      await this.rotate();
    }

    const position = this.earliestUnresolved();
    if (position.segment === this.cursor.segment && position.offset === this.cursor.offset) return;

    const path = join(this.directory, CURSOR_FILE);
    await writeFile(`${path}.tmp`, JSON.stringify(position));
    await rename(`${path}.tmp`, path);
    this.cursor = position;

    for (const id of [...this.segmentSizes.keys()]) {
      if (id < position.segment) {
        await unlink(join(this.directory, segmentFile(id)));
        this.segmentSizes.delete(id);
      }
    }
  }

  /** Serialises file mutations; the task's own error still reaches its caller. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private wake(): void {
    this.waiter?.();
  }
}

async function readCursor(directory: string, log: Logger): Promise<Position | null> {
  let raw: string;
  try {
    raw = await readFile(join(directory, CURSOR_FILE), 'utf8');
  } catch (err: unknown) {
    if (isNotFound(err)) return null;
    throw err;
  }

  const parsed = positionSchema.safeParse(safeJson(raw));
  if (!parsed.success) {
    // Replaying from the oldest segment redelivers, it never loses entries.
    log.warn({ directory }, 'Unreadable queue cursor, replaying from the oldest segment');
    return null;
  }
  return parsed.data;
}

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
