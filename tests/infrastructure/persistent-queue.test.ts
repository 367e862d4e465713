import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { appendFileSync, existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import {
  PersistentQueue,
  QueueClosedError,
  QueueFullError,
  queueDirectory,
} from '../../src/infrastructure/queue/index.js';
import type { PersistentQueueOptions } from '../../src/infrastructure/queue/index.js';
import type { QueueEntry } from '../../src/domain/index.js';
import { fakeLogger, makeEntry, makeRow, tempDir } from '../support/helpers.js';

const MiB = 1024 * 1024;

function entry(eventId: string): QueueEntry {
  return makeEntry(makeRow({ event_id: eventId }));
}

function fullEntry(eventId: string, retries = 0): QueueEntry {
  return {
    destination: 'dest',
    enqueued_at: '2026-02-18T12:00:00.000Z',
    retries,
    row: {
      event_id: eventId,
      table_name: 'events_click',
      columns: { event_id: eventId, url: '/home', user_id: 7, premium: true, referrer: null },
      primary_keys: ['event_id'],
      column_types: { user_id: 'bigint' },
    },
  };
}

function lineBytes(e: QueueEntry): number {
  return Buffer.byteLength(`${JSON.stringify(e)}\n`);
}

describe('PersistentQueue', () => {
  let dir: ReturnType<typeof tempDir>;
  let queues: PersistentQueue[];

  const options = (overrides: Partial<PersistentQueueOptions> = {}): PersistentQueueOptions => ({
    max_bytes: MiB,
    segment_bytes: MiB / 4,
    max_retries: 3,
    ...overrides,
  });

  async function openQueue(overrides: Partial<PersistentQueueOptions> = {}, log = fakeLogger()) {
    const queue = await PersistentQueue.open('dest', dir.path, options(overrides), log);
    queues.push(queue);
    return queue;
  }

  function segmentPath(id: number): string {
    return join(queueDirectory(dir.path, 'dest'), `segment-${String(id).padStart(6, '0')}.log`);
  }

  beforeEach(() => {
    dir = tempDir();
    queues = [];
  });

  afterEach(async () => {
    for (const q of queues) await q.close();
    dir.cleanup();
  });

  it('names the queue directory after the destination', () => {
    expect(queueDirectory('/base', 'a/b')).toBe(join('/base', 'queue.dst%3Da%2Fb'));
  });

  it('delivers entries in FIFO order', async () => {
    const queue = await openQueue();
    await queue.enqueue(entry('e1'));
    await queue.enqueue(entry('e2'));

    const first = await queue.dequeue();
    const second = await queue.dequeue();

    expect(first?.entry.row.event_id).toBe('e1');
    expect(second?.entry.row.event_id).toBe('e2');
    expect(queue.stats()).toMatchObject({ pending: 0, in_flight: 2 });
  });

  it('replays unacknowledged entries unchanged after a restart', async () => {
    const queue = await openQueue();
    await queue.enqueue(fullEntry('e1'));
    await queue.enqueue(fullEntry('e2'));
    await queue.enqueue(fullEntry('e3'));

    await (await queue.dequeue())?.ack();
    await (await queue.dequeue())?.nack(new Error('timeout'));
    await queue.dequeue(); // e3 in flight, never acknowledged
    await queue.close();

    const reopened = await openQueue();
    expect(reopened.size).toBe(2);
    expect((await reopened.dequeue())?.entry).toEqual(fullEntry('e3'));
    expect((await reopened.dequeue())?.entry).toEqual(fullEntry('e2', 1));
  });

  it('waits for an entry when empty', async () => {
    const queue = await openQueue();
    const pending = queue.dequeue();

    await queue.enqueue(entry('late'));

    expect((await pending)?.entry.row.event_id).toBe('late');
  });

  it('resolves null when the consumer aborts', async () => {
    const queue = await openQueue();
    const ac = new AbortController();
    const pending = queue.dequeue(ac.signal);

    ac.abort();

    await expect(pending).resolves.toBeNull();
  });

  it('allows a single waiting consumer', async () => {
    const queue = await openQueue();
    const ac = new AbortController();
    const waiting = queue.dequeue(ac.signal);

    await expect(queue.dequeue()).rejects.toThrow('Queue queue.dst=dest already has an active consumer');

    ac.abort();
    await waiting;
  });

  it('rejects enqueues beyond max_bytes', async () => {
    const size = lineBytes(entry('e1'));
    const queue = await openQueue({ max_bytes: size * 2 });

    await queue.enqueue(entry('e1'));
    await queue.enqueue(entry('e2'));

    await expect(queue.enqueue(entry('e3'))).rejects.toBeInstanceOf(QueueFullError);
    expect(queue.size).toBe(2);
  });

  it('rotates segments and deletes the ones fully consumed', async () => {
    const size = lineBytes(entry('e1'));
    const queue = await openQueue({ segment_bytes: size });

    await queue.enqueue(entry('e1'));
    await queue.enqueue(entry('e2'));
    await queue.enqueue(entry('e3'));
    expect(existsSync(segmentPath(3))).toBe(true);

    await (await queue.dequeue())?.ack();

    expect(existsSync(segmentPath(1))).toBe(false);
    expect(existsSync(segmentPath(2))).toBe(true);
    expect(queue.stats().disk_bytes).toBe(size * 2);
  });

  it('frees the last segment once drained, even when it exceeds max_bytes', async () => {
    const queue = await openQueue({ max_bytes: 4096, segment_bytes: 8192 });
    const total = 200;
    expect(lineBytes(entry('e0')) * total).toBeGreaterThan(4096 * 5);

    for (let i = 0; i < total; i++) {
      await queue.enqueue(entry(`e${i}`));
      await (await queue.dequeue())?.ack();
    }

    expect(queue.stats()).toEqual({ pending: 0, in_flight: 0, disk_bytes: 0, dead_lettered: 0 });
    expect(readdirSync(queue.directory).filter((f) => f.startsWith('segment-'))).toEqual(['segment-000201.log']);

    await queue.close();
    const reopened = await openQueue({ max_bytes: 4096, segment_bytes: 8192 });
    expect(reopened.size).toBe(0);
    await reopened.enqueue(entry('after-restart'));
    expect(reopened.size).toBe(1);
  });

  it('truncates a torn record on recovery', async () => {
    const size = lineBytes(entry('e1'));
    const queue = await openQueue();
    await queue.enqueue(entry('e1'));
    await queue.close();

    appendFileSync(segmentPath(1), '{"destination":"dest","enq');

    const log = fakeLogger();
    const reopened = await openQueue({}, log);

    expect(reopened.size).toBe(1);
    expect(statSync(segmentPath(1)).size).toBe(size);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ queue: 'queue.dst=dest', segment: 1 }),
      'Truncated partial queue record',
    );
  });

  it('requeues a nacked entry at the tail with one more retry', async () => {
    const queue = await openQueue();
    await queue.enqueue(entry('e1'));
    await queue.enqueue(entry('e2'));

    const first = await queue.dequeue();
    await expect(first?.nack(new Error('timeout'))).resolves.toEqual({ dead_lettered: false, retries: 1 });

    expect((await queue.dequeue())?.entry.row.event_id).toBe('e2');
    const retried = await queue.dequeue();
    expect(retried?.entry.row.event_id).toBe('e1');
    expect(retried?.entry.retries).toBe(1);
  });

  it('dead-letters an entry past max_retries and reports it', async () => {
    const onDeadLetter = vi.fn();
    const queue = await openQueue({ max_retries: 1, onDeadLetter });
    await queue.enqueue(entry('e1'));

    await (await queue.dequeue())?.nack(new Error('timeout'));
    const last = await queue.dequeue();
    await expect(last?.nack(new Error('timeout again'))).resolves.toEqual({ dead_lettered: true, retries: 1 });

    expect(queue.size).toBe(0);
    expect(queue.stats().dead_lettered).toBe(1);
    expect(onDeadLetter).toHaveBeenCalledWith(expect.objectContaining({
      queue: 'queue.dst=dest',
      error: 'timeout again',
      entry: expect.objectContaining({ retries: 1 }),
    }));

    const lines = readFileSync(join(queue.directory, 'dead-letter.log'), 'utf8').trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}').entry.row.event_id).toBe('e1');
  });

  it('dead-letters a rejected entry immediately', async () => {
    const queue = await openQueue();
    await queue.enqueue(entry('e1'));

    await (await queue.dequeue())?.reject(new Error('bad column'));

    expect(queue.stats()).toMatchObject({ pending: 0, in_flight: 0, dead_lettered: 1 });
  });

  it('does not replay acknowledged or dead-lettered entries', async () => {
    const queue = await openQueue();
    await queue.enqueue(entry('e1'));
    await queue.enqueue(entry('e2'));
    await (await queue.dequeue())?.ack();
    await (await queue.dequeue())?.reject(new Error('bad column'));
    await queue.close();

    const reopened = await openQueue();
    expect(reopened.size).toBe(0);
  });

  it('refuses to settle an entry twice', async () => {
    const queue = await openQueue();
    await queue.enqueue(entry('e1'));
    const delivery = await queue.dequeue();

    await delivery?.ack();

    await expect(delivery?.ack()).rejects.toThrow('Queue entry e1 already settled');
  });

  it('rejects enqueues and ends consumers after close', async () => {
    const queue = await openQueue();
    const waiting = queue.dequeue();

    await queue.close();

    await expect(waiting).resolves.toBeNull();
    await expect(queue.enqueue(entry('e1'))).rejects.toBeInstanceOf(QueueClosedError);
    expect(queue.isClosed).toBe(true);
  });
});
