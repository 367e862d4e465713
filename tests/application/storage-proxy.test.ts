import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { StorageProxy } from '../../src/application/storage-proxy.js';
import type { StorageProxyOptions } from '../../src/application/storage-proxy.js';
import { TransformPipeline } from '../../src/application/transform-pipeline.js';
import { createFieldMapper } from '../../src/application/field-mapping.js';
import { createTableNameResolver } from '../../src/application/table-name.js';
import { OutcomeCache } from '../../src/application/outcome-cache.js';
import { BufferFullError, TransformError } from '../../src/application/errors.js';
import { DestinationError } from '../../src/domain/index.js';
import type { EnrichmentRule } from '../../src/domain/index.js';
import { PersistentQueue } from '../../src/infrastructure/queue/index.js';
import { fakeAdapter, fakeMonitorKeeper } from '../support/fakes.js';
import { fakeLogger, makeEvent, tempDir } from '../support/helpers.js';

const rejectFlagged: EnrichmentRule = {
  name: 'ip_lookup',
  description: 'ip_lookup /reject -> /x',
  execute: (fields) => {
    if (fields['reject'] === true) throw new Error('flagged');
  },
};

function pipeline(breakOnError = false): TransformPipeline {
  const { mapper, type_casts } = createFieldMapper({ kind: 'identity' });
  return new TransformPipeline({
    destination: 'dest',
    rules: [rejectFlagged],
    mapper,
    type_casts,
    table: createTableNameResolver('{{ /table }}'),
    primary_key_fields: [],
    break_on_error: breakOnError,
    log: fakeLogger(),
  });
}

describe('StorageProxy', () => {
  let outcomes: OutcomeCache;
  let proxies: StorageProxy[];

  function makeProxy(overrides: Partial<StorageProxyOptions> = {}): StorageProxy {
    const proxy = new StorageProxy({
      name: 'dest',
      type: 'fake',
      mode: 'batch',
      pipeline: pipeline(),
      adapter: fakeAdapter(),
      queue: null,
      outcomes,
      monitorKeeper: fakeMonitorKeeper(),
      batch: { flush_interval_ms: 60_000, batch_size: 10, max_buffered_rows: 100 },
      retry: { max_attempts: 3, base_delay_ms: 1, max_delay_ms: 5 },
      shutdown_timeout_ms: 1_000,
      log: fakeLogger(),
      ...overrides,
    });
    proxies.push(proxy);
    return proxy;
  }

  const event = (id: string, extra: Record<string, unknown> = {}) =>
    makeEvent({ event_id: id, payload: { table: 'clicks', ...extra } });

  beforeEach(() => {
    outcomes = new OutcomeCache();
    proxies = [];
  });

  afterEach(async () => {
    for (const p of proxies) await p.close();
  });

  describe('transform failures', () => {
    it('records a skipped outcome for an event without a table', async () => {
      const adapter = fakeAdapter();
      const proxy = makeProxy({ adapter });

      const result = await proxy.consume(makeEvent({ event_id: 'e1', payload: {} }));
      await proxy.flush();

      expect(result.status).toBe('skipped');
      expect(outcomes.recent('dest')).toEqual([
        expect.objectContaining({ event_id: 'e1', status: 'skipped', table_name: null }),
      ]);
      expect(adapter.write).not.toHaveBeenCalled();
    });

    it('throws the transform error with break_on_error', async () => {
      const proxy = makeProxy({ pipeline: pipeline(true) });

      await expect(proxy.consume(event('e1', { reject: true }))).rejects.toBeInstanceOf(TransformError);
      await expect(proxy.consume(event('e2'))).resolves.toEqual({ status: 'accepted', table_name: 'clicks' });
    });
  });

  describe('batch mode', () => {
    it('writes the whole batch and records one success per event', async () => {
      const adapter = fakeAdapter();
      const proxy = makeProxy({ adapter });

      await proxy.consume(event('e1'));
      await proxy.consume(event('e2'));
      expect(proxy.summary().buffered).toBe(2);

      await proxy.flush();

      expect(adapter.write).toHaveBeenCalledTimes(1);
      expect(adapter.written[0]?.map((r) => r.event_id)).toEqual(['e1', 'e2']);
      expect(outcomes.recent('dest').map((o) => `${o.event_id}:${o.status}:${o.retries}`))
        .toEqual(['e2:success:0', 'e1:success:0']);
    });

    it('flushes once the size threshold is reached', async () => {
      const adapter = fakeAdapter();
      const proxy = makeProxy({
        adapter,
        batch: { flush_interval_ms: 60_000, batch_size: 2, max_buffered_rows: 100 },
      });

      await proxy.consume(event('e1'));
      await proxy.consume(event('e2'));

      await vi.waitFor(() => expect(adapter.write).toHaveBeenCalledTimes(1));
    });

    it('flushes on the timer', async () => {
      const adapter = fakeAdapter();
      const proxy = makeProxy({
        adapter,
        batch: { flush_interval_ms: 20, batch_size: 100, max_buffered_rows: 100 },
      });
      proxy.start();

      await proxy.consume(event('e1'));

      await vi.waitFor(() => expect(outcomes.lastStatus('dest', 'e1')).toBe('success'));
    });

    it('retries a failed batch and then succeeds', async () => {
      const adapter = fakeAdapter([new Error('connection reset')]);
      const proxy = makeProxy({ adapter });

      await proxy.consume(event('e1'));
      await proxy.flush();

      expect(adapter.write).toHaveBeenCalledTimes(2);
      expect(outcomes.recent('dest')[0]).toMatchObject({ status: 'success', retries: 1 });
    });

    it('marks every row permanent-error once attempts are exhausted', async () => {
      const down = new DestinationError('down', true);
      const adapter = fakeAdapter([down, down, down]);
      const proxy = makeProxy({ adapter });

      await proxy.consume(event('e1'));
      await proxy.consume(event('e2'));
      await proxy.flush();

      expect(adapter.write).toHaveBeenCalledTimes(3);
      expect(outcomes.recent('dest')).toEqual([
        expect.objectContaining({ event_id: 'e2', status: 'permanent-error', retries: 2, error: 'retries exhausted after 3 attempts: down' }),
        expect.objectContaining({ event_id: 'e1', status: 'permanent-error', retries: 2 }),
      ]);
    });

    it('does not retry permanent adapter errors', async () => {
      const adapter = fakeAdapter([new DestinationError('bad column', false)]);
      const proxy = makeProxy({ adapter });

      await proxy.consume(event('e1'));
      await proxy.flush();

      expect(adapter.write).toHaveBeenCalledTimes(1);
      expect(outcomes.recent('dest')[0]).toMatchObject({ status: 'permanent-error', error: 'bad column', retries: 0 });
    });

    it('applies backpressure when the buffer is full', async () => {
      const proxy = makeProxy({ batch: { flush_interval_ms: 60_000, batch_size: 10, max_buffered_rows: 1 } });

      await proxy.consume(event('e1'));

      await expect(proxy.consume(event('e2'))).rejects.toBeInstanceOf(BufferFullError);
    });

    it('takes the destination lock around every write', async () => {
      const monitorKeeper = fakeMonitorKeeper();
      const proxy = makeProxy({ monitorKeeper, adapter: fakeAdapter([new DestinationError('bad', false)]) });

      await proxy.consume(event('e1'));
      await proxy.flush();

      expect(monitorKeeper.calls).toEqual(['lock dest:write', 'release dest:write']);
    });

    it('keeps backing off during the final flush and gives up at the shutdown timeout', async () => {
      const timeout = new DestinationError('timeout', true);
      const adapter = fakeAdapter([timeout, timeout, timeout]);
      const proxy = makeProxy({
        adapter,
        retry: { max_attempts: 3, base_delay_ms: 10_000, max_delay_ms: 10_000 },
        shutdown_timeout_ms: 50,
      });

      await proxy.consume(event('e1'));
      await proxy.close();

      await vi.waitFor(() => {
        expect(outcomes.recent('dest')).toEqual([
          expect.objectContaining({
            event_id: 'e1',
            status: 'permanent-error',
            error: 'destination closed during retry: timeout',
          }),
        ]);
      });
      expect(adapter.write).toHaveBeenCalledTimes(1);
    });

    it('flushes buffered rows on close and closes the adapter', async () => {
      const adapter = fakeAdapter();
      const proxy = makeProxy({ adapter });

      await proxy.consume(event('e1'));
      await proxy.close();

      expect(adapter.write).toHaveBeenCalledTimes(1);
      expect(adapter.close).toHaveBeenCalledTimes(1);
      expect(proxy.state).toBe('closed');
      await expect(proxy.consume(event('e2'))).rejects.toThrow('[dest] destination is closed');
    });
  });

  describe('stream mode', () => {
    let dir: ReturnType<typeof tempDir>;

    beforeEach(() => {
      dir = tempDir();
    });

    afterEach(async () => {
      for (const p of proxies) await p.close();
      dir.cleanup();
    });

    async function streamProxy(adapter: ReturnType<typeof fakeAdapter>, maxRetries = 2) {
      const queue = await PersistentQueue.open(
        'dest',
        dir.path,
        { max_bytes: 1024 * 1024, segment_bytes: 256 * 1024, max_retries: maxRetries },
        fakeLogger(),
      );
      const proxy = makeProxy({ mode: 'stream', adapter, queue });
      proxy.start();
      return { proxy, queue };
    }

    it('requires a queue', () => {
      expect(() => new StorageProxy({
        name: 'dest',
        type: 'fake',
        mode: 'stream',
        pipeline: pipeline(),
        adapter: fakeAdapter(),
        queue: null,
        outcomes,
        monitorKeeper: fakeMonitorKeeper(),
        batch: { flush_interval_ms: 1_000, batch_size: 1, max_buffered_rows: 1 },
        retry: { max_attempts: 1, base_delay_ms: 1, max_delay_ms: 1 },
        shutdown_timeout_ms: 10,
        log: fakeLogger(),
      })).toThrow('[dest] stream mode requires a durable queue');
    });

    it('delivers queued events and acknowledges them', async () => {
      const adapter = fakeAdapter();
      const { proxy, queue } = await streamProxy(adapter);

      await proxy.consume(event('e1'));

      await vi.waitFor(() => expect(outcomes.lastStatus('dest', 'e1')).toBe('success'));
      await vi.waitFor(() => expect(queue.size).toBe(0));
      expect(adapter.written).toEqual([[expect.objectContaining({ event_id: 'e1', table_name: 'clicks' })]]);
    });

    it('redelivers after a transient failure', async () => {
      const adapter = fakeAdapter([new DestinationError('timeout', true)]);
      const { proxy } = await streamProxy(adapter);

      await proxy.consume(event('e1'));

      await vi.waitFor(() => expect(outcomes.lastStatus('dest', 'e1')).toBe('success'));
      expect(adapter.write).toHaveBeenCalledTimes(2);
      expect(outcomes.recent('dest')).toEqual([
        expect.objectContaining({ event_id: 'e1', status: 'success', retries: 1 }),
      ]);
    });

    it('dead-letters permanent failures', async () => {
      const adapter = fakeAdapter([new DestinationError('bad column', false)]);
      const { proxy, queue } = await streamProxy(adapter);

      await proxy.consume(event('e1'));

      await vi.waitFor(() => expect(outcomes.lastStatus('dest', 'e1')).toBe('permanent-error'));
      expect(adapter.write).toHaveBeenCalledTimes(1);
      expect(queue.stats().dead_lettered).toBe(1);
    });

    it('gives up once the queue retry budget is spent', async () => {
      const down = new DestinationError('down', true);
      const adapter = fakeAdapter([down, down, down]);
      const { proxy } = await streamProxy(adapter, 1);

      await proxy.consume(event('e1'));

      await vi.waitFor(() => expect(outcomes.lastStatus('dest', 'e1')).toBe('permanent-error'));
      expect(adapter.write).toHaveBeenCalledTimes(2);
      expect(outcomes.recent('dest')[0]).toMatchObject({
        retries: 1,
        error: 'retries exhausted after 2 attempts: down',
      });
    });

    it('acknowledges an already delivered event without writing it again', async () => {
      const adapter = fakeAdapter();
      outcomes.record({
        event_id: 'e1',
        destination: 'dest',
        status: 'success',
        table_name: 'clicks',
        error: null,
        retries: 0,
        timestamp: '2026-02-18T12:00:00.000Z',
      });
      const { proxy, queue } = await streamProxy(adapter);

      await proxy.consume(event('e1'));

      await vi.waitFor(() => expect(queue.size).toBe(0));
      expect(adapter.write).not.toHaveBeenCalled();
    });
  });
});
