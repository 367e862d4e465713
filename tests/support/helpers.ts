import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { ProcessedRow, QueueEntry, RawEvent } from '../../src/domain/index.js';

/** Minimal fake logger; `child` returns the same instance so calls are observable. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

let counter = 0;

/**
 * Factory for creating raw events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<RawEvent> = {}): RawEvent {
  counter++;
  return {
    event_id: overrides.event_id ?? `evt-${counter}`,
    token: overrides.token ?? 'test-token',
    payload: overrides.payload ?? { event_type: 'page_view', url: '/home' },
    received_at: overrides.received_at ?? '2026-02-18T12:00:00.000Z',
  };
}

export function makeRow(overrides: Partial<ProcessedRow> = {}): ProcessedRow {
  counter++;
  return {
    event_id: overrides.event_id ?? `row-${counter}`,
    table_name: overrides.table_name ?? 'events',
    columns: overrides.columns ?? { url: '/home' },
    primary_keys: overrides.primary_keys ?? [],
    column_types: overrides.column_types ?? {},
  };
}

export function makeEntry(row: ProcessedRow = makeRow(), destination = 'dest'): QueueEntry {
  return {
    destination,
    enqueued_at: '2026-02-18T12:00:00.000Z',
    retries: 0,
    row,
  };
}

/** Fresh temporary directory plus its cleanup. */
export function tempDir(prefix = 'sinkflow-test-'): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), prefix));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}
