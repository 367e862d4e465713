import type { EventPayload } from './event.js';

/** A parsed `/`-separated field path, e.g. `/location/city` → ['location', 'city']. */
export type JsonPath = readonly string[];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a field path. The leading slash is optional; empty segments are rejected.
 */
export function parsePath(raw: string): JsonPath {
  const trimmed = raw.trim();
  const body = trimmed.startsWith('/') ? trimmed.slice(1) : trimmed;
  if (body === '') {
    throw new Error(`Empty field path: "${raw}"`);
  }
  const segments = body.split('/');
  if (segments.some((s) => s.trim() === '')) {
    throw new Error(`Malformed field path: "${raw}"`);
  }
  return segments.map((s) => s.trim());
}

export function formatPath(path: JsonPath): string {
  return `/${path.join('/')}`;
}

export function getPath(fields: EventPayload, path: JsonPath): unknown {
  let current: unknown = fields;
  for (const segment of path) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/**
 * Sets a value, creating intermediate objects as needed.
 * Throws when an intermediate segment holds a non-object value.
 */
export function setPath(fields: EventPayload, path: JsonPath, value: unknown): void {
  let current: Record<string, unknown> = fields;
  for (let i = 0; i < path.length - 1; i++) {
    const segment = path[i];
    if (segment === undefined) break;
    const next = current[segment];
    if (next === undefined || next === null) {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    } else if (isRecord(next)) {
      current = next;
    } else {
      throw new Error(`Cannot set ${formatPath(path)}: "${segment}" is not an object`);
    }
  }
  const last = path[path.length - 1];
  if (last !== undefined) {
    current[last] = value;
  }
}

/** Removes a value and returns it (undefined when absent). */
export function deletePath(fields: EventPayload, path: JsonPath): unknown {
  const parent = getPath(fields, path.slice(0, -1));
  const last = path[path.length - 1];
  if (!isRecord(parent) || last === undefined || !(last in parent)) return undefined;
  const value = parent[last];
  delete parent[last];
  return value;
}
