import type { ColumnValue, EventPayload, JsonPath } from '../domain/index.js';
import { isRecord } from '../domain/index.js';

/**
 * Lowercases a name and replaces everything outside [a-z0-9_] with `_`,
 * so it is usable as a table or column identifier in any destination.
 */
export function sanitizeIdentifier(name: string): string {
  return name.trim().toLowerCase().replace(/[^a-z0-9_]/g, '_');
}

/** Column that a nested field path lands in once the event is flattened. */
export function columnForPath(path: JsonPath): string {
  return sanitizeIdentifier(path.join('_'));
}

function toColumnValue(value: unknown): ColumnValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

/**
 * Flattens nested objects into `parent_child` columns.
 * Arrays are stored as JSON strings; key order follows the event.
 *
 * Two fields can land in the same column (`{ a: { b: 1 }, a_b: 2 }`); the
 * later one wins and `onCollision` is told the column name.
 */
export function flattenFields(
  fields: EventPayload,
  onCollision?: (column: string) => void,
): Record<string, ColumnValue> {
  const columns: Record<string, ColumnValue> = {};

  const walk = (prefix: string, value: Record<string, unknown>): void => {
    for (const [key, nested] of Object.entries(value)) {
      const column = sanitizeIdentifier(prefix === '' ? key : `${prefix}_${key}`);
      if (isRecord(nested) && !(nested instanceof Date)) {
        walk(column, nested);
      } else if (nested !== undefined) {
        if (column in columns) onCollision?.(column);
        columns[column] = toColumnValue(nested);
      }
    }
  };

  walk('', fields);
  return columns;
}
