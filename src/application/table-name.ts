import type { EventPayload, JsonPath } from '../domain/index.js';
import { getPath, parsePath } from '../domain/index.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { sanitizeIdentifier } from './columns.js';

export const DEFAULT_TABLE_NAME = 'events';

const PLACEHOLDER = /\{\{\s*([^}]*?)\s*\}\}/g;

/**
 * Resolves the target table of an event.
 *
 * Templates substitute event fields: `events_{{ /event_type }}`.
 * A placeholder whose field is missing (or not a scalar) fails the event.
 */
export interface TableNameResolver {
  readonly template: string;
  resolve(fields: EventPayload): string;
}

export function createTableNameResolver(template: string | undefined): TableNameResolver {
  const source = template === undefined || template.trim() === '' ? DEFAULT_TABLE_NAME : template.trim();

  const placeholders = new Map<string, JsonPath>();
  for (const match of source.matchAll(PLACEHOLDER)) {
    const [token, rawPath = ''] = match;
    try {
      placeholders.set(token, parsePath(rawPath));
    } catch (err: unknown) {
      throw new ConfigurationError(
        'invalid_config',
        `Invalid table_name_template "${source}": ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  if (placeholders.size === 0) {
    const fixed = sanitizeIdentifier(source);
    return { template: source, resolve: () => fixed };
  }

  return {
    template: source,
    resolve(fields) {
      const rendered = source.replace(PLACEHOLDER, (token) => {
        const path = placeholders.get(token);
        const value = path === undefined ? undefined : getPath(fields, path);
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          return String(value);
        }
        throw new Error(`table_name_template field ${token} has no scalar value`);
      });

      const name = sanitizeIdentifier(rendered);
      if (name === '') {
        throw new Error(`table_name_template "${source}" rendered an empty table name`);
      }
      return name;
    },
  };
}
