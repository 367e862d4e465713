import type { Logger } from 'pino';
import type { EnrichmentRule, EventPayload, ProcessedRow, RawEvent } from '../domain/index.js';
import type { FieldMapper } from './field-mapping.js';
import type { TableNameResolver } from './table-name.js';
import { TransformError, errorMessage } from './errors.js';
import { flattenFields, sanitizeIdentifier } from './columns.js';

export interface TransformPipelineOptions {
  readonly destination: string;
  /** Default rules first, then configured rules, in execution order. */
  readonly rules: readonly EnrichmentRule[];
  readonly mapper: FieldMapper;
  readonly type_casts: Readonly<Record<string, string>>;
  readonly table: TableNameResolver;
  readonly primary_key_fields: readonly string[];
  readonly break_on_error: boolean;
  readonly log: Logger;
}

/**
 * Result of processing one event.
 * `ok === false` carries the reason the event cannot be delivered.
 */
export type ProcessResult =
  | { readonly ok: true; readonly row: ProcessedRow }
  | { readonly ok: false; readonly error: TransformError };

/**
 * Turns a RawEvent into the row a destination stores.
 *
 * Order: enrichment → table name → field mapping → flatten → primary keys.
 * Table name templates refer to fields as they look after enrichment, so
 * mapping rules may move or drop the fields a template reads.
 * The input event is never mutated.
 */
export class TransformPipeline {
  private readonly options: TransformPipelineOptions;
  private readonly pkFields: readonly string[];

  constructor(options: TransformPipelineOptions) {
    this.options = options;
    this.pkFields = [...new Set(options.primary_key_fields.map(sanitizeIdentifier))];
  }

  get rules(): readonly EnrichmentRule[] {
    return this.options.rules;
  }

  get breakOnError(): boolean {
    return this.options.break_on_error;
  }

  process(event: RawEvent): ProcessResult {
    const { log, destination } = this.options;
    const fields: EventPayload = structuredClone(event.payload);

    for (const rule of this.options.rules) {
      try {
        rule.execute(fields);
      } catch (err: unknown) {
        if (this.options.break_on_error) {
          return this.fail('enrichment', event, `Enrichment rule ${rule.name} failed: ${errorMessage(err)}`, err);
        }
        log.warn(
          { err, destination, event_id: event.event_id, rule: rule.description },
          'Enrichment rule failed, continuing',
        );
      }
    }

    let tableName: string;
    try {
      tableName = this.options.table.resolve(fields);
    } catch (err: unknown) {
      return this.fail('table_name', event, errorMessage(err), err);
    }

    let mapped: EventPayload;
    try {
      mapped = this.options.mapper.map(fields);
    } catch (err: unknown) {
      return this.fail('mapping', event, `Field mapping failed: ${errorMessage(err)}`, err);
    }

    const collisions: string[] = [];
    const columns = flattenFields(mapped, (column) => collisions.push(column));
    if (collisions.length > 0) {
      const message = `Fields collide in columns [${collisions.join(', ')}]`;
      if (this.options.break_on_error) {
        return this.fail('flatten', event, message, undefined);
      }
      log.warn({ destination, event_id: event.event_id, columns: collisions }, 'Flattened fields collide, keeping the later value');
    }

    return {
      ok: true,
      row: {
        event_id: event.event_id,
        table_name: tableName,
        columns,
        primary_keys: this.pkFields.filter((field) => field in columns),
        column_types: this.options.type_casts,
      },
    };
  }

  private fail(stage: TransformError['stage'], event: RawEvent, message: string, cause: unknown): ProcessResult {
    return {
      ok: false,
      error: new TransformError(stage, event.event_id, `[${this.options.destination}] ${message}`, { cause }),
    };
  }
}
