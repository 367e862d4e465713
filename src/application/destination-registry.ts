import type { Logger } from 'pino';
import type {
  DeliveryMode,
  DestinationAdapter,
  EnrichmentRule,
  GeoResolver,
  MonitorKeeper,
} from '../domain/index.js';
import { BATCH_MODE, STREAM_MODE, createEnrichmentRule, defaultEnrichmentRules } from '../domain/index.js';
import type { DeadLetterRecord, PersistentQueueOptions } from '../infrastructure/queue/index.js';
import { PersistentQueue } from '../infrastructure/queue/index.js';
import type { DestinationConfig } from './destination-schema.js';
import { destinationConfigSchema } from './destination-schema.js';
import type { MappingVariant } from './field-mapping.js';
import { createFieldMapper, describeRule, resolveMappingVariant } from './field-mapping.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { OutcomeCache } from './outcome-cache.js';
import type { DurableQueue } from './storage-proxy.js';
import { StorageProxy } from './storage-proxy.js';
import { DEFAULT_TABLE_NAME, createTableNameResolver } from './table-name.js';
import { TransformPipeline } from './transform-pipeline.js';

/** What an adapter constructor receives. */
export interface AdapterContext {
  readonly name: string;
  readonly type: string;
  /** Adapter-specific block: `config[type]`, else `config.datasource`, else `{}`. */
  readonly connection: Readonly<Record<string, unknown>>;
  readonly primary_key_fields: readonly string[];
  readonly log: Logger;
}

export type AdapterFactory = (context: AdapterContext) => DestinationAdapter;

export type QueueOpener = (
  destination: string,
  baseDir: string,
  options: PersistentQueueOptions,
  log: Logger,
) => Promise<DurableQueue>;

/** Process-wide collaborators shared by every destination. */
export interface DestinationDeps {
  readonly event_log_dir: string;
  readonly outcomes: OutcomeCache;
  readonly monitorKeeper: MonitorKeeper;
  readonly geo: GeoResolver;
  readonly log: Logger;
  readonly openQueue?: QueueOpener;
  readonly onDeadLetter?: (record: DeadLetterRecord) => void;
}

/**
 * Resolved, immutable configuration of one destination. A reconfiguration
 * builds a new destination rather than mutating this.
 */
export interface DestinationSpec {
  readonly name: string;
  readonly type: string;
  readonly mode: DeliveryMode;
  readonly only_tokens: readonly string[];
  readonly break_on_error: boolean;
  readonly table_name_template: string;
  readonly mapping: MappingVariant['kind'];
  readonly primary_key_fields: readonly string[];
  readonly enrichment: readonly string[];
}

export interface Destination {
  readonly spec: DestinationSpec;
  readonly proxy: StorageProxy;
  readonly queue: DurableQueue | null;
}

const openPersistentQueue: QueueOpener = (destination, baseDir, options, log) =>
  PersistentQueue.open(destination, baseDir, options, log);

function connectionBlock(config: DestinationConfig, type: string): Record<string, unknown> {
  const block: unknown = config[type] ?? config['datasource'];
  if (typeof block === 'object' && block !== null && !Array.isArray(block)) {
    return { ...block };
  }
  return {};
}

/**
 * Maps destination type identifiers to adapter constructors and builds
 * fully wired destinations from configuration.
 *
 * Adding a destination type means registering a factory, populated once
 * at process start.
 */
export class DestinationRegistry {
  private readonly factories = new Map<string, AdapterFactory>();

  register(type: string, factory: AdapterFactory): this {
    this.factories.set(type, factory);
    return this;
  }

  has(type: string): boolean {
    return this.factories.has(type);
  }

  types(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Validates configuration and builds a started destination.
   *
   * Throws ConfigurationError (unknown_type, invalid_mode,
   * invalid_enrichment, invalid_mapping, invalid_config). A queue opened
   * before a failure is closed before the error propagates.
   */
  async create(name: string, rawConfig: unknown, deps: DestinationDeps): Promise<Destination> {
    const parsed = destinationConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw new ConfigurationError('invalid_config', `[${name}] invalid destination config: ${issues}`);
    }

    const config = parsed.data;
    const type = config.type !== undefined && config.type.trim() !== '' ? config.type.trim() : name;
    const modeRaw = config.mode !== undefined && config.mode.trim() !== '' ? config.mode.trim() : BATCH_MODE;
    const log = deps.log.child({ destination: name });

    log.info({ type, mode: modeRaw }, 'Initializing destination');

    if (modeRaw !== BATCH_MODE && modeRaw !== STREAM_MODE) {
      throw new ConfigurationError(
        'invalid_mode',
        `Unknown destination mode: ${modeRaw}. Available mode: [${BATCH_MODE}, ${STREAM_MODE}]`,
      );
    }
    const mode: DeliveryMode = modeRaw;

    const layout = config.data_layout;
    const table = createTableNameResolver(layout?.table_name_template);
    if (table.template === DEFAULT_TABLE_NAME) {
      log.info({ table: DEFAULT_TABLE_NAME }, 'Using default table name');
    }

    const rules = this.buildEnrichmentRules(config, deps.geo, log);

    const variant = resolveMappingVariant(layout);
    const { mapper, type_casts } = createFieldMapper(variant);
    logMappingRules(variant, log);

    const primaryKeyFields = layout?.primary_key_fields ?? [];

    const pipeline = new TransformPipeline({
      destination: name,
      rules,
      mapper,
      type_casts,
      table,
      primary_key_fields: primaryKeyFields,
      break_on_error: config.break_on_error,
      log,
    });

    const factory = this.factories.get(type);
    if (factory === undefined) {
      throw new ConfigurationError(
        'unknown_type',
        `Unknown destination type: ${type}. Registered types: [${this.types().join(', ')}]`,
      );
    }

    let queue: DurableQueue | null = null;
    if (mode === STREAM_MODE) {
      const openQueue = deps.openQueue ?? openPersistentQueue;
      queue = await openQueue(
        name,
        deps.event_log_dir,
        {
          max_bytes: config.queue.max_bytes,
          segment_bytes: config.queue.segment_bytes,
          max_retries: config.retry.max_attempts - 1,
          dead_letter_max_bytes: config.queue.max_bytes,
          onDeadLetter: deps.onDeadLetter,
        },
        log,
      );
    }

    let proxy: StorageProxy;
    try {
      const adapter = factory({
        name,
        type,
        connection: connectionBlock(config, type),
        primary_key_fields: primaryKeyFields,
        log,
      });

      proxy = new StorageProxy({
        name,
        type,
        mode,
        pipeline,
        adapter,
        queue,
        outcomes: deps.outcomes,
        monitorKeeper: deps.monitorKeeper,
        batch: config.batch,
        retry: config.retry,
        shutdown_timeout_ms: config.shutdown_timeout_ms,
        log,
      });
    } catch (err: unknown) {
      if (queue !== null) await queue.close();
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(
        'invalid_config',
        `[${name}] failed to create ${type} adapter: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    proxy.start();

    return {
      spec: {
        name,
        type,
        mode,
        only_tokens: config.only_tokens,
        break_on_error: config.break_on_error,
        table_name_template: table.template,
        mapping: variant.kind,
        primary_key_fields: primaryKeyFields,
        enrichment: rules.map((r) => r.description),
      },
      proxy,
      queue,
    };
  }

  private buildEnrichmentRules(config: DestinationConfig, geo: GeoResolver, log: Logger): EnrichmentRule[] {
    if (config.enrichment.length === 0) {
      log.warn("Destination doesn't have enrichment rules");
    } else {
      log.info('Configured enrichment rules:');
    }

    const rules = defaultEnrichmentRules(geo);

    for (const ruleConfig of config.enrichment) {
      const label = `${ruleConfig.name} ${ruleConfig.from} -> ${ruleConfig.to}`;
      log.info(label);
      try {
        rules.push(createEnrichmentRule(ruleConfig, geo));
      } catch (err: unknown) {
        throw new ConfigurationError(
          'invalid_enrichment',
          `Error creating enrichment rule [${label}]: ${errorMessage(err)}`,
          { cause: err },
        );
      }
    }

    return rules;
  }
}

function logMappingRules(variant: MappingVariant, log: Logger): void {
  switch (variant.kind) {
    case 'structured': {
      const mode = variant.keep_unmapped ? 'keep unmapped fields' : 'remove unmapped fields';
      log.info(`Configured field mapping rules with [${mode}] mode:`);
      for (const field of variant.fields) log.info(describeRule(field));
      break;
    }
    case 'legacy':
      log.info(`Configured field mapping rules with [${variant.mapping_type}] mode:`);
      for (const rule of variant.rules) log.info(rule);
      break;
    case 'identity':
      log.warn("Destination doesn't have mapping rules");
      break;
  }
}
