import type { Logger } from 'pino';
import type { RawEvent } from '../domain/index.js';
import type { Destination, DestinationDeps, DestinationRegistry } from './destination-registry.js';
import type { ConsumeResult, ProxySummary } from './storage-proxy.js';
import { BackpressureError, TransformError, errorMessage } from './errors.js';

export type IngestStatus = 'accepted' | 'skipped' | 'backpressure' | 'rejected' | 'failed';

export interface IngestResult {
  readonly destination: string;
  readonly status: IngestStatus;
  readonly error?: string;
}

export interface DestinationSummary extends ProxySummary {
  readonly only_tokens: readonly string[];
  readonly table_name_template: string;
  readonly mapping: string;
}

/**
 * Owns every configured destination for the lifetime of the process.
 *
 * A destination that fails to build is logged and left out; the others
 * keep running. Events are routed by ingestion token, and a failure at
 * one destination never affects delivery to another.
 */
export class DestinationService {
  private readonly registry: DestinationRegistry;
  private readonly deps: DestinationDeps;
  private readonly log: Logger;
  private readonly destinations = new Map<string, Destination>();

  constructor(registry: DestinationRegistry, deps: DestinationDeps) {
    this.registry = registry;
    this.deps = deps;
    this.log = deps.log;
  }

  /**
   * Builds every destination. Returns the configuration errors of the ones
   * that could not be activated, keyed by destination name.
   */
  async init(configs: Readonly<Record<string, unknown>>): Promise<Map<string, Error>> {
    const failures = new Map<string, Error>();

    for (const [name, config] of Object.entries(configs)) {
      try {
        await this.add(name, config);
      } catch (err: unknown) {
        const error = err instanceof Error ? err : new Error(String(err));
        failures.set(name, error);
        this.log.error({ err: error, destination: name }, 'Destination initialization failed, skipping');
      }
    }

    this.log.info(
      { active: [...this.destinations.keys()], failed: [...failures.keys()] },
      'Destinations initialized',
    );

    return failures;
  }

  /**
   * Tears down a running destination (if any) and builds it again from
   * new configuration. On failure the destination stays removed.
   */
  async replace(name: string, config: unknown): Promise<void> {
    await this.remove(name);
    await this.add(name, config);
  }

  async remove(name: string): Promise<void> {
    const existing = this.destinations.get(name);
    if (existing === undefined) return;
    this.destinations.delete(name);
    await existing.proxy.close();
    this.log.info({ destination: name }, 'Destination removed');
  }

  get(name: string): Destination | undefined {
    return this.destinations.get(name);
  }

  names(): string[] {
    return [...this.destinations.keys()];
  }

  list(): DestinationSummary[] {
    return [...this.destinations.values()].map((d) => ({
      ...d.proxy.summary(),
      only_tokens: d.spec.only_tokens,
      table_name_template: d.spec.table_name_template,
      mapping: d.spec.mapping,
    }));
  }

  /**
   * Hands an event to every destination accepting its token.
   * An empty `only_tokens` list accepts every token.
   */
  async ingest(event: RawEvent): Promise<IngestResult[]> {
    const targets = [...this.destinations.values()].filter(
      (d) => d.spec.only_tokens.length === 0 || d.spec.only_tokens.includes(event.token),
    );

    return Promise.all(targets.map((d) => this.deliverTo(d, event)));
  }

  async close(): Promise<void> {
    const all = [...this.destinations.values()];
    this.destinations.clear();
    await Promise.all(all.map((d) => d.proxy.close()));
    this.log.info({ count: all.length }, 'All destinations closed');
  }

  private async add(name: string, config: unknown): Promise<void> {
    const destination = await this.registry.create(name, config, this.deps);
    this.destinations.set(name, destination);
  }

  private async deliverTo(destination: Destination, event: RawEvent): Promise<IngestResult> {
    const name = destination.spec.name;
    let result: ConsumeResult;
    try {
      result = await destination.proxy.consume(event);
    } catch (err: unknown) {
      if (err instanceof BackpressureError) {
        this.log.warn({ destination: name, event_id: event.event_id, err }, 'Destination applied backpressure');
        return { destination: name, status: 'backpressure', error: err.message };
      }
      if (err instanceof TransformError) {
        return { destination: name, status: 'rejected', error: err.message };
      }
      this.log.error({ destination: name, event_id: event.event_id, err }, 'Failed to hand event to destination');
      return { destination: name, status: 'failed', error: errorMessage(err) };
    }

    return result.status === 'accepted'
      ? { destination: name, status: 'accepted' }
      : { destination: name, status: 'skipped', error: result.error.message };
  }
}
