import type { EventPayload } from '../event.js';

/** Rule names accepted in destination `enrichment` configuration. */
export type EnrichmentRuleName = 'ip_lookup' | 'user_agent_parse';

/** One entry of a destination's `enrichment` list. */
export interface EnrichmentRuleConfig {
  readonly name: string;
  readonly from: string;
  readonly to: string;
}

/**
 * An enrichment rule derives fields from an event.
 *
 * `execute` mutates the working copy of the event in place. Throwing signals a
 * rule failure; the pipeline decides whether that is fatal for the event.
 * A rule whose source field is absent is a no-op, not a failure.
 */
export interface EnrichmentRule {
  readonly name: EnrichmentRuleName;
  readonly description: string;
  execute(fields: EventPayload): void;
}

/** Geolocation attributes written by the ip_lookup rule. */
export interface GeoData {
  readonly country: string | null;
  readonly city: string | null;
  readonly region: string | null;
  readonly zip: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

/** Resolves an IP address to a location. `null` means "not found". */
export interface GeoResolver {
  lookup(ip: string): GeoData | null;
}

/** Resolver used when no geo database is configured. */
export const NOOP_GEO_RESOLVER: GeoResolver = {
  lookup: () => null,
};
