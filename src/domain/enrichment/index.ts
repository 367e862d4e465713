import type { EnrichmentRule, EnrichmentRuleConfig, GeoResolver } from './types.js';
import { parsePath } from '../json-path.js';
import { createIpLookupRule } from './ip-lookup.js';
import { createUserAgentRule } from './user-agent.js';

export type {
  EnrichmentRule,
  EnrichmentRuleConfig,
  EnrichmentRuleName,
  GeoData,
  GeoResolver,
} from './types.js';
export { NOOP_GEO_RESOLVER } from './types.js';
export { createIpLookupRule } from './ip-lookup.js';
export { createUserAgentRule } from './user-agent.js';

export const DEFAULT_IP_FIELD = '/source_ip';
export const DEFAULT_LOCATION_FIELD = '/location';
export const DEFAULT_USER_AGENT_FIELD = '/user_agent';
export const DEFAULT_PARSED_UA_FIELD = '/parsed_ua';

/**
 * Builds a rule from its configuration entry.
 * Throws on unknown rule names and malformed paths.
 */
export function createEnrichmentRule(
  config: EnrichmentRuleConfig,
  resolver: GeoResolver,
): EnrichmentRule {
  const from = parsePath(config.from);
  const to = parsePath(config.to);

  switch (config.name) {
    case 'ip_lookup':
      return createIpLookupRule(from, to, resolver);
    case 'user_agent_parse':
      return createUserAgentRule(from, to);
    default:
      throw new Error(`Unknown enrichment rule: ${config.name}. Available rules: [ip_lookup, user_agent_parse]`);
  }
}

/**
 * The two rules every destination runs before its configured ones.
 * Returned as a fresh list so callers pass it explicitly into the pipeline.
 */
export function defaultEnrichmentRules(resolver: GeoResolver): EnrichmentRule[] {
  return [
    createIpLookupRule(parsePath(DEFAULT_IP_FIELD), parsePath(DEFAULT_LOCATION_FIELD), resolver),
    createUserAgentRule(parsePath(DEFAULT_USER_AGENT_FIELD), parsePath(DEFAULT_PARSED_UA_FIELD)),
  ];
}
