import { isIP } from 'node:net';
import type { EnrichmentRule, GeoResolver } from './types.js';
import type { JsonPath } from '../json-path.js';
import { formatPath, getPath, setPath } from '../json-path.js';

/**
 * Derives geolocation from the viewer's network address.
 *
 * Fails on values that are not IPv4/IPv6 addresses. An address the resolver
 * does not know leaves the event untouched.
 */
export function createIpLookupRule(
  from: JsonPath,
  to: JsonPath,
  resolver: GeoResolver,
): EnrichmentRule {
  return {
    name: 'ip_lookup',
    description: `ip_lookup ${formatPath(from)} -> ${formatPath(to)}`,

    execute(fields): void {
      const raw = getPath(fields, from);
      if (raw === undefined || raw === null || raw === '') return;

      if (typeof raw !== 'string' || isIP(raw.trim()) === 0) {
        throw new Error(`ip_lookup: ${formatPath(from)} is not an IP address: ${JSON.stringify(raw)}`);
      }

      const geo = resolver.lookup(raw.trim());
      if (geo === null) return;

      setPath(fields, to, { ...geo });
    },
  };
}
