import { describe, it, expect, vi } from 'vitest';
import {
  createEnrichmentRule,
  createIpLookupRule,
  createUserAgentRule,
  defaultEnrichmentRules,
  NOOP_GEO_RESOLVER,
} from '../../src/domain/index.js';
import type { GeoData } from '../../src/domain/index.js';

const BERLIN: GeoData = {
  country: 'DE',
  city: 'Berlin',
  region: 'BE',
  zip: '10115',
  latitude: 52.5,
  longitude: 13.4,
};

function fakeResolver() {
  return { lookup: vi.fn((ip: string) => (ip === '203.0.113.7' ? BERLIN : null)) };
}

const CHROME_UA =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

describe('ip_lookup', () => {
  it('writes the resolved location to the target path', () => {
    const rule = createIpLookupRule(['client', 'ip'], ['client', 'geo'], fakeResolver());
    const fields: Record<string, unknown> = { client: { ip: '203.0.113.7' } };

    rule.execute(fields);

    expect(fields).toEqual({ client: { ip: '203.0.113.7', geo: BERLIN } });
  });

  it('leaves the event untouched when the address is unknown', () => {
    const rule = createIpLookupRule(['ip'], ['geo'], fakeResolver());
    const fields: Record<string, unknown> = { ip: '198.51.100.1' };

    rule.execute(fields);

    expect(fields).toEqual({ ip: '198.51.100.1' });
  });

  it('is a no-op when the source field is absent', () => {
    const resolver = fakeResolver();
    const rule = createIpLookupRule(['ip'], ['geo'], resolver);

    rule.execute({});

    expect(resolver.lookup).not.toHaveBeenCalled();
  });

  it('fails on values that are not IP addresses', () => {
    const rule = createIpLookupRule(['ip'], ['geo'], NOOP_GEO_RESOLVER);
    expect(() => rule.execute({ ip: 'not-an-ip' })).toThrow('ip_lookup: /ip is not an IP address: "not-an-ip"');
  });

  it('describes itself with both paths', () => {
    const rule = createIpLookupRule(['ip'], ['geo'], NOOP_GEO_RESOLVER);
    expect(rule.description).toBe('ip_lookup /ip -> /geo');
  });
});

describe('user_agent_parse', () => {
  it('parses browser and OS attributes', () => {
    const rule = createUserAgentRule(['ua'], ['parsed']);
    const fields: Record<string, unknown> = { ua: CHROME_UA };

    rule.execute(fields);

    const parsed = fields['parsed'] as Record<string, unknown>;
    expect(parsed['ua_family']).toBe('Chrome');
    expect(parsed['ua_version']).toBe('120.0.0.0');
    expect(parsed['os_family']).toBe('Windows');
    expect(parsed['device_type']).toBe('desktop');
  });

  it('fails when the source is not a string', () => {
    const rule = createUserAgentRule(['ua'], ['parsed']);
    expect(() => rule.execute({ ua: 42 })).toThrow('user_agent_parse: /ua must be a string');
  });
});

describe('createEnrichmentRule', () => {
  it('builds rules by name', () => {
    const rule = createEnrichmentRule({ name: 'user_agent_parse', from: '/h/ua', to: '/h/parsed' }, NOOP_GEO_RESOLVER);
    expect(rule.name).toBe('user_agent_parse');
    expect(rule.description).toBe('user_agent_parse /h/ua -> /h/parsed');
  });

  it('rejects unknown rule names', () => {
    expect(() => createEnrichmentRule({ name: 'geo_magic', from: '/a', to: '/b' }, NOOP_GEO_RESOLVER))
      .toThrow('Unknown enrichment rule: geo_magic. Available rules: [ip_lookup, user_agent_parse]');
  });

  it('rejects malformed paths', () => {
    expect(() => createEnrichmentRule({ name: 'ip_lookup', from: '/a//b', to: '/c' }, NOOP_GEO_RESOLVER))
      .toThrow('Malformed field path');
  });
});

describe('defaultEnrichmentRules', () => {
  it('returns the geo rule then the user-agent rule', () => {
    const rules = defaultEnrichmentRules(NOOP_GEO_RESOLVER);
    expect(rules.map((r) => r.description)).toEqual([
      'ip_lookup /source_ip -> /location',
      'user_agent_parse /user_agent -> /parsed_ua',
    ]);
  });

  it('returns a fresh list on every call', () => {
    expect(defaultEnrichmentRules(NOOP_GEO_RESOLVER)).not.toBe(defaultEnrichmentRules(NOOP_GEO_RESOLVER));
  });
});
