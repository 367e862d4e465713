import Bowser from 'bowser';
import type { EnrichmentRule } from './types.js';
import type { JsonPath } from '../json-path.js';
import { formatPath, getPath, setPath } from '../json-path.js';

/**
 * Parses a user-agent header into browser, OS and device attributes.
 */
export function createUserAgentRule(from: JsonPath, to: JsonPath): EnrichmentRule {
  return {
    name: 'user_agent_parse',
    description: `user_agent_parse ${formatPath(from)} -> ${formatPath(to)}`,

    execute(fields): void {
      const raw = getPath(fields, from);
      if (raw === undefined || raw === null || raw === '') return;

      if (typeof raw !== 'string') {
        throw new Error(`user_agent_parse: ${formatPath(from)} must be a string`);
      }

      const { browser, os, platform } = Bowser.parse(raw);

      setPath(fields, to, {
        ua_family: browser.name ?? null,
        ua_version: browser.version ?? null,
        os_family: os.name ?? null,
        os_version: os.versionName ?? os.version ?? null,
        device_family: platform.model ?? platform.vendor ?? null,
        device_type: platform.type ?? null,
      });
    },
  };
}
