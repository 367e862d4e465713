import { open as openDatabase } from 'maxmind';
import type { CityResponse, Reader } from 'maxmind';
import type { Logger } from 'pino';
import type { GeoData, GeoResolver } from '../../domain/index.js';
import { NOOP_GEO_RESOLVER } from '../../domain/index.js';

/**
 * Maps a GeoLite2/GeoIP2 City record to the fields written by `ip_lookup`.
 */
export function toGeoData(record: CityResponse): GeoData {
  const subdivision = record.subdivisions?.[0];
  return {
    country: record.country?.iso_code ?? null,
    city: record.city?.names.en ?? null,
    region: subdivision?.iso_code ?? subdivision?.names.en ?? null,
    zip: record.postal?.code ?? null,
    latitude: record.location?.latitude ?? null,
    longitude: record.location?.longitude ?? null,
  };
}

export class MaxmindGeoResolver implements GeoResolver {
  private readonly reader: Reader<CityResponse>;

  constructor(reader: Reader<CityResponse>) {
    this.reader = reader;
  }

  lookup(ip: string): GeoData | null {
    const record = this.reader.get(ip);
    return record === null ? null : toGeoData(record);
  }
}

/**
 * Opens the MaxMind database when a path is configured. Without one, or when
 * the file cannot be opened, `ip_lookup` finds nothing and events pass through.
 */
export async function createGeoResolver(dbPath: string | undefined, log: Logger): Promise<GeoResolver> {
  if (dbPath === undefined || dbPath === '') {
    log.info('No MaxMind database configured, geo lookup disabled');
    return NOOP_GEO_RESOLVER;
  }

  try {
    const reader = await openDatabase<CityResponse>(dbPath);
    log.info({ path: dbPath }, 'MaxMind database loaded');
    return new MaxmindGeoResolver(reader);
  } catch (err: unknown) {
    log.error({ err, path: dbPath }, 'Failed to open MaxMind database, geo lookup disabled');
    return NOOP_GEO_RESOLVER;
  }
}
