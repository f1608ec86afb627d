import fs from 'fs';
import { ConfigurationError } from '../errors';
import { LocationEntry, LocationRegistry } from '../interfaces/location';
import { LocationFileSchema, LocationSource } from '../schemas/location.schema';
import { sha256Hex } from '../utils/strings';
import { isValidTimeZone } from '../utils/time';

export function computeWeatherId(source: LocationSource): string {
  return sha256Hex(
    [
      source.name,
      source.latitude,
      source.longitude,
      source.series_id,
      source.station_id,
      source.timezone,
    ].join('|')
  );
}

function toEntry(source: LocationSource): LocationEntry {
  if (!isValidTimeZone(source.timezone)) {
    throw new ConfigurationError(
      `Location '${source.name}' has an unknown time zone: ${source.timezone}`
    );
  }

  return Object.freeze({
    name: source.name,
    latitude: source.latitude,
    longitude: source.longitude,
    seriesId: source.series_id,
    stationId: source.station_id,
    timezone: source.timezone,
    weatherId: computeWeatherId(source),
  });
}

/**
 * Build the registry from already-decoded JSON. The result and every entry
 * are frozen; components receive it by reference.
 */
export function createLocationRegistry(raw: unknown): LocationRegistry {
  const parsed = LocationFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid location registry -> ${issues}`);
  }

  const entries = Object.freeze(parsed.data.locations.map(toEntry));
  const byName = new Map<string, LocationEntry>();

  for (const entry of entries) {
    if (byName.has(entry.name)) {
      throw new ConfigurationError(`Duplicate location in registry: ${entry.name}`);
    }
    byName.set(entry.name, entry);
  }

  const get = (name: string): LocationEntry => {
    const exact = byName.get(name);
    if (exact) return exact;

    const folded = entries.find((e) => e.name.toLowerCase() === name.toLowerCase());
    if (folded) return folded;

    const known = [...byName.keys()].sort().join(', ');
    throw new ConfigurationError(`Location '${name}' not found in registry. Known: ${known}`);
  };

  return Object.freeze({
    entries,
    get,
    select(names?: ReadonlyArray<string>): ReadonlyArray<LocationEntry> {
      if (!names || names.length === 0) return entries;
      return Object.freeze(names.map(get));
    },
  });
}

export function loadLocationRegistry(path: string): LocationRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Unable to read location registry at ${path}`, { cause: err });
  }
  return createLocationRegistry(raw);
}
