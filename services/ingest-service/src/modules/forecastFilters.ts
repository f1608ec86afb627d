import { ExclusionRules } from '../config/env';
import {
  ForecastRecord,
  ObservationRecord,
  RetainedForecast,
  RetainedObservation,
} from '../interfaces/records';
import { calendarDate } from '../utils/time';

export const NO_EXCLUSIONS: ExclusionRules = { locations: [], modelRuns: [] };

export interface ForecastDrops {
  /** valid time not after issue time */
  readonly causality: number;
  readonly duplicate: number;
  /** same uniqueness key, different temperature */
  readonly conflicting: number;
  readonly missingTemperature: number;
  readonly excluded: number;
}

export interface ForecastFilterResult {
  readonly records: ReadonlyArray<RetainedForecast>;
  readonly dropped: ForecastDrops;
}

export interface ObservationDrops {
  readonly missingTemperature: number;
  readonly excluded: number;
  readonly duplicate: number;
}

export interface ObservationFilterResult {
  readonly records: ReadonlyArray<RetainedObservation>;
  readonly dropped: ObservationDrops;
}

/** Forecasts must point into the future of the run that produced them. */
export function dropNonCausal(records: ReadonlyArray<ForecastRecord>): ForecastRecord[] {
  return records.filter((r) => r.validTimeUtc.getTime() > r.issueTimeUtc.getTime());
}

function firstBy<T>(records: ReadonlyArray<T>, keyOf: (record: T) => string): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];
  for (const record of records) {
    const key = keyOf(record);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(record);
  }
  return kept;
}

export function uniquenessKey(record: ForecastRecord): string {
  return [
    record.location,
    record.modelRun,
    record.validTimeUtc.toISOString(),
    record.issueTimeUtc.toISOString(),
  ].join('|');
}

/**
 * Collapse repeated forecasts, keeping the first occurrence. The calendar
 * date of the valid time is taken in `timeZone`.
 */
export function collapseDuplicates(
  records: ReadonlyArray<ForecastRecord>,
  timeZone: string
): ForecastRecord[] {
  return firstBy(records, (r) =>
    [
      r.validTimeUtc.toISOString(),
      r.temperatureC === null ? 'null' : String(r.temperatureC),
      r.location,
      r.issueTimeUtc.toISOString(),
      r.modelRun,
      calendarDate(r.validTimeUtc, timeZone),
    ].join('|')
  );
}

/** At most one record per (location, model run, valid time, issue time). */
export function enforceUniqueness(records: ReadonlyArray<ForecastRecord>): ForecastRecord[] {
  return firstBy(records, uniquenessKey);
}

function hasTemperature<T extends { temperatureC: number | null }>(
  record: T
): record is T & { readonly temperatureC: number } {
  return record.temperatureC !== null;
}

export function applyForecastExclusions(
  records: ReadonlyArray<ForecastRecord>,
  rules: ExclusionRules = NO_EXCLUSIONS
): { records: RetainedForecast[]; missingTemperature: number; excluded: number } {
  const withTemperature = records.filter(hasTemperature);
  const kept = withTemperature.filter(
    (r) => !rules.locations.includes(r.location) && !rules.modelRuns.includes(r.modelRun)
  );
  return {
    records: kept,
    missingTemperature: records.length - withTemperature.length,
    excluded: withTemperature.length - kept.length,
  };
}

/** Causality, then duplicate collapse, then exclusions. */
export function filterForecasts(
  records: ReadonlyArray<ForecastRecord>,
  timeZone: string,
  rules: ExclusionRules = NO_EXCLUSIONS
): ForecastFilterResult {
  const causal = dropNonCausal(records);
  const collapsed = collapseDuplicates(causal, timeZone);
  const unique = enforceUniqueness(collapsed);
  const excluded = applyForecastExclusions(unique, rules);

  return {
    records: excluded.records,
    dropped: {
      causality: records.length - causal.length,
      duplicate: causal.length - collapsed.length,
      conflicting: collapsed.length - unique.length,
      missingTemperature: excluded.missingTemperature,
      excluded: excluded.excluded,
    },
  };
}

export function filterObservations(
  records: ReadonlyArray<ObservationRecord>,
  rules: ExclusionRules = NO_EXCLUSIONS
): ObservationFilterResult {
  const withTemperature = records.filter(hasTemperature);
  const included = withTemperature.filter((r) => !rules.locations.includes(r.location));
  const unique = firstBy(included, (r) => r.provenanceHash);

  return {
    records: unique,
    dropped: {
      missingTemperature: records.length - withTemperature.length,
      excluded: withTemperature.length - included.length,
      duplicate: included.length - unique.length,
    },
  };
}
