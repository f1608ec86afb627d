import {
  AccuWeatherCurrentPayload,
  AccuWeatherForecastPayload,
  ForecastPayload,
  NwsCurrentPayload,
  ObservationPayload,
  OpenMeteoForecastPayload,
} from '../interfaces/payloads';
import { ForecastDraft, ObservationDraft, ProviderName, SourceTimestamp } from '../interfaces/records';
import { fahrenheitToCelsius, sha256Hex } from '../utils/strings';

export const ACCUWEATHER_MODEL_RUN = 'accuweather_12h';

export const QUALITY_FLAGS = {
  accuweather: 'reported',
  nws: 'provisional',
} as const;

function provenance(provider: ProviderName, raw: unknown) {
  const rawPayload = JSON.stringify(raw) ?? 'null';
  return { provider, rawPayload, provenanceHash: sha256Hex(rawPayload) };
}

function epochOf(date: Date): SourceTimestamp {
  return { kind: 'epoch', seconds: date.getTime() / 1000 };
}

function toCelsius(value: number | null, unit: string): number | null {
  if (value === null || !Number.isFinite(value)) return null;
  return unit.trim().toUpperCase().startsWith('F') ? fahrenheitToCelsius(value) : value;
}

// --- forecasts ---

export function normalizeAccuWeatherForecast(payload: AccuWeatherForecastPayload): ForecastDraft[] {
  return payload.entries.map(({ raw, entry }): ForecastDraft => ({
    ...provenance('accuweather', raw),
    location: payload.location,
    issueTime: epochOf(payload.fetchedAt),
    validTime: { kind: 'text', value: entry.DateTime },
    temperatureC: toCelsius(entry.Temperature.Value, entry.Temperature.Unit),
    modelRun: ACCUWEATHER_MODEL_RUN,
    asOfTimeUtc: payload.fetchedAt,
  }));
}

export function normalizeOpenMeteoForecast(payload: OpenMeteoForecastPayload): ForecastDraft[] {
  const unit = payload.temperatureUnit === 'fahrenheit' ? 'F' : 'C';

  return payload.series.flatMap((series) => {
    const issueTime: SourceTimestamp =
      series.issueTime === null
        ? epochOf(payload.fetchedAt)
        : { kind: 'epoch', seconds: series.issueTime };

    return series.points.map((point): ForecastDraft => ({
      ...provenance('openmeteo', {
        model: series.model,
        model_code: series.modelCode,
        issue_time: series.issueTime,
        time: point.time,
        temperature_2m: point.value,
        temperature_unit: payload.temperatureUnit,
      }),
      location: payload.location,
      issueTime,
      validTime: { kind: 'epoch', seconds: point.time },
      temperatureC: toCelsius(point.value, unit),
      modelRun: series.model,
      asOfTimeUtc: payload.fetchedAt,
    }));
  });
}

export function normalizeForecast(payload: ForecastPayload): ForecastDraft[] {
  switch (payload.provider) {
    case 'accuweather':
      return normalizeAccuWeatherForecast(payload);
    case 'openmeteo':
      return normalizeOpenMeteoForecast(payload);
  }
}

// --- observations ---

export function normalizeAccuWeatherCurrent(payload: AccuWeatherCurrentPayload): ObservationDraft[] {
  return payload.entries.map(({ raw, entry }): ObservationDraft => ({
    ...provenance('accuweather', raw),
    location: payload.location,
    stationId: payload.locationKey,
    validTime: { kind: 'text', value: entry.LocalObservationDateTime },
    temperatureC: toCelsius(entry.Temperature.Metric.Value, entry.Temperature.Metric.Unit),
    qualityFlag: QUALITY_FLAGS.accuweather,
    asOfTimeUtc: payload.fetchedAt,
  }));
}

export function normalizeNwsCurrent(payload: NwsCurrentPayload): ObservationDraft[] {
  return payload.rows.map((row): ObservationDraft => ({
    ...provenance('nws', row.cells),
    location: payload.location,
    stationId: payload.stationId,
    validTime: { kind: 'text', value: row.localDateTime },
    temperatureC: toCelsius(row.airTempF, 'F'),
    qualityFlag: QUALITY_FLAGS.nws,
    asOfTimeUtc: payload.fetchedAt,
  }));
}

export function normalizeObservation(payload: ObservationPayload): ObservationDraft[] {
  switch (payload.provider) {
    case 'accuweather':
      return normalizeAccuWeatherCurrent(payload);
    case 'nws':
      return normalizeNwsCurrent(payload);
  }
}
