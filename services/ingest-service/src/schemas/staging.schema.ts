import { LocationRegistry } from '../interfaces/location';
import { RetainedForecast, RetainedObservation } from '../interfaces/records';

export type ColumnKind = 'string' | 'timestamp' | 'float' | 'integer';

export interface ColumnSpec {
  readonly name: string;
  readonly kind: ColumnKind;
}

export type CellValue = string | number | Date;

export type Row = Readonly<Record<string, CellValue>>;

export interface TableSchema {
  readonly name: string;
  readonly columns: ReadonlyArray<ColumnSpec>;
}

export const OBSERVATION_TABLE: TableSchema = {
  name: 'observation',
  columns: [
    { name: 'location', kind: 'string' },
    { name: 'station_id', kind: 'string' },
    { name: 'valid_time_utc', kind: 'timestamp' },
    { name: 'as_of_time_utc', kind: 'timestamp' },
    { name: 'temperature_c', kind: 'float' },
    { name: 'quality_flag', kind: 'string' },
    { name: 'provider', kind: 'string' },
    { name: 'provenance_hash', kind: 'string' },
    { name: 'raw_payload', kind: 'string' },
  ],
};

export const FORECAST_TABLE: TableSchema = {
  name: 'forecast',
  columns: [
    { name: 'location', kind: 'string' },
    { name: 'provider', kind: 'string' },
    { name: 'issue_time_utc', kind: 'timestamp' },
    { name: 'valid_time_utc', kind: 'timestamp' },
    { name: 'lead_hours', kind: 'integer' },
    { name: 'temperature_c', kind: 'float' },
    { name: 'model_run', kind: 'string' },
    { name: 'as_of_time_utc', kind: 'timestamp' },
    { name: 'provenance_hash', kind: 'string' },
    { name: 'raw_payload', kind: 'string' },
  ],
};

export const LOCATION_DIMENSION_TABLE: TableSchema = {
  name: 'dim_location',
  columns: [
    { name: 'name', kind: 'string' },
    { name: 'latitude', kind: 'float' },
    { name: 'longitude', kind: 'float' },
    { name: 'series_id', kind: 'string' },
    { name: 'station_id', kind: 'string' },
    { name: 'timezone', kind: 'string' },
    { name: 'weather_id', kind: 'string' },
  ],
};

export function forecastToRow(record: RetainedForecast): Row {
  return {
    location: record.location,
    provider: record.provider,
    issue_time_utc: record.issueTimeUtc,
    valid_time_utc: record.validTimeUtc,
    lead_hours: record.leadHours,
    temperature_c: record.temperatureC,
    model_run: record.modelRun,
    as_of_time_utc: record.asOfTimeUtc,
    provenance_hash: record.provenanceHash,
    raw_payload: record.rawPayload,
  };
}

export function observationToRow(record: RetainedObservation): Row {
  return {
    location: record.location,
    station_id: record.stationId,
    valid_time_utc: record.validTimeUtc,
    as_of_time_utc: record.asOfTimeUtc,
    temperature_c: record.temperatureC,
    quality_flag: record.qualityFlag,
    provider: record.provider,
    provenance_hash: record.provenanceHash,
    raw_payload: record.rawPayload,
  };
}

export function locationDimensionRows(registry: LocationRegistry): Row[] {
  return registry.entries.map((entry) => ({
    name: entry.name,
    latitude: entry.latitude,
    longitude: entry.longitude,
    series_id: entry.seriesId,
    station_id: entry.stationId,
    timezone: entry.timezone,
    weather_id: entry.weatherId,
  }));
}
