import { CurrentConditions, HourlyForecast } from '../schemas/accuweather.schema';
import { LocationEntry } from './location';
import { ProviderName } from './records';

/** A validated provider element alongside the untouched element it came from. */
export interface RawEntry<T> {
  readonly raw: unknown;
  readonly entry: T;
}

export interface AccuWeatherForecastPayload {
  readonly provider: 'accuweather';
  readonly kind: 'forecast';
  readonly location: string;
  readonly locationKey: string;
  readonly fetchedAt: Date;
  readonly entries: ReadonlyArray<RawEntry<HourlyForecast>>;
}

export interface AccuWeatherCurrentPayload {
  readonly provider: 'accuweather';
  readonly kind: 'current';
  readonly location: string;
  readonly locationKey: string;
  readonly fetchedAt: Date;
  readonly entries: ReadonlyArray<RawEntry<CurrentConditions>>;
}

export interface ModelPoint {
  /** Bucket start, unix seconds. */
  readonly time: number;
  readonly value: number | null;
}

export interface ModelSeries {
  /** Requested model identifier, paired by position with the response. */
  readonly model: string;
  /** Provider's numeric model code as echoed in the response. */
  readonly modelCode: number;
  /** Model run timestamp declared by the provider, unix seconds. */
  readonly issueTime: number | null;
  readonly intervalSeconds: number;
  readonly points: ReadonlyArray<ModelPoint>;
}

export type TemperatureUnit = 'celsius' | 'fahrenheit';

export interface OpenMeteoForecastPayload {
  readonly provider: 'openmeteo';
  readonly kind: 'forecast';
  readonly location: string;
  readonly fetchedAt: Date;
  readonly temperatureUnit: TemperatureUnit;
  readonly series: ReadonlyArray<ModelSeries>;
}

export interface NwsRow {
  /** Naive local wall clock, "YYYY-MM-DDTHH:mm". */
  readonly localDateTime: string;
  readonly wind: string;
  readonly weather: string;
  readonly airTempF: number | null;
  readonly sixHourMaxF: number | null;
  readonly cells: ReadonlyArray<string>;
}

export interface NwsCurrentPayload {
  readonly provider: 'nws';
  readonly kind: 'current';
  readonly location: string;
  readonly stationId: string;
  readonly fetchedAt: Date;
  readonly rows: ReadonlyArray<NwsRow>;
}

export type ForecastPayload = AccuWeatherForecastPayload | OpenMeteoForecastPayload;

export type ObservationPayload = AccuWeatherCurrentPayload | NwsCurrentPayload;

export interface ForecastSource {
  readonly provider: ProviderName;
  fetchForecast(location: LocationEntry, signal?: AbortSignal): Promise<ForecastPayload>;
}

export interface ObservationSource {
  readonly provider: ProviderName;
  fetchCurrent(location: LocationEntry, signal?: AbortSignal): Promise<ObservationPayload>;
}
