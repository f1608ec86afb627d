import { ResponseCache } from '../cache';
import { HttpTimeouts, RetryPolicy } from '../config/env';
import { IngestError, ProviderResponseError } from '../errors';
import { LocationEntry } from '../interfaces/location';
import {
  ForecastSource,
  ModelPoint,
  ModelSeries,
  OpenMeteoForecastPayload,
  TemperatureUnit,
} from '../interfaces/payloads';
import { logger } from '../logger';
import { DEFAULT_TIMEOUTS } from './httpClient';
import { Sleep, withRetry } from './retry';

const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

/**
 * The parts of a decoded per-model response this client reads. Matches the
 * WeatherApiResponse objects returned by the openmeteo SDK.
 */
export interface ModelResponse {
  model(): number;
  current(): { time(): bigint } | null;
  hourly(): {
    time(): bigint;
    timeEnd(): bigint;
    interval(): number;
    variables(index: number): { valuesArray(): Float32Array | null } | null;
  } | null;
}

export type OpenMeteoParams = Record<string, string | number>;

/**
 * One outbound call, one response per requested model, in request order.
 * The call must stop when `signal` aborts.
 */
export type OpenMeteoTransport = (
  url: string,
  params: OpenMeteoParams,
  signal: AbortSignal
) => Promise<ModelResponse[]>;

export const sdkTransport: OpenMeteoTransport = async (url, params, signal) => {
  const { fetchWeatherApi } = await import('openmeteo');
  // Retries are owned by withRetry
  return fetchWeatherApi(url, params, 0, 0.2, 2, { signal });
};

export interface OpenMeteoClientOptions {
  models: ReadonlyArray<string>;
  forecastDays?: number;
  temperatureUnit?: TemperatureUnit;
  cacheTtlSeconds?: number;
  transport?: OpenMeteoTransport;
  /** readMs bounds each attempt, connect included */
  timeouts?: HttpTimeouts;
  retry?: RetryPolicy;
  sleep?: Sleep;
  url?: string;
  now?: () => Date;
}

/** Hourly buckets over the half-open range [start, end). */
export function bucketTimes(start: number, end: number, interval: number): number[] {
  if (!(interval > 0)) {
    throw new ProviderResponseError(`Open-Meteo series has a non-positive interval: ${interval}`);
  }
  const times: number[] = [];
  for (let t = start; t < end; t += interval) {
    times.push(t);
  }
  return times;
}

export function toModelSeries(model: string, response: ModelResponse): ModelSeries {
  const hourly = response.hourly();
  if (!hourly) {
    throw new ProviderResponseError(`Open-Meteo response for ${model} has no hourly block`);
  }

  const values = hourly.variables(0)?.valuesArray();
  if (!values) {
    throw new ProviderResponseError(`Open-Meteo response for ${model} has no temperature values`);
  }

  const interval = hourly.interval();
  const times = bucketTimes(Number(hourly.time()), Number(hourly.timeEnd()), interval);

  if (times.length !== values.length) {
    throw new ProviderResponseError(
      `Open-Meteo series length mismatch for ${model}: ${times.length} times, ${values.length} values`
    );
  }

  const points: ModelPoint[] = times.map((time, i) => ({
    time,
    value: Number.isNaN(values[i]) ? null : values[i],
  }));

  const current = response.current();

  return {
    model,
    modelCode: response.model(),
    issueTime: current ? Number(current.time()) : null,
    intervalSeconds: interval,
    points,
  };
}

export class OpenMeteoClient implements ForecastSource {
  readonly provider = 'openmeteo' as const;

  private readonly cache = new ResponseCache<OpenMeteoForecastPayload>('openmeteo:forecast');
  private readonly transport: OpenMeteoTransport;

  constructor(private readonly options: OpenMeteoClientOptions) {
    this.transport = options.transport ?? sdkTransport;
  }

  async fetchForecast(
    location: LocationEntry,
    signal?: AbortSignal
  ): Promise<OpenMeteoForecastPayload> {
    const models = this.options.models;
    const temperatureUnit = this.options.temperatureUnit ?? 'fahrenheit';

    const params: OpenMeteoParams = {
      latitude: location.latitude,
      longitude: location.longitude,
      forecast_days: this.options.forecastDays ?? 3,
      current: 'temperature_2m',
      hourly: 'temperature_2m',
      temperature_unit: temperatureUnit,
      timezone: location.timezone,
      models: models.join(','),
    };

    const cacheKey = JSON.stringify(params);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return { ...cached, location: location.name };
    }

    const url = this.options.url ?? FORECAST_URL;
    const fetchedAt = this.now();

    let responses: ModelResponse[];
    try {
      responses = await withRetry(
        () => this.transport(url, params, this.attemptSignal(signal)),
        { policy: this.options.retry, signal, sleep: this.options.sleep, label: url }
      );
    } catch (err) {
      if (err instanceof IngestError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderResponseError(`Open-Meteo request failed: ${message}`, { cause: err });
    }

    if (responses.length !== models.length) {
      throw new ProviderResponseError(
        `Open-Meteo returned ${responses.length} model response(s) for ${models.length} requested model(s)`
      );
    }

    const series = models.map((model, i) => toModelSeries(model, responses[i]));

    const payload: OpenMeteoForecastPayload = {
      provider: 'openmeteo',
      kind: 'forecast',
      location: location.name,
      fetchedAt,
      temperatureUnit,
      series,
    };

    this.cache.set(cacheKey, payload, this.options.cacheTtlSeconds ?? 300);
    logger.debug(
      { location: location.name, models: models.length },
      'Open-Meteo forecast fetched'
    );
    return payload;
  }

  private attemptSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout((this.options.timeouts ?? DEFAULT_TIMEOUTS).readMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}
