import fs from 'fs';
import { z } from 'zod';
import { ResponseCache } from '../cache';
import { HttpTimeouts, loadSettingsFile, RetryPolicy } from '../config/env';
import { ConfigurationError, ProviderResponseError } from '../errors';
import { LocationEntry } from '../interfaces/location';
import {
  AccuWeatherCurrentPayload,
  AccuWeatherForecastPayload,
  ForecastSource,
  ObservationSource,
  RawEntry,
} from '../interfaces/payloads';
import { logger } from '../logger';
import {
  CurrentConditionsSchema,
  GeopositionSchema,
  HourlyForecastSchema,
} from '../schemas/accuweather.schema';
import { createHttpClient, getJson, HttpGetter, QueryParams } from './httpClient';
import { Sleep } from './retry';

const BASE_URL = 'https://dataservice.accuweather.com';
const LOCATION_KEY_TTL_SECONDS = 24 * 60 * 60;

/**
 * A credential value pointing into /run/secrets/ is treated as a Docker
 * secret file; anything else is the literal credential.
 */
export function readSecret(value: string, label: string): string | undefined {
  if (!value.startsWith('/run/secrets/')) return value;

  try {
    return fs.readFileSync(value, 'utf8').trim() || undefined;
  } catch (err) {
    throw new ConfigurationError(`${label} points to an unreadable secret file`, { cause: err });
  }
}

export function resolveSecret(envVar: string): string | undefined {
  const value = process.env[envVar];
  return value ? readSecret(value, envVar) : undefined;
}

export interface AccuWeatherClientOptions {
  apiKey?: string;
  http?: HttpGetter;
  timeouts?: HttpTimeouts;
  retry?: RetryPolicy;
  sleep?: Sleep;
  /** Temperatures in °C when true; the provider default of °F otherwise. */
  metric?: boolean;
  language?: string;
  baseUrl?: string;
  now?: () => Date;
}

function parseList<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  what: string
): RawEntry<T>[] {
  if (!Array.isArray(data)) {
    throw new ProviderResponseError(`AccuWeather ${what} payload is not a list`, { payload: data });
  }

  return data.map((raw: unknown, index) => {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderResponseError(`AccuWeather ${what} entry ${index} failed validation`, {
        payload: parsed.error.issues,
      });
    }
    return { raw, entry: parsed.data };
  });
}

export class AccuWeatherClient implements ForecastSource, ObservationSource {
  readonly provider = 'accuweather' as const;

  private readonly apiKey: string;
  private readonly http: HttpGetter;
  private readonly keyCache = new ResponseCache<string>('accuweather:location-key');
  private readonly options: AccuWeatherClientOptions;

  constructor(options: AccuWeatherClientOptions = {}) {
    let apiKey = options.apiKey ? readSecret(options.apiKey, 'apiKey') : undefined;
    if (!options.apiKey) {
      loadSettingsFile();
      apiKey = resolveSecret('ACCUWEATHER_API_KEY');
    }
    if (!apiKey) {
      throw new ConfigurationError(
        'AccuWeather API key is not set (ACCUWEATHER_API_KEY or the apiKey option)'
      );
    }

    this.apiKey = apiKey;
    this.options = options;
    this.http = options.http ?? createHttpClient(options.timeouts);
  }

  async fetchForecast(
    location: LocationEntry,
    signal?: AbortSignal
  ): Promise<AccuWeatherForecastPayload> {
    const locationKey = await this.locationKey(location, signal);
    const fetchedAt = this.now();

    const data = await this.get(`/forecasts/v1/hourly/12hour/${locationKey}`, signal, {
      metric: this.options.metric ?? false,
      details: true,
    });

    const entries = parseList(HourlyForecastSchema, data, 'hourly forecast');
    logger.debug({ location: location.name, count: entries.length }, 'AccuWeather forecast fetched');

    return {
      provider: 'accuweather',
      kind: 'forecast',
      location: location.name,
      locationKey,
      fetchedAt,
      entries,
    };
  }

  async fetchCurrent(
    location: LocationEntry,
    signal?: AbortSignal
  ): Promise<AccuWeatherCurrentPayload> {
    const locationKey = await this.locationKey(location, signal);
    const fetchedAt = this.now();

    const data = await this.get(`/currentconditions/v1/${locationKey}`, signal, {
      details: true,
    });

    return {
      provider: 'accuweather',
      kind: 'current',
      location: location.name,
      locationKey,
      fetchedAt,
      entries: parseList(CurrentConditionsSchema, data, 'current conditions'),
    };
  }

  /** Geoposition search, cached per coordinate pair. */
  async locationKey(location: LocationEntry, signal?: AbortSignal): Promise<string> {
    const q = `${location.latitude.toFixed(6)},${location.longitude.toFixed(6)}`;

    const cached = this.keyCache.get(q);
    if (cached) return cached;

    const data = await this.get('/locations/v1/cities/geoposition/search', signal, {
      q,
      details: false,
    });

    const parsed = GeopositionSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderResponseError(`AccuWeather geoposition response has no Key for ${q}`, {
        payload: data,
      });
    }

    this.keyCache.set(q, parsed.data.Key, LOCATION_KEY_TTL_SECONDS);
    return parsed.data.Key;
  }

  private get(path: string, signal: AbortSignal | undefined, params: QueryParams): Promise<unknown> {
    return getJson(
      this.http,
      `${this.options.baseUrl ?? BASE_URL}${path}`,
      { ...params, language: this.options.language ?? 'en-us', apikey: this.apiKey },
      { retry: this.options.retry, signal, sleep: this.options.sleep }
    );
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }
}
