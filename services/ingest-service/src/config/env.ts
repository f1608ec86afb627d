import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { splitList } from '../utils/strings';
import { isValidTimeZone } from '../utils/time';

export const DEFAULT_OPENMETEO_MODELS = [
  'best_match',
  'ecmwf_ifs04',
  'ecmwf_ifs025',
  'ecmwf_aifs025',
  'gfs_global',
  'gfs_hrrr',
  'ncep_nbm_conus',
  'gfs_graphcast025',
  'jma_gsm',
  'icon_global',
  'gem_global',
  'gem_regional',
  'meteofrance_arpege_world',
  'ukmo_global_deterministic_10km',
] as const;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type AppEnv = 'development' | 'production' | 'test';

const DEFAULT_LOG_LEVEL: Record<AppEnv, LogLevel> = {
  development: 'debug',
  production: 'info',
  test: 'silent',
};

const logSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

const envSchema = logSchema.extend({
  ACCUWEATHER_API_KEY: z.string().optional(),
  LOCATIONS_FILE: z.string().min(1).default('config/locations.json'),
  STAGING_ROOT: z.string().min(1).default('data/staging'),
  STAGING_FORMAT: z.enum(['parquet', 'ndjson']).default('parquet'),
  RUN_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isValidTimeZone, { message: 'must be an IANA time zone' }),
  INGEST_CONCURRENCY: positiveInt(1),
  LOCATION_TIMEOUT_MS: positiveInt(120_000),
  HTTP_CONNECT_TIMEOUT_MS: positiveInt(10_000),
  HTTP_READ_TIMEOUT_MS: positiveInt(30_000),
  RETRY_ATTEMPTS: positiveInt(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(750),
  OPENMETEO_MODELS: z.string().optional(),
  OPENMETEO_FORECAST_DAYS: z.coerce.number().int().min(1).max(16).default(3),
  OPENMETEO_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  EXCLUDED_LOCATIONS: z.string().optional(),
  EXCLUDED_MODEL_RUNS: z.string().optional(),
});

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
}

export interface HttpTimeouts {
  readonly connectMs: number;
  readonly readMs: number;
}

export interface ExclusionRules {
  readonly locations: ReadonlyArray<string>;
  readonly modelRuns: ReadonlyArray<string>;
}

export interface LogSettings {
  readonly level: LogLevel;
  /** pino-pretty output, development only */
  readonly pretty: boolean;
}

export interface AppConfig {
  readonly env: AppEnv;
  readonly log: LogSettings;
  readonly accuWeatherApiKey?: string;
  readonly locationsFile: string;
  readonly staging: {
    readonly root: string;
    readonly format: 'parquet' | 'ndjson';
    readonly runTimeZone: string;
  };
  readonly concurrency: number;
  readonly locationTimeoutMs: number;
  readonly http: HttpTimeouts;
  readonly retry: RetryPolicy;
  readonly openMeteo: {
    readonly models: ReadonlyArray<string>;
    readonly forecastDays: number;
    readonly cacheTtlSeconds: number;
  };
  readonly exclusions: ExclusionRules;
}

/**
 * Pre-populate process.env from a local settings file. Values already set in
 * the environment always win.
 */
export function loadSettingsFile(path = process.env.SETTINGS_FILE ?? '.env'): void {
  dotenv.config({ path, override: false, quiet: true });
}

function toLogSettings(env: AppEnv, level?: LogLevel): LogSettings {
  return Object.freeze({ level: level ?? DEFAULT_LOG_LEVEL[env], pretty: env === 'development' });
}

/**
 * Log settings alone, for the logger that exists before the full config is
 * loaded. An invalid value falls back to production defaults; loadConfig
 * reports it.
 */
export function loadLogSettings(source: NodeJS.ProcessEnv = process.env): LogSettings {
  const parsed = logSchema.safeParse(source);
  return parsed.success
    ? toLogSettings(parsed.data.NODE_ENV, parsed.data.LOG_LEVEL)
    : toLogSettings('production');
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration -> ${issues}`);
  }

  const env = parsed.data;
  const models = splitList(env.OPENMETEO_MODELS);

  return Object.freeze({
    env: env.NODE_ENV,
    log: toLogSettings(env.NODE_ENV, env.LOG_LEVEL),
    accuWeatherApiKey: env.ACCUWEATHER_API_KEY || undefined,
    locationsFile: env.LOCATIONS_FILE,
    staging: Object.freeze({
      root: env.STAGING_ROOT,
      format: env.STAGING_FORMAT,
      runTimeZone: env.RUN_TIMEZONE,
    }),
    concurrency: env.INGEST_CONCURRENCY,
    locationTimeoutMs: env.LOCATION_TIMEOUT_MS,
    http: Object.freeze({
      connectMs: env.HTTP_CONNECT_TIMEOUT_MS,
      readMs: env.HTTP_READ_TIMEOUT_MS,
    }),
    retry: Object.freeze({
      maxAttempts: env.RETRY_ATTEMPTS,
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
    }),
    openMeteo: Object.freeze({
      models: Object.freeze(models.length ? models : [...DEFAULT_OPENMETEO_MODELS]),
      forecastDays: env.OPENMETEO_FORECAST_DAYS,
      cacheTtlSeconds: env.OPENMETEO_CACHE_TTL_SECONDS,
    }),
    exclusions: Object.freeze({
      locations: Object.freeze(splitList(env.EXCLUDED_LOCATIONS)),
      modelRuns: Object.freeze(splitList(env.EXCLUDED_MODEL_RUNS)),
    }),
  });
}
