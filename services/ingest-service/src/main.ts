import { AppConfig, loadConfig, loadSettingsFile } from './config/env';
import { loadLocationRegistry } from './config/locations';
import { ConfigurationError, IngestRunError, NetworkError } from './errors';
import { LocationRegistry } from './interfaces/location';
import { logger } from './logger';
import { AccuWeatherClient } from './modules/accuWeatherClient';
import { NwsClient } from './modules/nwsClient';
import { OpenMeteoClient } from './modules/openMeteoClient';
import { IngestJob, runIngest, RunSummary } from './modules/orchestrator';
import { createForecastPipeline, createObservationPipeline, PipelineDeps } from './modules/pipelines';
import { serializerFor } from './modules/serializers';
import { StagingWriter } from './modules/stagingWriter';
import { LOCATION_DIMENSION_TABLE, locationDimensionRows } from './schemas/staging.schema';
import { splitList } from './utils/strings';

export const JOB_NAMES = [
  'accuweather-forecast',
  'accuweather-current',
  'openmeteo-forecast',
  'nws-current',
] as const;

export type JobName = (typeof JOB_NAMES)[number];

function isJobName(value: string): value is JobName {
  return JOB_NAMES.some((name) => name === value);
}

export interface CliArgs {
  jobs: JobName[];
  locations?: string[];
}

/** `[job ...] [--locations=Austin,Chicago]`; no jobs means all of them. */
export function parseArgs(argv: ReadonlyArray<string>): CliArgs {
  const jobs: JobName[] = [];
  let locations: string[] | undefined;

  for (const arg of argv) {
    if (arg.startsWith('--locations=')) {
      locations = splitList(arg.slice('--locations='.length));
      continue;
    }
    if (!isJobName(arg)) {
      throw new ConfigurationError(`Unknown job '${arg}'. Expected one of: ${JOB_NAMES.join(', ')}`);
    }
    jobs.push(arg);
  }

  return { jobs: jobs.length ? jobs : [...JOB_NAMES], locations };
}

// -------------------------------------------------
// Job wiring
// -------------------------------------------------
export function buildJobs(
  names: ReadonlyArray<JobName>,
  config: AppConfig,
  deps: PipelineDeps,
  locations?: ReadonlyArray<string>
): IngestJob[] {
  const http = config.http;
  const retry = config.retry;

  let accuWeather: AccuWeatherClient | undefined;
  const accuWeatherClient = () => {
    accuWeather =
      accuWeather ?? new AccuWeatherClient({ apiKey: config.accuWeatherApiKey, timeouts: http, retry });
    return accuWeather;
  };

  return names.map((label): IngestJob => {
    switch (label) {
      case 'accuweather-forecast':
        return { label, locations, task: createForecastPipeline(accuWeatherClient(), deps) };
      case 'accuweather-current':
        return { label, locations, task: createObservationPipeline(accuWeatherClient(), deps) };
      case 'openmeteo-forecast':
        return {
          label,
          locations,
          task: createForecastPipeline(
            new OpenMeteoClient({
              models: config.openMeteo.models,
              forecastDays: config.openMeteo.forecastDays,
              cacheTtlSeconds: config.openMeteo.cacheTtlSeconds,
              timeouts: http,
              retry,
            }),
            deps
          ),
        };
      case 'nws-current':
        return {
          label,
          locations,
          task: createObservationPipeline(new NwsClient({ timeouts: http, retry }), deps),
        };
    }
  });
}

export interface MainResult {
  summaries: RunSummary[];
  failedJobs: string[];
}

export async function runJobs(
  args: CliArgs,
  config: AppConfig,
  registry: LocationRegistry,
  signal?: AbortSignal
): Promise<MainResult> {
  const writer = new StagingWriter({
    root: config.staging.root,
    serializer: serializerFor(config.staging.format),
    runTimeZone: config.staging.runTimeZone,
  });

  await writer.replaceDimension(LOCATION_DIMENSION_TABLE, locationDimensionRows(registry));

  const deps: PipelineDeps = {
    writer,
    runTimestamp: new Date(),
    exclusions: config.exclusions,
  };

  const summaries: RunSummary[] = [];
  const failedJobs: string[] = [];

  for (const job of buildJobs(args.jobs, config, deps, args.locations)) {
    if (signal?.aborted) break;

    try {
      const summary = await runIngest(job, {
        registry,
        concurrency: config.concurrency,
        locationTimeoutMs: config.locationTimeoutMs,
        signal,
      });
      summaries.push(summary);
    } catch (err) {
      if (!(err instanceof IngestRunError)) throw err;
      logger.error({ job: job.label, failures: err.failures }, 'Ingest job failed for every location');
      failedJobs.push(job.label);
    }
  }

  return { summaries, failedJobs };
}

// -------------------------------------------------
// Process entry
// -------------------------------------------------
export async function main(argv: ReadonlyArray<string> = process.argv.slice(2)): Promise<number> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}. Aborting in-flight ingest...`);
    controller.abort(new NetworkError(`Interrupted by ${signal}`));
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    loadSettingsFile();
    const config = loadConfig();
    logger.level = config.log.level;
    const args = parseArgs(argv);
    const registry = loadLocationRegistry(config.locationsFile);

    const { failedJobs } = await runJobs(args, config, registry, controller.signal);
    return failedJobs.length || controller.signal.aborted ? 1 : 0;
  } catch (err) {
    logger.error({ err }, 'Ingest aborted');
    return 1;
  } finally {
    process.removeListener('SIGINT', onSignal);
    process.removeListener('SIGTERM', onSignal);
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'Unhandled ingest failure');
      process.exitCode = 1;
    }
  );
}
