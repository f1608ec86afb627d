import Bottleneck from 'bottleneck';
import {
  ConfigurationError,
  describeError,
  IngestRunError,
  LocationFailure,
  NetworkError,
} from '../errors';
import { LocationEntry, LocationRegistry } from '../interfaces/location';
import { logger } from '../logger';
import { LocationOutcome, LocationTask } from './pipelines';

export interface IngestJob {
  /** Used in logs and in the run error, e.g. "openmeteo-forecast". */
  label: string;
  task: LocationTask;
  /** Registry names to ingest; every registered location when omitted. */
  locations?: ReadonlyArray<string>;
}

export interface RunOptions {
  registry: LocationRegistry;
  concurrency?: number;
  locationTimeoutMs?: number;
  signal?: AbortSignal;
}

export interface RunSummary {
  readonly label: string;
  readonly successes: ReadonlyArray<LocationOutcome>;
  readonly failures: ReadonlyArray<LocationFailure>;
}

type Slot = { ok: true; outcome: LocationOutcome } | { ok: false; failure: LocationFailure };

const DEFAULT_LOCATION_TIMEOUT_MS = 120_000;

function abortReason(signal: AbortSignal, fallback: string): Error {
  return signal.reason instanceof Error ? signal.reason : new NetworkError(fallback, signal.reason);
}

/**
 * Settles with `work()`, or rejects as soon as `signal` aborts. Work is not
 * started on an already aborted signal.
 */
function raceAbort<T>(work: () => Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(abortReason(signal, 'Location cancelled'));
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(abortReason(signal, 'Location cancelled'));
    signal.addEventListener('abort', onAbort, { once: true });
  });

  return Promise.race([work(), aborted]).finally(() => {
    if (onAbort) signal.removeEventListener('abort', onAbort);
  });
}

export function resolveLocations(
  registry: LocationRegistry,
  names?: ReadonlyArray<string>
): ReadonlyArray<LocationEntry> {
  const locations = registry.select(names);
  if (!locations.length) {
    throw new ConfigurationError('No locations selected for ingest');
  }
  return locations;
}

/**
 * Run `job.task` once per location. A location's failure is recorded in its
 * own slot and never stops the others; a ConfigurationError stops the run.
 */
export async function runIngest(job: IngestJob, options: RunOptions): Promise<RunSummary> {
  const locations = resolveLocations(options.registry, job.locations);
  const timeoutMs = options.locationTimeoutMs ?? DEFAULT_LOCATION_TIMEOUT_MS;

  const run = new AbortController();
  const onExternalAbort = () => run.abort(options.signal?.reason);
  if (options.signal?.aborted) {
    run.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const limiter = new Bottleneck({ maxConcurrent: Math.max(1, options.concurrency ?? 1) });
  const slots: Slot[] = [];
  const state: { fatal?: ConfigurationError } = {};

  const runOne = async (location: LocationEntry, index: number): Promise<void> => {
    const controller = new AbortController();
    const onRunAbort = () => controller.abort(run.signal.reason);
    if (run.signal.aborted) {
      controller.abort(run.signal.reason);
    } else {
      run.signal.addEventListener('abort', onRunAbort, { once: true });
    }

    const timer = setTimeout(
      () => controller.abort(new NetworkError(`Location timed out after ${timeoutMs} ms`)),
      timeoutMs
    );

    try {
      const outcome = await raceAbort(
        () => job.task(location, controller.signal),
        controller.signal
      );
      slots[index] = { ok: true, outcome };

      logger.info(
        {
          job: job.label,
          location: location.name,
          retained: outcome.retained,
          status: outcome.staged?.status ?? 'empty',
          path: outcome.staged?.path,
        },
        'Location ingested'
      );
    } catch (err) {
      if (err instanceof ConfigurationError) {
        state.fatal = state.fatal ?? err;
        run.abort(err);
      }

      const failure: LocationFailure = { location: location.name, ...describeError(err) };
      slots[index] = { ok: false, failure };
      logger.warn({ job: job.label, ...failure }, 'Location ingest failed');
    } finally {
      clearTimeout(timer);
      run.signal.removeEventListener('abort', onRunAbort);
    }
  };

  try {
    await Promise.all(
      locations.map((location, index) => limiter.schedule(() => runOne(location, index)))
    );
  } finally {
    options.signal?.removeEventListener('abort', onExternalAbort);
  }

  if (state.fatal) {
    logger.error(
      { job: job.label, err: state.fatal.message },
      'Ingest aborted by configuration error'
    );
    throw state.fatal;
  }

  const successes: LocationOutcome[] = [];
  const failures: LocationFailure[] = [];
  for (const slot of slots) {
    if (slot.ok) successes.push(slot.outcome);
    else failures.push(slot.failure);
  }

  if (!successes.length) {
    throw new IngestRunError(job.label, failures);
  }

  logger.info(
    { job: job.label, succeeded: successes.length, failed: failures.length },
    'Ingest run complete'
  );
  return { label: job.label, successes, failures };
}
