import { ExclusionRules } from '../config/env';
import { LocationEntry } from '../interfaces/location';
import { ForecastSource, ObservationSource } from '../interfaces/payloads';
import { Dataset, ProviderName } from '../interfaces/records';
import { logger } from '../logger';
import {
  FORECAST_TABLE,
  forecastToRow,
  OBSERVATION_TABLE,
  observationToRow,
} from '../schemas/staging.schema';
import {
  filterForecasts,
  filterObservations,
  ForecastDrops,
  NO_EXCLUSIONS,
  ObservationDrops,
} from './forecastFilters';
import { normalizeForecast, normalizeObservation } from './normalizer';
import { StagedFile, StagingWriter } from './stagingWriter';
import { resolveForecastTimes, resolveObservationTimes } from './timestamps';

export interface PipelineDeps {
  writer: StagingWriter;
  /** Shared by every file a run stages. */
  runTimestamp: Date;
  exclusions?: ExclusionRules;
}

export interface LocationOutcome {
  readonly location: string;
  readonly provider: ProviderName;
  readonly dataset: Dataset;
  /** null when nothing survived filtering */
  readonly staged: StagedFile | null;
  readonly fetched: number;
  readonly retained: number;
  readonly rejected: number;
  readonly dropped: ForecastDrops | ObservationDrops;
}

export type LocationTask = (location: LocationEntry, signal: AbortSignal) => Promise<LocationOutcome>;

/** fetch -> normalize -> resolve times -> filter -> stage */
export function createForecastPipeline(source: ForecastSource, deps: PipelineDeps): LocationTask {
  return async (location, signal) => {
    const payload = await source.fetchForecast(location, signal);

    const drafts = normalizeForecast(payload);
    const resolved = resolveForecastTimes(drafts, location.timezone);
    const filtered = filterForecasts(
      resolved.records,
      location.timezone,
      deps.exclusions ?? NO_EXCLUSIONS
    );

    // A location that timed out is already reported failed; it must not stage
    signal.throwIfAborted();
    const staged = filtered.records.length
      ? await deps.writer.stage(
          {
            provider: source.provider,
            dataset: 'forecast',
            location: location.name,
            runTimestamp: deps.runTimestamp,
          },
          FORECAST_TABLE,
          filtered.records.map(forecastToRow)
        )
      : null;

    logger.debug(
      { location: location.name, provider: source.provider, dropped: filtered.dropped },
      'Forecast batch filtered'
    );

    return {
      location: location.name,
      provider: source.provider,
      dataset: 'forecast',
      staged,
      fetched: drafts.length,
      retained: filtered.records.length,
      rejected: resolved.rejected.length,
      dropped: filtered.dropped,
    };
  };
}

export function createObservationPipeline(
  source: ObservationSource,
  deps: PipelineDeps
): LocationTask {
  return async (location, signal) => {
    const payload = await source.fetchCurrent(location, signal);

    const drafts = normalizeObservation(payload);
    const resolved = resolveObservationTimes(drafts, location.timezone);
    const filtered = filterObservations(resolved.records, deps.exclusions ?? NO_EXCLUSIONS);

    signal.throwIfAborted();
    const staged = filtered.records.length
      ? await deps.writer.stage(
          {
            provider: source.provider,
            dataset: 'observation',
            location: location.name,
            runTimestamp: deps.runTimestamp,
          },
          OBSERVATION_TABLE,
          filtered.records.map(observationToRow)
        )
      : null;

    return {
      location: location.name,
      provider: source.provider,
      dataset: 'observation',
      staged,
      fetched: drafts.length,
      retained: filtered.records.length,
      rejected: resolved.rejected.length,
      dropped: filtered.dropped,
    };
  };
}
