import { ValidationError } from '../errors';
import {
  ForecastDraft,
  ForecastRecord,
  ObservationDraft,
  ObservationRecord,
  RejectedRecord,
  StageResult,
} from '../interfaces/records';
import { logger } from '../logger';
import { hoursBetween, toUtc } from '../utils/time';

function resolveEach<D extends { rawPayload: string }, R>(
  drafts: ReadonlyArray<D>,
  resolve: (draft: D) => R
): StageResult<R> {
  const records: R[] = [];
  const rejected: RejectedRecord[] = [];

  for (const draft of drafts) {
    try {
      records.push(resolve(draft));
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      rejected.push({ reason: err.message, rawPayload: draft.rawPayload });
    }
  }

  if (rejected.length) {
    logger.warn(
      { rejected: rejected.length, first: rejected[0].reason },
      'Dropped records with unresolvable timestamps'
    );
  }
  return { records, rejected };
}

/** Resolve issue and valid times to UTC and derive the lead time. */
export function resolveForecastTimes(
  drafts: ReadonlyArray<ForecastDraft>,
  timeZone: string
): StageResult<ForecastRecord> {
  return resolveEach(drafts, (draft) => {
    const issueTimeUtc = toUtc(draft.issueTime, timeZone);
    const validTimeUtc = toUtc(draft.validTime, timeZone);

    return {
      location: draft.location,
      provider: draft.provider,
      issueTimeUtc,
      validTimeUtc,
      leadHours: hoursBetween(issueTimeUtc, validTimeUtc),
      temperatureC: draft.temperatureC,
      modelRun: draft.modelRun,
      asOfTimeUtc: draft.asOfTimeUtc,
      provenanceHash: draft.provenanceHash,
      rawPayload: draft.rawPayload,
    };
  });
}

export function resolveObservationTimes(
  drafts: ReadonlyArray<ObservationDraft>,
  timeZone: string
): StageResult<ObservationRecord> {
  return resolveEach(drafts, (draft) => ({
    location: draft.location,
    stationId: draft.stationId,
    validTimeUtc: toUtc(draft.validTime, timeZone),
    asOfTimeUtc: draft.asOfTimeUtc,
    temperatureC: draft.temperatureC,
    qualityFlag: draft.qualityFlag,
    provider: draft.provider,
    provenanceHash: draft.provenanceHash,
    rawPayload: draft.rawPayload,
  }));
}
