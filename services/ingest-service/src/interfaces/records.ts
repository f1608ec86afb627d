export type ProviderName = 'accuweather' | 'openmeteo' | 'nws';

export type Dataset = 'forecast' | 'observation';

/**
 * A timestamp as the provider reported it, before UTC resolution.
 * Text may be naive ("2025-01-14T09:53") or zone-aware ("...-06:00", "...Z").
 */
export type SourceTimestamp =
  | { kind: 'epoch'; seconds: number }
  | { kind: 'text'; value: string; offsetSeconds?: number };

interface Provenance {
  readonly provider: ProviderName;
  readonly provenanceHash: string;
  readonly rawPayload: string;
}

export interface ForecastDraft extends Provenance {
  readonly location: string;
  readonly issueTime: SourceTimestamp;
  readonly validTime: SourceTimestamp;
  readonly temperatureC: number | null;
  readonly modelRun: string;
  readonly asOfTimeUtc: Date;
}

export interface ObservationDraft extends Provenance {
  readonly location: string;
  readonly stationId: string;
  readonly validTime: SourceTimestamp;
  readonly temperatureC: number | null;
  readonly qualityFlag: string;
  readonly asOfTimeUtc: Date;
}

export interface ForecastRecord extends Provenance {
  readonly location: string;
  readonly issueTimeUtc: Date;
  readonly validTimeUtc: Date;
  readonly leadHours: number;
  readonly temperatureC: number | null;
  readonly modelRun: string;
  readonly asOfTimeUtc: Date;
}

export interface ObservationRecord extends Provenance {
  readonly location: string;
  readonly stationId: string;
  readonly validTimeUtc: Date;
  readonly asOfTimeUtc: Date;
  readonly temperatureC: number | null;
  readonly qualityFlag: string;
}

/** Records that passed the exclusion filter always carry a temperature. */
export type Retained<T extends { temperatureC: number | null }> = T & {
  readonly temperatureC: number;
};

export type RetainedForecast = Retained<ForecastRecord>;
export type RetainedObservation = Retained<ObservationRecord>;

/** Outcome of a stage that may reject individual records. */
export interface StageResult<T> {
  readonly records: ReadonlyArray<T>;
  readonly rejected: ReadonlyArray<RejectedRecord>;
}

export interface RejectedRecord {
  readonly reason: string;
  readonly rawPayload: string;
}
