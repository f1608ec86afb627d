export interface LocationEntry {
  readonly name: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly seriesId: string;
  readonly stationId: string;
  readonly timezone: string;
  /** SHA-256 of the identity fields, stable across runs. */
  readonly weatherId: string;
}

export interface LocationRegistry {
  readonly entries: ReadonlyArray<LocationEntry>;
  get(name: string): LocationEntry;
  select(names?: ReadonlyArray<string>): ReadonlyArray<LocationEntry>;
}
