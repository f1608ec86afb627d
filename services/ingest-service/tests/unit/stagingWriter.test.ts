import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import { createLocationRegistry } from '@/config/locations';
import { RetainedForecast } from '@/interfaces/records';
import { ndjsonSerializer } from '@/modules/serializers';
import { encodeRunTimestamp, StagingKey, StagingWriter } from '@/modules/stagingWriter';
import {
  FORECAST_TABLE,
  forecastToRow,
  LOCATION_DIMENSION_TABLE,
  locationDimensionRows,
} from '@/schemas/staging.schema';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const record: RetainedForecast = {
  location: 'Los Angeles',
  provider: 'openmeteo',
  issueTimeUtc: new Date('2025-01-14T00:00:00Z'),
  validTimeUtc: new Date('2025-01-14T06:00:00Z'),
  leadHours: 6,
  temperatureC: 12.5,
  modelRun: 'gfs_global',
  asOfTimeUtc: new Date('2025-01-14T00:05:00Z'),
  provenanceHash: 'abc123',
  rawPayload: '{"time":1736834400}',
};

const expectedLine = JSON.stringify({
  location: 'Los Angeles',
  provider: 'openmeteo',
  issue_time_utc: '2025-01-14T00:00:00.000Z',
  valid_time_utc: '2025-01-14T06:00:00.000Z',
  lead_hours: 6,
  temperature_c: 12.5,
  model_run: 'gfs_global',
  as_of_time_utc: '2025-01-14T00:05:00.000Z',
  provenance_hash: 'abc123',
  raw_payload: '{"time":1736834400}',
});

describe('encodeRunTimestamp (unit)', () => {
  it('replaces separators with file-name safe tokens', () => {
    expect(encodeRunTimestamp('2025-11-03T22:26:40-06:00')).toBe('2025-11-03T22_26_40_minus_06_00');
    expect(encodeRunTimestamp('2025-11-04T10:56:40+05:30')).toBe('2025-11-04T10_56_40_plus_05_30');
    expect(encodeRunTimestamp('2025-11-04T04:26:40Z')).toBe('2025-11-04T04_26_40_plus_00_00');
  });
});

describe('StagingWriter (unit)', () => {
  let root: string;
  let writer: StagingWriter;

  const key: StagingKey = {
    provider: 'openmeteo',
    dataset: 'forecast',
    location: 'Los Angeles',
    runTimestamp: new Date('2025-11-04T04:26:40.123Z'),
  };

  beforeEach(async () => {
    root = await fsp.mkdtemp(path.join(os.tmpdir(), 'staging-'));
    writer = new StagingWriter({
      root,
      serializer: ndjsonSerializer,
      runTimeZone: 'America/Chicago',
    });
  });

  afterEach(async () => {
    await fsp.rm(root, { recursive: true, force: true });
  });

  /**
   * Purpose:
   * Verifies the partition layout and the encoded file name.
   */
  it('derives the staged path from provider, dataset, location and run time', () => {
    expect(writer.pathFor(key)).toBe(
      path.join(
        root,
        'openmeteo_forecast',
        'run_date=2025-11-03',
        'openmeteo_forecast_los_angeles_2025-11-03T22_26_40_minus_06_00.ndjson'
      )
    );
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - rows are written one JSON object per line
   * - columns follow the table schema order
   */
  it('writes a new staged file', async () => {
    const staged = await writer.stage(key, FORECAST_TABLE, [forecastToRow(record)]);

    expect(staged).toEqual({ path: writer.pathFor(key), status: 'written', rows: 1 });
    await expect(fsp.readFile(staged.path, 'utf8')).resolves.toBe(`${expectedLine}\n`);
  });

  /**
   * Purpose:
   * Verifies Idempotency:
   * - a second write for the same key is a no-op
   * - the first content survives
   * - no temporary files are left behind
   */
  it('never overwrites an existing staged file', async () => {
    await writer.stage(key, FORECAST_TABLE, [forecastToRow(record)]);

    const second = await writer.stage(key, FORECAST_TABLE, [
      forecastToRow({ ...record, temperatureC: 99 }),
    ]);

    expect(second.status).toBe('skipped');
    await expect(fsp.readFile(second.path, 'utf8')).resolves.toBe(`${expectedLine}\n`);
    await expect(fsp.readdir(path.dirname(second.path))).resolves.toEqual([
      path.basename(second.path),
    ]);
  });

  /**
   * Purpose:
   * Verifies a file published by another writer between the existence
   * check and the final link is kept, and the batch is skipped.
   */
  it('skips a staged file that appears while the batch is written', async () => {
    const racing: StagingWriter = new StagingWriter({
      root,
      runTimeZone: 'America/Chicago',
      serializer: {
        ...ndjsonSerializer,
        async write(tempPath, table, rows) {
          await ndjsonSerializer.write(tempPath, table, rows);
          await fsp.writeFile(racing.pathFor(key), 'from another run\n');
        },
      },
    });

    const staged = await racing.stage(key, FORECAST_TABLE, [forecastToRow(record)]);

    expect(staged).toEqual({ path: racing.pathFor(key), status: 'skipped', rows: 0 });
    await expect(fsp.readFile(staged.path, 'utf8')).resolves.toBe('from another run\n');
    await expect(fsp.readdir(path.dirname(staged.path))).resolves.toEqual([
      path.basename(staged.path),
    ]);
  });

  /**
   * Purpose:
   * Verifies the dimension table is replaced wholesale on every write.
   */
  it('rewrites the location dimension in full', async () => {
    const source = (name: string) => ({
      name,
      latitude: 41.7868,
      longitude: -87.7522,
      series_id: `SERIES-${name}`,
      station_id: 'KMDW',
      timezone: 'America/Chicago',
    });

    const first = createLocationRegistry({ locations: [source('Chicago'), source('Joliet')] });
    const second = createLocationRegistry({ locations: [source('Chicago')] });

    await writer.replaceDimension(LOCATION_DIMENSION_TABLE, locationDimensionRows(first));
    const staged = await writer.replaceDimension(
      LOCATION_DIMENSION_TABLE,
      locationDimensionRows(second)
    );

    expect(staged).toEqual({
      path: path.join(root, 'dim_location.ndjson'),
      status: 'replaced',
      rows: 1,
    });

    const lines = (await fsp.readFile(staged.path, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      name: 'Chicago',
      series_id: 'SERIES-Chicago',
      weather_id: second.entries[0].weatherId,
    });
  });
});
