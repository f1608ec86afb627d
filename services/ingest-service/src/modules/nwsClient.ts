import * as cheerio from 'cheerio';
import { HttpTimeouts, RetryPolicy } from '../config/env';
import { ProviderResponseError } from '../errors';
import { LocationEntry } from '../interfaces/location';
import { NwsCurrentPayload, NwsRow, ObservationSource } from '../interfaces/payloads';
import { logger } from '../logger';
import { calendarDate } from '../utils/time';
import { createHttpClient, getText, HttpGetter } from './httpClient';
import { Sleep } from './retry';

const BASE_URL = 'https://forecast.weather.gov/data/obhistory';

/** Table positions of day, time, wind, weather, air temperature and 6-hour max. */
export const NWS_COLUMNS = [0, 1, 2, 4, 6, 8] as const;

const REQUIRED_CELLS = Math.max(...NWS_COLUMNS) + 1;

export interface NwsClientOptions {
  http?: HttpGetter;
  timeouts?: HttpTimeouts;
  retry?: RetryPolicy;
  sleep?: Sleep;
  userAgent?: string;
  baseUrl?: string;
  now?: () => Date;
}

function parseTemperature(text: string): number | null {
  const value = Number.parseFloat(text);
  return Number.isFinite(value) ? value : null;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * The table only lists the day of month. Days later than today belong to the
 * previous month.
 */
export function resolveDay(day: number, today: string): string {
  const [year, month, todayDay] = today.split('-').map(Number);
  if (day <= todayDay) {
    return `${year}-${pad(month)}-${pad(day)}`;
  }
  const previous = month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
  return `${previous.year}-${pad(previous.month)}-${pad(day)}`;
}

/**
 * Extract observation rows from an obhistory page. `today` is the fetch date
 * in the station's time zone, "YYYY-MM-DD".
 */
export function parseObservationTable(html: string, today: string): NwsRow[] {
  const $ = cheerio.load(html);
  const table = $('table').first();
  if (!table.length) {
    throw new ProviderResponseError('NWS page has no observation table', { payload: html });
  }

  const rows: NwsRow[] = [];

  table.find('tr').each((_, tr) => {
    const cells = $(tr)
      .find('td')
      .map((__, td) => $(td).text().trim())
      .get();

    if (!cells.length) return;
    // Footer rows repeat the header labels
    if (cells[0].includes('Date')) return;

    if (cells.length < REQUIRED_CELLS) {
      throw new ProviderResponseError(
        `NWS table row has ${cells.length} cell(s), expected column layout not found`,
        { payload: cells }
      );
    }

    const [dayCell, timeCell, wind, weather, airTemp, sixHourMax] = NWS_COLUMNS.map(
      (index) => cells[index]
    );

    const day = Number.parseInt(dayCell, 10);
    if (!Number.isInteger(day) || day < 1 || day > 31) {
      throw new ProviderResponseError(`NWS table has an unexpected day cell: ${dayCell}`, {
        payload: cells,
      });
    }

    rows.push({
      localDateTime: `${resolveDay(day, today)}T${timeCell}`,
      wind,
      weather,
      airTempF: parseTemperature(airTemp),
      sixHourMaxF: parseTemperature(sixHourMax),
      cells,
    });
  });

  if (!rows.length) {
    throw new ProviderResponseError('NWS table has no data rows, expected column layout not found', {
      payload: html,
    });
  }
  return rows;
}

export class NwsClient implements ObservationSource {
  readonly provider = 'nws' as const;

  private readonly http: HttpGetter;

  constructor(private readonly options: NwsClientOptions = {}) {
    this.http =
      options.http ??
      createHttpClient(options.timeouts, {
        'User-Agent': options.userAgent ?? 'weather-staging (ingest-service)',
      });
  }

  async fetchCurrent(location: LocationEntry, signal?: AbortSignal): Promise<NwsCurrentPayload> {
    const fetchedAt = this.options.now ? this.options.now() : new Date();
    const url = `${this.options.baseUrl ?? BASE_URL}/${location.stationId}.html`;

    const html = await getText(this.http, url, {}, {
      retry: this.options.retry,
      signal,
      sleep: this.options.sleep,
    });

    const rows = parseObservationTable(html, calendarDate(fetchedAt, location.timezone));
    logger.debug({ location: location.name, rows: rows.length }, 'NWS observations scraped');

    return {
      provider: 'nws',
      kind: 'current',
      location: location.name,
      stationId: location.stationId,
      fetchedAt,
      rows,
    };
  }
}
