import { ProviderResponseError } from '@/errors';
import { LocationEntry } from '@/interfaces/location';
import { NwsClient, parseObservationTable, resolveDay } from '@/modules/nwsClient';

jest.mock('@/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const HEADER = `
  <tr><th>Date</th><th>Time (cst)</th><th>Wind (mph)</th><th>Vis. (mi.)</th><th>Weather</th>
      <th>Sky Cond.</th><th>Air</th><th>Dwpt</th><th>6 hr Max</th><th>6 hr Min</th></tr>`;

const row = (cells: string[]) => `<tr>${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`;

function page(rows: string[]): string {
  return `<html><body><table>${HEADER}${rows.join('')}${row([
    'Date',
    'Time (cst)',
    'Wind (mph)',
    'Vis.',
    'Weather',
    'Sky Cond.',
    'Air',
    'Dwpt',
    'Max.',
    'Min.',
  ])}</table></body></html>`;
}

const chicago: LocationEntry = {
  name: 'Chicago',
  latitude: 41.7868,
  longitude: -87.7522,
  seriesId: 'KXHIGHCHI',
  stationId: 'KMDW',
  timezone: 'America/Chicago',
  weatherId: 'weather-id',
};

describe('parseObservationTable (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - positional columns are picked out of each data row
   * - header and footer rows are skipped
   * - the day of month is placed in the current month
   */
  it('extracts observation rows', () => {
    const html = page([
      row(['14', '09:53', 'N 10', '10.00', 'Overcast', 'OVC020', '23', '12', '', '']),
      row(['14', '08:53', 'Calm', '10.00', 'Fair', 'CLR', 'NA', '11', '30', '20']),
    ]);

    expect(parseObservationTable(html, '2025-01-14')).toEqual([
      {
        localDateTime: '2025-01-14T09:53',
        wind: 'N 10',
        weather: 'Overcast',
        airTempF: 23,
        sixHourMaxF: null,
        cells: ['14', '09:53', 'N 10', '10.00', 'Overcast', 'OVC020', '23', '12', '', ''],
      },
      {
        localDateTime: '2025-01-14T08:53',
        wind: 'Calm',
        weather: 'Fair',
        airTempF: null,
        sixHourMaxF: 30,
        cells: ['14', '08:53', 'Calm', '10.00', 'Fair', 'CLR', 'NA', '11', '30', '20'],
      },
    ]);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - a short data row means the layout changed
   * - a table without data rows is rejected
   */
  it('rejects an unexpected layout', () => {
    expect(() => parseObservationTable(page([row(['14', '09:53', 'N 10'])]), '2025-01-14')).toThrow(
      ProviderResponseError
    );
    expect(() => parseObservationTable(page([]), '2025-01-14')).toThrow(
      'NWS table has no data rows, expected column layout not found'
    );
    expect(() => parseObservationTable('<p>maintenance</p>', '2025-01-14')).toThrow(
      'NWS page has no observation table'
    );
  });
});

describe('resolveDay (unit)', () => {
  it('rolls days after today back into the previous month', () => {
    expect(resolveDay(3, '2025-03-03')).toBe('2025-03-03');
    expect(resolveDay(28, '2025-03-01')).toBe('2025-02-28');
    expect(resolveDay(31, '2025-01-01')).toBe('2024-12-31');
  });
});

describe('NwsClient (unit)', () => {
  const mockGet = jest.fn();

  beforeEach(() => {
    mockGet.mockReset();
  });

  /**
   * Purpose:
   * Fetches the station page as text and dates rows in the station's zone.
   */
  it('scrapes the station observation history', async () => {
    mockGet.mockResolvedValueOnce({
      status: 200,
      data: page([row(['14', '21:53', 'S 5', '10.00', 'Fair', 'CLR', '19', '8', '', ''])]),
    });

    const client = new NwsClient({
      http: { get: mockGet },
      // Already the 15th in UTC, still the 14th in Chicago
      now: () => new Date('2025-01-15T04:00:00Z'),
    });
    const payload = await client.fetchCurrent(chicago);

    expect(mockGet).toHaveBeenCalledWith('https://forecast.weather.gov/data/obhistory/KMDW.html', {
      params: {},
      responseType: 'text',
      signal: undefined,
    });
    expect(payload).toMatchObject({
      provider: 'nws',
      kind: 'current',
      location: 'Chicago',
      stationId: 'KMDW',
    });
    expect(payload.rows.map((r) => r.localDateTime)).toEqual(['2025-01-14T21:53']);
  });
});
