import { ValidationError } from '@/errors';
import {
  calendarDate,
  hoursBetween,
  isValidTimeZone,
  parseOffsetMinutes,
  timeZoneOffsetMinutes,
  toOffsetIso,
  toUtc,
  toZonedIso,
} from '@/utils/time';

describe('toUtc (unit)', () => {
  const expected = '2025-01-14T15:53:00.000Z';

  /**
   * Purpose:
   * Every source form that names the same instant resolves to it.
   */
  it('resolves epoch, zone-aware and offset-declared timestamps', () => {
    expect(toUtc({ kind: 'epoch', seconds: 1736869980 }).toISOString()).toBe(expected);
    expect(toUtc({ kind: 'text', value: '2025-01-14T09:53:00-06:00' }).toISOString()).toBe(expected);
    expect(toUtc({ kind: 'text', value: '2025-01-14T15:53:00Z' }).toISOString()).toBe(expected);
    expect(
      toUtc({ kind: 'text', value: '2025-01-14T09:53', offsetSeconds: -21600 }).toISOString()
    ).toBe(expected);
  });

  /**
   * Purpose:
   * Naive wall clocks take the location's zone, including its DST rules.
   */
  it('interprets naive text in the location time zone', () => {
    expect(toUtc({ kind: 'text', value: '2025-01-14T09:53' }, 'America/Chicago').toISOString()).toBe(
      expected
    );
    // Central Daylight Time, UTC-5
    expect(toUtc({ kind: 'text', value: '2025-07-01T09:00' }, 'America/Chicago').toISOString()).toBe(
      '2025-07-01T14:00:00.000Z'
    );
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - unparseable text and impossible dates are rejected
   * - naive text needs a zone
   */
  it('rejects timestamps it cannot resolve', () => {
    expect(() => toUtc({ kind: 'text', value: 'yesterday' }, 'UTC')).toThrow(ValidationError);
    expect(() => toUtc({ kind: 'text', value: '2025-02-30T10:00' }, 'UTC')).toThrow(ValidationError);
    expect(() => toUtc({ kind: 'text', value: '2025-01-14T09:53' })).toThrow(ValidationError);
    expect(() => toUtc({ kind: 'epoch', seconds: Number.NaN })).toThrow(ValidationError);
  });
});

describe('offset rendering (unit)', () => {
  /**
   * Purpose:
   * Zone-aware text survives a trip through UTC and back.
   */
  it.each(['2025-11-03T22:26:40-06:00', '2025-07-01T05:30:00+05:30', '2025-01-14T15:53:00+00:00'])(
    'round-trips %s',
    (text) => {
      const offset = parseOffsetMinutes(text);
      expect(offset).not.toBeNull();
      expect(toOffsetIso(toUtc({ kind: 'text', value: text }), offset ?? 0)).toBe(text);
    }
  );

  /**
   * Purpose:
   * Rendering in an IANA zone picks the offset in force at that instant.
   */
  it('renders an instant in a named zone', () => {
    const instant = new Date('2025-11-04T04:26:40Z');

    expect(toZonedIso(instant, 'America/Chicago')).toBe('2025-11-03T22:26:40-06:00');
    expect(toZonedIso(instant, 'UTC')).toBe('2025-11-04T04:26:40+00:00');
  });

  it('parses zone suffixes', () => {
    expect(parseOffsetMinutes('2025-01-14T09:53:00Z')).toBe(0);
    expect(parseOffsetMinutes('2025-01-14T09:53:00-0600')).toBe(-360);
    expect(parseOffsetMinutes('2025-01-14T09:53')).toBeNull();
  });
});

describe('zone helpers (unit)', () => {
  it('computes calendar dates and offsets in a zone', () => {
    const lateEvening = new Date('2025-01-15T03:00:00Z');

    expect(calendarDate(lateEvening, 'America/Chicago')).toBe('2025-01-14');
    expect(calendarDate(lateEvening, 'UTC')).toBe('2025-01-15');
    expect(timeZoneOffsetMinutes(lateEvening, 'America/Chicago')).toBe(-360);
  });

  it('validates zone names', () => {
    expect(isValidTimeZone('America/Denver')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });

  it('rounds lead time to whole hours', () => {
    expect(
      hoursBetween(new Date('2025-01-14T00:00:00Z'), new Date('2025-01-14T05:40:00Z'))
    ).toBe(6);
  });
});
