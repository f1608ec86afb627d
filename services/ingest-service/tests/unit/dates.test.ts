import { ValidationError } from '@/errors';
import { buildFileStemCandidates, enumerateDateRange, formatDate, parseDate } from '@/utils/dates';

describe('enumerateDateRange (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - both ends are included
   * - dates are rendered in the start format
   */
  it('lists every date between two bounds', () => {
    expect(enumerateDateRange('2025-01-01', 'YYYY-MM-DD', '2025-01-03')).toEqual([
      '2025-01-01',
      '2025-01-02',
      '2025-01-03',
    ]);
  });

  it('returns an empty list when start is after end', () => {
    expect(enumerateDateRange('2025-01-05', 'YYYY-MM-DD', '2025-01-03')).toEqual([]);
  });

  /**
   * Purpose:
   * Market-style dates parse in any case and render upper-cased.
   */
  it('handles the YYMMMDD format across a month boundary', () => {
    expect(enumerateDateRange('25sep29', 'YYMMMDD', '25OCT01')).toEqual([
      '25SEP29',
      '25SEP30',
      '25OCT01',
    ]);
  });

  it('accepts an end date in a different format', () => {
    expect(enumerateDateRange('20250228', 'YYYYMMDD', '2025-03-01', 'YYYY-MM-DD')).toEqual([
      '20250228',
      '20250301',
    ]);
  });

  it('defaults the end to today', () => {
    const today = new Date(2025, 2, 3, 12, 0, 0);
    expect(enumerateDateRange('2025-03-01', 'YYYY-MM-DD', undefined, undefined, today)).toEqual([
      '2025-03-01',
      '2025-03-02',
      '2025-03-03',
    ]);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - unknown formats and unparsable dates are validation errors
   */
  it('rejects unsupported formats and bad dates', () => {
    expect(() => enumerateDateRange('2025-01-01', 'DD/MM/YYYY', '2025-01-02')).toThrow(
      ValidationError
    );
    expect(() => enumerateDateRange('2025-13-01', 'YYYY-MM-DD', '2025-12-31')).toThrow(
      ValidationError
    );
    expect(() => parseDate('25XYZ01', 'YYMMMDD')).toThrow(ValidationError);
  });

  it('formats a parsed date back to its source text', () => {
    expect(formatDate(parseDate('99JAN05', 'YYMMMDD'), 'YYYY-MM-DD')).toBe('1999-01-05');
  });
});

describe('buildFileStemCandidates (unit)', () => {
  it('combines prefixes, dates and suffixes with prefixes outermost', () => {
    expect(
      buildFileStemCandidates({
        prefixes: ['KXHIGHAUS-', 'KXHIGHCHI-'],
        dates: ['25SEP29', '25SEP30'],
        suffixes: ['-T80'],
      })
    ).toEqual([
      'KXHIGHAUS-25SEP29-T80',
      'KXHIGHAUS-25SEP30-T80',
      'KXHIGHCHI-25SEP29-T80',
      'KXHIGHCHI-25SEP30-T80',
    ]);
  });

  it('uses bare stems when no suffixes are given', () => {
    expect(buildFileStemCandidates({ prefixes: ['obs_'], dates: ['20250101'] })).toEqual([
      'obs_20250101',
    ]);
  });

  it('rejects empty prefixes and short-circuits empty dates', () => {
    expect(() => buildFileStemCandidates({ prefixes: [], dates: ['20250101'] })).toThrow(
      ValidationError
    );
    expect(buildFileStemCandidates({ prefixes: ['obs_'], dates: [] })).toEqual([]);
  });
});
