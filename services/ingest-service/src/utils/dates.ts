import { ValidationError } from '../errors';

export type DateFormat = 'YYYY-MM-DD' | 'YYYYMMDD' | 'YYMMMDD';

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

const DAY_MS = 86_400_000;

const PATTERNS: Record<DateFormat, RegExp> = {
  'YYYY-MM-DD': /^(\d{4})-(\d{2})-(\d{2})$/,
  YYYYMMDD: /^(\d{4})(\d{2})(\d{2})$/,
  YYMMMDD: /^(\d{2})([A-Za-z]{3})(\d{2})$/,
};

function isDateFormat(value: string): value is DateFormat {
  return value in PATTERNS;
}

function assertFormat(format: string): DateFormat {
  if (!isDateFormat(format)) {
    throw new ValidationError(`Unsupported date format: ${format}`);
  }
  return format;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** Parse a date string to UTC midnight (ms). */
export function parseDate(text: string, format: string): number {
  const fmt = assertFormat(format);
  const match = PATTERNS[fmt].exec(text.trim());
  if (!match) {
    throw new ValidationError(`Could not parse ${JSON.stringify(text)} as ${fmt}`);
  }

  let year: number;
  let month: number;
  const day = Number(match[3]);

  if (fmt === 'YYMMMDD') {
    const yy = Number(match[1]);
    // Two-digit years pivot at 69 (69 -> 1969, 68 -> 2068)
    year = yy < 69 ? 2000 + yy : 1900 + yy;
    month = MONTHS.indexOf(match[2].toUpperCase()) + 1;
    if (month === 0) {
      throw new ValidationError(`Unknown month in ${JSON.stringify(text)}`);
    }
  } else {
    year = Number(match[1]);
    month = Number(match[2]);
  }

  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    throw new ValidationError(`Invalid calendar date ${JSON.stringify(text)}`);
  }
  return ms;
}

export function formatDate(ms: number, format: string): string {
  const fmt = assertFormat(format);
  const d = new Date(ms);
  const year = d.getUTCFullYear();
  const month = d.getUTCMonth() + 1;
  const day = d.getUTCDate();

  switch (fmt) {
    case 'YYYY-MM-DD':
      return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
    case 'YYYYMMDD':
      return `${pad(year, 4)}${pad(month)}${pad(day)}`;
    case 'YYMMMDD':
      return `${pad(year % 100)}${MONTHS[month - 1]}${pad(day)}`;
  }
}

/**
 * Every date from `start` to `end` inclusive, rendered in `startFormat`.
 * `end` defaults to today's local date; a start after the end yields [].
 */
export function enumerateDateRange(
  start: string,
  startFormat: string,
  end?: string,
  endFormat?: string,
  today: Date = new Date()
): string[] {
  const from = parseDate(start, startFormat);
  const to =
    end === undefined
      ? Date.UTC(today.getFullYear(), today.getMonth(), today.getDate())
      : parseDate(end, endFormat ?? startFormat);

  if (from > to) return [];

  const days = Math.round((to - from) / DAY_MS) + 1;
  return Array.from({ length: days }, (_, i) => formatDate(from + i * DAY_MS, startFormat));
}

/** Every `prefix + date + suffix` permutation, prefixes outermost. */
export function buildFileStemCandidates({
  prefixes,
  dates,
  suffixes,
}: {
  prefixes: Iterable<string>;
  dates: Iterable<string>;
  suffixes?: Iterable<string>;
}): string[] {
  const prefixList = [...prefixes];
  const dateList = [...dates];
  const suffixList = suffixes ? [...suffixes] : [];

  if (prefixList.length === 0) {
    throw new ValidationError('prefixes must contain at least one prefix');
  }
  if (dateList.length === 0) return [];

  const endings = suffixList.length ? suffixList : [''];

  return prefixList.flatMap((prefix) =>
    dateList.flatMap((date) => endings.map((suffix) => `${prefix}${date}${suffix}`))
  );
}
