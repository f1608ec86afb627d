import { ValidationError } from '../errors';
import { SourceTimestamp } from '../interfaces/records';

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const WALL_CLOCK_RE =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?$/;
const ZONE_SUFFIX_RE = /(Z|[+-]\d{2}:?\d{2})$/i;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    try {
      formatter = new Intl.DateTimeFormat('en-US', {
        timeZone,
        hourCycle: 'h23',
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
      });
    } catch (err) {
      throw new ValidationError(`Unknown time zone: ${timeZone}`, { cause: err });
    }
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

function wallClockIn(date: Date, timeZone: string): WallClock {
  const values: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(date)) {
    if (part.type !== 'literal') {
      values[part.type] = Number(part.value);
    }
  }
  return {
    year: values.year,
    month: values.month,
    day: values.day,
    hour: values.hour,
    minute: values.minute,
    second: values.second,
    millisecond: date.getUTCMilliseconds(),
  };
}

function wallClockMs(wall: WallClock): number {
  return Date.UTC(
    wall.year,
    wall.month - 1,
    wall.day,
    wall.hour,
    wall.minute,
    wall.second,
    wall.millisecond
  );
}

/**
 * Offset of `timeZone` from UTC at the given instant, in minutes
 * (America/Chicago in January is -360).
 */
export function timeZoneOffsetMinutes(date: Date, timeZone: string): number {
  return Math.round((wallClockMs(wallClockIn(date, timeZone)) - date.getTime()) / 60_000);
}

function parseWallClock(text: string): WallClock {
  const match = WALL_CLOCK_RE.exec(text.trim());
  if (!match) {
    throw new ValidationError(`Unparseable timestamp: ${text}`);
  }
  const [, y, mo, d, h, mi, s, frac] = match;
  const wall: WallClock = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h),
    minute: Number(mi),
    second: s ? Number(s) : 0,
    millisecond: frac ? Number(frac.slice(0, 3).padEnd(3, '0')) : 0,
  };

  // Reject rollovers such as Feb 30 or 25:00
  const check = new Date(wallClockMs(wall));
  if (
    check.getUTCFullYear() !== wall.year ||
    check.getUTCMonth() !== wall.month - 1 ||
    check.getUTCDate() !== wall.day ||
    check.getUTCHours() !== wall.hour ||
    check.getUTCMinutes() !== wall.minute
  ) {
    throw new ValidationError(`Invalid calendar timestamp: ${text}`);
  }
  return wall;
}

/** Minutes east of UTC named by a zone suffix, or null for naive text. */
export function parseOffsetMinutes(text: string): number | null {
  const match = ZONE_SUFFIX_RE.exec(text.trim());
  if (!match) return null;

  const suffix = match[1].toUpperCase();
  if (suffix === 'Z') return 0;

  const sign = suffix.startsWith('-') ? -1 : 1;
  const digits = suffix.slice(1).replace(':', '');
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/** Interpret a naive wall clock as local time in `timeZone`. */
export function zonedWallClockToUtc(text: string, timeZone: string): Date {
  const guess = wallClockMs(parseWallClock(text));

  // One correction pass settles every instant outside a DST gap.
  const firstOffset = timeZoneOffsetMinutes(new Date(guess), timeZone);
  let instant = guess - firstOffset * 60_000;
  const secondOffset = timeZoneOffsetMinutes(new Date(instant), timeZone);
  if (secondOffset !== firstOffset) {
    instant = guess - secondOffset * 60_000;
  }
  return new Date(instant);
}

/**
 * Resolve a provider timestamp to a UTC instant.
 *
 * Zone-aware text names its own instant. Naive text uses the provider-declared
 * offset when there is one, otherwise the location's time zone.
 */
export function toUtc(source: SourceTimestamp, timeZone?: string): Date {
  if (source.kind === 'epoch') {
    if (!Number.isFinite(source.seconds)) {
      throw new ValidationError(`Invalid epoch timestamp: ${source.seconds}`);
    }
    return new Date(source.seconds * 1000);
  }

  const text = source.value.trim();
  const offset = parseOffsetMinutes(text);

  if (offset !== null) {
    const wall = parseWallClock(text.replace(ZONE_SUFFIX_RE, ''));
    return new Date(wallClockMs(wall) - offset * 60_000);
  }

  if (source.offsetSeconds !== undefined) {
    return new Date(wallClockMs(parseWallClock(text)) - source.offsetSeconds * 1000);
  }

  if (!timeZone) {
    throw new ValidationError(`Naive timestamp without a time zone: ${text}`);
  }
  return zonedWallClockToUtc(text, timeZone);
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/** Render an instant as ISO text at a fixed offset ("2025-01-14T09:53:00-06:00"). */
export function toOffsetIso(date: Date, offsetMinutes: number): string {
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);
  const ms = shifted.getUTCMilliseconds();

  const sign = offsetMinutes < 0 ? '-' : '+';
  const abs = Math.abs(offsetMinutes);

  return (
    `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}` +
    `T${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())}` +
    (ms ? `.${pad(ms, 3)}` : '') +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

/** Render an instant as ISO text in an IANA zone. */
export function toZonedIso(date: Date, timeZone: string): string {
  return toOffsetIso(date, timeZoneOffsetMinutes(date, timeZone));
}

/** Calendar date ("YYYY-MM-DD") of an instant in `timeZone`. */
export function calendarDate(date: Date, timeZone: string): string {
  const wall = wallClockIn(date, timeZone);
  return `${pad(wall.year, 4)}-${pad(wall.month)}-${pad(wall.day)}`;
}

export function hoursBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / 3_600_000);
}
