import { createHash } from 'crypto';

/** "Los Angeles" -> "los_angeles" */
export function slugify(value: string): string {
  return value
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}

export function fahrenheitToCelsius(value: number): number {
  return ((value - 32) * 5) / 9;
}

/** Comma-separated list with blanks dropped. */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
