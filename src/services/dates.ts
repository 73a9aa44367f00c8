/**
 * Front matter date parsing
 */

import type { FrontMatterValue } from '../models.js';

// 2024-01-02, 2024/1/2 10:30, 2024-01-02T10:30:00.123456+0800, ...Z
const DATE_TIME_RE =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?$/i;
const OFFSET_RE = /^([+-])(\d{2}):?(\d{2})?$/;

interface DateParts {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function isValidTime(parts: DateParts): boolean {
  return parts.hour < 24 && parts.minute < 60 && parts.second < 60;
}

function matchesParts(date: Date, parts: DateParts, utc: boolean): boolean {
  const year = utc ? date.getUTCFullYear() : date.getFullYear();
  const month = utc ? date.getUTCMonth() : date.getMonth();
  const day = utc ? date.getUTCDate() : date.getDate();
  return year === parts.year && month === parts.month - 1 && day === parts.day;
}

/**
 * Offset in minutes east of UTC, or null for `Z`-less naive values
 */
function parseOffset(raw: string | undefined): number | null {
  if (!raw) return null;
  if (raw.toUpperCase() === 'Z') return 0;

  const match = OFFSET_RE.exec(raw);
  if (!match) return null;

  const sign = match[1] === '-' ? -1 : 1;
  const hours = Number(match[2]);
  const minutes = Number(match[3] ?? '0');
  if (hours > 23 || minutes > 59) return Number.NaN;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse a timestamp string. Naive values are read in the local timezone;
 * fractional seconds beyond microseconds are dropped.
 */
export function parseDateString(value: string): Date | null {
  const match = DATE_TIME_RE.exec(value.trim());
  if (!match) return null;

  const fraction = (match[7] ?? '').slice(0, 6);
  const parts: DateParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? '0'),
    minute: Number(match[5] ?? '0'),
    second: Number(match[6] ?? '0'),
    millisecond: Number(fraction.padEnd(3, '0').slice(0, 3)),
  };
  if (!isValidTime(parts)) return null;

  const offset = parseOffset(match[8]);
  if (offset !== null && Number.isNaN(offset)) return null;

  if (offset === null) {
    const local = new Date(
      parts.year,
      parts.month - 1,
      parts.day,
      parts.hour,
      parts.minute,
      parts.second,
      parts.millisecond
    );
    return matchesParts(local, parts, false) ? local : null;
  }

  const utc = new Date(
    Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second, parts.millisecond)
  );
  if (!matchesParts(utc, parts, true)) return null;
  return new Date(utc.getTime() - offset * 60_000);
}

/**
 * Resolve a front matter date. Numbers are Unix seconds. Anything
 * unparsable gives the fallback, or the current time without one.
 */
export function parsePostDate(value: FrontMatterValue | undefined, fallback?: Date): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    const date = new Date(value * 1000);
    // Epochs past the Date range give an Invalid Date
    if (!Number.isNaN(date.getTime())) return date;
  }

  if (typeof value === 'string' && value.trim()) {
    const parsed = parseDateString(value);
    if (parsed) return parsed;
  }

  return fallback ?? new Date();
}

export function toUnixTimestamp(date: Date): number {
  return Math.trunc(date.getTime() / 1000);
}
