import { DateWindow } from '../interfaces/weatherHistory';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 86_400_000;

/**
 * Parses a strict `YYYY-MM-DD` calendar date as a UTC day number
 * (days since 1970-01-01). Returns null for malformed or impossible dates.
 */
export function toDayNumber(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);

  const ms = Date.UTC(year, month - 1, day);
  const date = new Date(ms);

  // Date.UTC rolls 2023-02-30 over into March
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return ms / MS_PER_DAY;
}

export function isIsoDate(value: string): boolean {
  return toDayNumber(value) !== null;
}

export function fromDayNumber(dayNumber: number): string {
  return new Date(dayNumber * MS_PER_DAY).toISOString().slice(0, 10);
}

function requireDayNumber(value: string): number {
  const dayNumber = toDayNumber(value);
  if (dayNumber === null) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  return dayNumber;
}

export function addDays(value: string, days: number): string {
  return fromDayNumber(requireDayNumber(value) + days);
}

/** Inclusive day count; 0 when end precedes start. */
export function countDays(start: string, end: string): number {
  return Math.max(requireDayNumber(end) - requireDayNumber(start) + 1, 0);
}

export function listDates(start: string, end: string): string[] {
  const first = requireDayNumber(start);
  return Array.from({ length: countDays(start, end) }, (_, i) => fromDayNumber(first + i));
}

export function endOfMonth(value: string): string {
  const dayNumber = requireDayNumber(value);
  const date = new Date(dayNumber * MS_PER_DAY);
  const last = Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0);
  return fromDayNumber(last / MS_PER_DAY);
}

/**
 * Partitions the inclusive range into consecutive windows that never cross
 * a calendar month and never span more than `maxWindowDays` days.
 */
export function splitIntoWindows(start: string, end: string, maxWindowDays: number): DateWindow[] {
  if (!Number.isInteger(maxWindowDays) || maxWindowDays < 1) {
    throw new RangeError(`maxWindowDays must be a positive integer, got ${maxWindowDays}`);
  }

  const last = requireDayNumber(end);
  const windows: DateWindow[] = [];
  let cursor = requireDayNumber(start);

  while (cursor <= last) {
    const windowStart = fromDayNumber(cursor);
    const monthEnd = requireDayNumber(endOfMonth(windowStart));
    const windowEnd = Math.min(monthEnd, cursor + maxWindowDays - 1, last);

    windows.push({ start: windowStart, end: fromDayNumber(windowEnd) });
    cursor = windowEnd + 1;
  }

  return windows;
}
