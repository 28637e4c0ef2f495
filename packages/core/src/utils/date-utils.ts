import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Calendar date in YYYY-MM-DD form. All calendar arithmetic is done in UTC.
 */
export type IsoDate = string;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function parseIsoDate(value: string): Result<IsoDate, Error> {
  if (!isIsoDate(value)) {
    return err(new Error(`Invalid date '${value}': expected YYYY-MM-DD`));
  }
  return ok(value);
}

/** UTC calendar date of a timestamp */
export function toIsoDate(timestamp: Date): IsoDate {
  return timestamp.toISOString().slice(0, 10);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  const base = new Date(`${date}T00:00:00.000Z`);
  return toIsoDate(new Date(base.getTime() + days * DAY_MS));
}

/**
 * Inclusive list of dates from start to end. Empty when start is after end.
 */
export function isoDateRange(start: IsoDate, end: IsoDate): IsoDate[] {
  const dates: IsoDate[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/** Whole days from start to end (negative when end precedes start) */
export function daysBetween(start: IsoDate, end: IsoDate): number {
  const startMs = new Date(`${start}T00:00:00.000Z`).getTime();
  const endMs = new Date(`${end}T00:00:00.000Z`).getTime();
  return Math.round((endMs - startMs) / DAY_MS);
}

export function isValidDate(value: Date): boolean {
  return !isNaN(value.getTime());
}
