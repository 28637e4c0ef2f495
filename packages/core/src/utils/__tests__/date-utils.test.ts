import { describe, expect, it } from 'vitest';

import { addDays, daysBetween, isIsoDate, isoDateRange, parseIsoDate, toIsoDate } from '../date-utils.js';

describe('date-utils', () => {
  it('accepts only real calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-1-05')).toBe(false);
    expect(isIsoDate('yesterday')).toBe(false);
  });

  it('wraps invalid input in an error result', () => {
    const result = parseIsoDate('2024-13-01');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe("Invalid date '2024-13-01': expected YYYY-MM-DD");
    }
  });

  it('takes the UTC calendar date of a timestamp', () => {
    expect(toIsoDate(new Date('2024-03-01T23:59:59.999Z'))).toBe('2024-03-01');
    expect(toIsoDate(new Date('2024-03-01T21:30:00-03:00'))).toBe('2024-03-02');
  });

  it('adds days across month and year boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2024-03-01', -6)).toBe('2024-02-24');
  });

  it('builds inclusive ranges', () => {
    expect(isoDateRange('2024-02-27', '2024-03-01')).toEqual(['2024-02-27', '2024-02-28', '2024-02-29', '2024-03-01']);
    expect(isoDateRange('2024-03-02', '2024-03-01')).toEqual([]);
  });

  it('counts days between dates', () => {
    expect(daysBetween('2024-02-27', '2024-03-01')).toBe(3);
    expect(daysBetween('2024-03-01', '2024-03-01')).toBe(0);
  });
});
