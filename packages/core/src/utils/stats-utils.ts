/**
 * Descriptive statistics over plain number arrays.
 *
 * Standard deviation is the sample estimator (n - 1 denominator) everywhere in the
 * pipeline; a single value has zero spread rather than an undefined one.
 */

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

/** Arithmetic mean; 0 for an empty array */
export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

/** Sample standard deviation (ddof = 1); 0 when fewer than two values */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  let squares = 0;
  for (const value of values) {
    squares += (value - avg) ** 2;
  }
  return Math.sqrt(squares / (values.length - 1));
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid] ?? 0;
  return ((sorted[mid - 1] ?? 0) + (sorted[mid] ?? 0)) / 2;
}

/** Smallest value; 0 for an empty array */
export function min(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let result = Infinity;
  for (const value of values) if (value < result) result = value;
  return result;
}

/** Largest value; 0 for an empty array */
export function max(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let result = -Infinity;
  for (const value of values) if (value > result) result = value;
  return result;
}

/**
 * Percentage change from `from` to `to`. A zero base has no meaningful change and yields 0.
 */
export function percentChange(from: number, to: number): number {
  if (from === 0) return 0;
  return (to / from - 1) * 100;
}

/**
 * The trailing window of at most `size` values ending at `index` (inclusive).
 * Shrinks near the start of the series; never looks ahead.
 */
export function trailingWindow<T>(values: readonly T[], index: number, size: number): T[] {
  return values.slice(Math.max(0, index - size + 1), index + 1);
}
