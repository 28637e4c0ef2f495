import type { TrendClass, VolatilityClass } from '@fxlake/core';

/**
 * Ordered boundary table: the first row whose bound admits the value wins
 */
interface Boundary<L extends string> {
  label: L;
  admits: (value: number) => boolean;
}

function classify<L extends string>(table: readonly Boundary<L>[], fallback: L, value: number): L {
  for (const boundary of table) {
    if (boundary.admits(value)) return boundary.label;
  }
  return fallback;
}

// Average 7-day volatility: [0,1) Low, [1,2) Moderate, [2,5) High, [5,inf) VeryHigh
const VOLATILITY_BOUNDARIES: readonly Boundary<VolatilityClass>[] = [
  { label: 'Low', admits: (value) => value < 1 },
  { label: 'Moderate', admits: (value) => value < 2 },
  { label: 'High', admits: (value) => value < 5 },
];

// Latest daily change in percent, from the top down
const TREND_BOUNDARIES: readonly Boundary<TrendClass>[] = [
  { label: 'StrongUp', admits: (value) => value > 2 },
  { label: 'Up', admits: (value) => value > 0.5 },
  { label: 'Stable', admits: (value) => value >= -0.5 },
  { label: 'Down', admits: (value) => value >= -2 },
];

export function classifyVolatility(avgVolatility7d: number): VolatilityClass {
  return classify(VOLATILITY_BOUNDARIES, 'VeryHigh', avgVolatility7d);
}

export function classifyTrend(lastDailyChange: number): TrendClass {
  return classify(TREND_BOUNDARIES, 'StrongDown', lastDailyChange);
}
