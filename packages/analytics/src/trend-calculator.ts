import {
  max,
  mean,
  min,
  percentChange,
  sampleStd,
  trailingWindow,
  type DailyMetric,
  type TrendPoint,
} from '@fxlake/core';

import { compareStrings, groupBy } from './analytics-utils.js';

export const MOVING_AVERAGE_WINDOW = 7;
export const VOLATILITY_WINDOW = 7;
export const EXTREMES_WINDOW = 30;

/** Relative position reported when the 30-point window has no range */
const NEUTRAL_POSITION = 50;

/**
 * Rolling metrics for one currency's series, already sorted by date.
 * Every window is trailing and inclusive of the current point.
 */
export function calculateCurrencyTrend(series: readonly DailyMetric[]): TrendPoint[] {
  const means = series.map((metric) => metric.rateMean);
  const firstMean = means[0] ?? 0;
  const dailyChanges = means.map((value, i) => (i === 0 ? 0 : percentChange(means[i - 1] ?? 0, value)));

  return series.map((metric, i) => {
    const extremesWindow = trailingWindow(means, i, EXTREMES_WINDOW);
    const max30d = max(extremesWindow);
    const min30d = min(extremesWindow);
    const range30d = max30d - min30d;

    return {
      ...metric,
      dailyChangePct: dailyChanges[i] ?? 0,
      cumulativeChangePct: percentChange(firstMean, metric.rateMean),
      movingAvg7d: mean(trailingWindow(means, i, MOVING_AVERAGE_WINDOW)),
      volatility7d: sampleStd(trailingWindow(dailyChanges, i, VOLATILITY_WINDOW)),
      max30d,
      min30d,
      relativePositionPct: range30d > 0 ? ((metric.rateMean - min30d) / range30d) * 100 : NEUTRAL_POSITION,
    };
  });
}

/**
 * Split metrics per currency, compute each currency's trend independently and
 * concatenate the results in currency order (dates ascending within a currency).
 */
export function calculateTrends(metrics: readonly DailyMetric[]): TrendPoint[] {
  const byCurrency = groupBy(metrics, (metric) => metric.currency);
  const currencies = [...byCurrency.keys()].sort(compareStrings);

  return currencies.flatMap((currency) => {
    const series = [...(byCurrency.get(currency) ?? [])].sort((a, b) => compareStrings(a.date, b.date));
    return calculateCurrencyTrend(series);
  });
}
