import { max, mean, min, sampleStd, type CurrencySummary, type TrendPoint } from '@fxlake/core';

import { compareStrings, groupBy } from './analytics-utils.js';
import { classifyTrend, classifyVolatility } from './classification.js';

function summarizeSeries(series: readonly TrendPoint[]): CurrencySummary | undefined {
  const current = series[series.length - 1];
  const first = series[0];
  if (!current || !first) return undefined;

  const means = series.map((point) => point.rateMean);
  const dailyChanges = series.map((point) => point.dailyChangePct);
  const avgVolatility7d = mean(series.map((point) => point.volatility7d));

  return {
    currency: current.currency,
    currentRate: current.rateMean,
    lastDailyChange: current.dailyChangePct,
    totalChangePct: current.cumulativeChangePct,
    movingAvg7d: current.movingAvg7d,
    volatility7d: current.volatility7d,
    relativePositionPct: current.relativePositionPct,
    lastUpdate: current.lastUpdate,
    historicalMin: min(means),
    historicalMax: max(means),
    historicalAvg: mean(means),
    avgVolatility7d,
    avgDailyVolatility: sampleStd(dailyChanges),
    maxDailyDrop: min(dailyChanges),
    maxDailyGain: max(dailyChanges),
    firstDate: first.date,
    lastDate: current.date,
    totalObservations: series.length,
    volatilityClass: classifyVolatility(avgVolatility7d),
    trendClass: classifyTrend(current.dailyChangePct),
  };
}

/**
 * One row per currency: the latest trend point joined with whole-series statistics.
 *
 * Rows are ordered by totalObservations (desc), then avgVolatility7d (asc), then
 * currency, so well-observed and stable currencies come first.
 */
export function summarizeCurrencies(trends: readonly TrendPoint[]): CurrencySummary[] {
  const summaries: CurrencySummary[] = [];
  for (const series of groupBy(trends, (point) => point.currency).values()) {
    const ordered = [...series].sort((a, b) => compareStrings(a.date, b.date));
    const summary = summarizeSeries(ordered);
    if (summary) summaries.push(summary);
  }

  return summaries.sort(
    (a, b) =>
      b.totalObservations - a.totalObservations ||
      a.avgVolatility7d - b.avgVolatility7d ||
      compareStrings(a.currency, b.currency)
  );
}
