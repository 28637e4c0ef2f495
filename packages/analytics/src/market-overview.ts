import {
  daysBetween,
  EmptyBatchError,
  type CurrencySummary,
  type MajorCurrencyRow,
  type MarketOverview,
} from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';

import { compareStrings } from './analytics-utils.js';

export const MAJOR_CURRENCY_COUNT = 10;

/** |lastDailyChange| at or below this counts as stable */
const STABLE_CHANGE_PCT = 0.1;

/**
 * First row holding the extreme value of `valueOf`. Ties keep the earlier row,
 * so the summary's own ordering decides.
 */
function pickExtreme(
  summaries: readonly CurrencySummary[],
  valueOf: (summary: CurrencySummary) => number,
  isBetter: (candidate: number, best: number) => boolean
): { currency: string; value: number } {
  let best: CurrencySummary | undefined;
  for (const summary of summaries) {
    if (!best || isBetter(valueOf(summary), valueOf(best))) best = summary;
  }
  return best ? { currency: best.currency, value: valueOf(best) } : { currency: '', value: 0 };
}

export function toMajorCurrencyRow(summary: CurrencySummary): MajorCurrencyRow {
  return {
    currency: summary.currency,
    currentRate: summary.currentRate,
    lastDailyChange: summary.lastDailyChange,
    totalChangePct: summary.totalChangePct,
    volatilityClass: summary.volatilityClass,
    trendClass: summary.trendClass,
  };
}

/**
 * Reduce the summary table, in its existing order, to market-wide counts and extremes.
 *
 * A currency with a small positive or negative change is counted both as up/down
 * and as stable; the three sentiment counts need not add up to the total.
 */
export function buildMarketOverview(
  summaries: readonly CurrencySummary[],
  generatedAt: Date = new Date()
): Result<MarketOverview, EmptyBatchError> {
  if (summaries.length === 0) {
    return err(new EmptyBatchError('Cannot build a market overview without currency summaries'));
  }

  const start = summaries.map((summary) => summary.firstDate).sort(compareStrings)[0] ?? '';
  const end = summaries.map((summary) => summary.lastDate).sort(compareStrings)[summaries.length - 1] ?? '';
  const countWhere = (predicate: (summary: CurrencySummary) => boolean) => summaries.filter(predicate).length;

  const gainer = pickExtreme(summaries, (s) => s.totalChangePct, (a, b) => a > b);
  const loser = pickExtreme(summaries, (s) => s.totalChangePct, (a, b) => a < b);
  const mostVolatile = pickExtreme(summaries, (s) => s.avgVolatility7d, (a, b) => a > b);
  const mostStable = pickExtreme(summaries, (s) => s.avgVolatility7d, (a, b) => a < b);

  return ok({
    generatedAt: generatedAt.toISOString(),
    totalCurrencies: summaries.length,
    observationPeriod: {
      start,
      end,
      totalDays: daysBetween(start, end) + 1,
    },
    marketSentiment: {
      currenciesUp: countWhere((s) => s.lastDailyChange > 0),
      currenciesDown: countWhere((s) => s.lastDailyChange < 0),
      currenciesStable: countWhere((s) => Math.abs(s.lastDailyChange) <= STABLE_CHANGE_PCT),
    },
    volatilityDistribution: {
      low: countWhere((s) => s.volatilityClass === 'Low'),
      moderate: countWhere((s) => s.volatilityClass === 'Moderate'),
      high: countWhere((s) => s.volatilityClass === 'High'),
      veryHigh: countWhere((s) => s.volatilityClass === 'VeryHigh'),
    },
    topPerformers: {
      biggestGainer: { currency: gainer.currency, changePct: gainer.value },
      biggestLoser: { currency: loser.currency, changePct: loser.value },
      mostVolatile: { currency: mostVolatile.currency, volatility: mostVolatile.value },
      mostStable: { currency: mostStable.currency, volatility: mostStable.value },
    },
    majorCurrencies: summaries.slice(0, MAJOR_CURRENCY_COUNT).map(toMajorCurrencyRow),
  });
}
