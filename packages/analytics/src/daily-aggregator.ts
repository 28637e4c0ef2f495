import { max, mean, min, sampleStd, type DailyMetric, type RateObservation } from '@fxlake/core';

import { compareStrings, groupBy } from './analytics-utils.js';

function toDailyMetric(group: readonly RateObservation[], date: string, currency: string): DailyMetric {
  const rates = group.map((observation) => observation.rate);
  const rateMean = mean(rates);
  const rateStd = sampleStd(rates);
  const rateMin = min(rates);
  const rateMax = max(rates);

  let lastUpdate = group[0]?.collectedAt ?? new Date(0);
  for (const observation of group) {
    if (observation.collectedAt.getTime() > lastUpdate.getTime()) lastUpdate = observation.collectedAt;
  }

  return {
    date,
    currency,
    rateMean,
    rateStd,
    rateMin,
    rateMax,
    observationCount: group.length,
    rateRange: rateMax - rateMin,
    coefficientOfVariation: rateMean === 0 ? 0 : rateStd / rateMean,
    lastUpdate,
  };
}

/**
 * One DailyMetric per (collectionDate, targetCurrency), ordered by date then currency.
 * Standard deviation is the sample estimator; a single observation has zero spread.
 */
export function aggregateDaily(observations: readonly RateObservation[]): DailyMetric[] {
  const groups = groupBy(observations, (observation) => `${observation.collectionDate}|${observation.targetCurrency}`);

  const metrics: DailyMetric[] = [];
  for (const group of groups.values()) {
    const first = group[0];
    if (first) metrics.push(toDailyMetric(group, first.collectionDate, first.targetCurrency));
  }

  return metrics.sort((a, b) => compareStrings(a.date, b.date) || compareStrings(a.currency, b.currency));
}
