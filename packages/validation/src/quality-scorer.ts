import {
  isCurrencyCode,
  isKnownCurrency,
  max,
  mean,
  median,
  min,
  OBSERVATION_COLUMNS,
  sampleStd,
  type CompletenessCheck,
  type CurrencyConsistencyCheck,
  type ObservationColumn,
  type QualityReport,
  type RateDistributionCheck,
  type RateObservation,
} from '@fxlake/core';

import { MAX_RATE } from './rules/rate-rules.js';

/**
 * A row as the scorer sees it: any cell may be missing, so raw data can be scored too
 */
export type ObservationCells = {
  readonly [K in ObservationColumn]?: RateObservation[K] | null | undefined;
};

const MISSING_WEIGHT = 0.3;
const INVALID_RATE_WEIGHT = 0.4;
const INVALID_CURRENCY_WEIGHT = 0.3;

/** Rates above this are legitimate for some pairs but flagged for review */
const EXTREME_RATE = 1000;

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value));
}

function presentRates(rows: readonly ObservationCells[]): number[] {
  const rates: number[] = [];
  for (const row of rows) {
    if (typeof row.rate === 'number' && !Number.isNaN(row.rate)) rates.push(row.rate);
  }
  return rates;
}

function checkCompleteness(rows: readonly ObservationCells[]): CompletenessCheck {
  const missingValues: Record<ObservationColumn, number> = {
    baseCurrency: 0,
    targetCurrency: 0,
    rate: 0,
    observedAt: 0,
    collectedAt: 0,
    collectionDate: 0,
    pipelineVersion: 0,
  };

  let missingTotal = 0;
  for (const row of rows) {
    for (const column of OBSERVATION_COLUMNS) {
      if (isMissing(row[column])) {
        missingValues[column] += 1;
        missingTotal += 1;
      }
    }
  }

  const cells = rows.length * OBSERVATION_COLUMNS.length;
  return {
    totalRecords: rows.length,
    missingValues,
    completenessScore: cells === 0 ? 0 : 1 - missingTotal / cells,
  };
}

function checkCurrencyConsistency(rows: readonly ObservationCells[]): CurrencyConsistencyCheck {
  const baseCodes = new Set<string>();
  const targetCodes = new Set<string>();
  for (const row of rows) {
    if (typeof row.baseCurrency === 'string') baseCodes.add(row.baseCurrency);
    if (typeof row.targetCurrency === 'string') targetCodes.add(row.targetCurrency);
  }

  const distinct = [...new Set([...baseCodes, ...targetCodes])];
  return {
    uniqueBaseCurrencies: baseCodes.size,
    uniqueTargetCurrencies: targetCodes.size,
    invalidCodes: distinct.filter((code) => !isCurrencyCode(code)),
    unknownCodes: distinct.filter((code) => isCurrencyCode(code) && !isKnownCurrency(code)),
    totalCurrencyPairs: rows.length,
  };
}

function checkRateDistribution(rates: readonly number[]): RateDistributionCheck {
  return {
    min: min(rates),
    max: max(rates),
    mean: mean(rates),
    median: median(rates),
    std: sampleStd(rates),
    zeroCount: rates.filter((rate) => rate === 0).length,
    negativeCount: rates.filter((rate) => rate < 0).length,
    extremeCount: rates.filter((rate) => rate > EXTREME_RATE).length,
  };
}

function calculateOverallScore(rows: readonly ObservationCells[], completeness: CompletenessCheck): number {
  const missingRatio = 1 - completeness.completenessScore;

  const invalidRates = presentRates(rows).filter((rate) => rate <= 0 || rate > MAX_RATE).length;
  const invalidRateRatio = invalidRates / rows.length;

  let invalidSlots = 0;
  for (const row of rows) {
    if (!isCurrencyCode(row.baseCurrency)) invalidSlots += 1;
    if (!isCurrencyCode(row.targetCurrency)) invalidSlots += 1;
  }
  const invalidCurrencyRatio = invalidSlots / (rows.length * 2);

  return Math.max(
    0,
    1 -
      MISSING_WEIGHT * missingRatio -
      INVALID_RATE_WEIGHT * invalidRateRatio -
      INVALID_CURRENCY_WEIGHT * invalidCurrencyRatio
  );
}

function collectIssues(
  completeness: CompletenessCheck,
  consistency: CurrencyConsistencyCheck,
  distribution: RateDistributionCheck
): string[] {
  const issues: string[] = [];

  const missing = Object.entries(completeness.missingValues).filter(([, count]) => count > 0);
  if (missing.length > 0) {
    issues.push(`Missing values found: ${missing.map(([column, count]) => `${column}=${count}`).join(', ')}`);
  }
  if (consistency.invalidCodes.length > 0) {
    issues.push(`Invalid currency codes: ${consistency.invalidCodes.join(', ')}`);
  }
  if (consistency.unknownCodes.length > 0) {
    issues.push(`Currency codes not in ISO 4217: ${consistency.unknownCodes.join(', ')}`);
  }
  if (distribution.zeroCount > 0) {
    issues.push(`Found ${distribution.zeroCount} zero rates`);
  }
  if (distribution.negativeCount > 0) {
    issues.push(`Found ${distribution.negativeCount} negative rates`);
  }
  if (distribution.extremeCount > 0) {
    issues.push(`Found ${distribution.extremeCount} extreme rates (>${EXTREME_RATE})`);
  }
  return issues;
}

/**
 * Score a batch in [0, 1]:
 *
 *   1 - 0.3 * missingRatio - 0.4 * invalidRateRatio - 0.3 * invalidCurrencyRatio, floored at 0
 *
 * Pure: every call builds its own report and issue list.
 */
export function scoreQuality(rows: readonly ObservationCells[], generatedAt: Date = new Date()): QualityReport {
  const completeness = checkCompleteness(rows);
  const currencyConsistency = checkCurrencyConsistency(rows);
  const rateDistribution = checkRateDistribution(presentRates(rows));

  if (rows.length === 0) {
    return {
      generatedAt: generatedAt.toISOString(),
      totalRecords: 0,
      completeness,
      currencyConsistency,
      rateDistribution,
      issues: ['No records to score'],
      overallScore: 0,
    };
  }

  return {
    generatedAt: generatedAt.toISOString(),
    totalRecords: rows.length,
    completeness,
    currencyConsistency,
    rateDistribution,
    issues: collectIssues(completeness, currencyConsistency, rateDistribution),
    overallScore: calculateOverallScore(rows, completeness),
  };
}
