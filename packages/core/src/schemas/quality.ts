import type { ObservationColumn } from './observation.js';

export interface CompletenessCheck {
  totalRecords: number;
  missingValues: Record<ObservationColumn, number>;
  completenessScore: number;
}

export interface CurrencyConsistencyCheck {
  uniqueBaseCurrencies: number;
  uniqueTargetCurrencies: number;
  /** Distinct codes that are not exactly three letters */
  invalidCodes: string[];
  /** Well-formed codes missing from the ISO 4217 table (reported, not penalized) */
  unknownCodes: string[];
  totalCurrencyPairs: number;
}

export interface RateDistributionCheck {
  min: number;
  max: number;
  mean: number;
  median: number;
  std: number;
  zeroCount: number;
  negativeCount: number;
  /** Rates above 1000 - legitimate for some pairs, flagged for review */
  extremeCount: number;
}

/**
 * Quality assessment of one batch of observations. Built once, read-only afterwards.
 */
export interface QualityReport {
  generatedAt: string;
  totalRecords: number;
  completeness: CompletenessCheck;
  currencyConsistency: CurrencyConsistencyCheck;
  rateDistribution: RateDistributionCheck;
  issues: string[];
  /** In [0, 1] */
  overallScore: number;
}
