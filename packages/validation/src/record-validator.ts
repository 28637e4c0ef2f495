import type { RateObservation } from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';

import { checkCurrencyCodes } from './rules/currency-rules.js';
import { isValidRate, roundRate } from './rules/rate-rules.js';
import type { RuleId } from './rules/rule-ids.js';
import {
  isCollectionDateConsistent,
  isTimestampInRange,
  isWithinCollectionWindow,
} from './rules/timestamp-rules.js';

export interface RejectedObservation {
  /** Position in the input batch */
  index: number;
  record: RateObservation;
  violations: RuleId[];
}

export interface ValidationOutcome {
  accepted: RateObservation[];
  rejected: RejectedObservation[];
  total: number;
  /** accepted / total; 0 for an empty batch */
  successRate: number;
}

/**
 * Evaluate every rule against one record. Accepted records come back with
 * upper-cased codes and the rate rounded to 8 decimals.
 */
export function validateObservation(record: RateObservation): Result<RateObservation, RuleId[]> {
  const violations = checkCurrencyCodes(record.baseCurrency, record.targetCurrency);

  if (!isValidRate(record.rate)) {
    violations.push('rate-range');
  }

  const observedInRange = isTimestampInRange(record.observedAt);
  const collectedInRange = isTimestampInRange(record.collectedAt);
  if (!observedInRange || !collectedInRange) {
    violations.push('timestamp-range');
  }

  // Window and date checks only make sense on real dates; bad ones are already reported above
  if (observedInRange && collectedInRange && !isWithinCollectionWindow(record.observedAt, record.collectedAt)) {
    violations.push('collection-window');
  }
  if (collectedInRange && !isCollectionDateConsistent(record.collectionDate, record.collectedAt)) {
    violations.push('collection-date');
  }

  if (violations.length > 0) {
    return err(violations);
  }

  return ok({
    ...record,
    baseCurrency: record.baseCurrency.toUpperCase(),
    targetCurrency: record.targetCurrency.toUpperCase(),
    rate: roundRate(record.rate),
  });
}

/**
 * Partition a batch into accepted and rejected records, preserving input order in both.
 * Never fails: a batch with nothing accepted is still a valid outcome.
 */
export function validateObservations(records: readonly RateObservation[]): ValidationOutcome {
  const accepted: RateObservation[] = [];
  const rejected: RejectedObservation[] = [];

  records.forEach((record, index) => {
    validateObservation(record).match(
      (valid) => accepted.push(valid),
      (violations) => rejected.push({ index, record, violations })
    );
  });

  return {
    accepted,
    rejected,
    total: records.length,
    successRate: records.length === 0 ? 0 : accepted.length / records.length,
  };
}
