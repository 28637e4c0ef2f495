import { isCurrencyCode } from '@fxlake/core';

import type { RuleId } from './rule-ids.js';

export function checkCurrencyCodes(baseCurrency: string, targetCurrency: string): RuleId[] {
  const violations: RuleId[] = [];

  if (!isCurrencyCode(baseCurrency) || !isCurrencyCode(targetCurrency)) {
    violations.push('currency-code');
  }
  if (baseCurrency.toUpperCase() === targetCurrency.toUpperCase()) {
    violations.push('currency-pair');
  }
  return violations;
}
