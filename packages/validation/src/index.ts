export { normalizeSnapshot } from './normalizer.js';
export {
  validateObservation,
  validateObservations,
  type RejectedObservation,
  type ValidationOutcome,
} from './record-validator.js';
export { scoreQuality, type ObservationCells } from './quality-scorer.js';
export { checkCurrencyCodes } from './rules/currency-rules.js';
export { isValidRate, MAX_RATE, RATE_DECIMALS, roundRate } from './rules/rate-rules.js';
export { RULE_IDS, type RuleId } from './rules/rule-ids.js';
export {
  isCollectionDateConsistent,
  isTimestampInRange,
  isWithinCollectionWindow,
  MAX_YEAR,
  MIN_YEAR,
} from './rules/timestamp-rules.js';
export { ValidationService, type ValidationServiceOptions } from './validation-service.js';
