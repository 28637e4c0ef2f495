export const RULE_IDS = [
  'currency-code',
  'currency-pair',
  'rate-range',
  'timestamp-range',
  'collection-window',
  'collection-date',
] as const;

export type RuleId = (typeof RULE_IDS)[number];
