export {
  AggregationService,
  DEFAULT_DAYS_BACK,
  type AggregationOptions,
  type AggregationServiceOptions,
} from './aggregation-service.js';
export { classifyTrend, classifyVolatility } from './classification.js';
export { summarizeCurrencies } from './currency-summarizer.js';
export { aggregateDaily } from './daily-aggregator.js';
export { buildMarketOverview, MAJOR_CURRENCY_COUNT, toMajorCurrencyRow } from './market-overview.js';
export {
  calculateCurrencyTrend,
  calculateTrends,
  EXTREMES_WINDOW,
  MOVING_AVERAGE_WINDOW,
  VOLATILITY_WINDOW,
} from './trend-calculator.js';
