export {
  DEFAULT_BASE_CURRENCY,
  SnapshotIngester,
  type CollectOptions,
  type IngestionResult,
  type SnapshotIngesterOptions,
} from './services/snapshot-ingester.js';
export {
  createExchangeRateApiClient,
  EXCHANGE_RATE_API_PROVIDER,
  ExchangeRateApiClient,
  type ExchangeRateApiConfig,
  type IRatesSource,
  type LatestRatesError,
} from './sources/exchangerate-api/client.js';
export { LatestRatesResponseSchema, type LatestRatesResponse } from './sources/exchangerate-api/schemas.js';
