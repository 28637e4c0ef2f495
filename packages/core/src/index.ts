// Currency codes
export { isCurrencyCode, isKnownCurrency, parseCurrencyCode } from './currency.js';
export type { CurrencyCode } from './currency.js';

// Errors
export {
  ConfigError,
  EmptyBatchError,
  getErrorCategory,
  getErrorMessage,
  InvalidInputError,
  isPipelineError,
  MalformedSnapshotError,
  NoDataForPeriodError,
  PipelineError,
  SnapshotNotFoundError,
  StorageError,
  UnexpectedError,
} from './errors.js';
export type { PipelineErrorCategory } from './errors.js';

// Schemas and domain types
export * from './schemas/primitives.js';
export * from './schemas/observation.js';
export * from './schemas/metrics.js';
export * from './schemas/overview.js';
export * from './schemas/snapshot.js';
export type * from './schemas/quality.js';
export type * from './schemas/report.js';

// Utilities
export * from './utils/date-utils.js';
export * from './utils/stats-utils.js';
export * from './utils/report-utils.js';
export * from './utils/zod-utils.js';
