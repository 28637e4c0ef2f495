export { textFile, writeFilesAtomically, type StagedFile } from './atomic-write.js';
export { GOLD_PARQUET_TABLES, LakePaths, type GoldOutput, type GoldParquetTable } from './lake-paths.js';
export { parquetFile, readParquetFile, writeParquetFile } from './parquet/parquet-io.js';
export {
  consolidatedTable,
  currencySummaryTable,
  dailyMetricsTable,
  exchangeRatesTable,
  historicalTrendsTable,
  toConsolidatedRow,
  type ConsolidatedRow,
  type ParquetTable,
} from './parquet/tables.js';
export {
  GoldRepository,
  type GoldLayer,
  type GoldWriteResult,
  type IGoldRepository,
} from './repositories/gold-repository.js';
export {
  RawSnapshotRepository,
  type IRawSnapshotRepository,
  type RawSnapshotLoadError,
} from './repositories/raw-snapshot-repository.js';
export { SilverRepository, type ISilverRepository } from './repositories/silver-repository.js';
