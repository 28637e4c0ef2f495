import { promises as fs } from 'node:fs';

import {
  formatZodIssues,
  MarketOverviewSchema,
  StorageError,
  type CurrencySummary,
  type DailyMetric,
  type IsoDate,
  type MarketOverview,
  type TrendPoint,
} from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';

import { textFile, writeFilesAtomically } from '../atomic-write.js';
import type { GoldOutput, LakePaths } from '../lake-paths.js';
import { parquetFile, readParquetFile } from '../parquet/parquet-io.js';
import {
  consolidatedTable,
  currencySummaryTable,
  dailyMetricsTable,
  historicalTrendsTable,
  toConsolidatedRow,
  type ConsolidatedRow,
  type ParquetTable,
} from '../parquet/tables.js';

import { BaseRepository, isNotFoundError } from './base-repository.js';

export interface GoldLayer {
  dailyMetrics: readonly DailyMetric[];
  trends: readonly TrendPoint[];
  summaries: readonly CurrencySummary[];
  overview: MarketOverview;
}

export interface GoldWriteResult {
  filesCreated: Record<GoldOutput, string>;
  totalSizeKb: number;
}

/**
 * Gold layer: analytical tables and the market overview for one reference date
 */
export interface IGoldRepository {
  /**
   * Write every gold output for `date`. Either all files are replaced or none is.
   */
  save(date: IsoDate, layer: GoldLayer): Promise<Result<GoldWriteResult, StorageError>>;

  loadDailyMetrics(date: IsoDate): Promise<Result<DailyMetric[] | undefined, StorageError>>;
  loadTrends(date: IsoDate): Promise<Result<TrendPoint[] | undefined, StorageError>>;
  loadSummaries(date: IsoDate): Promise<Result<CurrencySummary[] | undefined, StorageError>>;
  loadConsolidated(date: IsoDate): Promise<Result<ConsolidatedRow[] | undefined, StorageError>>;
  loadOverview(date: IsoDate): Promise<Result<MarketOverview | undefined, StorageError>>;
}

export class GoldRepository extends BaseRepository implements IGoldRepository {
  constructor(paths: LakePaths) {
    super(paths, 'GoldRepository');
  }

  async save(date: IsoDate, layer: GoldLayer): Promise<Result<GoldWriteResult, StorageError>> {
    const filesCreated: Record<GoldOutput, string> = {
      daily_metrics: this.paths.gold('daily_metrics', date),
      historical_trends: this.paths.gold('historical_trends', date),
      currency_summary: this.paths.gold('currency_summary', date),
      market_overview: this.paths.gold('market_overview', date),
      consolidated: this.paths.gold('consolidated', date),
    };

    const written = await writeFilesAtomically([
      parquetFile(filesCreated.daily_metrics, dailyMetricsTable, layer.dailyMetrics),
      parquetFile(filesCreated.historical_trends, historicalTrendsTable, layer.trends),
      parquetFile(filesCreated.currency_summary, currencySummaryTable, layer.summaries),
      textFile(filesCreated.market_overview, JSON.stringify(layer.overview, undefined, 2)),
      parquetFile(filesCreated.consolidated, consolidatedTable, layer.summaries.map(toConsolidatedRow)),
    ]);
    if (written.isErr()) {
      return err(written.error);
    }

    let totalBytes = 0;
    try {
      for (const filePath of written.value) {
        totalBytes += (await fs.stat(filePath)).size;
      }
    } catch (error) {
      return this.storageFailure(error, 'Failed to stat gold files', this.paths.goldDir);
    }

    const totalSizeKb = Math.round((totalBytes / 1024) * 100) / 100;
    this.logger.info({ date, filesCreated: written.value.length, totalSizeKb }, 'Saved gold layer');
    return ok({ filesCreated, totalSizeKb });
  }

  loadDailyMetrics(date: IsoDate): Promise<Result<DailyMetric[] | undefined, StorageError>> {
    return this.loadTable(this.paths.gold('daily_metrics', date), dailyMetricsTable);
  }

  loadTrends(date: IsoDate): Promise<Result<TrendPoint[] | undefined, StorageError>> {
    return this.loadTable(this.paths.gold('historical_trends', date), historicalTrendsTable);
  }

  loadSummaries(date: IsoDate): Promise<Result<CurrencySummary[] | undefined, StorageError>> {
    return this.loadTable(this.paths.gold('currency_summary', date), currencySummaryTable);
  }

  loadConsolidated(date: IsoDate): Promise<Result<ConsolidatedRow[] | undefined, StorageError>> {
    return this.loadTable(this.paths.gold('consolidated', date), consolidatedTable);
  }

  async loadOverview(date: IsoDate): Promise<Result<MarketOverview | undefined, StorageError>> {
    const filePath = this.paths.gold('market_overview', date);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return ok(undefined);
      }
      return this.storageFailure(error, 'Failed to read market overview', filePath);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return this.storageFailure(error, 'Market overview is not valid JSON', filePath);
    }

    const parsed = MarketOverviewSchema.safeParse(json);
    if (!parsed.success) {
      return err(
        new StorageError(`Market overview ${filePath} is malformed: ${formatZodIssues(parsed.error).join('; ')}`, {
          filePath,
        })
      );
    }
    return ok(parsed.data);
  }

  private async loadTable<T>(filePath: string, table: ParquetTable<T>): Promise<Result<T[] | undefined, StorageError>> {
    try {
      await fs.access(filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        return ok(undefined);
      }
      return this.storageFailure(error, `Failed to access ${table.name}`, filePath);
    }

    try {
      return await readParquetFile(filePath, table);
    } catch (error) {
      return this.storageFailure(error, `Failed to read ${table.name}`, filePath);
    }
  }
}
