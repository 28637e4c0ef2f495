import path from 'node:path';

import type { IsoDate } from '@fxlake/core';

/**
 * Gold outputs written per aggregation run, keyed by the name used in reports
 */
export const GOLD_PARQUET_TABLES = ['daily_metrics', 'historical_trends', 'currency_summary', 'consolidated'] as const;
export type GoldParquetTable = (typeof GOLD_PARQUET_TABLES)[number];

export type GoldOutput = GoldParquetTable | 'market_overview';

/**
 * File layout of the lake under one data directory:
 *
 *   raw/<date>.json
 *   silver/exchange_rates_<date>.parquet
 *   gold/<table>_<date>.parquet, gold/market_overview_<date>.json
 */
export class LakePaths {
  constructor(readonly dataDir: string) {}

  get rawDir(): string {
    return path.join(this.dataDir, 'raw');
  }

  get silverDir(): string {
    return path.join(this.dataDir, 'silver');
  }

  get goldDir(): string {
    return path.join(this.dataDir, 'gold');
  }

  rawSnapshot(date: IsoDate): string {
    return path.join(this.rawDir, `${date}.json`);
  }

  silverObservations(date: IsoDate): string {
    return path.join(this.silverDir, `exchange_rates_${date}.parquet`);
  }

  gold(output: GoldOutput, date: IsoDate): string {
    const extension = output === 'market_overview' ? 'json' : 'parquet';
    return path.join(this.goldDir, `${output}_${date}.${extension}`);
  }
}
