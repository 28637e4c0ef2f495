import {
  StorageError,
  type CurrencySummary,
  type DailyMetric,
  type IsoDate,
  type MarketOverview,
  type RateObservation,
  type TrendPoint,
} from '@fxlake/core';
import type { ConsolidatedRow, GoldLayer, GoldWriteResult, IGoldRepository, ISilverRepository } from '@fxlake/data';
import { err, ok, type Result } from 'neverthrow';
import { beforeEach, describe, expect, it } from 'vitest';

import { AggregationService } from '../aggregation-service.js';

import { makeObservation } from './test-utils.js';

class InMemorySilverRepository implements ISilverRepository {
  readonly days = new Map<IsoDate, readonly RateObservation[]>();

  pathFor(date: IsoDate): string {
    return `/lake/silver/exchange_rates_${date}.parquet`;
  }

  load(date: IsoDate): Promise<Result<RateObservation[] | undefined, StorageError>> {
    const records = this.days.get(date);
    return Promise.resolve(ok(records ? [...records] : undefined));
  }

  save(date: IsoDate, observations: readonly RateObservation[]): Promise<Result<string, StorageError>> {
    this.days.set(date, observations);
    return Promise.resolve(ok(this.pathFor(date)));
  }
}

class InMemoryGoldRepository implements IGoldRepository {
  readonly layers = new Map<IsoDate, GoldLayer>();
  failWith: StorageError | undefined;

  save(date: IsoDate, layer: GoldLayer): Promise<Result<GoldWriteResult, StorageError>> {
    if (this.failWith) return Promise.resolve(err(this.failWith));
    this.layers.set(date, layer);
    return Promise.resolve(
      ok({
        filesCreated: {
          daily_metrics: `/lake/gold/daily_metrics_${date}.parquet`,
          historical_trends: `/lake/gold/historical_trends_${date}.parquet`,
          currency_summary: `/lake/gold/currency_summary_${date}.parquet`,
          market_overview: `/lake/gold/market_overview_${date}.json`,
          consolidated: `/lake/gold/consolidated_${date}.parquet`,
        },
        totalSizeKb: 12.5,
      })
    );
  }

  loadDailyMetrics(date: IsoDate): Promise<Result<DailyMetric[] | undefined, StorageError>> {
    return Promise.resolve(ok(this.layers.get(date)?.dailyMetrics.slice()));
  }

  loadTrends(date: IsoDate): Promise<Result<TrendPoint[] | undefined, StorageError>> {
    return Promise.resolve(ok(this.layers.get(date)?.trends.slice()));
  }

  loadSummaries(date: IsoDate): Promise<Result<CurrencySummary[] | undefined, StorageError>> {
    return Promise.resolve(ok(this.layers.get(date)?.summaries.slice()));
  }

  loadConsolidated(): Promise<Result<ConsolidatedRow[] | undefined, StorageError>> {
    return Promise.resolve(ok(undefined));
  }

  loadOverview(date: IsoDate): Promise<Result<MarketOverview | undefined, StorageError>> {
    return Promise.resolve(ok(this.layers.get(date)?.overview));
  }
}

function dayOfRates(date: IsoDate, rates: Record<string, number>): RateObservation[] {
  return Object.entries(rates).map(([targetCurrency, rate]) =>
    makeObservation({
      targetCurrency,
      rate,
      collectionDate: date,
      observedAt: new Date(`${date}T12:00:00.000Z`),
      collectedAt: new Date(`${date}T12:01:00.000Z`),
    })
  );
}

describe('AggregationService', () => {
  let silver: InMemorySilverRepository;
  let gold: InMemoryGoldRepository;
  let service: AggregationService;

  beforeEach(() => {
    silver = new InMemorySilverRepository();
    gold = new InMemoryGoldRepository();
    let clock = 1_000;
    service = new AggregationService(silver, gold, {
      now: () => {
        clock += 250;
        return clock;
      },
    });
  });

  it('aggregates a window of silver days into gold', async () => {
    silver.days.set('2024-03-01', dayOfRates('2024-03-01', { BRL: 5.5, EUR: 0.9 }));
    silver.days.set('2024-03-02', dayOfRates('2024-03-02', { BRL: 5.5, EUR: 0.9 }));

    const report = await service.processDate('2024-03-02', { daysBack: 2 });

    expect(report.status).toBe('success');
    if (report.status !== 'success') return;
    expect(report.executionTimeSeconds).toBe(0.5);
    expect(report.processing).toEqual({
      periodStart: '2024-03-01',
      periodEnd: '2024-03-02',
      daysIncluded: 2,
      daysSkipped: [],
      silverRecordsProcessed: 4,
      dailyMetricsCalculated: 4,
      currenciesAnalyzed: 2,
    });
    expect(report.output.totalFiles).toBe(5);
    expect(report.output.totalSizeKb).toBe(12.5);
    expect(report.insights.topCurrencies).toEqual([
      { currency: 'BRL', currentRate: 5.5, trendClass: 'Stable' },
      { currency: 'EUR', currentRate: 0.9, trendClass: 'Stable' },
    ]);
    expect(report.insights.marketOverview.totalCurrencies).toBe(2);
    expect(report.insights.marketOverview.generatedAt).toBe(new Date(1_500).toISOString());
    expect(report.insights.marketOverview.volatilityDistribution.low).toBe(2);

    const layer = gold.layers.get('2024-03-02');
    expect(layer?.trends).toHaveLength(4);
    expect(layer?.summaries.map((summary) => summary.volatilityClass)).toEqual(['Low', 'Low']);
  });

  it('skips days without silver data', async () => {
    silver.days.set('2024-03-01', dayOfRates('2024-03-01', { BRL: 5.5 }));

    const report = await service.processDate('2024-03-01', { daysBack: 3 });

    expect(report.status).toBe('success');
    if (report.status !== 'success') return;
    expect(report.processing.periodStart).toBe('2024-02-28');
    expect(report.processing.daysIncluded).toBe(1);
    expect(report.processing.daysSkipped).toEqual(['2024-02-28', '2024-02-29']);
  });

  it('reports an error when the window has no data', async () => {
    const report = await service.processDate('2024-03-07');

    expect(report).toEqual({
      status: 'error',
      targetDate: '2024-03-07',
      executionTimeSeconds: 0.25,
      errorCategory: 'no-data-for-period',
      errorMessage: 'No data found for period 2024-03-01 to 2024-03-07',
    });
    expect(gold.layers.size).toBe(0);
  });

  it.each([0, -1, 1.5])('rejects daysBack %d', async (daysBack) => {
    const report = await service.processDate('2024-03-01', { daysBack });

    expect(report.status).toBe('error');
    if (report.status !== 'error') return;
    expect(report.errorCategory).toBe('input');
    expect(report.errorMessage).toBe(`daysBack must be a positive integer, got ${daysBack}`);
  });

  it('rejects a malformed date', async () => {
    const report = await service.processDate('2024-13-01');

    expect(report.status).toBe('error');
    if (report.status !== 'error') return;
    expect(report.errorMessage).toBe("Invalid date '2024-13-01': expected YYYY-MM-DD");
  });

  it('surfaces gold write failures', async () => {
    silver.days.set('2024-03-01', dayOfRates('2024-03-01', { BRL: 5.5 }));
    gold.failWith = new StorageError('Failed to write 5 file(s): disk full');

    const report = await service.processDate('2024-03-01', { daysBack: 1 });

    expect(report.status).toBe('error');
    if (report.status !== 'error') return;
    expect(report.errorCategory).toBe('storage');
    expect(report.errorMessage).toBe('Failed to write 5 file(s): disk full');
  });
});
