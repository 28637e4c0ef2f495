import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { CurrencySummary, DailyMetric, RateObservation, TrendPoint } from '@fxlake/core';

import { LakePaths } from '../lake-paths.js';

/**
 * Create an empty lake in a fresh temporary directory. For use in tests only.
 */
export async function createTempLake(): Promise<{ cleanup: () => Promise<void>; paths: LakePaths }> {
  const dataDir = await mkdtemp(path.join(tmpdir(), 'fxlake-test-'));
  return {
    cleanup: () => rm(dataDir, { force: true, recursive: true }),
    paths: new LakePaths(dataDir),
  };
}

export function makeObservation(overrides: Partial<RateObservation> = {}): RateObservation {
  return {
    baseCurrency: 'USD',
    targetCurrency: 'BRL',
    rate: 5.5,
    observedAt: new Date('2024-03-01T00:00:01.000Z'),
    collectedAt: new Date('2024-03-01T12:00:00.000Z'),
    collectionDate: '2024-03-01',
    pipelineVersion: '1.0.0',
    ...overrides,
  };
}

export function makeDailyMetric(overrides: Partial<DailyMetric> = {}): DailyMetric {
  return {
    date: '2024-03-01',
    currency: 'BRL',
    rateMean: 5.5,
    rateStd: 0,
    rateMin: 5.5,
    rateMax: 5.5,
    observationCount: 1,
    rateRange: 0,
    coefficientOfVariation: 0,
    lastUpdate: new Date('2024-03-01T12:00:00.000Z'),
    ...overrides,
  };
}

export function makeTrendPoint(overrides: Partial<TrendPoint> = {}): TrendPoint {
  return {
    ...makeDailyMetric(),
    dailyChangePct: 0,
    cumulativeChangePct: 0,
    movingAvg7d: 5.5,
    volatility7d: 0,
    max30d: 5.5,
    min30d: 5.5,
    relativePositionPct: 50,
    ...overrides,
  };
}

export function makeSummary(overrides: Partial<CurrencySummary> = {}): CurrencySummary {
  return {
    currency: 'BRL',
    currentRate: 5.5,
    lastDailyChange: 0,
    totalChangePct: 0,
    movingAvg7d: 5.5,
    volatility7d: 0,
    relativePositionPct: 50,
    lastUpdate: new Date('2024-03-01T12:00:00.000Z'),
    historicalMin: 5.5,
    historicalMax: 5.5,
    historicalAvg: 5.5,
    avgVolatility7d: 0,
    avgDailyVolatility: 0,
    maxDailyDrop: 0,
    maxDailyGain: 0,
    firstDate: '2024-03-01',
    lastDate: '2024-03-01',
    totalObservations: 1,
    volatilityClass: 'Low',
    trendClass: 'Stable',
    ...overrides,
  };
}
