import { ParquetSchema } from '@dsnp/parquetjs';
import {
  CurrencySummarySchema,
  DailyMetricSchema,
  RateObservationSchema,
  TrendPointSchema,
  type CurrencySummary,
  type DailyMetric,
  type RateObservation,
  type TrendPoint,
} from '@fxlake/core';
import type { z } from 'zod';

const utf8 = { type: 'UTF8', compression: 'SNAPPY' } as const;
const double = { type: 'DOUBLE', compression: 'SNAPPY' } as const;
const int32 = { type: 'INT32', compression: 'SNAPPY' } as const;
const timestamp = { type: 'TIMESTAMP_MILLIS', compression: 'SNAPPY' } as const;

/**
 * A typed Parquet table: its column schema, how a record becomes a row,
 * and how a row read back becomes a record again.
 */
export interface ParquetTable<T> {
  name: string;
  schema: ParquetSchema;
  rowSchema: z.ZodType<T, z.ZodTypeDef, unknown>;
  toRow: (record: T) => Record<string, unknown>;
}

export const exchangeRatesTable: ParquetTable<RateObservation> = {
  name: 'exchange_rates',
  schema: new ParquetSchema({
    baseCurrency: utf8,
    targetCurrency: utf8,
    rate: double,
    observedAt: timestamp,
    collectedAt: timestamp,
    collectionDate: utf8,
    pipelineVersion: utf8,
  }),
  rowSchema: RateObservationSchema,
  toRow: (record) => ({
    baseCurrency: record.baseCurrency,
    targetCurrency: record.targetCurrency,
    rate: record.rate,
    observedAt: record.observedAt,
    collectedAt: record.collectedAt,
    collectionDate: record.collectionDate,
    pipelineVersion: record.pipelineVersion,
  }),
};

const dailyMetricColumns = {
  date: utf8,
  currency: utf8,
  rateMean: double,
  rateStd: double,
  rateMin: double,
  rateMax: double,
  observationCount: int32,
  rateRange: double,
  coefficientOfVariation: double,
  lastUpdate: timestamp,
};

function dailyMetricRow(record: DailyMetric): Record<string, unknown> {
  return {
    date: record.date,
    currency: record.currency,
    rateMean: record.rateMean,
    rateStd: record.rateStd,
    rateMin: record.rateMin,
    rateMax: record.rateMax,
    observationCount: record.observationCount,
    rateRange: record.rateRange,
    coefficientOfVariation: record.coefficientOfVariation,
    lastUpdate: record.lastUpdate,
  };
}

export const dailyMetricsTable: ParquetTable<DailyMetric> = {
  name: 'daily_metrics',
  schema: new ParquetSchema(dailyMetricColumns),
  rowSchema: DailyMetricSchema,
  toRow: dailyMetricRow,
};

export const historicalTrendsTable: ParquetTable<TrendPoint> = {
  name: 'historical_trends',
  schema: new ParquetSchema({
    ...dailyMetricColumns,
    dailyChangePct: double,
    cumulativeChangePct: double,
    movingAvg7d: double,
    volatility7d: double,
    max30d: double,
    min30d: double,
    relativePositionPct: double,
  }),
  rowSchema: TrendPointSchema,
  toRow: (record) => ({
    ...dailyMetricRow(record),
    dailyChangePct: record.dailyChangePct,
    cumulativeChangePct: record.cumulativeChangePct,
    movingAvg7d: record.movingAvg7d,
    volatility7d: record.volatility7d,
    max30d: record.max30d,
    min30d: record.min30d,
    relativePositionPct: record.relativePositionPct,
  }),
};

export const currencySummaryTable: ParquetTable<CurrencySummary> = {
  name: 'currency_summary',
  schema: new ParquetSchema({
    currency: utf8,
    currentRate: double,
    lastDailyChange: double,
    totalChangePct: double,
    movingAvg7d: double,
    volatility7d: double,
    relativePositionPct: double,
    lastUpdate: timestamp,
    historicalMin: double,
    historicalMax: double,
    historicalAvg: double,
    avgVolatility7d: double,
    avgDailyVolatility: double,
    maxDailyDrop: double,
    maxDailyGain: double,
    firstDate: utf8,
    lastDate: utf8,
    totalObservations: int32,
    volatilityClass: utf8,
    trendClass: utf8,
  }),
  rowSchema: CurrencySummarySchema,
  toRow: (record) => ({
    currency: record.currency,
    currentRate: record.currentRate,
    lastDailyChange: record.lastDailyChange,
    totalChangePct: record.totalChangePct,
    movingAvg7d: record.movingAvg7d,
    volatility7d: record.volatility7d,
    relativePositionPct: record.relativePositionPct,
    lastUpdate: record.lastUpdate,
    historicalMin: record.historicalMin,
    historicalMax: record.historicalMax,
    historicalAvg: record.historicalAvg,
    avgVolatility7d: record.avgVolatility7d,
    avgDailyVolatility: record.avgDailyVolatility,
    maxDailyDrop: record.maxDailyDrop,
    maxDailyGain: record.maxDailyGain,
    firstDate: record.firstDate,
    lastDate: record.lastDate,
    totalObservations: record.totalObservations,
    volatilityClass: record.volatilityClass,
    trendClass: record.trendClass,
  }),
};

// Headline columns of the summary, for consumers that only need the latest state
const ConsolidatedRowSchema = CurrencySummarySchema.pick({
  currency: true,
  currentRate: true,
  lastDailyChange: true,
  totalChangePct: true,
  movingAvg7d: true,
  volatility7d: true,
  trendClass: true,
  volatilityClass: true,
});

export type ConsolidatedRow = z.infer<typeof ConsolidatedRowSchema>;

export const consolidatedTable: ParquetTable<ConsolidatedRow> = {
  name: 'consolidated',
  schema: new ParquetSchema({
    currency: utf8,
    currentRate: double,
    lastDailyChange: double,
    totalChangePct: double,
    movingAvg7d: double,
    volatility7d: double,
    trendClass: utf8,
    volatilityClass: utf8,
  }),
  rowSchema: ConsolidatedRowSchema,
  toRow: (record) => ({
    currency: record.currency,
    currentRate: record.currentRate,
    lastDailyChange: record.lastDailyChange,
    totalChangePct: record.totalChangePct,
    movingAvg7d: record.movingAvg7d,
    volatility7d: record.volatility7d,
    trendClass: record.trendClass,
    volatilityClass: record.volatilityClass,
  }),
};

export function toConsolidatedRow(summary: CurrencySummary): ConsolidatedRow {
  return {
    currency: summary.currency,
    currentRate: summary.currentRate,
    lastDailyChange: summary.lastDailyChange,
    totalChangePct: summary.totalChangePct,
    movingAvg7d: summary.movingAvg7d,
    volatility7d: summary.volatility7d,
    trendClass: summary.trendClass,
    volatilityClass: summary.volatilityClass,
  };
}
