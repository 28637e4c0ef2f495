import { z } from 'zod';

import { CountSchema, IsoDateSchema, TimestampSchema } from './primitives.js';

/**
 * One row per (date, currency): the day's rate statistics
 */
export const DailyMetricSchema = z.object({
  date: IsoDateSchema,
  currency: z.string(),
  rateMean: z.number(),
  rateStd: z.number(),
  rateMin: z.number(),
  rateMax: z.number(),
  observationCount: CountSchema,
  rateRange: z.number(),
  coefficientOfVariation: z.number(),
  /** Latest collectedAt among the day's observations */
  lastUpdate: TimestampSchema,
});

/**
 * DailyMetric plus rolling, per-currency trend fields. Every field is always populated.
 */
export const TrendPointSchema = DailyMetricSchema.extend({
  dailyChangePct: z.number(),
  cumulativeChangePct: z.number(),
  movingAvg7d: z.number(),
  volatility7d: z.number(),
  max30d: z.number(),
  min30d: z.number(),
  relativePositionPct: z.number(),
});

export const VolatilityClassSchema = z.enum(['Low', 'Moderate', 'High', 'VeryHigh']);
export const TrendClassSchema = z.enum(['StrongUp', 'Up', 'Stable', 'Down', 'StrongDown']);

export const CurrencySummarySchema = z.object({
  currency: z.string(),
  currentRate: z.number(),
  lastDailyChange: z.number(),
  totalChangePct: z.number(),
  movingAvg7d: z.number(),
  volatility7d: z.number(),
  relativePositionPct: z.number(),
  lastUpdate: TimestampSchema,
  historicalMin: z.number(),
  historicalMax: z.number(),
  historicalAvg: z.number(),
  avgVolatility7d: z.number(),
  /** Sample std of dailyChangePct over the whole series */
  avgDailyVolatility: z.number(),
  maxDailyDrop: z.number(),
  maxDailyGain: z.number(),
  firstDate: IsoDateSchema,
  lastDate: IsoDateSchema,
  /** Number of daily points in the series */
  totalObservations: CountSchema,
  volatilityClass: VolatilityClassSchema,
  trendClass: TrendClassSchema,
});

export type DailyMetric = z.infer<typeof DailyMetricSchema>;
export type TrendPoint = z.infer<typeof TrendPointSchema>;
export type VolatilityClass = z.infer<typeof VolatilityClassSchema>;
export type TrendClass = z.infer<typeof TrendClassSchema>;
export type CurrencySummary = z.infer<typeof CurrencySummarySchema>;
