import { z } from 'zod';

import { TrendClassSchema, VolatilityClassSchema } from './metrics.js';
import { IsoDateSchema } from './primitives.js';

const ChangeExtremeSchema = z.object({
  currency: z.string(),
  changePct: z.number(),
});

const VolatilityExtremeSchema = z.object({
  currency: z.string(),
  volatility: z.number(),
});

export const MajorCurrencyRowSchema = z.object({
  currency: z.string(),
  currentRate: z.number(),
  lastDailyChange: z.number(),
  totalChangePct: z.number(),
  volatilityClass: VolatilityClassSchema,
  trendClass: TrendClassSchema,
});

/**
 * Market-wide snapshot reduced from the currency summary table.
 * Persisted as pretty-printed JSON next to the gold tables.
 */
export const MarketOverviewSchema = z.object({
  generatedAt: z.string(),
  totalCurrencies: z.number().int().nonnegative(),
  observationPeriod: z.object({
    start: IsoDateSchema,
    end: IsoDateSchema,
    totalDays: z.number().int().positive(),
  }),
  marketSentiment: z.object({
    currenciesUp: z.number().int().nonnegative(),
    currenciesDown: z.number().int().nonnegative(),
    currenciesStable: z.number().int().nonnegative(),
  }),
  volatilityDistribution: z.object({
    low: z.number().int().nonnegative(),
    moderate: z.number().int().nonnegative(),
    high: z.number().int().nonnegative(),
    veryHigh: z.number().int().nonnegative(),
  }),
  topPerformers: z.object({
    biggestGainer: ChangeExtremeSchema,
    biggestLoser: ChangeExtremeSchema,
    mostVolatile: VolatilityExtremeSchema,
    mostStable: VolatilityExtremeSchema,
  }),
  majorCurrencies: z.array(MajorCurrencyRowSchema),
});

export type MajorCurrencyRow = z.infer<typeof MajorCurrencyRowSchema>;
export type MarketOverview = z.infer<typeof MarketOverviewSchema>;
