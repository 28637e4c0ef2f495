import { z } from 'zod';

import { CurrencyCodeSchema, IsoDateSchema, TimestampSchema } from './primitives.js';

/**
 * Canonical per-pair record produced from one snapshot entry.
 *
 * observedAt is the provider's "last update"; collectedAt is when the pipeline
 * fetched it. collectionDate is the UTC calendar date of collectedAt.
 */
export const RateObservationSchema = z.object({
  baseCurrency: CurrencyCodeSchema,
  targetCurrency: CurrencyCodeSchema,
  rate: z.number().finite().positive(),
  observedAt: TimestampSchema,
  collectedAt: TimestampSchema,
  collectionDate: IsoDateSchema,
  pipelineVersion: z.string().min(1),
});

export type RateObservation = z.infer<typeof RateObservationSchema>;

/**
 * Observation columns, in persisted order. Quality scoring counts missing cells over these.
 */
export const OBSERVATION_COLUMNS = [
  'baseCurrency',
  'targetCurrency',
  'rate',
  'observedAt',
  'collectedAt',
  'collectionDate',
  'pipelineVersion',
] as const satisfies readonly (keyof RateObservation)[];

export type ObservationColumn = (typeof OBSERVATION_COLUMNS)[number];
