import { z } from 'zod';

import type { IsoDate } from '../utils/date-utils.js';

import { IsoDateSchema } from './primitives.js';

/**
 * ExchangeRate-API v6 "latest" response, as stored verbatim in the raw layer
 */
export const ExchangeRateApiResponseSchema = z
  .object({
    result: z.string(),
    base_code: z.string().min(1),
    conversion_rates: z.record(z.string(), z.number()),
    time_last_update_unix: z.number().int().optional(),
    time_last_update_utc: z.string().optional(),
    time_next_update_unix: z.number().int().optional(),
    'error-type': z.string().optional(),
  })
  .passthrough();

export const PipelineMetadataSchema = z.object({
  collection_timestamp: z.string().refine((val) => !isNaN(Date.parse(val)), { message: 'Invalid timestamp' }),
  collection_date: IsoDateSchema,
  base_currency: z.string().min(1),
  pipeline_version: z.string().min(1),
});

/**
 * Raw layer file: provider response enriched with pipeline metadata
 */
export const RawSnapshotEnvelopeSchema = z.object({
  pipeline_metadata: PipelineMetadataSchema,
  api_response: ExchangeRateApiResponseSchema,
});

export type ExchangeRateApiResponse = z.infer<typeof ExchangeRateApiResponseSchema>;
export type PipelineMetadata = z.infer<typeof PipelineMetadataSchema>;
export type RawSnapshotEnvelope = z.infer<typeof RawSnapshotEnvelopeSchema>;

/**
 * One provider response for one base currency, with the timestamps the normalizer needs
 */
export interface RawSnapshot {
  baseCurrency: string;
  rates: Record<string, number>;
  /** Provider "last update" time; falls back to collectedAt when the provider omits it */
  observedAt: Date;
  collectedAt: Date;
  collectionDate: IsoDate;
  pipelineVersion: string;
}

/**
 * Flatten a stored envelope into the snapshot view used by the normalizer
 */
export function toRawSnapshot(envelope: RawSnapshotEnvelope): RawSnapshot {
  const { api_response: response, pipeline_metadata: metadata } = envelope;
  const collectedAt = new Date(metadata.collection_timestamp);
  const observedAt =
    response.time_last_update_unix !== undefined ? new Date(response.time_last_update_unix * 1000) : collectedAt;

  return {
    baseCurrency: response.base_code,
    rates: response.conversion_rates,
    observedAt,
    collectedAt,
    collectionDate: metadata.collection_date,
    pipelineVersion: metadata.pipeline_version,
  };
}
