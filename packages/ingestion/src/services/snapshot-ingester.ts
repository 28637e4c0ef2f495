import {
  elapsedSeconds,
  getErrorMessage,
  toIsoDate,
  UnexpectedError,
  type IsoDate,
  type PipelineError,
  type RawSnapshotEnvelope,
} from '@fxlake/core';
import type { IRawSnapshotRepository } from '@fxlake/data';
import { getLogger, type Logger } from '@fxlake/logger';
import { err, ok, type Result } from 'neverthrow';

import type { IRatesSource } from '../sources/exchangerate-api/client.js';

export const DEFAULT_BASE_CURRENCY = 'USD';

export interface CollectOptions {
  baseCurrency?: string | undefined;
}

export interface SnapshotIngesterOptions {
  now?: () => number;
  pipelineVersion: string;
}

export interface IngestionResult {
  baseCurrency: string;
  collectionDate: IsoDate;
  executionTimeSeconds: number;
  filePath: string;
  totalRates: number;
}

/**
 * Bronze stage: fetch one "latest rates" response, wrap it with pipeline metadata
 * and store it as the raw snapshot of today's UTC date. Past dates cannot be collected:
 * the provider only serves the latest rates.
 */
export class SnapshotIngester {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly pipelineVersion: string;

  constructor(
    private readonly ratesSource: IRatesSource,
    private readonly rawRepository: IRawSnapshotRepository,
    options: SnapshotIngesterOptions
  ) {
    this.logger = getLogger('SnapshotIngester');
    this.now = options.now ?? Date.now;
    this.pipelineVersion = options.pipelineVersion;
  }

  async collectDailyRates(options: CollectOptions = {}): Promise<Result<IngestionResult, PipelineError>> {
    const baseCurrency = (options.baseCurrency ?? DEFAULT_BASE_CURRENCY).toUpperCase();
    const startedAt = this.now();
    const collectedAt = new Date(startedAt);
    // Must match the UTC date of collection_timestamp
    const collectionDate = toIsoDate(collectedAt);

    this.logger.info({ baseCurrency, collectionDate }, 'Starting daily rate collection');

    try {
      const response = await this.ratesSource.getLatestRates(baseCurrency);
      if (response.isErr()) {
        this.logger.error(
          { baseCurrency, category: response.error.category },
          `Rate collection failed: ${response.error.message}`
        );
        return err(response.error);
      }

      const envelope: RawSnapshotEnvelope = {
        pipeline_metadata: {
          collection_timestamp: collectedAt.toISOString(),
          collection_date: collectionDate,
          base_currency: baseCurrency,
          pipeline_version: this.pipelineVersion,
        },
        api_response: response.value,
      };

      const saved = await this.rawRepository.save(envelope);
      if (saved.isErr()) {
        return err(saved.error);
      }

      const result: IngestionResult = {
        baseCurrency,
        collectionDate,
        executionTimeSeconds: elapsedSeconds(startedAt, this.now()),
        filePath: saved.value,
        totalRates: Object.keys(response.value.conversion_rates).length,
      };
      this.logger.info(result, 'Raw snapshot saved');
      return ok(result);
    } catch (error) {
      return err(new UnexpectedError(`Unexpected error collecting rates for ${baseCurrency}: ${getErrorMessage(error)}`));
    }
  }
}
