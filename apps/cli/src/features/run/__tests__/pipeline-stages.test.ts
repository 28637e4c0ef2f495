import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { AggregationService } from '@fxlake/analytics';
import { GoldRepository, LakePaths, RawSnapshotRepository, SilverRepository } from '@fxlake/data';
import { SnapshotIngester, type IRatesSource, type LatestRatesError, type LatestRatesResponse } from '@fxlake/ingestion';
import { ValidationService } from '@fxlake/validation';
import { ok, type Result } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { PipelineRunHandler, type StageRunners } from '../run-handler.js';

const NOW = Date.parse('2024-06-10T12:00:00.000Z');

class StaticRatesSource implements IRatesSource {
  getLatestRates(baseCurrency: string): Promise<Result<LatestRatesResponse, LatestRatesError>> {
    return Promise.resolve(
      ok({
        result: 'success',
        base_code: baseCurrency,
        conversion_rates: { BRL: 5.5, EUR: 0.9 },
        time_last_update_unix: Date.parse('2024-06-10T00:00:01.000Z') / 1000,
      })
    );
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}

describe('pipeline stages on a lake directory', () => {
  let dataDir: string;
  let runners: StageRunners;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), 'fxlake-run-'));
    const paths = new LakePaths(dataDir);
    const ingester = new SnapshotIngester(new StaticRatesSource(), new RawSnapshotRepository(paths), {
      now: () => NOW,
      pipelineVersion: '1.0.0',
    });
    const validation = new ValidationService(new RawSnapshotRepository(paths), new SilverRepository(paths));
    const aggregation = new AggregationService(new SilverRepository(paths), new GoldRepository(paths));

    runners = {
      ingest: (params) => ingester.collectDailyRates(params),
      validate: (date) => validation.processDate(date),
      aggregate: (date, daysBack) => aggregation.processDate(date, { daysBack }),
    };
  });

  afterEach(async () => {
    await rm(dataDir, { force: true, recursive: true });
  });

  it('validates and aggregates the snapshot ingested for the same date', async () => {
    const result = await new PipelineRunHandler(runners).execute({
      stage: 'all',
      date: '2024-06-10',
      baseCurrency: 'USD',
      daysBack: 7,
    });

    const value = result._unsafeUnwrap();
    expect(value.stagesRun).toEqual(['ingest', 'validate', 'aggregate']);
    expect(value.ingestion?.collectionDate).toBe('2024-06-10');
    expect(value.validation?.processing.validatedRecords).toBe(2);
    expect(value.validation?.processing.invalidRecords).toBe(0);
    expect(value.aggregation?.processing.daysIncluded).toBe(1);
    expect(value.aggregation?.processing.currenciesAnalyzed).toBe(2);
  });
});
