import { ConfigError, InvalidInputError, type AggregationReport, type ErrorReport, type ValidationReport } from '@fxlake/core';
import type { IngestionResult } from '@fxlake/ingestion';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi, type Mock } from 'vitest';

import { makeAggregationReport, makeValidationReport } from '../../__tests__/report-fixtures.js';
import { checkRunDate, PipelineRunHandler, PipelineStageError, type StageRunners } from '../run-handler.js';

const ingestion: IngestionResult = {
  baseCurrency: 'USD',
  collectionDate: '2024-03-07',
  executionTimeSeconds: 0.8,
  filePath: '/lake/raw/2024-03-07.json',
  totalRates: 3,
};

function notFoundReport(targetDate: string): ErrorReport {
  return {
    status: 'error',
    targetDate,
    executionTimeSeconds: 0.01,
    errorCategory: 'not-found',
    errorMessage: `No snapshot found for ${targetDate} (looked in /lake/raw/${targetDate}.json)`,
  };
}

interface FakeRunners {
  ingest: Mock<StageRunners['ingest']>;
  validate: Mock<StageRunners['validate']>;
  aggregate: Mock<StageRunners['aggregate']>;
}

function createRunners(): FakeRunners {
  return {
    ingest: vi.fn<StageRunners['ingest']>().mockResolvedValue(ok(ingestion)),
    validate: vi.fn<StageRunners['validate']>().mockResolvedValue(makeValidationReport({ targetDate: '2024-03-07' })),
    aggregate: vi.fn<StageRunners['aggregate']>().mockResolvedValue(makeAggregationReport()),
  };
}

const params = { stage: 'all', date: '2024-03-07', baseCurrency: 'USD', daysBack: 7 } as const;

describe('PipelineRunHandler', () => {
  it('runs ingest, validate and aggregate in order for one date', async () => {
    const runners = createRunners();

    const result = await new PipelineRunHandler(runners).execute(params);

    const value = result._unsafeUnwrap();
    expect(value.stagesRun).toEqual(['ingest', 'validate', 'aggregate']);
    expect(value.ingestion).toEqual(ingestion);
    expect(value.validation?.targetDate).toBe('2024-03-07');
    expect(value.aggregation?.output.totalFiles).toBe(5);
    expect(runners.ingest).toHaveBeenCalledWith({ baseCurrency: 'USD' });
    expect(runners.validate).toHaveBeenCalledWith('2024-03-07');
    expect(runners.aggregate).toHaveBeenCalledWith('2024-03-07', 7);
  });

  it('runs a single selected stage', async () => {
    const runners = createRunners();

    const result = await new PipelineRunHandler(runners).execute({ ...params, stage: 'aggregate', daysBack: 30 });

    expect(result._unsafeUnwrap().stagesRun).toEqual(['aggregate']);
    expect(runners.ingest).not.toHaveBeenCalled();
    expect(runners.validate).not.toHaveBeenCalled();
    expect(runners.aggregate).toHaveBeenCalledWith('2024-03-07', 30);
  });

  it('stops at a failed report and keeps what earlier stages produced', async () => {
    const runners = createRunners();
    runners.validate.mockResolvedValue(notFoundReport('2024-03-07') satisfies ValidationReport);

    const result = await new PipelineRunHandler(runners).execute(params);

    expect(runners.aggregate).not.toHaveBeenCalled();
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(PipelineStageError);
      expect(result.error.stage).toBe('validate');
      expect(result.error.category).toBe('not-found');
      expect(result.error.message).toBe(
        'validate stage failed: No snapshot found for 2024-03-07 (looked in /lake/raw/2024-03-07.json)'
      );
      expect(result.error.completed.stagesRun).toEqual(['ingest']);
      expect(result.error.completed.ingestion).toEqual(ingestion);
    }
  });

  it('carries an ingestion error category through', async () => {
    const runners = createRunners();
    runners.ingest.mockResolvedValue(err(new ConfigError('EXCHANGE_API_KEY is not set')));

    const result = await new PipelineRunHandler(runners).execute(params);

    expect(runners.validate).not.toHaveBeenCalled();
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.category).toBe('config');
      expect(result.error.completed.stagesRun).toEqual([]);
    }
  });

  it('fails on an aggregation error report', async () => {
    const runners = createRunners();
    const noData: AggregationReport = {
      status: 'error',
      targetDate: '2024-03-07',
      executionTimeSeconds: 0.02,
      errorCategory: 'no-data-for-period',
      errorMessage: 'No data found for period 2024-03-01 to 2024-03-07',
    };
    runners.aggregate.mockResolvedValue(noData);

    const result = await new PipelineRunHandler(runners).execute({ ...params, stage: 'aggregate' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.category).toBe('no-data-for-period');
      expect(result.error.stage).toBe('aggregate');
    }
  });
});

describe('checkRunDate', () => {
  it('accepts ingesting stages for today', () => {
    expect(checkRunDate({ stage: 'all', date: '2024-03-07' }, '2024-03-07').isOk()).toBe(true);
    expect(checkRunDate({ stage: 'ingest', date: '2024-03-07' }, '2024-03-07').isOk()).toBe(true);
  });

  it('rejects ingesting stages for any other date', () => {
    const result = checkRunDate({ stage: 'all', date: '2024-03-06' }, '2024-03-07');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidInputError);
      expect(result.error.message).toBe(
        'Rates can only be ingested for today (2024-03-07, UTC), not 2024-03-06. Use --stage validate or --stage aggregate for other dates'
      );
    }
    expect(checkRunDate({ stage: 'ingest', date: '2024-03-08' }, '2024-03-07').isErr()).toBe(true);
  });

  it('lets validate and aggregate target past dates', () => {
    expect(checkRunDate({ stage: 'validate', date: '2024-03-01' }, '2024-03-07').isOk()).toBe(true);
    expect(checkRunDate({ stage: 'aggregate', date: '2024-03-01' }, '2024-03-07').isOk()).toBe(true);
  });
});
