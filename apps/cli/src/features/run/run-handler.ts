import {
  InvalidInputError,
  PipelineError,
  type AggregationReport,
  type AggregationSuccessReport,
  type ErrorReport,
  type IsoDate,
  type PipelineErrorCategory,
  type ValidationReport,
  type ValidationSuccessReport,
} from '@fxlake/core';
import type { IngestionResult } from '@fxlake/ingestion';
import { getLogger } from '@fxlake/logger';
import { err, ok, type Result } from 'neverthrow';

import type { CommandContext } from '../shared/command-runtime.js';
import { PIPELINE_STAGES, type PipelineStage } from '../shared/schemas.js';

const logger = getLogger('PipelineRunHandler');

/**
 * The three stages behind narrow signatures, so the handler can run against fakes
 */
export interface StageRunners {
  ingest(params: { baseCurrency: string }): Promise<Result<IngestionResult, PipelineError>>;
  validate(date: IsoDate): Promise<ValidationReport>;
  aggregate(date: IsoDate, daysBack: number): Promise<AggregationReport>;
}

export interface PipelineRunParams {
  stage: 'all' | PipelineStage;
  date: IsoDate;
  baseCurrency: string;
  daysBack: number;
}

export interface PipelineRunResult {
  date: IsoDate;
  stagesRun: PipelineStage[];
  ingestion?: IngestionResult | undefined;
  validation?: ValidationSuccessReport | undefined;
  aggregation?: AggregationSuccessReport | undefined;
}

/**
 * A stage failed; `completed` holds what the earlier stages produced
 */
export class PipelineStageError extends PipelineError {
  readonly category: PipelineErrorCategory;

  constructor(
    readonly stage: PipelineStage,
    category: PipelineErrorCategory,
    message: string,
    readonly completed: PipelineRunResult
  ) {
    super(`${stage} stage failed: ${message}`, { stage });
    this.category = category;
  }
}

export function stageRunnersFor(ctx: CommandContext): StageRunners {
  return {
    ingest: async ({ baseCurrency }) => {
      const ingester = ctx.snapshotIngester();
      if (ingester.isErr()) {
        return err(ingester.error);
      }
      return ingester.value.collectDailyRates({ baseCurrency });
    },
    validate: (date) => ctx.validationService().processDate(date),
    aggregate: (date, daysBack) => ctx.aggregationService().processDate(date, { daysBack }),
  };
}

/**
 * The provider only serves the latest rates, so a run that ingests must target today.
 */
export function checkRunDate(
  params: Pick<PipelineRunParams, 'date' | 'stage'>,
  today: IsoDate
): Result<void, InvalidInputError> {
  const ingests = params.stage === 'all' || params.stage === 'ingest';
  if (ingests && params.date !== today) {
    return err(
      new InvalidInputError(
        `Rates can only be ingested for today (${today}, UTC), not ${params.date}. Use --stage validate or --stage aggregate for other dates`
      )
    );
  }
  return ok(undefined);
}

/**
 * Runs the selected stages in order (ingest, validate, aggregate) for one date and
 * stops at the first failure.
 */
export class PipelineRunHandler {
  constructor(private readonly runners: StageRunners) {}

  async execute(params: PipelineRunParams): Promise<Result<PipelineRunResult, PipelineStageError>> {
    const stages = params.stage === 'all' ? [...PIPELINE_STAGES] : [params.stage];
    const result: PipelineRunResult = { date: params.date, stagesRun: [] };

    for (const stage of stages) {
      logger.info({ date: params.date, stage }, 'Running pipeline stage');
      const failure = await this.runStage(stage, params, result);
      if (failure) {
        logger.error({ category: failure.category, stage }, failure.message);
        return err(failure);
      }
      result.stagesRun.push(stage);
    }

    return ok(result);
  }

  private async runStage(
    stage: PipelineStage,
    params: PipelineRunParams,
    result: PipelineRunResult
  ): Promise<PipelineStageError | undefined> {
    switch (stage) {
      case 'ingest': {
        const ingestion = await this.runners.ingest({ baseCurrency: params.baseCurrency });
        if (ingestion.isErr()) {
          return new PipelineStageError(stage, ingestion.error.category, ingestion.error.message, result);
        }
        result.ingestion = ingestion.value;
        return undefined;
      }
      case 'validate': {
        const report = await this.runners.validate(params.date);
        if (report.status === 'error') {
          return fromErrorReport(stage, report, result);
        }
        result.validation = report;
        return undefined;
      }
      case 'aggregate': {
        const report = await this.runners.aggregate(params.date, params.daysBack);
        if (report.status === 'error') {
          return fromErrorReport(stage, report, result);
        }
        result.aggregation = report;
        return undefined;
      }
    }
  }
}

function fromErrorReport(stage: PipelineStage, report: ErrorReport, completed: PipelineRunResult): PipelineStageError {
  return new PipelineStageError(stage, report.errorCategory, report.errorMessage, completed);
}
