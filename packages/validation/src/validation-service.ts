import {
  buildErrorReport,
  elapsedSeconds,
  EmptyBatchError,
  getErrorMessage,
  InvalidInputError,
  isIsoDate,
  toRawSnapshot,
  UnexpectedError,
  type IsoDate,
  type PipelineError,
  type RejectionSample,
  type ValidationReport,
  type ValidationSuccessReport,
} from '@fxlake/core';
import type { IRawSnapshotRepository, ISilverRepository } from '@fxlake/data';
import { getLogger, type Logger } from '@fxlake/logger';
import { err, ok, type Result } from 'neverthrow';

import { normalizeSnapshot } from './normalizer.js';
import { scoreQuality } from './quality-scorer.js';
import { validateObservations, type RejectedObservation } from './record-validator.js';

const REJECTION_SAMPLE_SIZE = 3;

type CompletedValidation = Omit<ValidationSuccessReport, 'executionTimeSeconds'>;

export interface ValidationServiceOptions {
  now?: () => number;
}

function toRejectionSample(rejection: RejectedObservation): RejectionSample {
  return {
    index: rejection.index,
    targetCurrency: rejection.record.targetCurrency,
    violations: rejection.violations,
  };
}

/**
 * Silver stage: raw snapshot of one date -> validated, quality-scored observations on disk.
 */
export class ValidationService {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly rawRepository: IRawSnapshotRepository,
    private readonly silverRepository: ISilverRepository,
    options: ValidationServiceOptions = {}
  ) {
    this.logger = getLogger('ValidationService');
    this.now = options.now ?? Date.now;
  }

  /**
   * Run the silver stage for `date`. Always resolves to a report; fatal conditions
   * become an error report and leave the silver layer untouched.
   */
  async processDate(date: IsoDate): Promise<ValidationReport> {
    const startedAt = this.now();
    this.logger.info({ targetDate: date }, 'Starting silver validation');

    let result: Result<CompletedValidation, PipelineError>;
    try {
      result = await this.run(date);
    } catch (error) {
      result = err(new UnexpectedError(`Unexpected error validating ${date}: ${getErrorMessage(error)}`));
    }

    const executionTimeSeconds = elapsedSeconds(startedAt, this.now());

    if (result.isErr()) {
      this.logger.error(
        { category: result.error.category, executionTimeSeconds, targetDate: date },
        `Silver validation failed: ${result.error.message}`
      );
      return buildErrorReport(date, executionTimeSeconds, result.error);
    }

    const report: ValidationSuccessReport = { ...result.value, executionTimeSeconds };
    this.logger.info(
      {
        executionTimeSeconds,
        finalRecords: report.output.finalRecords,
        qualityScore: report.quality.overallScore,
        targetDate: date,
      },
      'Silver validation completed'
    );
    return report;
  }

  private async run(date: IsoDate): Promise<Result<CompletedValidation, PipelineError>> {
    if (!isIsoDate(date)) {
      return err(new InvalidInputError(`Invalid date '${date}': expected YYYY-MM-DD`));
    }

    const envelopeResult = await this.rawRepository.load(date);
    if (envelopeResult.isErr()) {
      return err(envelopeResult.error);
    }

    const records = normalizeSnapshot(toRawSnapshot(envelopeResult.value));
    this.logger.info({ records: records.length }, 'Normalized raw snapshot');

    const outcome = validateObservations(records);
    if (outcome.rejected.length > 0) {
      this.logger.warn(
        {
          rejected: outcome.rejected.length,
          samples: outcome.rejected.slice(0, REJECTION_SAMPLE_SIZE).map(toRejectionSample),
        },
        'Records rejected by validation'
      );
    }
    if (outcome.accepted.length === 0) {
      return err(new EmptyBatchError(`No valid records after validation (${outcome.total} rejected)`, { date }));
    }

    // Scored over the whole normalized batch so rejected records weigh on the score
    const quality = scoreQuality(records, new Date(this.now()));

    const savedResult = await this.silverRepository.save(date, outcome.accepted);
    if (savedResult.isErr()) {
      return err(savedResult.error);
    }

    const report: CompletedValidation = {
      status: 'success',
      targetDate: date,
      input: {
        rawFile: this.rawRepository.pathFor(date),
        totalRawRecords: outcome.total,
      },
      processing: {
        validatedRecords: outcome.accepted.length,
        invalidRecords: outcome.rejected.length,
        validationSuccessRate: outcome.successRate,
        rejectionSamples: outcome.rejected.slice(0, REJECTION_SAMPLE_SIZE).map(toRejectionSample),
      },
      output: {
        silverFile: savedResult.value,
        finalRecords: outcome.accepted.length,
      },
      quality,
    };
    return ok(report);
  }
}
