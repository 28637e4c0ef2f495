import { PipelineError, toIsoDate, type ErrorReport, type IsoDate, type PipelineErrorCategory } from '@fxlake/core';

/**
 * Check for --json before option validation, to pick the output format for the validation error itself
 */
export function isJsonFlagSet(rawOptions: unknown): boolean {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Today's calendar date in UTC */
export function todayUtc(now: Date = new Date()): IsoDate {
  return toIsoDate(now);
}

/**
 * A stage's error report raised as an error, keeping its category for the exit code
 */
export class ReportedFailure extends PipelineError {
  readonly category: PipelineErrorCategory;

  constructor(report: ErrorReport) {
    super(report.errorMessage, {
      executionTimeSeconds: report.executionTimeSeconds,
      targetDate: report.targetDate,
    });
    this.category = report.errorCategory;
  }
}
