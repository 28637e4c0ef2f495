import { getErrorCategory, getErrorMessage } from '../errors.js';
import type { ErrorReport } from '../schemas/report.js';

import type { IsoDate } from './date-utils.js';

/**
 * Seconds elapsed since `startedAt` (epoch ms), to millisecond precision
 */
export function elapsedSeconds(startedAt: number, now: number): number {
  return Math.round(now - startedAt) / 1000;
}

export function buildErrorReport(targetDate: IsoDate, executionTimeSeconds: number, error: unknown): ErrorReport {
  return {
    status: 'error',
    targetDate,
    executionTimeSeconds,
    errorCategory: getErrorCategory(error),
    errorMessage: getErrorMessage(error),
  };
}
