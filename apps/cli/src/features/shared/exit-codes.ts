import type { PipelineErrorCategory } from '@fxlake/core';

/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Snapshot or silver data not found */
  NOT_FOUND: 4,

  /** Network or provider error */
  NETWORK_ERROR: 6,

  /** Lake read or write failed */
  STORAGE_ERROR: 7,

  /** Input data failed validation */
  VALIDATION_ERROR: 8,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const CATEGORY_EXIT_CODES: Record<PipelineErrorCategory, ExitCode> = {
  input: ExitCodes.VALIDATION_ERROR,
  'not-found': ExitCodes.NOT_FOUND,
  'empty-batch': ExitCodes.VALIDATION_ERROR,
  'no-data-for-period': ExitCodes.NOT_FOUND,
  storage: ExitCodes.STORAGE_ERROR,
  network: ExitCodes.NETWORK_ERROR,
  config: ExitCodes.CONFIG_ERROR,
  unexpected: ExitCodes.GENERAL_ERROR,
};

export function exitCodeForCategory(category: PipelineErrorCategory): ExitCode {
  return CATEGORY_EXIT_CODES[category];
}
