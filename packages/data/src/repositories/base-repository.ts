import { getErrorMessage, StorageError } from '@fxlake/core';
import { getLogger, type Logger } from '@fxlake/logger';
import { err, type Result } from 'neverthrow';

import type { LakePaths } from '../lake-paths.js';

export abstract class BaseRepository {
  protected readonly paths: LakePaths;
  protected readonly logger: Logger;

  constructor(paths: LakePaths, repositoryName: string) {
    this.paths = paths;
    this.logger = getLogger(repositoryName);
  }

  /**
   * Wrap an unknown failure as a StorageError with context
   */
  protected storageFailure<T = never>(error: unknown, context: string, filePath: string): Result<T, StorageError> {
    const message = `${context}: ${getErrorMessage(error)}`;
    this.logger.error({ filePath }, message);
    return err(new StorageError(message, { filePath }));
  }
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
