import { promises as fs } from 'node:fs';

import type { IsoDate, RateObservation, StorageError } from '@fxlake/core';
import { ok, type Result } from 'neverthrow';

import { writeFilesAtomically } from '../atomic-write.js';
import type { LakePaths } from '../lake-paths.js';
import { parquetFile, readParquetFile } from '../parquet/parquet-io.js';
import { exchangeRatesTable } from '../parquet/tables.js';

import { BaseRepository, isNotFoundError } from './base-repository.js';

/**
 * Silver layer: validated observations, one Parquet file per collection date
 */
export interface ISilverRepository {
  /**
   * Load the observations validated for `date`; undefined when that date has no silver file.
   */
  load(date: IsoDate): Promise<Result<RateObservation[] | undefined, StorageError>>;

  /**
   * Replace the silver file for `date`. Returns the file path.
   */
  save(date: IsoDate, observations: readonly RateObservation[]): Promise<Result<string, StorageError>>;

  pathFor(date: IsoDate): string;
}

export class SilverRepository extends BaseRepository implements ISilverRepository {
  constructor(paths: LakePaths) {
    super(paths, 'SilverRepository');
  }

  pathFor(date: IsoDate): string {
    return this.paths.silverObservations(date);
  }

  async load(date: IsoDate): Promise<Result<RateObservation[] | undefined, StorageError>> {
    const filePath = this.pathFor(date);

    try {
      await fs.access(filePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        return ok(undefined);
      }
      return this.storageFailure(error, 'Failed to access silver file', filePath);
    }

    try {
      const result = await readParquetFile(filePath, exchangeRatesTable);
      if (result.isOk()) {
        this.logger.debug({ filePath, records: result.value.length }, 'Loaded silver observations');
      }
      return result;
    } catch (error) {
      return this.storageFailure(error, 'Failed to read silver file', filePath);
    }
  }

  async save(date: IsoDate, observations: readonly RateObservation[]): Promise<Result<string, StorageError>> {
    const filePath = this.pathFor(date);
    const written = await writeFilesAtomically([parquetFile(filePath, exchangeRatesTable, observations)]);

    return written.map(() => {
      this.logger.info({ filePath, records: observations.length }, 'Saved silver observations');
      return filePath;
    });
  }
}
