import { promises as fs } from 'node:fs';

import {
  formatZodIssues,
  getErrorMessage,
  MalformedSnapshotError,
  RawSnapshotEnvelopeSchema,
  SnapshotNotFoundError,
  type IsoDate,
  type RawSnapshotEnvelope,
  type StorageError,
} from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';

import { textFile, writeFilesAtomically } from '../atomic-write.js';
import type { LakePaths } from '../lake-paths.js';

import { BaseRepository, isNotFoundError } from './base-repository.js';

export type RawSnapshotLoadError = SnapshotNotFoundError | MalformedSnapshotError | StorageError;

/**
 * Raw layer: one JSON envelope per collection date, stored exactly as fetched
 */
export interface IRawSnapshotRepository {
  /**
   * Load and structurally validate the envelope collected on `date`.
   */
  load(date: IsoDate): Promise<Result<RawSnapshotEnvelope, RawSnapshotLoadError>>;

  /**
   * Store an envelope under its collection date, replacing any earlier one. Returns the file path.
   */
  save(envelope: RawSnapshotEnvelope): Promise<Result<string, StorageError>>;

  pathFor(date: IsoDate): string;
}

export class RawSnapshotRepository extends BaseRepository implements IRawSnapshotRepository {
  constructor(paths: LakePaths) {
    super(paths, 'RawSnapshotRepository');
  }

  pathFor(date: IsoDate): string {
    return this.paths.rawSnapshot(date);
  }

  async load(date: IsoDate): Promise<Result<RawSnapshotEnvelope, RawSnapshotLoadError>> {
    const filePath = this.pathFor(date);

    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return err(new SnapshotNotFoundError(date, filePath));
      }
      return this.storageFailure(error, 'Failed to read raw snapshot', filePath);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      return err(new MalformedSnapshotError(`Raw snapshot ${filePath} is not valid JSON`, [getErrorMessage(error)]));
    }

    const parsed = RawSnapshotEnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      return err(new MalformedSnapshotError(`Raw snapshot ${filePath} is malformed`, formatZodIssues(parsed.error)));
    }

    this.logger.debug(
      { filePath, rates: Object.keys(parsed.data.api_response.conversion_rates).length },
      'Loaded raw snapshot'
    );
    return ok(parsed.data);
  }

  async save(envelope: RawSnapshotEnvelope): Promise<Result<string, StorageError>> {
    const filePath = this.pathFor(envelope.pipeline_metadata.collection_date);
    const written = await writeFilesAtomically([textFile(filePath, JSON.stringify(envelope, undefined, 2))]);

    return written.map(() => {
      this.logger.info({ filePath }, 'Saved raw snapshot');
      return filePath;
    });
  }
}
