import { ParquetReader, ParquetWriter } from '@dsnp/parquetjs';
import { formatZodIssues, StorageError } from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';

import type { StagedFile } from '../atomic-write.js';

import type { ParquetTable } from './tables.js';

/**
 * Write `records` to a Parquet file at `filePath`, in order
 */
export async function writeParquetFile<T>(filePath: string, table: ParquetTable<T>, records: readonly T[]): Promise<void> {
  const writer = await ParquetWriter.openFile(table.schema, filePath);
  try {
    for (const record of records) {
      await writer.appendRow(table.toRow(record));
    }
  } finally {
    await writer.close();
  }
}

/**
 * Parquet output staged for writeFilesAtomically
 */
export function parquetFile<T>(filePath: string, table: ParquetTable<T>, records: readonly T[]): StagedFile {
  return {
    path: filePath,
    write: (tempPath) => writeParquetFile(tempPath, table, records),
  };
}

/**
 * Read every row of a Parquet file and validate it against the table's row schema.
 * The first invalid row fails the whole read.
 */
export async function readParquetFile<T>(filePath: string, table: ParquetTable<T>): Promise<Result<T[], StorageError>> {
  const reader = await ParquetReader.openFile(filePath);
  try {
    const cursor = reader.getCursor();
    const records: T[] = [];

    let row: unknown = await cursor.next();
    while (row !== null && row !== undefined) {
      const parsed = table.rowSchema.safeParse(row);
      if (!parsed.success) {
        return err(
          new StorageError(
            `Row ${records.length} of ${filePath} does not match ${table.name}: ${formatZodIssues(parsed.error).join('; ')}`,
            { filePath, table: table.name }
          )
        );
      }
      records.push(parsed.data);
      row = await cursor.next();
    }

    return ok(records);
  } finally {
    await reader.close();
  }
}
