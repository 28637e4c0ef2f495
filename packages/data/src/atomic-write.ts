/**
 * Atomic file write utilities.
 * Ensures all-or-nothing semantics for multi-file writes.
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';

import { getErrorMessage, StorageError } from '@fxlake/core';
import { err, ok, type Result } from 'neverthrow';

export interface StagedFile {
  path: string;
  /** Writes the complete file at `tempPath`; it is renamed to `path` once every file is staged */
  write: (tempPath: string) => Promise<void>;
}

/**
 * Text content staged as a StagedFile
 */
export function textFile(path: string, content: string): StagedFile {
  return {
    path,
    write: (tempPath) => fs.writeFile(tempPath, content, 'utf8'),
  };
}

interface CommittedFile {
  path: string;
  /** Where the file previously at `path` was moved; undefined when there was none */
  backupPath: string | undefined;
}

async function moveAside(filePath: string, backupPath: string): Promise<boolean> {
  try {
    await fs.rename(filePath, backupPath);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Undo committed renames, newest first, putting previous files back. Returns the failures.
 */
async function rollBack(committed: readonly CommittedFile[]): Promise<string[]> {
  const failures: string[] = [];
  for (const file of [...committed].reverse()) {
    try {
      await fs.rm(file.path, { force: true });
      if (file.backupPath) {
        await fs.rename(file.backupPath, file.path);
      }
    } catch (error) {
      failures.push(`${file.path}: ${getErrorMessage(error)}`);
    }
  }
  return failures;
}

/**
 * Atomically write multiple files.
 * Writes to temp files first, then renames them one by one, moving any previous file
 * aside. If a rename fails, the renames already done are undone and the previous files
 * restored. Cleans up temp files if any write fails.
 */
export async function writeFilesAtomically(files: StagedFile[]): Promise<Result<string[], StorageError>> {
  const tempPaths: string[] = [];
  const committed: CommittedFile[] = [];

  try {
    const uniqueDirs = [...new Set(files.map((f) => dirname(f.path)))];
    await Promise.all(uniqueDirs.map((dir) => fs.mkdir(dir, { recursive: true })));

    for (const file of files) {
      const tempPath = `${file.path}.tmp`;
      tempPaths.push(tempPath);
      await file.write(tempPath);
    }

    for (const [i, file] of files.entries()) {
      const backupPath = `${file.path}.bak`;
      const hadPrevious = await moveAside(file.path, backupPath);
      committed.push({ path: file.path, backupPath: hadPrevious ? backupPath : undefined });
      await fs.rename(tempPaths[i] ?? `${file.path}.tmp`, file.path);
    }
  } catch (error) {
    const rollbackFailures = await rollBack(committed);
    await Promise.allSettled(tempPaths.map((tempPath) => fs.rm(tempPath, { force: true })));

    const rollbackNote = rollbackFailures.length > 0 ? `; rollback incomplete: ${rollbackFailures.join(', ')}` : '';
    return err(
      new StorageError(`Failed to write ${files.length} file(s): ${getErrorMessage(error)}${rollbackNote}`, {
        files: files.map((f) => f.path),
      })
    );
  }

  await Promise.allSettled(
    committed.flatMap((file) => (file.backupPath ? [fs.rm(file.backupPath, { force: true })] : []))
  );
  return ok(files.map((f) => f.path));
}
