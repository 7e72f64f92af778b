/**
 * @fileoverview CSV persistence for output rows
 */

import { writeFile } from 'node:fs/promises';
import { stringify } from 'csv-stringify/sync';
import { OutputWriteError } from '@ibhist/contracts';
import type { OutputRow } from '@ibhist/contracts';

export const VALUE_COLUMNS = ['Open', 'High', 'Low', 'Close', 'Volume'] as const;

/**
 * Error codes that indicate a locked or protected target rather than a bug.
 */
const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EBUSY', 'EROFS']);

export const PERMISSION_GUIDANCE: readonly string[] = [
  'Possible causes:',
  '  - File is currently open in Excel or another application',
  '  - Insufficient write permissions in the directory',
  '  - File is marked as read-only',
  'Solutions:',
  '  - Close the file in any applications and try again',
  '  - Check the permissions of the output directory',
  '  - Choose a different output directory',
];

/**
 * Renders rows as CSV text with a `<dateColumn>,Open,High,Low,Close,Volume` header.
 */
export function renderBarsCsv(dateColumn: string, rows: readonly OutputRow[]): string {
  return stringify(
    rows.map((row) => [row.timestamp, row.open, row.high, row.low, row.close, row.volume]),
    { header: true, columns: [dateColumn, ...VALUE_COLUMNS] }
  );
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Writes the rows to `filePath` in a single write. Not retried.
 *
 * @throws {OutputWriteError} On permission, lock or read-only failures; other
 * filesystem errors propagate unchanged
 */
export async function writeBarsCsv(filePath: string, dateColumn: string, rows: readonly OutputRow[]): Promise<void> {
  const content = renderBarsCsv(dateColumn, rows);

  try {
    await writeFile(filePath, content, 'utf-8');
  } catch (error) {
    const code = errnoCode(error);
    if (code !== undefined && PERMISSION_CODES.has(code)) {
      throw new OutputWriteError(
        `Permission denied while saving file: ${filePath}`,
        { path: filePath, guidance: [...PERMISSION_GUIDANCE], errno: code },
        { cause: error }
      );
    }
    throw error;
  }
}
