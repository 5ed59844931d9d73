import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { debug } from '../debug.js';
import type { ReportRow } from '../domain/types.js';
import { OutputWriteError, errorMessage } from '../errors.js';
import { renderCsv, renderTsv } from './table.js';

/** The subset of a writable stream the TSV writer needs; `process.stdout` satisfies it. */
export interface OutputStream {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
  once(event: 'error', listener: (error: Error) => void): unknown;
  off(event: 'error', listener: (error: Error) => void): unknown;
}

export const writeTsv = (stream: OutputStream, rows: ReportRow[]): Promise<void> => {
  debug('writeTsv start', { rows: rows.length });
  const tsv = renderTsv(rows);
  return new Promise((resolveWrite, rejectWrite) => {
    // A failed write reports through the callback and then emits 'error'; the listener stays
    // attached until that event so it is never unhandled.
    const onError = (error: Error): void => {
      debug('writeTsv failed', { error });
      rejectWrite(new OutputWriteError(`Failed to write report to standard output: ${error.message}`, { cause: error }));
    };
    stream.once('error', onError);
    stream.write(tsv, (error) => {
      if (error) {
        onError(error);
        return;
      }
      stream.off('error', onError);
      debug('writeTsv end', { bytes: tsv.length });
      resolveWrite();
    });
  });
};

/** Creates or truncates `outputPath` with the CSV report and returns its absolute path. */
export const writeCsvReport = async (outputPath: string, rows: ReportRow[]): Promise<string> => {
  debug('writeCsvReport start', { outputPath, rows: rows.length });
  const abs = resolve(outputPath);
  try {
    await writeFile(abs, renderCsv(rows), 'utf8');
  } catch (error) {
    debug('writeCsvReport failed', { abs, error });
    throw new OutputWriteError(`Failed to write CSV to ${abs}: ${errorMessage(error)}`, { cause: error });
  }
  debug('writeCsvReport end', { abs });
  return abs;
};
