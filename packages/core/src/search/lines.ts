import fs from 'node:fs/promises';
import { AppError, FileAccessError } from '@ctxgrep/shared';

/**
 * Loads a file as a list of lines. The signal aborts the read.
 */
export type LineReader = (path: string, signal?: AbortSignal) => Promise<string[]>;

/**
 * Splits text on `\n` or `\r\n`. A trailing line terminator does not produce
 * an extra empty line, and empty text has no lines.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Maps whatever a read threw to a FileAccessError naming the file.
 */
export function toFileAccessError(path: string, error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new FileAccessError(path, `${path}: ${reason}`, {
    cause: error,
    details: { path, code: errnoCode(error) ?? 'UNKNOWN' },
  });
}

/**
 * Reads `path` as strict UTF-8. Undecodable bytes fail the read instead of
 * turning into U+FFFD.
 */
export const readFileLines: LineReader = async (path, signal) => {
  try {
    const bytes = await fs.readFile(path, { signal });
    return splitLines(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (error) {
    throw toFileAccessError(path, error);
  }
};
