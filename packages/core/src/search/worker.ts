import { SilentLogger, TimeoutError, toAppError } from '@ctxgrep/shared';
import { buildContextWindows, coalesceIntervals } from '../interval';
import { readFileLines, toFileAccessError, type LineReader } from './lines';
import type { LineMatcher } from './matcher';
import type { FileResult, MatchPosition, SearchOptions, WorkOutcome } from './types';

export interface WorkerOptions extends SearchOptions {
  /** Source of file lines. Default: UTF-8 read from disk */
  reader?: LineReader;
}

export function findMatches(lines: readonly string[], matcher: LineMatcher): MatchPosition[] {
  const positions: MatchPosition[] = [];
  for (let i = 0; i < lines.length; i++) {
    if (matcher.test(lines[i])) {
      positions.push(i);
    }
  }
  return positions;
}

/**
 * Matches, windows and coalesces one file's lines.
 *
 * @throws IntervalError if a margin yields an invalid window
 */
export function computeFileResult(
  path: string,
  lines: string[],
  options: Pick<SearchOptions, 'matcher' | 'before' | 'after'>,
): FileResult {
  const positions = findMatches(lines, options.matcher);
  const lastIndex = Math.max(lines.length - 1, 0);
  const windows = buildContextWindows(positions, options.before, options.after, lastIndex);
  return {
    path,
    lines,
    intervals: coalesceIntervals(windows),
    matchCount: positions.length,
  };
}

async function withTimeout<T>(
  path: string,
  work: (signal?: AbortSignal) => Promise<T>,
  timeoutMs?: number,
): Promise<T> {
  if (timeoutMs === undefined) {
    return work();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new TimeoutError(`${path}: timed out after ${timeoutMs}ms`, {
          timeoutMs,
          details: { path },
        }),
      );
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Searches a single file. Never rejects: every failure comes back as an
 * `ok: false` outcome so one bad file cannot abort the batch.
 */
export async function searchFile(path: string, options: WorkerOptions): Promise<WorkOutcome> {
  const log = (options.logger ?? new SilentLogger()).child({ file: path });
  const reader = options.reader ?? readFileLines;

  try {
    const lines = await withTimeout(
      path,
      (signal) =>
        reader(path, signal).catch((error: unknown) => {
          throw toFileAccessError(path, error);
        }),
      options.timeoutMs,
    );
    const result = computeFileResult(path, lines, options);
    log.debug(
      `${lines.length} lines, ${result.matchCount} matches, ${result.intervals.length} blocks`,
    );
    return { ok: true, path, result };
  } catch (error) {
    const appError = toAppError(error);
    log.debug(`failed with ${appError.code}: ${appError.message}`);
    return { ok: false, path, error: appError };
  }
}
