import type { AppError, Logger } from '@ctxgrep/shared';
import type { Interval } from '../interval';
import type { LineMatcher } from './matcher';

/** Zero-based index of a line the matcher accepted. */
export type MatchPosition = number;

export interface FileResult {
  /** Path as supplied by the caller */
  path: string;
  lines: string[];
  /** Coalesced, ascending, pairwise non-overlapping context windows */
  intervals: Interval[];
  matchCount: number;
}

export type WorkOutcome =
  | { ok: true; path: string; result: FileResult }
  | { ok: false; path: string; error: AppError };

/**
 * Read-only state shared by every worker in a batch.
 */
export interface SearchOptions {
  matcher: LineMatcher;
  /** Lines of leading context */
  before: number;
  /** Lines of trailing context */
  after: number;
  /**
   * Per-file time limit in milliseconds.
   * Default: none (wait for every file)
   */
  timeoutMs?: number;
  logger?: Logger;
}

export interface RenderOptions {
  /** Prefix with `"<n>: "` where n is 1-based */
  lineNumbers?: boolean;
  /** Prefix with `"<path>:"` */
  withFilename?: boolean;
}

/**
 * Destination for rendered output: `line` is stdout, `error` is stderr.
 */
export interface LineSink {
  line(text: string): void;
  error(text: string): void;
}

export interface BatchSummary {
  files: number;
  failed: number;
  matchedFiles: number;
  matches: number;
}
