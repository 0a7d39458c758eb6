import { EventEmitter } from 'node:events';
import { SilentLogger, type Logger } from '@ctxgrep/shared';
import { renderFileResult } from './render';
import { searchFile, type WorkerOptions } from './worker';
import type { BatchSummary, LineSink, RenderOptions, WorkOutcome } from './types';

export interface FileSearchStartedEvent {
  path: string;
  index: number;
}

export interface FileSearchFinishedEvent {
  path: string;
  index: number;
  ok: boolean;
  /** Position in completion order, 0-based */
  completed: number;
}

export interface BatchFinishedEvent extends BatchSummary {
  durationMs: number;
}

export function summarize(outcomes: readonly WorkOutcome[]): BatchSummary {
  const summary: BatchSummary = { files: outcomes.length, failed: 0, matchedFiles: 0, matches: 0 };
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      summary.failed++;
      continue;
    }
    summary.matches += outcome.result.matchCount;
    if (outcome.result.matchCount > 0) {
      summary.matchedFiles++;
    }
  }
  return summary;
}

/**
 * Runs one worker per file concurrently and hands back the outcomes in the
 * order the paths were given, whatever order the workers finish in.
 *
 * Events: `FileSearchStarted`, `FileSearchFinished`, `BatchFinished`.
 */
export class SearchRunner extends EventEmitter {
  private readonly options: Readonly<WorkerOptions>;
  private readonly logger: Logger;

  constructor(options: WorkerOptions) {
    super();
    this.options = Object.freeze({ ...options });
    this.logger = options.logger ?? new SilentLogger();
  }

  async run(paths: readonly string[]): Promise<WorkOutcome[]> {
    const startTime = Date.now();
    let completed = 0;
    this.logger.debug(`Searching ${paths.length} file(s) for /${this.options.matcher.source}/`);

    // searchFile never rejects, so Promise.all waits for every file
    const outcomes = await Promise.all(
      paths.map(async (path, index) => {
        const started: FileSearchStartedEvent = { path, index };
        this.emit('FileSearchStarted', started);
        const outcome = await searchFile(path, this.options);
        const finished: FileSearchFinishedEvent = {
          path,
          index,
          ok: outcome.ok,
          completed: completed++,
        };
        this.emit('FileSearchFinished', finished);
        return outcome;
      }),
    );

    const summary = summarize(outcomes);
    const durationMs = Date.now() - startTime;
    const finished: BatchFinishedEvent = { ...summary, durationMs };
    this.emit('BatchFinished', finished);
    this.logger.debug(
      `Finished ${summary.files} file(s) in ${durationMs}ms: ${summary.matches} matches, ${summary.failed} failed`,
    );

    return outcomes;
  }

  /**
   * Writes outcomes in order: covered lines of each successful file to
   * `sink.line`, failures to `sink.error`.
   */
  render(outcomes: readonly WorkOutcome[], sink: LineSink, options: RenderOptions = {}): void {
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        sink.error(outcome.error.message);
        continue;
      }
      for (const line of renderFileResult(outcome.result, options)) {
        sink.line(line);
      }
    }
  }
}
