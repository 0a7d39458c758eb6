import pc from 'picocolors';
import {
  SearchRunner,
  summarize,
  toBlocks,
  type BatchSummary,
  type LineSink,
  type RenderOptions,
  type RenderedBlock,
  type WorkOutcome,
} from '@ctxgrep/core';

export type ColorMode = 'auto' | 'always' | 'never';

export interface RendererOptions {
  json?: boolean;
  color?: ColorMode;
}

export interface ResultDisplayOptions extends RenderOptions {
  /** Print `<path>:<n>` per file instead of lines */
  count?: boolean;
}

export interface JsonFileReport {
  path: string;
  ok: boolean;
  matches?: number;
  blocks?: RenderedBlock[];
  error?: { code: string; message: string; details?: Record<string, unknown> | string };
}

export interface JsonReport {
  files: JsonFileReport[];
  summary: BatchSummary;
}

export function buildJsonReport(outcomes: readonly WorkOutcome[]): JsonReport {
  const files = outcomes.map((outcome): JsonFileReport => {
    if (!outcome.ok) {
      const { code, message, details } = outcome.error;
      return { path: outcome.path, ok: false, error: { code, message, details } };
    }
    return {
      path: outcome.path,
      ok: true,
      matches: outcome.result.matchCount,
      blocks: toBlocks(outcome.result),
    };
  });
  return { files, summary: summarize(outcomes) };
}

/**
 * Writes search results to stdout and problems to stderr.
 */
export class OutputRenderer implements LineSink {
  private readonly isJson: boolean;
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(options: RendererOptions = {}) {
    this.isJson = options.json ?? false;
    const mode = options.color ?? 'auto';
    this.colors = pc.createColors(mode === 'auto' ? pc.isColorSupported : mode === 'always');
  }

  render(outcomes: readonly WorkOutcome[], runner: SearchRunner, options: ResultDisplayOptions = {}) {
    if (this.isJson) {
      console.log(JSON.stringify(buildJsonReport(outcomes), null, 2));
      return;
    }
    if (options.count) {
      this.renderCounts(outcomes, options.withFilename || outcomes.length > 1);
      return;
    }
    runner.render(outcomes, this, options);
  }

  private renderCounts(outcomes: readonly WorkOutcome[], withFilename: boolean): void {
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        this.error(outcome.error.message);
        continue;
      }
      const n = outcome.result.matchCount;
      console.log(withFilename ? `${outcome.path}:${n}` : String(n));
    }
  }

  line(text: string): void {
    console.log(text);
  }

  error(message: string | Error): void {
    const msg = message instanceof Error ? message.message : message;
    if (this.isJson) {
      console.error(JSON.stringify({ error: msg }));
    } else {
      console.error(this.colors.red(msg));
    }
  }
}
