import { Command } from 'commander';
import { ConfigLoader, SearchRunner, compileMatcher } from '@ctxgrep/core';
import { ConsoleLogger, SilentLogger, type Logger } from '@ctxgrep/shared';
import type { GlobalOptions } from '../types';
import { OutputRenderer } from '../output/renderer';

export interface SearchCommandOptions {
  lineNumber?: boolean;
  withFilename?: boolean;
  beforeContext?: string;
  afterContext?: string;
  context?: string;
  ignoreCase?: boolean;
  fixedStrings?: boolean;
  invertMatch?: boolean;
  count?: boolean;
  timeout?: string;
  color?: string;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Maps parsed CLI options onto config keys. Unset flags stay undefined so
 * they do not override config files. Values are validated by the config
 * schema, not here.
 */
export function toConfigFlags(options: SearchCommandOptions): Record<string, unknown> {
  const context = toNumber(options.context);
  const flags: Record<string, unknown> = {
    lineNumbers: options.lineNumber,
    withFilename: options.withFilename,
    before: toNumber(options.beforeContext) ?? context,
    after: toNumber(options.afterContext) ?? context,
    ignoreCase: options.ignoreCase,
    fixedStrings: options.fixedStrings,
    invert: options.invertMatch,
    count: options.count,
    timeoutMs: toNumber(options.timeout),
    color: options.color,
  };
  for (const key of Object.keys(flags)) {
    if (flags[key] === undefined) delete flags[key];
  }
  return flags;
}

/**
 * Declares the search operands and flags on the root program. The pattern is
 * a plain argument, so words such as `search` or `help` are searched for
 * like any other.
 */
export function registerSearchCommand(program: Command) {
  program
    .argument('<pattern>', 'Pattern to search for')
    .argument('<files...>', 'Files to search, printed in the order given')
    .option('-n, --line-number', 'Prefix each line with its 1-based line number')
    .option('-H, --with-filename', 'Prefix each line with the file name')
    .option('-B, --before-context <num>', 'Print NUM lines of leading context')
    .option('-A, --after-context <num>', 'Print NUM lines of trailing context')
    .option('-C, --context <num>', 'Print NUM lines of leading and trailing context')
    .option('-i, --ignore-case', 'Ignore case distinctions in the pattern')
    .option('-F, --fixed-strings', 'Treat the pattern as a literal string')
    .option('-v, --invert-match', 'Select non-matching lines')
    .option('-c, --count', 'Print only a count of matching lines per file')
    .option('--timeout <ms>', 'Give up on a file after this many milliseconds')
    .option('--color <when>', 'Colorize errors: auto, always or never')
    .action(
      async (pattern: string, files: string[], options: SearchCommandOptions & GlobalOptions) => {
        const config = ConfigLoader.load({
          configPath: options.config,
          flags: toConfigFlags(options),
        });

        const logger: Logger = options.verbose
          ? new ConsoleLogger({ level: 'debug', useStderr: true })
          : new SilentLogger();

        // An invalid pattern fails here, before any file is opened
        const matcher = compileMatcher(pattern, {
          ignoreCase: config.ignoreCase,
          fixedStrings: config.fixedStrings,
          invert: config.invert,
        });

        const runner = new SearchRunner({
          matcher,
          before: config.before,
          after: config.after,
          timeoutMs: config.timeoutMs,
          logger,
        });
        const outcomes = await runner.run(files);

        const renderer = new OutputRenderer({ json: options.json, color: config.color });
        renderer.render(outcomes, runner, {
          lineNumbers: config.lineNumbers,
          withFilename: config.withFilename,
          count: config.count,
        });
      },
    );
}
