import { Command, CommanderError } from 'commander';
import { UsageError } from '@ctxgrep/shared';
import { version } from '../package.json';
import { registerSearchCommand } from './commands/search';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ctxgrep')
    .description('Search files for a pattern and print matches with merged context')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Parse failures are thrown and reported by the caller, not printed here
    .exitOverride()
    .configureOutput({ outputError: () => {} });

  registerSearchCommand(program);

  return program;
}

/**
 * Parses `argv` and runs the search. Commander parse failures (unknown
 * option, missing operand) become UsageError; `--help` and `--version`
 * resolve normally.
 */
export async function parseArgs(program: Command, argv: string[]): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (e) {
    if (!(e instanceof CommanderError)) {
      throw e;
    }
    if (e.exitCode === 0) {
      return;
    }
    throw new UsageError(e.message.replace(/^error: /, ''), {
      cause: e,
      details: { code: e.code },
    });
  }
}
