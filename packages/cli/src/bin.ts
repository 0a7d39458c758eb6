#!/usr/bin/env node
import { AppError, exitCodeFor } from '@ctxgrep/shared';
import { createProgram, parseArgs } from './program';
import type { GlobalOptions } from './types';

const program = createProgram();

async function main() {
  try {
    await parseArgs(program, process.argv);
  } catch (e) {
    const opts = program.opts<GlobalOptions>();

    if (opts.json) {
      console.error(
        JSON.stringify({
          error: {
            code: e instanceof AppError ? e.code : 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
            details: e instanceof AppError ? e.details : undefined,
          },
        }),
      );
    } else {
      console.error(`ctxgrep: ${(e instanceof Error && e.message) || String(e)}`);
      if (opts.verbose && e instanceof Error && e.stack) {
        console.error(`\nStack Trace:\n${e.stack}`);
      }
    }

    process.exit(exitCodeFor(e));
  }
}

void main();
