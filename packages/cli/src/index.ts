export const name = '@ctxgrep/cli';

export { createProgram, parseArgs } from './program';
export { registerSearchCommand, toConfigFlags } from './commands/search';
export type { SearchCommandOptions } from './commands/search';
export { OutputRenderer, buildJsonReport } from './output/renderer';
export type { GlobalOptions } from './types';
