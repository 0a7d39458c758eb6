export * from './types';
export { compileMatcher, escapeRegExp } from './matcher';
export type { LineMatcher, MatcherOptions } from './matcher';
export { readFileLines, splitLines, toFileAccessError } from './lines';
export type { LineReader } from './lines';
export { searchFile, computeFileResult, findMatches } from './worker';
export type { WorkerOptions } from './worker';
export { renderFileResult, toBlocks, formatLine } from './render';
export type { RenderedBlock } from './render';
export { SearchRunner, summarize } from './runner';
export type { FileSearchStartedEvent, FileSearchFinishedEvent, BatchFinishedEvent } from './runner';
