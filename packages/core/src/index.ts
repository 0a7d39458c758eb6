export const name = '@ctxgrep/core';

export * from './interval';
export * from './search';
export * from './config/loader';
