export const name = '@ctxgrep/shared';

export * from './errors';
export * from './logger';
export * from './config/schema';
