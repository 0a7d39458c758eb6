export type { Logger, LogLevel } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';
export { ConsoleLogger, SilentLogger } from './consoleLogger';
