import type { Logger, LogLevel } from './types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** Minimum level that is written. Default: info */
  level?: LogLevel;
  /** Route debug and info through console.error so stdout stays clean */
  useStderr?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly useStderr: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? 'info'];
    this.useStderr = options.useStderr ?? false;
  }

  debug(message: string): void {
    if (!this.enabled('debug')) return;
    if (this.useStderr) {
      console.error(message);
    } else {
      console.debug(message);
    }
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    if (this.useStderr) {
      console.error(message);
    } else {
      console.info(message);
    }
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

/**
 * Discards everything. Library code logs here unless a caller passes a logger.
 */
export class SilentLogger implements Logger {
  debug(_message: string): void {}
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_error: Error, _message?: string): void {}
  child(_bindings: Record<string, unknown>): Logger {
    return this;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
