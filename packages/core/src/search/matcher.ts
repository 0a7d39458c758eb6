import { ConfigError } from '@ctxgrep/shared';

/**
 * Decides whether a single line is selected. Implementations must be
 * stateless so one instance can be shared by concurrent workers.
 */
export interface LineMatcher {
  readonly source: string;
  test(line: string): boolean;
}

export interface MatcherOptions {
  ignoreCase?: boolean;
  /** Treat the pattern as a literal string */
  fixedStrings?: boolean;
  /** Select lines that do not match */
  invert?: boolean;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

class RegExpMatcher implements LineMatcher {
  constructor(
    private readonly regex: RegExp,
    private readonly invert: boolean,
  ) {}

  get source(): string {
    return this.regex.source;
  }

  test(line: string): boolean {
    // no 'g' or 'y' flag, so lastIndex is never consulted
    return this.regex.test(line) !== this.invert;
  }
}

/**
 * Compiles a pattern into a {@link LineMatcher}.
 *
 * @throws ConfigError when the pattern is not a valid regular expression.
 */
export function compileMatcher(pattern: string, options: MatcherOptions = {}): LineMatcher {
  const source = options.fixedStrings ? escapeRegExp(pattern) : pattern;
  const flags = options.ignoreCase ? 'i' : '';

  let regex: RegExp;
  try {
    regex = new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid pattern "${pattern}": ${reason}`, {
      cause: error,
      details: { pattern },
    });
  }

  return new RegExpMatcher(regex, options.invert ?? false);
}
