import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import path from 'node:path';
import fs from 'node:fs/promises';
import os from 'node:os';
import { Command } from 'commander';
import { ConfigError, UsageError, exitCodeFor } from '@ctxgrep/shared';
import { createProgram, parseArgs } from '../program';
import { registerSearchCommand, toConfigFlags } from './search';

describe('toConfigFlags', () => {
  it('drops unset flags', () => {
    expect(toConfigFlags({})).toEqual({});
  });

  it('maps option names to config keys', () => {
    expect(
      toConfigFlags({
        lineNumber: true,
        beforeContext: '2',
        afterContext: '3',
        invertMatch: true,
        timeout: '250',
        color: 'never',
      }),
    ).toEqual({
      lineNumbers: true,
      before: 2,
      after: 3,
      invert: true,
      timeoutMs: 250,
      color: 'never',
    });
  });

  it('lets -A and -B win over -C', () => {
    expect(toConfigFlags({ context: '4', afterContext: '1' })).toEqual({ before: 4, after: 1 });
  });

  it('turns non-numeric input into NaN for the schema to reject', () => {
    const flags = toConfigFlags({ beforeContext: 'abc', afterContext: ' ' });
    expect(Number.isNaN(flags.before)).toBe(true);
    expect(Number.isNaN(flags.after)).toBe(true);
  });
});

describe('registerSearchCommand', () => {
  it('declares pattern and files on the program itself', () => {
    const program = new Command();
    registerSearchCommand(program);
    expect(program.commands).toEqual([]);
    expect(program.registeredArguments.map((a) => a.name())).toEqual(['pattern', 'files']);
    expect(program.registeredArguments.map((a) => a.variadic)).toEqual([false, true]);
  });
});

describe('search command', () => {
  let tmpDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;

  const run = (...args: string[]) => createProgram().parseAsync(['node', 'ctxgrep', ...args]);
  const stdout = () => logSpy.mock.calls.map((c) => String(c[0]));
  const stderr = () => errSpy.mock.calls.map((c) => String(c[0]));

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ctxgrep-cli-'));
    await fs.writeFile(path.join(tmpDir, 'a.txt'), 'a\nMATCH\nc\nd\ne\n');
    await fs.writeFile(path.join(tmpDir, 'b.txt'), 'x\nhit\ny\nhit\nz\n');
    await fs.writeFile(path.join(tmpDir, 'words.txt'), 'search me\nhelp wanted\nother\n');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('prints a match with numbered context lines', async () => {
    await run('-n', '-B', '1', '-A', '1', 'MATCH', path.join(tmpDir, 'a.txt'));

    expect(stdout()).toEqual(['1: a', '2: MATCH', '3: c']);
    expect(stderr()).toEqual([]);
  });

  it('merges overlapping context into one block', async () => {
    await run('-n', '-A', '2', 'hit', path.join(tmpDir, 'b.txt'));

    expect(stdout()).toEqual(['2: hit', '3: y', '4: hit', '5: z']);
  });

  it('applies -C to both sides', async () => {
    await run('-C', '1', 'MATCH', path.join(tmpDir, 'a.txt'));

    expect(stdout()).toEqual(['a', 'MATCH', 'c']);
  });

  it('prints files in the order given and reports unreadable ones', async () => {
    const missing = path.join(tmpDir, 'missing.txt');
    await run(
      '-H',
      '--color',
      'never',
      'MATCH|hit',
      path.join(tmpDir, 'b.txt'),
      missing,
      path.join(tmpDir, 'a.txt'),
    );

    const b = path.join(tmpDir, 'b.txt');
    const a = path.join(tmpDir, 'a.txt');
    expect(stdout()).toEqual([`${b}:hit`, `${b}:hit`, `${a}:MATCH`]);
    expect(stderr()).toHaveLength(1);
    expect(stderr()[0].startsWith(`${missing}: ENOENT`)).toBe(true);
  });

  it('prints nothing for a file without matches', async () => {
    await run('nothing-like-this', path.join(tmpDir, 'a.txt'));

    expect(stdout()).toEqual([]);
    expect(stderr()).toEqual([]);
  });

  it('prints counts with -c', async () => {
    await run('-c', 'hit', path.join(tmpDir, 'b.txt'), path.join(tmpDir, 'a.txt'));

    expect(stdout()).toEqual([`${path.join(tmpDir, 'b.txt')}:2`, `${path.join(tmpDir, 'a.txt')}:0`]);
  });

  it('supports case-insensitive and inverted matching', async () => {
    await run('-i', '-v', '-n', 'match|[a-d]', path.join(tmpDir, 'a.txt'));

    expect(stdout()).toEqual(['5: e']);
  });

  it('emits a JSON report with --json', async () => {
    const file = path.join(tmpDir, 'b.txt');
    await run('--json', '-A', '1', 'hit', file);

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(stdout()[0])).toEqual({
      files: [
        {
          path: file,
          ok: true,
          matches: 2,
          blocks: [
            { startLine: 2, endLine: 3, lines: ['hit', 'y'] },
            { startLine: 4, endLine: 5, lines: ['hit', 'z'] },
          ],
        },
      ],
      summary: { files: 1, failed: 0, matchedFiles: 1, matches: 2 },
    });
  });

  it('rejects an invalid pattern before reading any file', async () => {
    const readSpy = vi.spyOn(fs, 'readFile');

    await expect(run('(oops', path.join(tmpDir, 'a.txt'))).rejects.toBeInstanceOf(ConfigError);
    expect(readSpy).not.toHaveBeenCalled();
    expect(stdout()).toEqual([]);
  });

  it('rejects a negative context size', async () => {
    await expect(run('--after-context=-1', 'x', path.join(tmpDir, 'a.txt'))).rejects.toThrow(
      'Configuration validation failed:\n- after: must not be negative',
    );
  });

  it('treats words like search and help as ordinary patterns', async () => {
    const file = path.join(tmpDir, 'words.txt');

    await run('search', file);
    expect(stdout()).toEqual(['search me']);

    logSpy.mockClear();
    await run('-n', 'help', file);
    expect(stdout()).toEqual(['2: help wanted']);
    expect(stderr()).toEqual([]);
  });

  it('accepts global options after the pattern', async () => {
    await run('hit', path.join(tmpDir, 'b.txt'), '--json');

    expect(JSON.parse(stdout()[0]).summary).toEqual({
      files: 1,
      failed: 0,
      matchedFiles: 1,
      matches: 2,
    });
  });
});

describe('parseArgs', () => {
  let tmpDir: string;
  let file: string;
  let writeSpy: MockInstance<typeof process.stdout.write>;

  const parse = (...args: string[]) => parseArgs(createProgram(), ['node', 'ctxgrep', ...args]);

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ctxgrep-args-'));
    file = path.join(tmpDir, 'a.txt');
    await fs.writeFile(file, 'x\n');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('turns an unknown option into a UsageError with exit code 2', async () => {
    const error = await parse('--bogus', 'x', file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UsageError);
    expect(error instanceof UsageError && error.message).toBe("unknown option '--bogus'");
    expect(error instanceof UsageError && error.details).toEqual({
      code: 'commander.unknownOption',
    });
    expect(exitCodeFor(error)).toBe(2);
  });

  it('turns a missing file operand into a UsageError', async () => {
    const error = await parse('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UsageError);
    expect(error instanceof UsageError && error.message).toBe(
      "missing required argument 'files'",
    );
  });

  it('keeps configuration errors as they are', async () => {
    await expect(parse('(oops', file)).rejects.toBeInstanceOf(ConfigError);
  });

  it('resolves after printing help or the version', async () => {
    await expect(parse('--help')).resolves.toBeUndefined();
    await expect(parse('--version')).resolves.toBeUndefined();
    expect(writeSpy).toHaveBeenCalledWith('0.1.0\n');
  });
});
