import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EXIT_FATAL, EXIT_NO_FILES, EXIT_OK, runCli } from '../../cli/run.js';
import { USAGE } from '../../cli/usage.js';
import { setLogLevel, setLogSink } from '../../lib/logger.js';
import { useSearchFixture } from '../lib/fixtures/search-hooks.js';

const getTestDir = useSearchFixture();

interface Captured {
  code: number;
  stdout: string[];
  stderr: string[];
  logs: string[];
}

const logs: string[] = [];

beforeEach(() => {
  logs.length = 0;
  setLogSink((line) => {
    logs.push(line);
  });
});

afterEach(() => {
  setLogSink();
  setLogLevel('warning');
});

async function run(argv: string[]): Promise<Captured> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const code = await runCli(argv, {
    stdout: (line) => {
      stdout.push(line);
    },
    stderr: (text) => {
      stderr.push(text);
    },
  });
  return { code, stdout, stderr, logs: [...logs] };
}

function fixturePath(...parts: string[]): string {
  return path.join(getTestDir(), ...parts);
}

describe('runCli', () => {
  it('prints usage for --help', async () => {
    const result = await run(['--help']);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toEqual([USAGE]);
  });

  it('rejects a missing pattern with usage on stderr', async () => {
    const result = await run([]);
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual([USAGE]);
    expect(result.logs[0]?.startsWith(
      '[error] cli: [E_INVALID_INPUT] Missing search pattern'
    )).toBe(true);
  });

  it('rejects unknown flags and malformed numbers', async () => {
    expect((await run(['--bogus', 'x'])).code).toBe(1);

    const result = await run(['--max-chars', 'lots', 'x']);
    expect(result.code).toBe(1);
    expect(result.logs[0]?.startsWith(
      '[error] cli: [E_INVALID_INPUT] --max-chars must be a non-negative integer'
    )).toBe(true);
  });

  it('exits with a fatal code for an invalid pattern', async () => {
    const result = await run(['(', getTestDir()]);
    expect(result.code).toBe(EXIT_FATAL);
    expect(result.stdout).toEqual([]);
    expect(result.logs[0]?.startsWith(
      '[error] cli: [E_INVALID_PATTERN] Invalid regular expression: ('
    )).toBe(true);
  });

  it('prefixes file names when several files are searched', async () => {
    const result = await run(['hello', getTestDir()]);
    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toEqual([
      `${fixturePath('b.txt')}:hello world`,
      `${fixturePath('b.txt')}:hello again`,
      `${fixturePath('sub', 'c.go')}:// hello from sub`,
      `${fixturePath('sub', 'deep', 'd.md')}:# hello`,
    ]);
  });

  it('omits the file name for a single file and adds line numbers', async () => {
    const result = await run(['-n', 'hello', fixturePath('b.txt')]);
    expect(result.stdout).toEqual(['1:hello world', '3:hello again']);
  });

  it('honours --no-filename and --no-recursive', async () => {
    const result = await run(['-h', '--no-recursive', 'hello', getTestDir()]);
    expect(result.stdout).toEqual(['hello world', 'hello again']);
  });

  it('trims excerpts with --context and --max-chars', async () => {
    const context = await run(['--context', '3', 'world', fixturePath('b.txt')]);
    expect(context.stdout).toEqual(['…lo world']);

    const capped = await run([
      '--max-chars',
      '5',
      'sub',
      fixturePath('sub', 'c.go'),
    ]);
    expect(capped.stdout).toEqual(['… sub']);
  });

  it('matches case-insensitively with -i', async () => {
    const result = await run(['-i', 'HELLO AGAIN', fixturePath('b.txt')]);
    expect(result.stdout).toEqual(['hello again']);
  });

  it('searches binary files with --all-files', async () => {
    const skipped = await run(['hello', fixturePath('image.bin')]);
    expect(skipped.stdout).toEqual([]);
    expect(skipped.code).toBe(EXIT_OK);

    const searched = await run(['-a', '--context', '0', 'hello', fixturePath('image.bin')]);
    expect(searched.stdout).toEqual(['hello…']);
  });

  it('reports when no file passes the filters', async () => {
    const result = await run(['hello', getTestDir(), '--include', '*.none']);
    expect(result.code).toBe(EXIT_NO_FILES);
    expect(result.stdout).toEqual(['No matching files found']);
  });

  it('logs unreadable roots as warnings unless quiet', async () => {
    const missing = fixturePath('missing.txt');
    const loud = await run(['hello', missing, fixturePath('b.txt')]);
    expect(loud.code).toBe(EXIT_OK);
    expect(loud.stdout).toEqual(['hello world', 'hello again']);
    expect(loud.logs[0]?.startsWith('[warning] search: [E_NOT_FOUND]')).toBe(
      true
    );

    const quiet = await run(['-q', 'hello', missing, fixturePath('b.txt')]);
    expect(quiet.stdout).toEqual(['hello world', 'hello again']);
    expect(quiet.logs).toEqual([]);
  });
});
