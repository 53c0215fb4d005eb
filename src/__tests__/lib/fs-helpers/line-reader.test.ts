import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  FragmentSplitter,
  LineBuffer,
  type LineFragment,
  readLines,
} from '../../../lib/fs-helpers/readers/line-reader.js';
import { useTempDir } from '../fixtures/search-hooks.js';

const getTempDir = useTempDir();

function describeFragments(
  fragments: Iterable<LineFragment>
): [string, boolean, boolean][] {
  return Array.from(fragments, (fragment): [string, boolean, boolean] => [
    fragment.bytes.toString('utf8'),
    fragment.terminal,
    fragment.eol,
  ]);
}

async function linesOf(
  name: string,
  content: string | Buffer,
  fragmentSize?: number
): Promise<string[]> {
  const filePath = path.join(getTempDir(), name);
  await fs.writeFile(filePath, content);
  const handle = await fs.open(filePath, 'r');
  try {
    const lines: string[] = [];
    for await (const line of readLines(handle, { fragmentSize })) {
      lines.push(line);
    }
    return lines;
  } finally {
    await handle.close();
  }
}

describe('FragmentSplitter', () => {
  it('rejects a non-positive fragment size', () => {
    expect(() => new FragmentSplitter(0)).toThrow(RangeError);
  });

  it('splits an overlong line into non-terminal fragments', () => {
    const splitter = new FragmentSplitter(4);
    expect(describeFragments(splitter.push(Buffer.from('abcdefghij\n')))).toEqual(
      [
        ['abcd', false, false],
        ['efgh', false, false],
        ['ij', true, true],
      ]
    );
  });

  it('does not emit an empty fragment for a line of exactly the fragment size', () => {
    const splitter = new FragmentSplitter(4);
    expect(describeFragments(splitter.push(Buffer.from('abcd\n')))).toEqual([
      ['abcd', true, true],
    ]);
  });

  it('carries a partial line across chunks and ends it at EOF', () => {
    const splitter = new FragmentSplitter(16);
    expect(describeFragments(splitter.push(Buffer.from('one\ntw')))).toEqual([
      ['one', true, true],
    ]);
    expect(describeFragments(splitter.push(Buffer.from('o')))).toEqual([]);
    expect(describeFragments(splitter.end())).toEqual([['two', true, false]]);
    expect(describeFragments(splitter.end())).toEqual([]);
  });
});

describe('LineBuffer', () => {
  it('joins fragments and strips a carriage return before the newline', () => {
    const buffer = new LineBuffer();
    expect(
      buffer.append({ bytes: Buffer.from('ab'), terminal: false, eol: false })
    ).toBeUndefined();
    expect(buffer.pendingBytes).toBe(2);
    expect(
      buffer.append({ bytes: Buffer.from('c\r'), terminal: true, eol: true })
    ).toBe('abc');
    expect(buffer.pendingBytes).toBe(0);
  });

  it('keeps a carriage return on a line ended by EOF', () => {
    const buffer = new LineBuffer();
    expect(
      buffer.append({ bytes: Buffer.from('tail\r'), terminal: true, eol: false })
    ).toBe('tail\r');
  });

  it('decodes a character split across fragments', () => {
    const bytes = Buffer.from('中', 'utf8');
    const buffer = new LineBuffer();
    buffer.append({ bytes: bytes.subarray(0, 1), terminal: false, eol: false });
    expect(
      buffer.append({ bytes: bytes.subarray(1), terminal: true, eol: true })
    ).toBe('中');
  });
});

describe('readLines', () => {
  it('yields logical lines regardless of the fragment size', async () => {
    expect(
      await linesOf('mixed.txt', 'héllo wörld\r\nsecond\nlast', 3)
    ).toEqual(['héllo wörld', 'second', 'last']);
  });

  it('keeps empty lines and drops nothing after a final newline', async () => {
    expect(await linesOf('blank.txt', 'x\n\ny\n')).toEqual(['x', '', 'y']);
  });

  it('yields nothing for an empty file', async () => {
    expect(await linesOf('empty.txt', '')).toEqual([]);
  });

  it('reassembles a line far longer than the fragment size', async () => {
    const long = 'z'.repeat(10_000);
    expect(await linesOf('long.txt', `${long}\nend\n`, 16)).toEqual([
      long,
      'end',
    ]);
  });

  it('keeps a trailing carriage return at EOF', async () => {
    expect(await linesOf('cr.txt', 'a\r\nb\r')).toEqual(['a', 'b\r']);
  });
});
