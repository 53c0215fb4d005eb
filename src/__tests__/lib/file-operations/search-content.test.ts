import * as path from 'node:path';

import { describe, expect, it } from 'vitest';

import type { MatchRecord, SearchWarning } from '../../../config/types.js';
import {
  ErrorCode,
  InvalidPatternError,
  SearchError,
} from '../../../lib/errors.js';
import {
  buildSearchConfig,
  executeSearch,
  searchContent,
} from '../../../lib/file-operations.js';
import { useSearchFixture } from '../fixtures/search-hooks.js';

const getTestDir = useSearchFixture();

function relative(record: MatchRecord): string {
  const file = path.relative(getTestDir(), record.path).split(path.sep).join('/');
  return `${file}:${record.line}:${record.excerpt}`;
}

describe('executeSearch', () => {
  it('scans every candidate in order and summarizes the run', async () => {
    const records: MatchRecord[] = [];
    const summary = await executeSearch(
      buildSearchConfig({ pattern: 'hello' }),
      [getTestDir()],
      {
        onMatch: (record) => {
          records.push(record);
        },
      }
    );

    expect(records.map(relative)).toEqual([
      'b.txt:1:hello world',
      'b.txt:3:hello again',
      'sub/c.go:1:// hello from sub',
      'sub/deep/d.md:1:# hello',
    ]);
    expect(summary).toEqual({
      status: 'completed',
      filesCollected: 5,
      filesScanned: 4,
      filesMatched: 3,
      skippedBinary: 1,
      skippedUnreadable: 0,
      matches: 4,
      warnings: [],
    });
  });

  it('announces the candidates before the first match', async () => {
    const events: string[] = [];
    await executeSearch(
      buildSearchConfig({ pattern: 'hello', include: '*.md' }),
      [getTestDir()],
      {
        onCandidates: (files) => {
          events.push(`candidates:${files.length}`);
        },
        onMatch: (record) => {
          events.push(`match:${path.basename(record.path)}`);
        },
      }
    );
    expect(events).toEqual(['candidates:1', 'match:d.md']);
  });

  it('reports no candidates without scanning', async () => {
    let announced = false;
    const summary = await executeSearch(
      buildSearchConfig({ pattern: 'hello', include: '*.none' }),
      [getTestDir()],
      {
        onCandidates: () => {
          announced = true;
        },
        onMatch: () => {},
      }
    );
    expect(announced).toBe(false);
    expect(summary.status).toBe('no-candidates');
    expect(summary.filesCollected).toBe(0);
  });

  it('forwards collection warnings and keeps searching', async () => {
    const missing = path.join(getTestDir(), 'missing');
    const warnings: SearchWarning[] = [];
    const summary = await executeSearch(
      buildSearchConfig({ pattern: 'package' }),
      [missing, path.join(getTestDir(), 'a.go')],
      {
        onMatch: () => {},
        onWarning: (warning) => {
          warnings.push(warning);
        },
      }
    );
    expect(warnings.map((warning) => warning.code)).toEqual([
      ErrorCode.E_NOT_FOUND,
    ]);
    expect(summary.warnings).toEqual(warnings);
    expect(summary.status).toBe('completed');
    expect(summary.matches).toBe(1);
  });
});

describe('searchContent', () => {
  it('collects matches in memory', async () => {
    const { matches, summary } = await searchContent([getTestDir()], {
      pattern: 'HELLO',
      ignoreCase: true,
      include: '*.go',
    });
    expect(matches.map(relative)).toEqual(['sub/c.go:1:// hello from sub']);
    expect(summary.filesCollected).toBe(2);
    expect(summary.filesMatched).toBe(1);
  });

  it('respects recursive: false', async () => {
    const { matches } = await searchContent([getTestDir()], {
      pattern: 'hello',
      recursive: false,
    });
    expect(matches.map(relative)).toEqual([
      'b.txt:1:hello world',
      'b.txt:3:hello again',
    ]);
  });

  it('rejects an invalid pattern before touching the file system', async () => {
    await expect(
      searchContent([path.join(getTestDir(), 'missing')], { pattern: '(' })
    ).rejects.toBeInstanceOf(InvalidPatternError);
  });

  it('rejects out-of-range options', async () => {
    await expect(
      searchContent([getTestDir()], { pattern: 'x', maxChars: 0 })
    ).rejects.toThrow(
      'Invalid search options: maxChars: maxChars must be at least 1'
    );
    await expect(
      searchContent([getTestDir()], { pattern: 'x', contextChars: -1 })
    ).rejects.toBeInstanceOf(SearchError);
  });
});
