import assert from 'node:assert/strict';
import { test } from 'node:test';

import { extract } from '../src/lib/file-operations/search/excerpt.js';

const ALPHABET = ['a', 'b', ' ', 'é', '中', '😀'];
const ELLIPSIS = '…';
const RUNS = 500;

// Deterministic so a failure reproduces.
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

interface Case {
  line: string;
  start: number;
  end: number;
  matchText: string;
  maxChars: number;
  contextChars: number;
}

function pick(random: () => number, bound: number): number {
  return Math.floor(random() * bound);
}

function generateCase(random: () => number): Case {
  const chars = Array.from({ length: pick(random, 60) }, () => {
    return ALPHABET[pick(random, ALPHABET.length)] ?? 'a';
  });
  const from = pick(random, chars.length + 1);
  const to = from + pick(random, chars.length - from + 1);

  const start = chars.slice(0, from).join('').length;
  const matchText = chars.slice(from, to).join('');
  return {
    line: chars.join(''),
    start,
    end: start + matchText.length,
    matchText,
    maxChars: 1 + pick(random, 30),
    contextChars: pick(random, 25),
  };
}

function forEachCase(check: (c: Case, excerpt: string) => void): void {
  const random = createRandom(0x5eed);
  for (let run = 0; run < RUNS; run++) {
    const c = generateCase(random);
    const excerpt = extract(c.line, c.start, c.end, c.maxChars, c.contextChars);
    check(c, excerpt);
  }
}

function contentLength(excerpt: string): number {
  return Array.from(excerpt).filter((char) => char !== ELLIPSIS).length;
}

test('excerpt content never exceeds maxChars', () => {
  forEachCase((c, excerpt) => {
    assert.ok(
      contentLength(excerpt) <= c.maxChars,
      `${JSON.stringify(c)} -> ${excerpt}`
    );
  });
});

test('excerpt contains the whole match when it fits', () => {
  forEachCase((c, excerpt) => {
    if (Array.from(c.matchText).length > c.maxChars) return;
    assert.ok(excerpt.includes(c.matchText), `${JSON.stringify(c)} -> ${excerpt}`);
  });
});

test('excerpt never splits a surrogate pair', () => {
  forEachCase((c, excerpt) => {
    assert.equal(
      Buffer.from(excerpt, 'utf8').toString('utf8'),
      excerpt,
      JSON.stringify(c)
    );
  });
});

test('excerpt is the untouched line when the line is short and context is wide', () => {
  forEachCase((c, excerpt) => {
    const length = Array.from(c.line).length;
    if (length > c.maxChars || c.contextChars < length) return;
    assert.equal(excerpt, c.line);
  });
});

test('excerpt is stable across repeated calls', () => {
  forEachCase((c, excerpt) => {
    assert.equal(
      extract(c.line, c.start, c.end, c.maxChars, c.contextChars),
      excerpt
    );
  });
});

test('a match at a line boundary gets no ellipsis on that side', () => {
  forEachCase((c, excerpt) => {
    if (Array.from(c.matchText).length > c.maxChars) return;
    if (c.start === 0) assert.ok(!excerpt.startsWith(ELLIPSIS), excerpt);
    if (c.end === c.line.length) assert.ok(!excerpt.endsWith(ELLIPSIS), excerpt);
  });
});
