import safeRegex from 'safe-regex2';

import type { ContentMatcher, MatchSpan } from '../../../config/types.js';
import { InvalidPatternError } from '../../errors.js';

export interface ContentPatternOptions {
  rejectUnsafe?: boolean;
}

const CASE_FOLD_MODIFIER = '(?i)';
const LEADING_INLINE_FLAGS = /^\(\?([A-Za-z]+)\)/;
const SUPPORTED_INLINE_FLAGS = new Set(['i', 'm', 's']);
const UNICODE_FLAGS = 'gu';
// Annex B syntax: lone braces and identity escapes such as \- are literals.
const LEGACY_FLAGS = 'g';

export function composeCaseFold(pattern: string, ignoreCase: boolean): string {
  return ignoreCase ? `${CASE_FOLD_MODIFIER}${pattern}` : pattern;
}

/**
 * Lift leading `(?flags)` groups into RegExp flags, so `(?i)` composed for
 * case-folding and any user-written leading modifiers combine.
 */
export function liftInlineFlags(pattern: string): {
  body: string;
  flags: string;
} {
  const flags = new Set<string>();
  let body = pattern;
  let match = LEADING_INLINE_FLAGS.exec(body);

  while (match !== null) {
    for (const flag of match[1] ?? '') {
      if (!SUPPORTED_INLINE_FLAGS.has(flag)) {
        throw new InvalidPatternError(
          `Invalid regular expression: ${pattern} (unsupported inline flag "${flag}")`,
          { searchPattern: pattern }
        );
      }
      flags.add(flag);
    }
    body = body.slice(match[0].length);
    match = LEADING_INLINE_FLAGS.exec(body);
  }

  return { body, flags: [...flags].sort().join('') };
}

function isSimpleSafePattern(pattern: string): boolean {
  if (pattern.length === 0) {
    return false;
  }

  const nestedQuantifierPattern = /[+*?}]\s*\)\s*[+*?{]/;
  if (nestedQuantifierPattern.test(pattern)) {
    return false;
  }

  const highRepetitionPattern = /\{(\d+)(?:,\d*)?\}/g;
  let match;
  while ((match = highRepetitionPattern.exec(pattern)) !== null) {
    const countStr = match[1];
    if (countStr === undefined) continue;

    const count = parseInt(countStr, 10);
    if (Number.isNaN(count) || count >= 25) {
      return false;
    }
  }

  return true;
}

function ensureSafePattern(body: string, originalPattern: string): void {
  if (isSimpleSafePattern(body) || safeRegex(body)) return;

  throw new InvalidPatternError(
    `Potentially unsafe regular expression (ReDoS risk): ${originalPattern}. ` +
      'Avoid patterns with nested quantifiers, overlapping alternations, or exponential backtracking.',
    { reason: 'ReDoS risk detected' }
  );
}

function tryRegex(body: string, flags: string): RegExp | Error {
  try {
    return new RegExp(body, flags);
  } catch (error: unknown) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Prefer unicode mode; fall back to legacy syntax for patterns it rejects,
 * such as `} else {` or `foo\-bar`.
 */
function compileRegex(body: string, flags: string, pattern: string): RegExp {
  const unicode = tryRegex(body, `${UNICODE_FLAGS}${flags}`);
  if (unicode instanceof RegExp) return unicode;

  const legacy = tryRegex(body, `${LEGACY_FLAGS}${flags}`);
  if (legacy instanceof RegExp) return legacy;

  throw new InvalidPatternError(
    `Invalid regular expression: ${pattern} (${unicode.message})`,
    { searchPattern: pattern }
  );
}

// Step past an empty match without splitting a surrogate pair.
function advanceIndex(line: string, index: number): number {
  const codePoint = line.codePointAt(index);
  return codePoint !== undefined && codePoint > 0xffff ? index + 2 : index + 1;
}

function createSpanFinder(regex: RegExp): (line: string) => MatchSpan[] {
  return (line: string): MatchSpan[] => {
    const spans: MatchSpan[] = [];
    let previousEnd = -1;
    regex.lastIndex = 0;

    let match: RegExpExecArray | null;
    while ((match = regex.exec(line)) !== null) {
      const start = match.index;
      const end = start + match[0].length;

      if (start === end) {
        regex.lastIndex = advanceIndex(line, end);
        // An empty match touching the previous match is not a new match.
        if (start === previousEnd) continue;
      }

      spans.push({ start, end });
      previousEnd = end;
    }

    return spans;
  };
}

export function compileContentPattern(
  pattern: string,
  ignoreCase: boolean,
  options: ContentPatternOptions = {}
): ContentMatcher {
  const { rejectUnsafe = true } = options;
  const { body, flags } = liftInlineFlags(composeCaseFold(pattern, ignoreCase));
  const regex = compileRegex(body, flags, pattern);

  if (rejectUnsafe) {
    ensureSafePattern(body, pattern);
  }

  return {
    source: regex.source,
    flags: regex.flags,
    findAll: createSpanFinder(regex),
  };
}
