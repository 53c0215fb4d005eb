/**
 * Match excerpts.
 *
 * Builds a bounded, ellipsis-annotated excerpt around one match in two
 * stages: a context window of `contextChars` on each side of the match, then
 * a length cap of `maxChars` centred on the match itself.
 *
 * Offsets passed in are UTF-16 string indices (as produced by RegExp). All
 * trimming arithmetic counts Unicode code points, so a cut never lands inside
 * a surrogate pair. Ellipsis markers are not counted against `maxChars`.
 */
import { ELLIPSIS } from '../../constants.js';

const ELLIPSIS_LENGTH = 1;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

interface Step {
  index: number;
  steps: number;
}

function stepBackward(line: string, from: number, count: number): Step {
  let index = from;
  let steps = 0;
  while (steps < count && index > 0) {
    const pair =
      index >= 2 &&
      isLowSurrogate(line.charCodeAt(index - 1)) &&
      isHighSurrogate(line.charCodeAt(index - 2));
    index -= pair ? 2 : 1;
    steps++;
  }
  return { index, steps };
}

function stepForward(line: string, from: number, count: number): Step {
  let index = from;
  let steps = 0;
  while (steps < count && index < line.length) {
    const codePoint = line.codePointAt(index) ?? 0;
    index += codePoint > 0xffff ? 2 : 1;
    steps++;
  }
  return { index, steps };
}

function countCodePoints(line: string, from: number, to: number): number {
  return stepForward(line, from, to - from).steps;
}

function assertSpan(line: string, start: number, end: number): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    start > end ||
    end > line.length
  ) {
    throw new RangeError(
      `Match span [${start}, ${end}) is outside a line of length ${line.length}`
    );
  }
}

interface ContextWindow {
  text: string;
  /** Window length in code points, including any ellipsis markers. */
  length: number;
  matchStart: number;
  matchEnd: number;
}

function buildContextWindow(
  line: string,
  matchStart: number,
  matchEnd: number,
  contextChars: number
): ContextWindow {
  const left = stepBackward(line, matchStart, contextChars);
  const right = stepForward(line, matchEnd, contextChars);
  const prefix = left.index > 0 ? ELLIPSIS : '';
  const suffix = right.index < line.length ? ELLIPSIS : '';
  const matchLength = countCodePoints(line, matchStart, matchEnd);

  const start = (prefix ? ELLIPSIS_LENGTH : 0) + left.steps;
  return {
    text: prefix + line.slice(left.index, right.index) + suffix,
    length:
      start + matchLength + right.steps + (suffix ? ELLIPSIS_LENGTH : 0),
    matchStart: start,
    matchEnd: start + matchLength,
  };
}

function capAroundMatch(window: ContextWindow, maxChars: number): string {
  const matchLength = window.matchEnd - window.matchStart;
  const available = maxChars - matchLength;
  const before = Math.trunc(available / 2);
  const after = available - before;

  const trimStart = Math.max(0, window.matchStart - before);
  const trimEnd = Math.min(window.length, window.matchEnd + after);

  const trimmed = Array.from(window.text).slice(trimStart, trimEnd).join('');
  const prefix = trimStart > 0 ? ELLIPSIS : '';
  const suffix = trimEnd < window.length ? ELLIPSIS : '';
  return prefix + trimmed + suffix;
}

/**
 * Extract the excerpt for the match `[matchStart, matchEnd)` of `line`.
 *
 * A match longer than `maxChars` is itself cut by the cap.
 */
export function extract(
  line: string,
  matchStart: number,
  matchEnd: number,
  maxChars: number,
  contextChars: number
): string {
  assertSpan(line, matchStart, matchEnd);

  const window = buildContextWindow(
    line,
    matchStart,
    matchEnd,
    Math.max(0, contextChars)
  );
  if (window.length <= maxChars) return window.text;
  return capAroundMatch(window, Math.max(0, maxChars));
}
