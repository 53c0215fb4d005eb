import { Minimatch } from 'minimatch';

import type { FilenameMatcher } from '../../../config/types.js';
import { InvalidFilterError } from '../../errors.js';
import { validateFilterPatternOrThrow } from '../pattern-validator.js';

// Plain shell wildcards against a single name: `*`, `?` and `[...]` only.
const MATCHER_OPTIONS = {
  dot: true,
  nocase: false,
  nobrace: true,
  noext: true,
  noglobstar: true,
  nocomment: true,
  nonegate: true,
} as const;

/**
 * Compile an include/exclude glob into a whole-name matcher.
 * An empty glob yields no filter.
 */
export function compileFilenameFilter(
  glob: string
): FilenameMatcher | undefined {
  if (glob.length === 0) return undefined;

  validateFilterPatternOrThrow(glob);

  const regex = new Minimatch(glob, MATCHER_OPTIONS).makeRe();
  if (regex === false) {
    throw new InvalidFilterError(`Invalid filter pattern: ${glob}`, {
      pattern: glob,
    });
  }

  return (name: string): boolean => regex.test(name);
}

/** Exclude wins over include; no include filter accepts everything. */
export function includeFile(
  name: string,
  include: FilenameMatcher | undefined,
  exclude: FilenameMatcher | undefined
): boolean {
  if (exclude?.(name)) return false;
  if (include && !include(name)) return false;
  return true;
}
