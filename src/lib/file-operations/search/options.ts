import type { z } from 'zod';

import type { SearchConfig } from '../../../config/types.js';
import {
  SearchOptionsInputSchema,
  type SearchOptionsInput,
} from '../../../schemas/index.js';
import {
  DEFAULT_CONTEXT_CHARS,
  DEFAULT_MAX_CHARS,
  DEFAULT_READ_BUFFER_SIZE,
} from '../../constants.js';
import { ErrorCode, SearchError } from '../../errors.js';
import { compileFilenameFilter } from './filename-filter.js';
import { compileContentPattern } from './match-strategy.js';

type ParsedOptions = z.output<typeof SearchOptionsInputSchema>;

interface ResolvedOptions {
  pattern: string;
  recursive: boolean;
  ignoreCase: boolean;
  include: string;
  exclude: string;
  maxChars: number;
  contextChars: number;
  textOnly: boolean;
  readBufferSize: number;
  rejectUnsafePatterns: boolean;
}

function applyDefaults(options: ParsedOptions): ResolvedOptions {
  return {
    pattern: options.pattern,
    recursive: options.recursive ?? true,
    ignoreCase: options.ignoreCase ?? false,
    include: options.include ?? '',
    exclude: options.exclude ?? '',
    maxChars: options.maxChars ?? DEFAULT_MAX_CHARS,
    contextChars: options.contextChars ?? DEFAULT_CONTEXT_CHARS,
    textOnly: options.textOnly ?? true,
    readBufferSize: options.readBufferSize ?? DEFAULT_READ_BUFFER_SIZE,
    rejectUnsafePatterns: options.rejectUnsafePatterns ?? true,
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function resolveSearchOptions(
  input: SearchOptionsInput
): ResolvedOptions {
  const parsed = SearchOptionsInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new SearchError(
      ErrorCode.E_INVALID_INPUT,
      `Invalid search options: ${formatIssues(parsed.error)}`,
      undefined,
      { issues: parsed.error.issues }
    );
  }
  return applyDefaults(parsed.data);
}

/**
 * Validate options and compile the pattern and filters into a frozen config.
 * Throws before any I/O when the pattern, a filter or an option is invalid.
 */
export function buildSearchConfig(input: SearchOptionsInput): SearchConfig {
  const options = resolveSearchOptions(input);

  const config: SearchConfig = {
    matcher: compileContentPattern(options.pattern, options.ignoreCase, {
      rejectUnsafe: options.rejectUnsafePatterns,
    }),
    recursive: options.recursive,
    ignoreCase: options.ignoreCase,
    include: compileFilenameFilter(options.include),
    exclude: compileFilenameFilter(options.exclude),
    maxChars: options.maxChars,
    contextChars: options.contextChars,
    textOnly: options.textOnly,
    readBufferSize: options.readBufferSize,
  };

  return Object.freeze(config);
}
