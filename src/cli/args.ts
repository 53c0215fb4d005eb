import { parseArgs as parseNodeArgs } from 'node:util';

import { ErrorCode, SearchError } from '../lib/errors.js';
import {
  CliArgsSchema,
  type CliArgs,
  type SearchOptionsInput,
} from '../schemas/index.js';

export type ParseArgsResult =
  | { kind: 'help' }
  | { kind: 'search'; args: CliArgs };

const OPTIONS = {
  'no-recursive': { type: 'boolean', default: false },
  'ignore-case': { type: 'boolean', short: 'i', default: false },
  'line-number': { type: 'boolean', short: 'n', default: false },
  'no-filename': { type: 'boolean', short: 'h', default: false },
  include: { type: 'string' },
  exclude: { type: 'string' },
  'max-chars': { type: 'string' },
  context: { type: 'string' },
  'all-files': { type: 'boolean', short: 'a', default: false },
  'allow-unsafe-regex': { type: 'boolean', default: false },
  quiet: { type: 'boolean', short: 'q', default: false },
  help: { type: 'boolean', default: false },
} as const;

function usageError(message: string, cause?: unknown): SearchError {
  return new SearchError(
    ErrorCode.E_INVALID_INPUT,
    message,
    undefined,
    undefined,
    cause
  );
}

interface RawArgs {
  values: {
    'no-recursive'?: boolean;
    'ignore-case'?: boolean;
    'line-number'?: boolean;
    'no-filename'?: boolean;
    include?: string;
    exclude?: string;
    'max-chars'?: string;
    context?: string;
    'all-files'?: boolean;
    'allow-unsafe-regex'?: boolean;
    quiet?: boolean;
    help?: boolean;
  };
  positionals: string[];
}

function readRawArgs(argv: readonly string[]): RawArgs {
  try {
    return parseNodeArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      options: OPTIONS,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw usageError(message, error);
  }
}

export function parseArgs(argv: readonly string[]): ParseArgsResult {
  const { values, positionals } = readRawArgs(argv);
  if (values.help) return { kind: 'help' };

  const [pattern, ...paths] = positionals;
  const parsed = CliArgsSchema.safeParse({
    pattern,
    paths,
    recursive: !values['no-recursive'],
    ignoreCase: values['ignore-case'] ?? false,
    showLineNumber: values['line-number'] ?? false,
    hideFilename: values['no-filename'] ?? false,
    include: values.include,
    exclude: values.exclude,
    maxChars: values['max-chars'],
    contextChars: values.context,
    textOnly: !values['all-files'],
    rejectUnsafePatterns: !values['allow-unsafe-regex'],
    quiet: values.quiet ?? false,
  });

  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join('; ');
    throw usageError(message, parsed.error);
  }

  return { kind: 'search', args: parsed.data };
}

export function toSearchOptions(args: CliArgs): SearchOptionsInput {
  return {
    pattern: args.pattern,
    recursive: args.recursive,
    ignoreCase: args.ignoreCase,
    include: args.include,
    exclude: args.exclude,
    maxChars: args.maxChars,
    contextChars: args.contextChars,
    textOnly: args.textOnly,
    rejectUnsafePatterns: args.rejectUnsafePatterns,
  };
}
