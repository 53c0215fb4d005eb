import type { SearchWarning } from '../config/types.js';

export enum ErrorCode {
  E_NOT_FOUND = 'E_NOT_FOUND',
  E_PERMISSION_DENIED = 'E_PERMISSION_DENIED',
  E_NOT_FILE = 'E_NOT_FILE',
  E_NOT_DIRECTORY = 'E_NOT_DIRECTORY',
  E_SYMLINK_NOT_ALLOWED = 'E_SYMLINK_NOT_ALLOWED',
  E_TIMEOUT = 'E_TIMEOUT',
  E_INVALID_PATTERN = 'E_INVALID_PATTERN',
  E_INVALID_FILTER = 'E_INVALID_FILTER',
  E_INVALID_INPUT = 'E_INVALID_INPUT',
  E_READ_FAILED = 'E_READ_FAILED',
  E_UNKNOWN = 'E_UNKNOWN',
}

export const NODE_ERROR_CODE_MAP: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.E_NOT_FOUND,
  EACCES: ErrorCode.E_PERMISSION_DENIED,
  EPERM: ErrorCode.E_PERMISSION_DENIED,
  EISDIR: ErrorCode.E_NOT_FILE,
  ENOTDIR: ErrorCode.E_NOT_DIRECTORY,
  ELOOP: ErrorCode.E_SYMLINK_NOT_ALLOWED,
  ETIMEDOUT: ErrorCode.E_TIMEOUT,
  // Resource exhaustion is transient; retrying later usually helps.
  EMFILE: ErrorCode.E_TIMEOUT,
  ENFILE: ErrorCode.E_TIMEOUT,
  EIO: ErrorCode.E_READ_FAILED,
};

const SUGGESTIONS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.E_NOT_FOUND]: 'Check that the path exists and is spelled correctly',
  [ErrorCode.E_PERMISSION_DENIED]:
    'Check file permissions or run with an account that can read the path',
  [ErrorCode.E_NOT_FILE]: 'The path is a directory; pass a file instead',
  [ErrorCode.E_NOT_DIRECTORY]:
    'A path component is not a directory; check the path',
  [ErrorCode.E_SYMLINK_NOT_ALLOWED]:
    'The path contains a symbolic link loop; remove or fix the link',
  [ErrorCode.E_TIMEOUT]:
    'The system ran out of resources or timed out; retry the search',
  [ErrorCode.E_INVALID_PATTERN]:
    'Check the regular expression syntax, e.g. escape ( [ { with a backslash',
  [ErrorCode.E_INVALID_FILTER]:
    'Use a file-name glob such as "*.ts" or "test_??.log"',
  [ErrorCode.E_INVALID_INPUT]: 'Check the option values passed to the search',
  [ErrorCode.E_READ_FAILED]:
    'The file could not be read to the end; check the device or file',
  [ErrorCode.E_UNKNOWN]: 'An unexpected error occurred; retry the search',
};

export class SearchError extends Error {
  readonly code: ErrorCode;
  readonly path?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    path?: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SearchError';
    this.code = code;
    this.path = path;
    this.details = details;
  }

  static fromError(
    code: ErrorCode,
    message: string,
    error: unknown,
    path?: string
  ): SearchError {
    const wrapped = new SearchError(code, message, path, undefined, error);
    if (error instanceof Error && error.stack) {
      wrapped.stack = `${wrapped.stack ?? ''}\nCaused by: ${error.stack}`;
    }
    return wrapped;
  }
}

/** Raised when the content pattern cannot be compiled. Fatal. */
export class InvalidPatternError extends SearchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.E_INVALID_PATTERN, message, undefined, details);
    this.name = 'InvalidPatternError';
  }
}

/** Raised when an include/exclude glob is malformed. Fatal. */
export class InvalidFilterError extends SearchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.E_INVALID_FILTER, message, undefined, details);
    this.name = 'InvalidFilterError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

function classifyByMessage(message: string): ErrorCode {
  const lower = message.toLowerCase();
  if (lower.includes('enoent') || lower.includes('no such file')) {
    return ErrorCode.E_NOT_FOUND;
  }
  if (lower.includes('eacces') || lower.includes('eperm')) {
    return ErrorCode.E_PERMISSION_DENIED;
  }
  return ErrorCode.E_UNKNOWN;
}

export function classifyError(error: unknown): ErrorCode {
  if (error instanceof SearchError) return error.code;
  if (isNodeError(error) && error.code) {
    const mapped = NODE_ERROR_CODE_MAP[error.code];
    if (mapped) return mapped;
  }
  if (error instanceof Error) return classifyByMessage(error.message);
  if (typeof error === 'string') return classifyByMessage(error);
  return ErrorCode.E_UNKNOWN;
}

export function getSuggestion(code: ErrorCode): string {
  return SUGGESTIONS[code];
}

function resolveMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function createDetailedError(
  error: unknown,
  path?: string,
  details?: Record<string, unknown>
): SearchWarning {
  const code = classifyError(error);
  const resolvedPath =
    path ?? (error instanceof SearchError ? error.path : undefined);
  return {
    code,
    message: resolveMessage(error),
    path: resolvedPath,
    suggestion: getSuggestion(code),
    details,
  };
}

export function formatDetailedError(error: SearchWarning): string {
  const lines = [`[${error.code}] ${error.message}`];
  if (error.path) lines.push(`  path: ${error.path}`);
  if (error.suggestion) lines.push(`  suggestion: ${error.suggestion}`);
  return lines.join('\n');
}
