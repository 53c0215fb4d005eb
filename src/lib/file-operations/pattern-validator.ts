import { MAX_FILTER_PATTERN_LENGTH } from '../constants.js';
import { InvalidFilterError } from '../errors.js';

const PATH_SEPARATOR_PATTERN = /\//;

interface PatternValidationResult {
  isValid: boolean;
  error?: string;
  suggestion?: string;
}

function invalidPattern(
  error: string,
  suggestion?: string
): PatternValidationResult {
  return { isValid: false, error, suggestion };
}

function validateLength(pattern: string): PatternValidationResult | null {
  if (pattern.length <= MAX_FILTER_PATTERN_LENGTH) return null;
  return invalidPattern(
    `Pattern too long (${pattern.length}/${MAX_FILTER_PATTERN_LENGTH} chars)`,
    'Simplify the pattern'
  );
}

function validateNoPathSeparator(
  pattern: string
): PatternValidationResult | null {
  if (!PATH_SEPARATOR_PATTERN.test(pattern)) return null;
  return invalidPattern(
    'Filters match file names only and cannot contain "/"',
    'Drop the directory part, e.g. "*.ts" instead of "src/*.ts"'
  );
}

function validateBracketsClosed(
  pattern: string
): PatternValidationResult | null {
  let open = false;
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\') {
      i++;
    } else if (char === '[' && !open) {
      open = true;
      // A leading "]" (or "!]") inside a class is literal.
      if (pattern[i + 1] === '!' || pattern[i + 1] === '^') i++;
      if (pattern[i + 1] === ']') i++;
    } else if (char === ']' && open) {
      open = false;
    }
  }
  if (!open) return null;
  return invalidPattern(
    'Unterminated character class "["',
    'Close the class with "]" or escape the bracket as "\\["'
  );
}

/**
 * Validates file-name glob filters.
 * Rejects path separators, overlong patterns and unclosed classes.
 */
function validateFilterPattern(pattern: string): PatternValidationResult {
  const validators = [
    validateLength,
    validateNoPathSeparator,
    validateBracketsClosed,
  ];

  for (const validator of validators) {
    const result = validator(pattern);
    if (result) return result;
  }

  return { isValid: true };
}

/**
 * Throws InvalidFilterError if pattern is invalid
 */
export function validateFilterPatternOrThrow(pattern: string): void {
  const result = validateFilterPattern(pattern);
  if (!result.isValid) {
    throw new InvalidFilterError(result.error ?? 'Invalid filter pattern', {
      pattern,
      suggestion: result.suggestion,
    });
  }
}
