import { logger } from './logger.js';

type EnvParseResult = number | null | undefined;

function parseEnvIntValue(
  envVar: string,
  min: number,
  max: number
): EnvParseResult {
  const value = process.env[envVar];
  if (!value) return undefined;

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    return null;
  }

  return parsed;
}

// Helper function for parsing and validating integer environment variables
export function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number,
  max: number
): number {
  const parsed = parseEnvIntValue(envVar, min, max);
  if (parsed === undefined) return defaultValue;
  if (parsed === null) {
    const value = process.env[envVar] ?? '';
    logger.warning(
      `Invalid ${envVar} value: ${value} (must be ${min}-${max}). Using default: ${defaultValue}`,
      'config'
    );
    return defaultValue;
  }
  return parsed;
}

export const MAX_CHARS_LIMIT = 100_000;
export const MAX_READ_BUFFER_SIZE = 64 * 1024 * 1024;

export const DEFAULT_MAX_CHARS = parseEnvInt(
  'SNIPGREP_MAX_CHARS',
  200,
  1,
  MAX_CHARS_LIMIT
);
export const DEFAULT_CONTEXT_CHARS = parseEnvInt(
  'SNIPGREP_CONTEXT_CHARS',
  20,
  0,
  MAX_CHARS_LIMIT
);
export const DEFAULT_READ_BUFFER_SIZE = parseEnvInt(
  'SNIPGREP_READ_BUFFER_SIZE',
  1024 * 1024,
  1,
  MAX_READ_BUFFER_SIZE
);

export const TEXT_SAMPLE_SIZE = 1024;
export const BINARY_RATIO_THRESHOLD = 0.1;

export const ELLIPSIS = '…';

export const MAX_FILTER_PATTERN_LENGTH = 1000;
