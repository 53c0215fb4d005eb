import { z } from 'zod';

import {
  MAX_CHARS_LIMIT,
  MAX_READ_BUFFER_SIZE,
} from '../../lib/constants.js';

export const SearchOptionsInputSchema = z
  .object({
    pattern: z.string().describe('Regular expression matched against lines'),
    recursive: z
      .boolean()
      .optional()
      .describe('Descend into subdirectories (default true)'),
    ignoreCase: z
      .boolean()
      .optional()
      .describe('Case-fold the content pattern'),
    include: z
      .string()
      .optional()
      .describe('File-name glob a candidate must match, e.g. "*.ts"'),
    exclude: z
      .string()
      .optional()
      .describe('File-name glob that rejects a candidate; wins over include'),
    maxChars: z
      .number()
      .int('maxChars must be an integer')
      .min(1, 'maxChars must be at least 1')
      .max(MAX_CHARS_LIMIT, `maxChars cannot exceed ${MAX_CHARS_LIMIT}`)
      .optional()
      .describe('Excerpt length cap, ellipses excluded'),
    contextChars: z
      .number()
      .int('contextChars must be an integer')
      .min(0, 'contextChars cannot be negative')
      .max(MAX_CHARS_LIMIT, `contextChars cannot exceed ${MAX_CHARS_LIMIT}`)
      .optional()
      .describe('Characters kept on each side of a match'),
    textOnly: z
      .boolean()
      .optional()
      .describe('Skip files classified as binary (default true)'),
    readBufferSize: z
      .number()
      .int('readBufferSize must be an integer')
      .min(1, 'readBufferSize must be at least 1 byte')
      .max(MAX_READ_BUFFER_SIZE, 'readBufferSize cannot exceed 64MB')
      .optional()
      .describe('Maximum bytes of one raw line read'),
    rejectUnsafePatterns: z
      .boolean()
      .optional()
      .describe('Reject patterns with exponential backtracking risk'),
  })
  .strict();

export type SearchOptionsInput = z.input<typeof SearchOptionsInputSchema>;
