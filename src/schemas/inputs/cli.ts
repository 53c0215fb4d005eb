import { z } from 'zod';

function integerOption(name: string): z.ZodEffects<z.ZodString, number> {
  return z
    .string()
    .regex(/^\d+$/u, `--${name} must be a non-negative integer`)
    .transform((value) => Number.parseInt(value, 10));
}

export const CliArgsSchema = z.object({
  pattern: z.string({ required_error: 'Missing search pattern' }),
  paths: z
    .array(z.string().min(1, 'Empty path argument'))
    .transform((paths) => (paths.length > 0 ? paths : ['.'])),
  recursive: z.boolean(),
  ignoreCase: z.boolean(),
  showLineNumber: z.boolean(),
  hideFilename: z.boolean(),
  include: z.string().optional(),
  exclude: z.string().optional(),
  maxChars: integerOption('max-chars').optional(),
  contextChars: integerOption('context').optional(),
  textOnly: z.boolean(),
  rejectUnsafePatterns: z.boolean(),
  quiet: z.boolean(),
});

export type CliArgs = z.output<typeof CliArgsSchema>;
