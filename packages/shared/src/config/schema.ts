import { z } from 'zod';

const ContextMarginSchema = z
  .number()
  .int('must be a whole number of lines')
  .nonnegative('must not be negative')
  .default(0);

export const SearchConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Prefix each rendered line with its 1-based number */
  lineNumbers: z.boolean().default(false),
  /** Prefix each rendered line with the file path */
  withFilename: z.boolean().default(false),
  /** Lines of leading context */
  before: ContextMarginSchema,
  /** Lines of trailing context */
  after: ContextMarginSchema,
  ignoreCase: z.boolean().default(false),
  fixedStrings: z.boolean().default(false),
  /** Select lines that do not match */
  invert: z.boolean().default(false),
  /** Print per-file match counts instead of lines */
  count: z.boolean().default(false),
  /** Per-file worker timeout; unset means wait indefinitely */
  timeoutMs: z.number().int().positive().optional(),
  color: z.enum(['auto', 'always', 'never']).default('auto'),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

/**
 * Formats zod issues the way config validation errors are reported.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
}
