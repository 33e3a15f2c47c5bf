/**
 * Zod validation schemas for CLI inputs
 *
 * Commander parses arguments, then we validate with Zod for:
 * - Allowed values (output formats)
 * - Cross-option rules (--branch needs --repo)
 * - Helpful error messages
 */

import { z } from 'zod';

import { OutputFormatSchema } from '../config/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type GlobalOptionsInput = z.input<typeof GlobalOptionsSchema>;
export type GlobalOptionsOutput = z.output<typeof GlobalOptionsSchema>;

// ============================================================================
// GENERATE COMMAND SCHEMA
// ============================================================================

const PatternListSchema = z.array(z.string().trim().min(1, 'Patterns cannot be empty'));

export const GenerateOptionsSchema = z
  .object({
    repo: z.string().trim().min(1, 'Repository URL cannot be empty').optional(),
    branch: z.string().trim().min(1, 'Branch name cannot be empty').optional(),
    target: z.string().min(1, 'Target directory cannot be empty').optional(),
    output: z.string().min(1, 'Output path cannot be empty').optional(),
    config: z.string().min(1, 'Config path cannot be empty').optional(),
    format: OutputFormatSchema.optional(),
    include: PatternListSchema.optional(),
    exclude: PatternListSchema.optional(),
    signatures: z.boolean().optional(),
    force: z.boolean().default(false),
  })
  .refine((options) => options.branch === undefined || options.repo !== undefined, {
    message: '--branch can only be used with --repo',
    path: ['branch'],
  })
  .refine((options) => options.target === undefined || options.repo !== undefined, {
    message: '--target can only be used with --repo',
    path: ['target'],
  });

export type GenerateOptions = z.output<typeof GenerateOptionsSchema>;

export const PathArgSchema = z.object({
  path: z.string().min(1, 'Path is required'),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema. On failure the issues come back as
 * `field: message` strings.
 *
 * @example
 * ```typescript
 * const result = validateInput(GenerateOptionsSchema, options);
 * if (!result.success) {
 *   throw new ValidationError('Invalid options', result.issues);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string; issues: string[] } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  return { success: false, error: `Validation failed:\n  ${issues.join('\n  ')}`, issues };
}
