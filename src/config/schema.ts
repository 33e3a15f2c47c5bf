/**
 * Configuration Schema
 *
 * Defines the shape of `.repodigest.toml` using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Size strings such as "512KB" or "1MB". Parsed to bytes by `parseSize()`.
 */
export const SizeStringSchema = z
  .string()
  .regex(/^\s*\d+\s*[A-Za-z]+\s*$/, 'Expected a size such as 512KB or 1MB');

/**
 * General traversal settings
 */
export const GeneralConfigSchema = z.object({
  max_depth: z
    .number()
    .int()
    .min(1, 'max_depth must be greater than 0')
    .describe('How many directory levels below the root to descend'),
  max_file_size: SizeStringSchema.describe('Files larger than this are listed but not read'),
  stats_in_output: z.boolean().describe('Include the statistics section in the document'),
});

/**
 * Output document formats
 */
export const OutputFormatSchema = z.enum(['markdown', 'json', 'yaml']);

/**
 * Output settings
 */
export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.describe('Document format'),
  stats: z.boolean().describe('Collect repository statistics'),
  signatures: z
    .boolean()
    .describe('Replace file bodies with declaration summaries'),
});

/**
 * Gitignore-style pattern lists for files and directories
 */
export const PathPatternsSchema = z.object({
  files: z.array(z.string()),
  dirs: z.array(z.string()),
});

/**
 * Root configuration schema
 * This is the complete shape of .repodigest.toml
 */
export const ConfigSchema = z.object({
  general: GeneralConfigSchema,
  output: OutputConfigSchema,
  include: PathPatternsSchema,
  exclude: PathPatternsSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type PathPatterns = z.infer<typeof PathPatternsSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
