/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Locate `.repodigest.toml` (target directory, or an explicit path)
 * 2. Parse it as TOML
 * 3. Validate the sparse user file with the deep-partial schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Validate the merged result, sizes and patterns
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import type { ZodIssue } from 'zod';
import { ConfigSchema, PartialConfigSchema, type Config, type OutputFormat } from './schema.js';
import { CONFIG_FILE_NAME, CONFIG_TEMPLATE, DEFAULT_CONFIG } from './defaults.js';
import { ConfigError } from '../errors/index.js';

const SIZE_UNITS: Readonly<Record<string, number>> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

export interface LoadConfigOptions {
  /** Directory searched for `.repodigest.toml` */
  targetDir?: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
}

/**
 * Values from the command line that override the config file
 */
export interface CliOverrides {
  format?: OutputFormat;
  /** Appended to `include.files` */
  include?: string[];
  /** Appended to `exclude.files` */
  exclude?: string[];
  /** Only applied when set; `undefined` keeps the config value */
  signatures?: boolean;
}

/**
 * Get the config file path for a target directory
 */
export function getConfigPath(targetDir: string): string {
  return path.join(targetDir, CONFIG_FILE_NAME);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * Arrays are replaced, not concatenated. `undefined` never overrides.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Convert a size string such as "1MB" or "512 kb" to bytes.
 *
 * @throws ConfigError if the format or unit is not recognized, or the size is 0
 */
export function parseSize(size: string): number {
  const match = /^(\d+)\s*([A-Za-z]+)$/.exec(size.trim());
  if (!match) {
    throw new ConfigError(`Invalid size format: ${size}`, 'Use a size such as 512KB or 1MB');
  }

  const [, digits, rawUnit] = match;
  const unit = rawUnit.toUpperCase();
  const multiplier = SIZE_UNITS[unit];
  if (multiplier === undefined) {
    throw new ConfigError(`Invalid size unit: ${unit}`, 'Valid units: B, KB, MB, GB');
  }

  const bytes = Number(digits) * multiplier;
  if (bytes < 1) {
    throw new ConfigError('max_file_size must be greater than 0');
  }
  return bytes;
}

/**
 * Reason a glob pattern is malformed, or null if it is usable.
 */
function findPatternProblem(pattern: string): string | null {
  let open = 0;
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === '\\') {
      i++;
    } else if (char === '[') {
      open++;
    } else if (char === ']') {
      if (open === 0) return 'unmatched bracket';
      open--;
    }
  }
  if (open !== 0) return 'unmatched bracket';

  const badSegment = pattern.split('/').some((segment) => segment.includes('**') && segment !== '**');
  if (badSegment) return 'invalid recursive glob';

  return null;
}

/**
 * Check a list of gitignore-style patterns.
 *
 * @param context - Where the patterns came from, e.g. "include files"
 * @throws ConfigError naming the first bad pattern
 */
export function validatePatterns(patterns: readonly string[], context: string): void {
  for (const pattern of patterns) {
    const problem = findPatternProblem(pattern);
    if (problem !== null) {
      throw new ConfigError(
        `Invalid pattern in ${context}: ${pattern} (${problem})`,
        'Patterns follow .gitignore syntax; ** must be a whole path segment'
      );
    }
  }
}

/**
 * Validate the parts of a config the schema cannot express.
 */
export function validateConfig(config: Config): void {
  parseSize(config.general.max_file_size);
  validatePatterns(config.include.files, 'include files');
  validatePatterns(config.include.dirs, 'include dirs');
  validatePatterns(config.exclude.files, 'exclude files');
  validatePatterns(config.exclude.dirs, 'exclude dirs');
}

/**
 * Parse TOML text into a validated, defaults-filled config.
 *
 * @param source - File path used in error messages
 */
export function parseConfig(content: string, source: string): Config {
  let parsed: unknown;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${source} or run: repodigest init --force`
    );
  }

  const partial = PartialConfigSchema.safeParse(parsed);
  if (!partial.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}:\n${formatIssues(partial.error.issues)}`,
      'Run: repodigest init --force  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));
  if (!merged.success) {
    throw new ConfigError(`Invalid configuration in ${source}:\n${formatIssues(merged.error.issues)}`);
  }

  validateConfig(merged.data);
  return merged.data;
}

/**
 * Load the config for a run.
 *
 * Without an explicit `configPath`, a missing `.repodigest.toml` means the
 * defaults are used.
 *
 * @throws ConfigError if the file is unreadable or invalid, or an explicit path does not exist
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const configPath =
    options.configPath ?? getConfigPath(options.targetDir ?? process.cwd());

  if (!fs.existsSync(configPath)) {
    if (options.configPath !== undefined) {
      throw new ConfigError(
        `Config file not found: ${configPath}`,
        'Check the --config path or run: repodigest init'
      );
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return parseConfig(content, configPath);
}

/**
 * Apply command-line overrides. CLI values win; pattern lists are appended
 * to the config's. Returns a new config.
 */
export function mergeCliOptions(config: Config, overrides: CliOverrides): Config {
  const merged: Config = {
    general: { ...config.general },
    output: {
      ...config.output,
      format: overrides.format ?? config.output.format,
      signatures: overrides.signatures ?? config.output.signatures,
    },
    include: {
      files: [...config.include.files, ...(overrides.include ?? [])],
      dirs: [...config.include.dirs],
    },
    exclude: {
      files: [...config.exclude.files, ...(overrides.exclude ?? [])],
      dirs: [...config.exclude.dirs],
    },
  };

  validatePatterns(overrides.include ?? [], 'include files');
  validatePatterns(overrides.exclude ?? [], 'exclude files');
  return merged;
}

/**
 * Write the commented default config into a directory.
 *
 * @returns Path of the written file
 * @throws ConfigError if the file exists and `force` is not set
 */
export function writeConfigTemplate(targetDir: string, force = false): string {
  const configPath = getConfigPath(targetDir);

  if (fs.existsSync(configPath) && !force) {
    throw new ConfigError(
      `Config file already exists: ${configPath}`,
      'Run: repodigest init --force  to overwrite it'
    );
  }

  fs.mkdirSync(targetDir, { recursive: true });
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}
