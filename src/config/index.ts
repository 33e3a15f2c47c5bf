/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users create a config file with `repodigest init`.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  GeneralConfigSchema,
  OutputConfigSchema,
  OutputFormatSchema,
  PathPatternsSchema,
} from './schema.js';
export type { Config, PartialConfig, OutputFormat, PathPatterns } from './schema.js';

// Defaults
export {
  DEFAULT_CONFIG,
  CONFIG_TEMPLATE,
  CONFIG_FILE_NAME,
} from './defaults.js';

// Loader functions
export {
  loadConfig,
  parseConfig,
  mergeCliOptions,
  parseSize,
  validatePatterns,
  validateConfig,
  writeConfigTemplate,
  getConfigPath,
  deepMerge,
} from './loader.js';
export type { LoadConfigOptions, CliOverrides } from './loader.js';
