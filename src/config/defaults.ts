/**
 * Default Configuration Values
 *
 * Used when the target directory has no `.repodigest.toml`, and to fill in
 * any field a user's file leaves out. The loader merges user config ON TOP
 * of these defaults.
 */

import type { Config } from './schema.js';

/** File name looked up in the target directory */
export const CONFIG_FILE_NAME = '.repodigest.toml';

export const DEFAULT_CONFIG: Config = {
  general: {
    max_depth: 10,
    max_file_size: '1MB',
    stats_in_output: true,
  },

  output: {
    format: 'markdown',
    stats: true,
    signatures: false,
  },

  // Empty include lists mean "everything not excluded"
  include: {
    files: [],
    dirs: [],
  },

  exclude: {
    files: [],
    dirs: [],
  },
};

/**
 * Config file template (TOML format)
 * Written by `repodigest init`
 */
export const CONFIG_TEMPLATE = `# repodigest configuration
# Place this file at the root of the directory you digest.

[general]
max_depth = ${DEFAULT_CONFIG.general.max_depth}
max_file_size = "${DEFAULT_CONFIG.general.max_file_size}"   # B, KB, MB or GB
stats_in_output = ${DEFAULT_CONFIG.general.stats_in_output}

[output]
format = "${DEFAULT_CONFIG.output.format}"   # markdown, json or yaml
stats = ${DEFAULT_CONFIG.output.stats}
signatures = ${DEFAULT_CONFIG.output.signatures}   # summarize code as declarations only

# Gitignore-style patterns. When any include pattern is set, only
# matching paths are digested.
[include]
files = []
dirs = []
# files = ["*.ts", "*.md"]
# dirs = ["src/"]

[exclude]
files = []
dirs = []
# files = ["*.min.js"]
# dirs = ["fixtures/", "vendor/"]
`;
