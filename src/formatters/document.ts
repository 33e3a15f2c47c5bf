/**
 * Shared pieces of the JSON and YAML documents.
 */

import { getExtension } from '../signatures/index.js';
import { getLanguageInfo, type RepoStats } from '../stats/index.js';
import { buildTree } from './tree.js';
import type { FormatInput } from './types.js';

export const GENERATOR_NAME = 'repodigest';

export interface DigestDocument {
  metadata: {
    generated_at: string;
    generator: string;
    signatures_mode: boolean;
  };
  project: {
    name: string;
    readme: string | null;
    tree: string;
    statistics: Record<string, unknown> | null;
  };
  files: Array<{ path: string; content: string }>;
}

/**
 * Statistics with the snake_case keys used in serialized output.
 */
export function statisticsRecord(stats: RepoStats): Record<string, unknown> {
  return {
    total_files: stats.totalFiles,
    text_files: stats.textFiles,
    binary_files: stats.binaryFiles,
    repo_size: stats.repoSize,
    branch: stats.branch,
    file_types: stats.fileTypes,
    languages: stats.languages,
    largest_files: stats.largestFiles,
    text_files_percentage: stats.textFilesPercentage,
    binary_files_percentage: stats.binaryFilesPercentage,
    file_types_percentage: stats.fileTypesPercentage,
  };
}

/**
 * Build the serializable document. Files without content appear in the
 * tree only.
 */
export function buildDocument(input: FormatInput): DigestDocument {
  const files: DigestDocument['files'] = [];
  for (const file of input.files) {
    if (file.content !== null) {
      files.push({ path: file.path, content: file.content });
    }
  }

  return {
    metadata: {
      generated_at: input.generatedAt.toISOString(),
      generator: GENERATOR_NAME,
      signatures_mode: input.signatures,
    },
    project: {
      name: input.rootName,
      readme: input.readme,
      tree: buildTree(
        input.rootName,
        input.files.map((file) => file.path)
      ),
      statistics: input.stats ? statisticsRecord(input.stats) : null,
    },
    files,
  };
}

/**
 * Fence info string for a file, empty when the language is unknown.
 */
export function fenceLanguage(filePath: string): string {
  return getLanguageInfo(getExtension(filePath))?.fence ?? '';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Find the repository's top-level README among collected files.
 */
export function findReadme<T extends { path: string; content: string | null }>(
  files: readonly T[]
): T | undefined {
  return files.find((file) => file.content !== null && file.path.toLowerCase() === 'readme.md');
}
