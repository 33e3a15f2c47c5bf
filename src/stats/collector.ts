/**
 * Repository Statistics
 *
 * Accumulates per-file facts during a digest and reduces them to the
 * numbers shown in the statistics section of the document.
 */

import { getExtension } from '../signatures/classifier.js';
import { getLanguageInfo } from './languages.js';

/** How many paths `largestFiles` lists */
const LARGEST_FILES_LIMIT = 10;

/** Key used in `fileTypes` for files without an extension */
export const NO_EXTENSION = '(none)';

interface FileRecord {
  path: string;
  extension: string;
  language: string | null;
  sizeBytes: number;
  isText: boolean;
}

/**
 * Summary statistics for one repository.
 */
export interface RepoStats {
  totalFiles: number;
  textFiles: number;
  binaryFiles: number;
  /** Total size, human readable */
  repoSize: string;
  branch: string;
  /** `.ext` to file count, most common first */
  fileTypes: Record<string, number>;
  /** Language name to file count, most common first */
  languages: Record<string, number>;
  /** Paths of the largest files, largest first */
  largestFiles: string[];
  textFilesPercentage: number;
  binaryFilesPercentage: number;
  /** `.ext` to share of all files, in percent */
  fileTypesPercentage: Record<string, number>;
}

/**
 * Format a byte count for display: `512 B`, `1.5 KB`, `2.0 MB`.
 */
export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(1)} ${units[unit]}`;
}

function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 1000) / 10;
}

/**
 * Sort a count map by count descending, then key ascending.
 */
function sortCounts(counts: Map<string, number>): Record<string, number> {
  const entries = [...counts.entries()].sort(
    ([keyA, countA], [keyB, countB]) => countB - countA || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0)
  );
  return Object.fromEntries(entries);
}

/**
 * Collects statistics file by file.
 *
 * Each path is counted once no matter how often it is processed.
 *
 * @example
 * ```ts
 * const collector = new StatsCollector();
 * collector.processFile('src/main.py', 'print(1)\n', 9);
 * collector.processFile('logo.png', null, 2048);
 * collector.getStats('main').textFilesPercentage; // 50
 * ```
 */
export class StatsCollector {
  private readonly records = new Map<string, FileRecord>();

  /**
   * Record one file.
   *
   * @param content - Decoded text, or null for binary/unreadable files
   * @param sizeBytes - Size on disk; defaults to the UTF-8 length of `content`
   */
  processFile(filePath: string, content: string | null, sizeBytes?: number): void {
    if (this.records.has(filePath)) {
      return;
    }

    const extension = getExtension(filePath);
    this.records.set(filePath, {
      path: filePath,
      extension,
      language: getLanguageInfo(extension)?.name ?? null,
      sizeBytes: sizeBytes ?? (content === null ? 0 : Buffer.byteLength(content, 'utf8')),
      isText: content !== null,
    });
  }

  /**
   * Add every file another collector has seen and this one has not.
   */
  merge(other: StatsCollector): void {
    for (const record of other.records.values()) {
      if (!this.records.has(record.path)) {
        this.records.set(record.path, { ...record });
      }
    }
  }

  get fileCount(): number {
    return this.records.size;
  }

  getStats(branch = 'unknown'): RepoStats {
    const records = [...this.records.values()];
    const totalFiles = records.length;
    const textFiles = records.filter((record) => record.isText).length;

    const typeCounts = new Map<string, number>();
    const languageCounts = new Map<string, number>();
    let totalBytes = 0;

    for (const record of records) {
      const type = record.extension === '' ? NO_EXTENSION : `.${record.extension}`;
      typeCounts.set(type, (typeCounts.get(type) ?? 0) + 1);
      if (record.language !== null) {
        languageCounts.set(record.language, (languageCounts.get(record.language) ?? 0) + 1);
      }
      totalBytes += record.sizeBytes;
    }

    const fileTypes = sortCounts(typeCounts);
    const fileTypesPercentage = Object.fromEntries(
      Object.entries(fileTypes).map(([type, count]) => [type, percentage(count, totalFiles)])
    );

    const largestFiles = [...records]
      .sort((a, b) => b.sizeBytes - a.sizeBytes || (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
      .slice(0, LARGEST_FILES_LIMIT)
      .map((record) => record.path);

    return {
      totalFiles,
      textFiles,
      binaryFiles: totalFiles - textFiles,
      repoSize: formatSize(totalBytes),
      branch,
      fileTypes,
      languages: sortCounts(languageCounts),
      largestFiles,
      textFilesPercentage: percentage(textFiles, totalFiles),
      binaryFilesPercentage: percentage(totalFiles - textFiles, totalFiles),
      fileTypesPercentage,
    };
  }
}
