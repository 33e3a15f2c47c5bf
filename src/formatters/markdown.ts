/**
 * Markdown Formatter
 *
 * Sections, in order: overview heading, optional signatures banner, README,
 * project tree, optional statistics, file contents, footer. Each section
 * ends with a newline and sections are separated by a blank line.
 */

import type { RepoStats } from '../stats/index.js';
import { GENERATOR_NAME, fenceLanguage, formatTimestamp } from './document.js';
import { buildTree } from './tree.js';
import type { FormatInput, Formatter } from './types.js';

/** How many file types the statistics section lists */
const TOP_FILE_TYPES = 10;

export const SIGNATURES_BANNER =
  '> **Signatures Mode**: code files list declarations only, each followed by the number of lines it spans.\n';

/**
 * Pick a fence that cannot be closed by the content itself.
 */
function fenceFor(language: string, content: string): string {
  return language === 'markdown' || content.includes('```') ? '````' : '```';
}

export function formatStatsSection(stats: RepoStats): string {
  const lines = [
    '## Project Statistics',
    '',
    `- Total Files: ${stats.totalFiles}`,
    `- Text Files: ${stats.textFiles} (${stats.textFilesPercentage}%)`,
    `- Binary Files: ${stats.binaryFiles} (${stats.binaryFilesPercentage}%)`,
    `- Repository Size: ${stats.repoSize}`,
    `- Current Branch: ${stats.branch}`,
  ];

  const types = Object.entries(stats.fileTypes).slice(0, TOP_FILE_TYPES);
  if (types.length > 0) {
    lines.push('- Most Common File Types:');
    for (const [type, count] of types) {
      lines.push(`  - ${type}: ${count}`);
    }
  }

  const languages = Object.entries(stats.languages);
  if (languages.length > 0) {
    lines.push('- Languages:');
    for (const [language, count] of languages) {
      lines.push(`  - ${language}: ${count}`);
    }
  }

  if (stats.largestFiles.length > 0) {
    lines.push('- Largest Files:');
    for (const path of stats.largestFiles) {
      lines.push(`  - ${path}`);
    }
  }

  return lines.join('\n') + '\n';
}

export class MarkdownFormatter implements Formatter {
  readonly name = 'markdown' as const;
  readonly extension = '.md';

  format(input: FormatInput): string {
    const sections: string[] = ['# Project Overview\n'];

    if (input.signatures) {
      sections.push(SIGNATURES_BANNER);
    }

    if (input.readme) {
      sections.push(`## README.md Content\n\n\`\`\`\`markdown\n${input.readme}\n\`\`\`\`\n`);
    }

    const tree = buildTree(
      input.rootName,
      input.files.map((file) => file.path)
    );
    sections.push(`## Project Structure\n\n\`\`\`tree\n${tree}\n\`\`\`\n`);

    if (input.stats) {
      sections.push(formatStatsSection(input.stats));
    }

    sections.push('## File Contents\n');
    for (const file of input.files) {
      if (file.content === null) continue;
      // Already shown in full above
      if (input.readme !== null && file.path.toLowerCase() === 'readme.md') continue;

      const language = fenceLanguage(file.path);
      const fence = fenceFor(language, file.content);
      sections.push(`### filepath ${file.path}\n\n${fence}${language}\n${file.content}\n${fence}\n`);
    }

    sections.push(`---\nGenerated by ${GENERATOR_NAME} on ${formatTimestamp(input.generatedAt)}\n`);

    return sections.join('\n');
  }
}
