/**
 * Statistics Module
 */

export { StatsCollector, formatSize, NO_EXTENSION } from './collector.js';
export type { RepoStats } from './collector.js';
export { getLanguageInfo } from './languages.js';
export type { LanguageInfo } from './languages.js';
