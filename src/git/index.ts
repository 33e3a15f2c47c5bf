/**
 * Git Module
 */

export {
  prepareRepository,
  getRepoInfo,
  isGitRepository,
  repoNameFromUrl,
  defaultGitRunner,
} from './git.js';
export type { GitRunner, GitRunOptions, PrepareRepositoryOptions, RepoInfo } from './git.js';
