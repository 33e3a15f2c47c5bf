/**
 * Git Utilities
 *
 * Clones remote repositories and reads branch, status and remote
 * information from local ones. Shells out to the `git` binary with
 * execFileSync; these commands are short and run once per digest.
 */

import { execFileSync } from 'node:child_process';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

import { GitError } from '../errors/index.js';

export interface GitRunOptions {
  cwd?: string;
}

/**
 * Runs `git <args>` and returns stdout. Throws when git exits non-zero.
 */
export type GitRunner = (args: readonly string[], options: GitRunOptions) => string;

export interface PrepareRepositoryOptions {
  /** Remote to clone; when absent `targetDir` must already be a repository */
  repoUrl?: string;
  /** Clone destination, or the local directory to digest */
  targetDir: string;
  /** Branch to check out when cloning */
  branch?: string;
  /** Accept a local directory that is not a Git work tree */
  force?: boolean;
}

export interface RepoInfo {
  isGitRepo: boolean;
  /** Current branch, or "unknown" outside a repository */
  branch: string;
  hasUncommittedChanges: boolean;
  remotes: string[];
  /** Top-level directory of the work tree */
  rootPath: string | null;
}

export const defaultGitRunner: GitRunner = (args, options) =>
  execFileSync('git', [...args], {
    cwd: options.cwd,
    encoding: 'utf8',
    stdio: ['pipe', 'pipe', 'pipe'],
  });

/**
 * Best description of a failed git invocation: its stderr when there is
 * one, otherwise the error message.
 */
function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    if ('stderr' in error) {
      const stderr = String(error.stderr ?? '').trim();
      if (stderr !== '') return stderr;
    }
    return error.message;
  }
  return String(error);
}

function tryGit(runner: GitRunner, args: readonly string[], cwd: string): string | null {
  try {
    return runner(args, { cwd }).trim();
  } catch {
    return null;
  }
}

/**
 * Derive a directory name from a clone URL.
 *
 * @example
 * ```ts
 * repoNameFromUrl('https://github.com/acme/widget.git'); // 'widget'
 * repoNameFromUrl('git@github.com:acme/tool');           // 'tool'
 * ```
 */
export function repoNameFromUrl(repoUrl: string): string {
  const trimmed = repoUrl.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const name = trimmed.split(/[/:]/).pop() ?? '';
  return name === '' ? 'repository' : name;
}

/**
 * Whether a directory is inside a Git work tree.
 */
export function isGitRepository(dir: string, runner: GitRunner = defaultGitRunner): boolean {
  return tryGit(runner, ['rev-parse', '--is-inside-work-tree'], dir) === 'true';
}

/**
 * Get the directory to digest, cloning first when a URL is given.
 *
 * @returns Absolute path of the repository
 * @throws GitError if the clone fails, the directory is missing, or it is
 *         not a repository and `force` is not set
 */
export function prepareRepository(
  options: PrepareRepositoryOptions,
  runner: GitRunner = defaultGitRunner
): string {
  const target = resolve(options.targetDir);

  if (options.repoUrl) {
    const args = ['clone'];
    if (options.branch) {
      args.push('--branch', options.branch);
    }
    args.push(options.repoUrl, target);

    try {
      runner(args, {});
    } catch (error) {
      throw new GitError(
        `Git clone failed: ${describeFailure(error)}`,
        error instanceof Error ? error : undefined,
        'Check the repository URL, branch name and your network access'
      );
    }
    return target;
  }

  if (!existsSync(target)) {
    throw new GitError(`Directory does not exist: ${target}`, undefined, 'Check the path and try again');
  }

  if (!options.force && !isGitRepository(target, runner)) {
    throw new GitError(
      `Directory is not a Git repository: ${target}`,
      undefined,
      'Use --force to digest a plain directory'
    );
  }

  return target;
}

/**
 * Read branch, status and remotes for a directory.
 * Outside a repository the result has `isGitRepo: false` and branch "unknown".
 */
export function getRepoInfo(dir: string, runner: GitRunner = defaultGitRunner): RepoInfo {
  if (!isGitRepository(dir, runner)) {
    return {
      isGitRepo: false,
      branch: 'unknown',
      hasUncommittedChanges: false,
      remotes: [],
      rootPath: null,
    };
  }

  // A repository without commits has no HEAD to abbreviate
  const branch =
    tryGit(runner, ['rev-parse', '--abbrev-ref', 'HEAD'], dir) ??
    tryGit(runner, ['symbolic-ref', '--short', 'HEAD'], dir) ??
    'unknown';

  const status = tryGit(runner, ['status', '--porcelain'], dir) ?? '';
  const remotes = (tryGit(runner, ['remote'], dir) ?? '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');

  return {
    isGitRepo: true,
    branch: branch === '' ? 'unknown' : branch,
    hasUncommittedChanges: status !== '',
    remotes,
    rootPath: tryGit(runner, ['rev-parse', '--show-toplevel'], dir),
  };
}
