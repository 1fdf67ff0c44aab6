import { execFileSync } from 'node:child_process';

/**
 * Runs git with the given arguments in cwd and returns stdout.
 * Replaceable so callers can be exercised without a repository.
 */
export type GitRunner = (args: string[], cwd: string) => string;

export const runGit: GitRunner = (args, cwd) =>
  execFileSync('git', args, { cwd, encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Whether path lies inside a git work tree (false when git is unavailable)
 */
export function isGitRepository(path: string, git: GitRunner = runGit): boolean {
  try {
    return git(['rev-parse', '--is-inside-work-tree'], path).trim() === 'true';
  } catch {
    return false;
  }
}

export function getRepositoryRoot(path: string, git: GitRunner = runGit): string {
  return git(['rev-parse', '--show-toplevel'], path).trim();
}

/**
 * Files added or modified by the most recent commit, relative to the
 * repository root. The root commit is compared against the empty tree.
 */
export function listLastCommitChanges(path: string, git: GitRunner = runGit): string[] {
  const output = git(['diff-tree', '--no-commit-id', '--name-only', '-r', '-z', '--root', '--diff-filter=AM', 'HEAD'], path);
  return output.split('\0').filter((file) => file !== '');
}
