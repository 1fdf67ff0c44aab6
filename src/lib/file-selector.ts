import { existsSync, readdirSync, realpathSync, statSync, type Stats } from 'node:fs';
import { join, resolve } from 'node:path';
import chalk from 'chalk';
import { ConfigurationError } from './errors.js';
import { getRepositoryRoot, isGitRepository, listLastCommitChanges, runGit, type GitRunner } from './git.js';

/**
 * Directories to exclude from scanning
 */
const EXCLUDED_DIRS = new Set(['node_modules', 'vendor', '__pycache__']);

export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'] as const;

export function isMarkdownFile(path: string): boolean {
  const lower = path.toLowerCase();
  return MARKDOWN_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Where the documents of a run come from, decided once at startup
 */
export type InputMode =
  | { readonly _tag: 'ExplicitFiles'; readonly paths: readonly string[] }
  | { readonly _tag: 'GitDiff'; readonly repository: string }
  | { readonly _tag: 'Invalid'; readonly reason: string };

export interface SelectionInput {
  /** Files and directories given on the command line */
  paths: readonly string[];
  /** Repository for git-diff mode */
  gitRepo?: string;
}

/**
 * Pick the input mode: explicit paths win, then a usable git repository
 */
export function resolveInputMode(input: SelectionInput, git: GitRunner = runGit): InputMode {
  if (input.paths.length > 0) {
    return { _tag: 'ExplicitFiles', paths: input.paths };
  }
  if (input.gitRepo && isGitRepository(input.gitRepo, git)) {
    return { _tag: 'GitDiff', repository: input.gitRepo };
  }
  return {
    _tag: 'Invalid',
    reason: input.gitRepo
      ? `No files given and ${input.gitRepo} is not a git repository`
      : 'No files given and no git repository to read changes from',
  };
}

/**
 * Scans a directory recursively for markdown files.
 * Excludes hidden entries and dependency directories.
 *
 * @returns Absolute paths, sorted alphabetically
 */
export function scanMarkdownFiles(directory: string): string[] {
  const files: string[] = [];

  function scan(dir: string): void {
    let entries: string[];
    try {
      entries = readdirSync(dir);
    } catch (error) {
      console.warn(chalk.yellow(`Skipping unreadable directory ${dir}: ${error}`));
      return;
    }

    for (const entry of entries) {
      if (entry.startsWith('.') || EXCLUDED_DIRS.has(entry)) {
        continue;
      }

      const fullPath = join(dir, entry);
      let stat: Stats;
      try {
        stat = statSync(fullPath);
      } catch {
        // Dangling symlink
        continue;
      }

      if (stat.isDirectory()) {
        scan(fullPath);
      } else if (stat.isFile() && isMarkdownFile(entry)) {
        files.push(resolve(fullPath));
      }
    }
  }

  scan(directory);
  return files.sort();
}

function canonicalPath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

function expandExplicitPaths(paths: readonly string[]): string[] {
  const files: string[] = [];
  for (const path of paths) {
    const absolute = resolve(path);
    if (!existsSync(absolute)) {
      console.warn(chalk.yellow(`File doesn't exist: ${path}`));
      continue;
    }
    if (statSync(absolute).isDirectory()) {
      files.push(...scanMarkdownFiles(absolute));
    } else {
      // Explicit files are taken as given, whatever their extension
      files.push(absolute);
    }
  }
  return files;
}

function expandGitChanges(repository: string, git: GitRunner): string[] {
  let root: string;
  let changes: string[];
  try {
    root = getRepositoryRoot(repository, git);
    changes = listLastCommitChanges(repository, git);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read the last commit of ${repository}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return changes
    .filter(isMarkdownFile)
    .map((file) => resolve(root, file))
    .filter((file) => existsSync(file));
}

function expandInputMode(mode: InputMode, git: GitRunner): string[] {
  switch (mode._tag) {
    case 'ExplicitFiles':
      return expandExplicitPaths(mode.paths);
    case 'GitDiff':
      return expandGitChanges(mode.repository, git);
    case 'Invalid':
      throw new ConfigurationError(mode.reason);
  }
}

/**
 * Produce the ordered, de-duplicated list of documents for a run.
 * A path reached twice (directly and through its directory) is kept once.
 */
export function selectFiles(mode: InputMode, git: GitRunner = runGit): string[] {
  const seen = new Set<string>();
  const selected: string[] = [];
  for (const candidate of expandInputMode(mode, git)) {
    const key = canonicalPath(candidate);
    if (!seen.has(key)) {
      seen.add(key);
      selected.push(candidate);
    }
  }
  return selected;
}
