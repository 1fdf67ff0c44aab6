import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ConfigurationError } from '../lib/errors.js';
import { isMarkdownFile, resolveInputMode, scanMarkdownFiles, selectFiles } from '../lib/file-selector.js';
import type { GitRunner } from '../lib/git.js';

function stubGit(root: string, changed: string[]): GitRunner {
  return (args) => {
    if (args[0] === 'rev-parse' && args[1] === '--is-inside-work-tree') return 'true\n';
    if (args[0] === 'rev-parse' && args[1] === '--show-toplevel') return `${root}\n`;
    if (args[0] === 'diff-tree') return changed.map((file) => `${file}\0`).join('');
    throw new Error(`unexpected git ${args.join(' ')}`);
  };
}

const notARepository: GitRunner = () => {
  throw new Error('fatal: not a git repository');
};

describe('file selector', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'md2cf-select-'));
    mkdirSync(join(testDir, 'sub'));
    mkdirSync(join(testDir, '.hidden'));
    mkdirSync(join(testDir, 'node_modules'));
    writeFileSync(join(testDir, 'a.md'), '# A');
    writeFileSync(join(testDir, 'b.markdown'), '# B');
    writeFileSync(join(testDir, 'notes.txt'), 'notes');
    writeFileSync(join(testDir, 'sub', 'c.md'), '# C');
    writeFileSync(join(testDir, '.hidden', 'x.md'), '# X');
    writeFileSync(join(testDir, 'node_modules', 'y.md'), '# Y');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('isMarkdownFile', () => {
    test('matches markdown extensions case-insensitively', () => {
      expect(isMarkdownFile('README.MD')).toBe(true);
      expect(isMarkdownFile('guide.markdown')).toBe(true);
      expect(isMarkdownFile('notes.txt')).toBe(false);
    });
  });

  describe('resolveInputMode', () => {
    test('prefers explicit paths', () => {
      expect(resolveInputMode({ paths: ['a.md'], gitRepo: testDir }, stubGit(testDir, []))).toEqual({
        _tag: 'ExplicitFiles',
        paths: ['a.md'],
      });
    });

    test('uses git when no paths are given', () => {
      expect(resolveInputMode({ paths: [], gitRepo: testDir }, stubGit(testDir, []))).toEqual({
        _tag: 'GitDiff',
        repository: testDir,
      });
    });

    test('is invalid without paths or a repository', () => {
      expect(resolveInputMode({ paths: [], gitRepo: testDir }, notARepository)).toEqual({
        _tag: 'Invalid',
        reason: `No files given and ${testDir} is not a git repository`,
      });
      expect(resolveInputMode({ paths: [] })).toEqual({
        _tag: 'Invalid',
        reason: 'No files given and no git repository to read changes from',
      });
    });
  });

  describe('scanMarkdownFiles', () => {
    test('finds markdown files, skipping hidden and dependency directories', () => {
      expect(scanMarkdownFiles(testDir)).toEqual([
        join(testDir, 'a.md'),
        join(testDir, 'b.markdown'),
        join(testDir, 'sub', 'c.md'),
      ]);
    });
  });

  describe('selectFiles', () => {
    test('keeps a file given both directly and through its directory once', () => {
      const files = selectFiles({ _tag: 'ExplicitFiles', paths: [join(testDir, 'a.md'), testDir] });
      expect(files).toEqual([join(testDir, 'a.md'), join(testDir, 'b.markdown'), join(testDir, 'sub', 'c.md')]);
    });

    test('takes explicit files as given', () => {
      expect(selectFiles({ _tag: 'ExplicitFiles', paths: [join(testDir, 'notes.txt')] })).toEqual([
        join(testDir, 'notes.txt'),
      ]);
    });

    test('warns about and skips missing paths', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const missing = join(testDir, 'missing.md');

      expect(selectFiles({ _tag: 'ExplicitFiles', paths: [missing, join(testDir, 'a.md')] })).toEqual([
        join(testDir, 'a.md'),
      ]);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0][0]).toContain(`File doesn't exist: ${missing}`);
    });

    test('selects markdown files changed by the last commit', () => {
      const git = stubGit(testDir, ['a.md', 'notes.txt', 'deleted.md', 'sub/c.md']);
      expect(selectFiles({ _tag: 'GitDiff', repository: testDir }, git)).toEqual([
        join(testDir, 'a.md'),
        join(testDir, 'sub', 'c.md'),
      ]);
    });

    test('reports a repository without commits as a configuration error', () => {
      const emptyRepository: GitRunner = (args) => {
        if (args[0] === 'rev-parse') return args[1] === '--show-toplevel' ? `${testDir}\n` : 'true\n';
        throw new Error('fatal: bad object HEAD');
      };
      const mode = resolveInputMode({ paths: [], gitRepo: testDir }, emptyRepository);

      expect(() => selectFiles(mode, emptyRepository)).toThrow(
        new ConfigurationError(`Cannot read the last commit of ${testDir}: fatal: bad object HEAD`),
      );
    });

    test('fails for an invalid input mode', () => {
      expect(() => selectFiles({ _tag: 'Invalid', reason: 'nothing to do' })).toThrow(ConfigurationError);
    });
  });
});
