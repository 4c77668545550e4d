import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as child_process from 'child_process';
import { GitClient } from '../../src/cli/git-utils';
import { LineTagError } from '../../src/shared/types';

vi.mock('child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockedExecFileSync = vi.mocked(child_process.execFileSync);

describe('GitClient', () => {
  const git = new GitClient('/repo');

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('stagedFiles', () => {
    it('returns staged paths', () => {
      mockedExecFileSync.mockReturnValue('src/app.c\0lib/util.py\0');
      expect(git.stagedFiles()).toEqual(['src/app.c', 'lib/util.py']);
      expect(mockedExecFileSync).toHaveBeenCalledWith(
        'git',
        ['diff', '--cached', '--name-only', '-z', '--diff-filter=ACMR'],
        expect.objectContaining({ cwd: '/repo' }),
      );
    });

    it('keeps non-ASCII and space-containing paths verbatim', () => {
      mockedExecFileSync.mockReturnValue('src/café.py\0docs/my file.c\0');
      expect(git.stagedFiles()).toEqual(['src/café.py', 'docs/my file.c']);
    });

    it('returns empty array when nothing is staged', () => {
      mockedExecFileSync.mockReturnValue('');
      expect(git.stagedFiles()).toEqual([]);
    });

    it('throws E202 when git fails', () => {
      mockedExecFileSync.mockImplementation(() => { throw new Error('not a git repo'); });
      let caught: unknown;
      try {
        git.stagedFiles();
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(LineTagError);
      expect(caught).toMatchObject({
        code: 'E202',
        context: { command: 'git diff --cached --name-only -z --diff-filter=ACMR' },
      });
    });
  });

  describe('stagedDiff', () => {
    it('asks for a zero-context diff of one file', () => {
      mockedExecFileSync.mockReturnValue('@@ -1 +1 @@\n');
      expect(git.stagedDiff('src/app.c')).toBe('@@ -1 +1 @@\n');
      expect(mockedExecFileSync).toHaveBeenCalledWith(
        'git',
        ['diff', '--cached', '-U0', '--no-color', '--no-ext-diff', '--src-prefix=a/', '--dst-prefix=b/', '--', 'src/app.c'],
        expect.objectContaining({ cwd: '/repo' }),
      );
    });
  });

  describe('mergeBase', () => {
    it('returns the commit', () => {
      mockedExecFileSync.mockReturnValue('abc123def456\n');
      expect(git.mergeBase('develop')).toBe('abc123def456');
      expect(mockedExecFileSync).toHaveBeenCalledWith(
        'git',
        ['merge-base', 'HEAD', 'develop'],
        expect.objectContaining({ cwd: '/repo' }),
      );
    });

    it('returns null when the ref does not resolve', () => {
      mockedExecFileSync.mockImplementation(() => { throw new Error('Not a valid object name develop'); });
      expect(git.mergeBase('develop')).toBeNull();
    });
  });

  describe('diffFrom', () => {
    it('diffs the commit against the working tree', () => {
      mockedExecFileSync.mockReturnValue('');
      git.diffFrom('abc123');
      expect(mockedExecFileSync).toHaveBeenCalledWith(
        'git',
        ['diff', '-U0', '--no-color', '--no-ext-diff', '--src-prefix=a/', '--dst-prefix=b/', 'abc123', '--'],
        expect.objectContaining({ cwd: '/repo' }),
      );
    });
  });

  describe('stage', () => {
    it('adds the file to the index', () => {
      mockedExecFileSync.mockReturnValue('');
      git.stage('src/app.c');
      expect(mockedExecFileSync).toHaveBeenCalledWith(
        'git',
        ['add', '--', 'src/app.c'],
        expect.objectContaining({ cwd: '/repo' }),
      );
    });
  });

  describe('currentBranch', () => {
    it('returns the branch name', () => {
      mockedExecFileSync.mockReturnValue('feature/ABC-4567-login\n');
      expect(git.currentBranch()).toBe('feature/ABC-4567-login');
    });

    it('returns null on error', () => {
      mockedExecFileSync.mockImplementation(() => { throw new Error('fail'); });
      expect(git.currentBranch()).toBeNull();
    });
  });

  describe('hooksDir', () => {
    it('resolves the hooks path against the repo root', () => {
      mockedExecFileSync.mockReturnValue('.git/hooks\n');
      expect(git.hooksDir()).toBe('/repo/.git/hooks');
    });
  });
});
