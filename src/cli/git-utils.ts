/**
 * Git-backed implementations of the version-control collaborators.
 * Every call is synchronous with a timeout; failures surface as E202
 * except where a missing ref is an expected answer (merge-base, branch).
 */

import { execFileSync } from 'child_process';
import path from 'path';
import type { BranchReader, DiffProvider, StageWriter } from '../shared/types';
import { LineTagError } from '../shared/types';
import { createLogger } from '../shared/logger';

const GIT_TIMEOUT_MS = 10_000;
const MAX_BUFFER = 10 * 1024 * 1024;

// Pins diff output against user settings (diff.external, diff.noprefix, diff.mnemonicPrefix).
const PLAIN_DIFF = ['--no-color', '--no-ext-diff', '--src-prefix=a/', '--dst-prefix=b/'];

export class GitClient implements DiffProvider, StageWriter, BranchReader {
  constructor(private readonly repoRoot: string) {}

  stagedFiles(): string[] {
    return splitNul(this.run(['diff', '--cached', '--name-only', '-z', '--diff-filter=ACMR']));
  }

  stagedDiff(file: string): string {
    return this.run(['diff', '--cached', '-U0', ...PLAIN_DIFF, '--', file]);
  }

  mergeBase(ref: string): string | null {
    try {
      return this.run(['merge-base', 'HEAD', ref]).trim() || null;
    } catch {
      return null;
    }
  }

  diffFrom(commit: string): string {
    return this.run(['diff', '-U0', ...PLAIN_DIFF, commit, '--']);
  }

  stage(file: string): void {
    this.run(['add', '--', file]);
  }

  currentBranch(): string | null {
    try {
      return this.run(['rev-parse', '--abbrev-ref', 'HEAD']).trim() || null;
    } catch {
      return null;
    }
  }

  /** Absolute path of the hooks directory (honours core.hooksPath and worktrees). */
  hooksDir(): string {
    const relative = this.run(['rev-parse', '--git-path', 'hooks']).trim();
    return path.resolve(this.repoRoot, relative);
  }

  private run(args: string[]): string {
    const log = createLogger({ module: 'git' });
    log.debug({ args }, 'git');
    try {
      return execFileSync('git', args, {
        cwd: this.repoRoot,
        encoding: 'utf-8',
        timeout: GIT_TIMEOUT_MS,
        maxBuffer: MAX_BUFFER,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (err) {
      throw new LineTagError({
        code: 'E202',
        severity: 'high',
        message: `git ${args.join(' ')} failed: ${err instanceof Error ? err.message : String(err)}`,
        userMessage: `git ${args[0]} failed. Is this a git repository?`,
        context: { command: `git ${args.join(' ')}` },
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}

/** Split `-z` output; paths come back unquoted and verbatim. */
function splitNul(output: string): string[] {
  return output.split('\0').filter(Boolean);
}
