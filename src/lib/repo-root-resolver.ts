import fs from 'fs';
import path from 'path';
import { LineTagError } from '../shared/types';

export interface ResolveResult {
  root: string;
  source: 'override' | 'cwd-walk';
}

// `.git` is a directory in a normal clone and a file in a linked worktree.
const SENTINEL = '.git';

function exists(p: string): boolean {
  try {
    fs.accessSync(p, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function normalizeReal(p: string): string {
  return fs.realpathSync(path.resolve(p));
}

function* parentsFrom(start: string): Generator<string> {
  let current = path.resolve(start);
  while (true) {
    yield current;
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
}

/**
 * Find the repository root: an explicit override (LINETAG_REPO_ROOT) when
 * given, else the nearest ancestor of `cwd` holding `.git`.
 */
export function resolveRepoRoot(opts?: { cwd?: string; override?: string }): ResolveResult {
  const cwd = opts?.cwd ?? process.cwd();

  const overrideValue = opts?.override?.trim();
  if (overrideValue) {
    const real = normalizeReal(overrideValue);
    if (!exists(path.join(real, SENTINEL))) {
      throw new LineTagError({
        code: 'E202',
        severity: 'high',
        message: `Repo root override ${real} has no ${SENTINEL}`,
        userMessage: `LINETAG_REPO_ROOT (${real}) is not a git repository.`,
        context: { file: real },
      });
    }
    return { root: real, source: 'override' };
  }

  for (const dir of parentsFrom(cwd)) {
    const real = normalizeReal(dir);
    if (exists(path.join(real, SENTINEL))) {
      return { root: real, source: 'cwd-walk' };
    }
  }

  throw new LineTagError({
    code: 'E202',
    severity: 'high',
    message: `Unable to resolve repo root from cwd=${cwd}`,
    userMessage: 'Not a git repository. Run linetag from inside your project.',
    context: { file: cwd },
  });
}
