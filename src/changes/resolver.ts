/**
 * Change-set resolution: which lines of which files are eligible for tagging.
 *
 *   staged: lines added in the index (`git diff --cached -U0`)
 *   base:   lines added since the merge-base with a base branch
 */

import type { ChangeScope, ChangeSet, DiffProvider } from '../shared/types';
import { LineTagError } from '../shared/types';
import { createLogger } from '../shared/logger';
import type { DelimiterTable } from '../tags/delimiters';
import { addedLineNumbers, groupAddedLinesByFile } from './diff-parser';

export interface BaseScopeOptions {
  baseBranch: string;
  fallbackBranch: string;
  /** Receives a user-facing warning when the fallback branch is used. */
  warn?: (msg: string) => void;
}

export function resolveStaged(provider: DiffProvider, table: DelimiterTable): ChangeSet {
  const log = createLogger({ module: 'resolver', scope: 'staged' });
  const changes = new Map<string, ReadonlySet<number>>();

  for (const file of provider.stagedFiles()) {
    if (!table.supports(file)) continue;
    const lines = addedLineNumbers(provider.stagedDiff(file));
    if (lines.size > 0) changes.set(file, lines);
  }

  log.debug({ files: changes.size }, 'staged change set resolved');
  return changes;
}

/**
 * Resolve the merge-base with `baseBranch`, falling back to `fallbackBranch`.
 * Throws E201 when neither resolves.
 */
export function resolveMergeBase(provider: DiffProvider, options: BaseScopeOptions): string {
  const log = createLogger({ module: 'resolver', scope: 'base' });

  const primary = provider.mergeBase(options.baseBranch);
  if (primary) return primary;

  if (options.fallbackBranch !== options.baseBranch) {
    const fallback = provider.mergeBase(options.fallbackBranch);
    if (fallback) {
      const msg = `Base branch "${options.baseBranch}" not found; using "${options.fallbackBranch}" instead.`;
      log.warn({ base: options.baseBranch, fallback: options.fallbackBranch }, 'base branch fallback');
      options.warn?.(msg);
      return fallback;
    }
  }

  throw new LineTagError({
    code: 'E201',
    severity: 'high',
    message: `No merge-base found for "${options.baseBranch}" or "${options.fallbackBranch}"`,
    userMessage: `Could not resolve base branch "${options.baseBranch}" (or fallback "${options.fallbackBranch}").`,
    context: { ref: options.baseBranch },
  });
}

export function resolveBaseDiff(
  provider: DiffProvider,
  table: DelimiterTable,
  options: BaseScopeOptions,
): ChangeSet {
  const log = createLogger({ module: 'resolver', scope: 'base' });
  const mergeBase = resolveMergeBase(provider, options);

  const changes = new Map<string, ReadonlySet<number>>();
  for (const [file, lines] of groupAddedLinesByFile(provider.diffFrom(mergeBase))) {
    if (table.supports(file)) changes.set(file, lines);
  }

  log.debug({ mergeBase, files: changes.size }, 'base change set resolved');
  return changes;
}

export function resolveChangeSet(
  scope: ChangeScope,
  provider: DiffProvider,
  table: DelimiterTable,
  options: BaseScopeOptions,
): ChangeSet {
  switch (scope) {
    case 'staged':
      return resolveStaged(provider, table);
    case 'base':
      return resolveBaseDiff(provider, table, options);
  }
}
