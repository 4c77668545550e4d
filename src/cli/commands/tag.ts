/**
 * `linetag tag`: tag the changed lines of every changed source file.
 */

import type { BranchReader, ChangeScope, DiffProvider, LineTagConfig, StageWriter, Tag } from '../../shared/types';
import { LineTagError } from '../../shared/types';
import { createLogger } from '../../shared/logger';
import { resolveChangeSet } from '../../changes';
import { DelimiterTable, isTag, processFile, tagFromBranch } from '../../tags';
import { formatSummary, label } from '../output';

export interface TagOptions {
  tag?: string;
  dryRun: boolean;
  scope: ChangeScope;
  baseBranch?: string;
}

export interface TagDeps {
  git: DiffProvider & StageWriter & BranchReader;
  config: Required<LineTagConfig>;
  root: string;
}

/** Explicit tag if given, else the first tag-shaped part of the branch name. */
export function resolveTag(explicit: string | undefined, branches: BranchReader): Tag {
  if (explicit !== undefined) {
    if (!isTag(explicit)) {
      throw new LineTagError({
        code: 'E101',
        severity: 'medium',
        message: `Invalid tag "${explicit}"`,
        userMessage: `"${explicit}" is not a valid tag (expected e.g. ABC-1234).`,
      });
    }
    return explicit;
  }

  const branch = branches.currentBranch();
  const derived = branch ? tagFromBranch(branch) : null;
  if (!derived) {
    throw new LineTagError({
      code: 'E101',
      severity: 'medium',
      message: `No tag in branch name ${branch ?? '(unknown)'}`,
      userMessage: 'No issue tag found (use --tag or a branch like ABC-1234-feature).',
      context: { ref: branch ?? undefined },
    });
  }
  return derived;
}

export async function runTag(
  deps: TagDeps,
  options: TagOptions,
  write: (msg: string) => void = console.log,
): Promise<number> {
  const log = createLogger({ module: 'tag', scope: options.scope, dryRun: options.dryRun });

  try {
    const tag = resolveTag(options.tag, deps.git);
    const table = new DelimiterTable(deps.config.delimiters);
    const changes = resolveChangeSet(options.scope, deps.git, table, {
      baseBranch: options.baseBranch ?? deps.config.base_branch,
      fallbackBranch: deps.config.fallback_branch,
      warn: (msg) => write(`${label.warn()} ${msg}`),
    });

    if (changes.size === 0) {
      write(`${label.info()} ${options.scope === 'staged'
        ? 'No staged source files to process.'
        : 'No changed source files since the base branch.'}`);
      return 0;
    }

    write(`${label.info()} Tagging with: ${tag}\n`);

    let linesTagged = 0;
    let linesSkipped = 0;
    let filesTagged = 0;
    for (const [file, lines] of changes) {
      const result = processFile(file, lines, {
        delimiter: table.require(file),
        tag,
        dryRun: options.dryRun,
        root: deps.root,
        removalKeywords: deps.config.removal_keywords,
        rewrite: { column: deps.config.column, markerOffset: deps.config.marker_offset },
      }, { stager: deps.git, write });

      linesTagged += result.tagged;
      linesSkipped += result.skipped;
      if (result.tagged > 0) filesTagged++;
    }

    log.info({ tag, files: changes.size, linesTagged, linesSkipped }, 'tag run complete');
    write('');
    write(formatSummary({
      dryRun: options.dryRun,
      files: changes.size,
      filesTagged,
      linesTagged,
      linesSkipped,
    }));
    return 0;
  } catch (err) {
    if (err instanceof LineTagError) {
      log.error({ code: err.code, context: err.context }, err.message);
      write(`${label.error()} ${err.userMessage ?? err.message}`);
      return 1;
    }
    throw err;
  }
}
