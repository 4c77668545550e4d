/**
 * Applies the classifier and rewriter to one file's changed lines.
 *
 * `tagContent` is the pure core; `processFile` adds reading, notices,
 * the atomic write-back and re-staging.
 */

import fs from 'fs';
import path from 'path';
import type { LineRecord, RewriteOptions, StageWriter, Tag } from '../shared/types';
import { createLogger } from '../shared/logger';
import { color } from '../cli/output';
import { classifyLine, REMOVAL_KEYWORDS } from './classifier';
import { extractTags } from './parser';
import { DEFAULT_REWRITE_OPTIONS, rewriteLine } from './writer';

export interface TagContentOptions {
  delimiter: string;
  tag: Tag;
  /** 1-based line numbers eligible for tagging. */
  changedLines: ReadonlySet<number>;
  removalKeywords?: readonly string[];
  rewrite?: RewriteOptions;
}

export interface TagContentResult {
  content: string;
  /** One record per changed line, in file order. */
  records: LineRecord[];
  tagged: number;
  /** Changed lines that already carried the tag. */
  skipped: number;
}

/**
 * Tag every changed line of `content`. Lines outside `changedLines` are
 * returned byte-for-byte, including a trailing `\r` on CRLF files.
 */
export function tagContent(content: string, options: TagContentOptions): TagContentResult {
  const lines = content.split('\n');
  const records: LineRecord[] = [];
  let tagged = 0;
  let skipped = 0;

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    if (!options.changedLines.has(lineNumber)) continue;

    const raw = lines[i];
    const cr = raw.endsWith('\r') ? '\r' : '';
    const original = cr ? raw.slice(0, -1) : raw;
    const kind = classifyLine(original, options.delimiter, options.removalKeywords ?? REMOVAL_KEYWORDS);
    const existingTags = extractTags(original);
    const record: LineRecord = { line: lineNumber, original, kind, existingTags };
    records.push(record);

    if (existingTags.includes(options.tag)) {
      skipped++;
      continue;
    }
    if (kind === 'skip') continue;

    const rewritten = rewriteLine(
      original,
      kind,
      options.delimiter,
      options.tag,
      options.rewrite ?? DEFAULT_REWRITE_OPTIONS,
    );
    if (rewritten === original) continue;

    record.rewritten = rewritten;
    lines[i] = rewritten + cr;
    tagged++;
  }

  return { content: lines.join('\n'), records, tagged, skipped };
}

export interface ProcessFileOptions extends Omit<TagContentOptions, 'changedLines'> {
  dryRun: boolean;
  /** Repository root that relative paths are resolved against. */
  root: string;
}

export interface ProcessFileDeps {
  stager: StageWriter;
  write?: (msg: string) => void;
}

export interface FileResult {
  file: string;
  tagged: number;
  skipped: number;
  written: boolean;
}

/**
 * Tag the changed lines of one file, report every decision, and when
 * anything changed outside dry-run mode, write the file back and re-stage it.
 */
export function processFile(
  file: string,
  changedLines: ReadonlySet<number>,
  options: ProcessFileOptions,
  deps: ProcessFileDeps,
): FileResult {
  const log = createLogger({ module: 'file-processor', file });
  const write = deps.write ?? console.log;
  const fullPath = path.resolve(options.root, file);

  const content = fs.readFileSync(fullPath, 'utf-8');
  const result = tagContent(content, { ...options, changedLines });

  for (const record of result.records) {
    const location = color.cyan(`${file}:${record.line}`);
    if (record.rewritten !== undefined) {
      const label = options.dryRun ? color.yellow('[DRY-RUN]') : color.green('[TAGGED]');
      write(`${label} ${location}`);
      write(color.dim(`  - ${record.original}`));
      write(`  + ${record.rewritten}`);
    } else if (record.existingTags.includes(options.tag)) {
      write(`${color.dim('[SKIP]')} ${location} already tagged with ${options.tag}`);
    }
  }

  log.debug({ changed: changedLines.size, tagged: result.tagged, skipped: result.skipped }, 'file processed');

  if (result.tagged === 0 || options.dryRun) {
    return { file, tagged: result.tagged, skipped: result.skipped, written: false };
  }

  writeAtomic(fullPath, result.content);
  deps.stager.stage(file);
  return { file, tagged: result.tagged, skipped: result.skipped, written: true };
}

/** Write via temp file + rename, keeping the original file mode. */
function writeAtomic(filePath: string, content: string): void {
  const tmpPath = filePath + '.linetag-tmp';
  try {
    fs.writeFileSync(tmpPath, content, 'utf8');
    const mode = fs.statSync(filePath).mode;
    fs.chmodSync(tmpPath, mode);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
