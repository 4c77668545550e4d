/**
 * Zero-context unified diff parsing.
 *
 * With `-U0` every hunk header `@@ -a,b +START,COUNT @@` names exactly the
 * added lines `[START, START + COUNT)` of the new file.
 */

export interface HunkRange {
  newStart: number;
  newLines: number;
}

const HUNK_HEADER = /^@@\s-[0-9]+(?:,[0-9]+)?\s\+([0-9]+)(?:,([0-9]+))?\s@@/;
const TARGET_HEADER = /^\+\+\+ (.+)$/;

/** Parse a hunk header; returns null for any other line. */
export function parseHunkHeader(line: string): HunkRange | null {
  const match = line.match(HUNK_HEADER);
  if (!match) return null;

  const newStart = Number.parseInt(match[1], 10);
  const newLines = match[2] === undefined ? 1 : Number.parseInt(match[2], 10);
  return { newStart, newLines };
}

/** Expand a hunk into its added line numbers; a pure deletion (count 0) yields none. */
export function expandHunk(hunk: HunkRange): number[] {
  const lines: number[] = [];
  for (let n = hunk.newStart; n < hunk.newStart + hunk.newLines; n++) {
    lines.push(n);
  }
  return lines;
}

/** Added line numbers of a single-file diff. */
export function addedLineNumbers(diff: string): Set<number> {
  const added = new Set<number>();
  for (const line of diff.split('\n')) {
    const hunk = parseHunkHeader(line);
    if (!hunk) continue;
    for (const n of expandHunk(hunk)) added.add(n);
  }
  return added;
}

/**
 * Added line numbers of a multi-file diff, keyed by target path (the
 * `+++ b/<path>` header with `b/` stripped). Deleted files (`+++ /dev/null`)
 * and files with no added lines are left out. Map order follows the diff.
 */
export function groupAddedLinesByFile(diff: string): Map<string, Set<number>> {
  const byFile = new Map<string, Set<number>>();
  let current: Set<number> | null = null;

  for (const line of diff.split('\n')) {
    if (line.startsWith('diff --git ')) {
      current = null;
      continue;
    }

    const target = line.match(TARGET_HEADER);
    if (target && current === null) {
      const file = stripTargetPrefix(target[1]);
      if (file === null) continue;
      current = byFile.get(file) ?? new Set<number>();
      byFile.set(file, current);
      continue;
    }

    const hunk = parseHunkHeader(line);
    if (hunk && current) {
      for (const n of expandHunk(hunk)) current.add(n);
    }
  }

  for (const [file, lines] of byFile) {
    if (lines.size === 0) byFile.delete(file);
  }
  return byFile;
}

function stripTargetPrefix(raw: string): string | null {
  const target = unquotePath(raw.replace(/\t.*$/, '').trim());
  if (target === '/dev/null') return null;
  return target.startsWith('b/') ? target.slice(2) : target;
}

const C_ESCAPES: Record<string, number> = {
  a: 0x07, b: 0x08, t: 0x09, n: 0x0a, v: 0x0b, f: 0x0c, r: 0x0d, '"': 0x22, '\\': 0x5c,
};

/**
 * Undo git's C-style path quoting (`"caf\303\251.py"`): octal escapes are
 * UTF-8 bytes. Unquoted paths are returned as-is.
 */
export function unquotePath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;

  const body = raw.slice(1, -1);
  const bytes: number[] = [];
  let i = 0;
  while (i < body.length) {
    const slash = body.indexOf('\\', i);
    const end = slash === -1 ? body.length : slash;
    bytes.push(...Buffer.from(body.slice(i, end), 'utf-8'));
    if (slash === -1 || slash + 1 >= body.length) break;

    const octal = body.slice(slash + 1).match(/^[0-7]{1,3}/);
    if (octal) {
      bytes.push(Number.parseInt(octal[0], 8));
      i = slash + 1 + octal[0].length;
      continue;
    }
    const escaped = body[slash + 1];
    bytes.push(C_ESCAPES[escaped] ?? escaped.charCodeAt(0));
    i = slash + 2;
  }
  return Buffer.from(bytes).toString('utf-8');
}
