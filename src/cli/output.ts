/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

const NO_COLOR = !!process.env.NO_COLOR || process.env.TERM === 'dumb';
const FORCE_COLOR = !!process.env.FORCE_COLOR;

function useColor(): boolean {
  if (FORCE_COLOR) return true;
  if (NO_COLOR) return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  green: `${ESC}32m`,
  cyan: `${ESC}36m`,
  boldRed: `${ESC}1;31m`,
  boldWhite: `${ESC}1;37m`,
  boldGreen: `${ESC}1;32m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  green: (t: string) => wrap(codes.green, t),
  cyan: (t: string) => wrap(codes.cyan, t),
  dim: (t: string) => wrap(codes.dim, t),
  bold: (t: string) => wrap(codes.boldWhite, t),
  boldGreen: (t: string) => wrap(codes.boldGreen, t),
};

export const label = {
  info: () => color.cyan('[INFO]'),
  warn: () => color.yellow('[WARN]'),
  error: () => color.red('[ERROR]'),
  success: () => color.boldGreen('[SUCCESS]'),
  dryRun: () => color.yellow('[DRY-RUN]'),
};

export interface RunSummary {
  dryRun: boolean;
  files: number;
  filesTagged: number;
  linesTagged: number;
  linesSkipped: number;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/** Final line of a `tag` run. */
export function formatSummary(summary: RunSummary): string {
  const skipped = summary.linesSkipped > 0
    ? ` ${plural(summary.linesSkipped, 'line')} already tagged.`
    : '';

  if (summary.dryRun) {
    return `${label.dryRun()} Complete. ${plural(summary.linesTagged, 'line')} would be tagged in ` +
      `${plural(summary.filesTagged, 'file')}.${skipped} No files were modified.`;
  }
  return `${label.success()} Tagged ${plural(summary.linesTagged, 'line')} in ` +
    `${plural(summary.filesTagged, 'file')}.${skipped}`;
}
