import type { LineKind } from '../shared/types';

export const REMOVAL_KEYWORDS: readonly string[] = ['deleted', 'delete', 'removed', 'remove', 'moved', 'move'];

/**
 * Decide whether a line is a tagging target.
 *
 * Code lines and comment lines that mark removed code (`# deleted ...`,
 * `//removed ...`) are targets; blank lines and other comments are skipped.
 */
export function classifyLine(
  line: string,
  delimiter: string,
  keywords: readonly string[] = REMOVAL_KEYWORDS,
): LineKind {
  const stripped = line.trim();
  if (!stripped) return 'skip';
  if (!stripped.startsWith(delimiter)) return 'code';

  const lowered = stripped.toLowerCase();
  const prefix = delimiter.toLowerCase();
  for (const keyword of keywords) {
    const word = keyword.toLowerCase();
    if (lowered.startsWith(`${prefix}${word}`) || lowered.startsWith(`${prefix} ${word}`)) {
      return 'removal-marker';
    }
  }
  return 'skip';
}
