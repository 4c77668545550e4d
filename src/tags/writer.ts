/**
 * Line rewriter: adds an issue tag to a line's trailing comment.
 *
 * Output shape for a code line:
 *
 *   <code><padding><DELIM free text> <DELIM TAG-1, TAG-2>
 *
 * with the padding chosen so the line ends at the configured column. When
 * the content does not fit, a single space separates code and comment and
 * the line runs past the column; nothing is ever truncated.
 *
 * Both rewrites are idempotent for the target tag.
 */

import type { LineKind, RewriteOptions, Tag } from '../shared/types';
import { extractTags, isTag, stripDelimiterNoise, uniqueTags } from './parser';

export const DEFAULT_REWRITE_OPTIONS: RewriteOptions = {
  column: 80,
  markerOffset: 40,
};

export interface CommentParts {
  /** Free comment text, whitespace-normalized. Empty when there is none. */
  text: string;
  tags: Tag[];
}

/**
 * Split a comment region (starting at its delimiter) into free text and tags.
 *
 * Tokens are whitespace-separated. A token whose comma-separated pieces are
 * all tags (after stripping leading `/#-`) contributes tags; a token equal to
 * the delimiter, such as the second `//` in `// note // ABC-1`, is dropped;
 * every other token is kept verbatim as free text.
 */
export function splitComment(region: string, delimiter: string): CommentParts {
  const body = region.startsWith(delimiter) ? region.slice(delimiter.length) : region;
  const words: string[] = [];
  const tags: Tag[] = [];

  for (const token of body.split(/\s+/)) {
    if (!token || /^,+$/.test(token)) continue;
    if (isDelimiterToken(token, delimiter)) continue;

    const pieces = token
      .split(',')
      .map(stripDelimiterNoise)
      .filter((piece) => piece.length > 0);
    if (pieces.length > 0 && pieces.every(isTag)) {
      tags.push(...pieces);
      continue;
    }
    words.push(token);
  }

  return { text: words.join(' ').replace(/,+$/, ''), tags };
}

export function renderTagBlock(delimiter: string, tags: Tag[]): string {
  return `${delimiter} ${tags.join(', ')}`;
}

/**
 * Place `comment` so it ends at `column`. Falls back to a single separating
 * space when `code + ' ' + comment` is already wider than the column.
 */
export function alignToColumn(code: string, comment: string, column: number): string {
  const codeWidth = width(code);
  const commentWidth = width(comment);
  if (codeWidth + 1 + commentWidth > column) {
    return `${code} ${comment}`;
  }
  return code + ' '.repeat(column - codeWidth - commentWidth) + comment;
}

/** Width in code points, so astral characters such as emoji count once. */
function width(text: string): number {
  return [...text].length;
}

/** Tag a line classified as code. */
export function rewriteCodeLine(
  line: string,
  delimiter: string,
  tag: Tag,
  options: RewriteOptions = DEFAULT_REWRITE_OPTIONS,
): string {
  if (extractTags(line).includes(tag)) return line;

  const trimmed = line.trimEnd();
  const commentStart = trimmed.indexOf(delimiter);
  const code = commentStart === -1 ? trimmed : trimmed.slice(0, commentStart).trimEnd();
  const region = commentStart === -1 ? '' : trimmed.slice(commentStart);

  return renderLine(code, region, delimiter, tag, options.column);
}

/**
 * Tag a removal-marker comment such as `# deleted print('Done')`.
 *
 * The marker text owns the first `markerOffset` columns, so the existing tag
 * block is looked for only from that offset on; the marker itself is kept
 * as-is.
 */
export function rewriteRemovalMarker(
  line: string,
  delimiter: string,
  tag: Tag,
  options: RewriteOptions = DEFAULT_REWRITE_OPTIONS,
): string {
  if (extractTags(line).includes(tag)) return line;

  const trimmed = line.trimEnd();
  const blockStart = trimmed.indexOf(delimiter, options.markerOffset);
  const marker = blockStart === -1 ? trimmed : trimmed.slice(0, blockStart).trimEnd();
  const region = blockStart === -1 ? '' : trimmed.slice(blockStart);

  return renderLine(marker, region, delimiter, tag, options.column);
}

export function rewriteLine(
  line: string,
  kind: LineKind,
  delimiter: string,
  tag: Tag,
  options: RewriteOptions = DEFAULT_REWRITE_OPTIONS,
): string {
  switch (kind) {
    case 'code':
      return rewriteCodeLine(line, delimiter, tag, options);
    case 'removal-marker':
      return rewriteRemovalMarker(line, delimiter, tag, options);
    case 'skip':
      return line;
  }
}

function renderLine(code: string, region: string, delimiter: string, tag: Tag, column: number): string {
  const { text, tags } = splitComment(region, delimiter);
  const tagBlock = renderTagBlock(delimiter, uniqueTags([...tags, tag]));
  const comment = text ? `${delimiter} ${text} ${tagBlock}` : tagBlock;
  return alignToColumn(code, comment, column);
}

function isDelimiterToken(token: string, delimiter: string): boolean {
  return token === delimiter;
}
