/**
 * Issue-tag parsing.
 *
 * A tag is one or more uppercase letters, a hyphen and one or more digits:
 * `ABC-123`. Comparison is exact and case-sensitive.
 */

import type { Tag } from '../shared/types';

export const TAG_PATTERN = /^[A-Z]+-\d+$/;

/** Unanchored form, used to find a tag inside a branch name. */
const TAG_SEARCH = /[A-Z]+-\d+/;

/** Characters stripped from the left of a token before matching. */
const DELIMITER_NOISE = /^[/#-]+/;

export function isTag(token: string): boolean {
  return TAG_PATTERN.test(token);
}

/** Strip leading `/`, `#` and `-` characters: `//ABC-1` → `ABC-1`. */
export function stripDelimiterNoise(token: string): string {
  return token.replace(DELIMITER_NOISE, '');
}

/**
 * Extract every tag from `text`, in order. Duplicates are kept; callers
 * that need set semantics use `uniqueTags`.
 */
export function extractTags(text: string): Tag[] {
  const tags: Tag[] = [];
  for (const part of text.split(/[,\s]+/)) {
    const cleaned = stripDelimiterNoise(part);
    if (isTag(cleaned)) {
      tags.push(cleaned);
    }
  }
  return tags;
}

/** Order-preserving dedup. */
export function uniqueTags(tags: Iterable<Tag>): Tag[] {
  return [...new Set(tags)];
}

/** First tag-shaped substring of a branch name: `feature/ABC-4567-login` → `ABC-4567`. */
export function tagFromBranch(branch: string): Tag | null {
  const match = branch.match(TAG_SEARCH);
  return match ? match[0] : null;
}
