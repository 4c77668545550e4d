/**
 * Barrel export for the tags module.
 */
export { TAG_PATTERN, isTag, extractTags, uniqueTags, tagFromBranch, stripDelimiterNoise } from './parser';
export { classifyLine, REMOVAL_KEYWORDS } from './classifier';
export { DelimiterTable } from './delimiters';
export {
  rewriteCodeLine,
  rewriteRemovalMarker,
  rewriteLine,
  alignToColumn,
  splitComment,
  renderTagBlock,
  DEFAULT_REWRITE_OPTIONS,
} from './writer';
export type { CommentParts } from './writer';
export { tagContent, processFile } from './file-processor';
export type { TagContentOptions, TagContentResult, ProcessFileOptions, ProcessFileDeps, FileResult } from './file-processor';
