export { parseHunkHeader, expandHunk, addedLineNumbers, groupAddedLinesByFile, unquotePath } from './diff-parser';
export type { HunkRange } from './diff-parser';
export { resolveStaged, resolveBaseDiff, resolveMergeBase, resolveChangeSet } from './resolver';
export type { BaseScopeOptions } from './resolver';
