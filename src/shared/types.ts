// === Tags and lines ===

/** Issue-tracker identifier such as `ABC-1234`. */
export type Tag = string;

export type LineKind = 'code' | 'removal-marker' | 'skip';

export type ChangeScope = 'staged' | 'base';

/** File path → 1-based line numbers eligible for tagging. */
export type ChangeSet = ReadonlyMap<string, ReadonlySet<number>>;

export interface LineRecord {
  /** 1-based line number. */
  line: number;
  original: string;
  kind: LineKind;
  existingTags: Tag[];
  /** Present only when the line was rewritten. */
  rewritten?: string;
}

export interface RewriteOptions {
  /** Column the tag block should end at. */
  column: number;
  /** Offset where the search for a removal marker's tag block starts. */
  markerOffset: number;
}

// === Version-control collaborators ===

export interface DiffProvider {
  /** Paths with staged changes, relative to the repository root. */
  stagedFiles(): string[];
  /** Zero-context staged diff of one file. */
  stagedDiff(file: string): string;
  /** Common ancestor of HEAD and `ref`, or null when `ref` cannot be resolved. */
  mergeBase(ref: string): string | null;
  /** Zero-context diff from `commit` to the working tree. */
  diffFrom(commit: string): string;
}

export interface StageWriter {
  stage(file: string): void;
}

export interface BranchReader {
  currentBranch(): string | null;
}

// === Error Type ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export type LineTagErrorCode =
  | 'E101' // no usable tag
  | 'E201' // base branch unresolvable
  | 'E202' // git command failed
  | 'E301' // unsupported file extension
  | 'E401'; // hook installation failed

export interface ErrorContext {
  file?: string;
  ref?: string;
  command?: string;
}

export class LineTagError extends Error {
  readonly code: LineTagErrorCode;
  readonly severity: ErrorSeverity;
  readonly userMessage?: string;
  readonly context: ErrorContext;
  readonly cause?: Error;

  constructor(opts: {
    code: LineTagErrorCode;
    severity: ErrorSeverity;
    message: string;
    userMessage?: string;
    context?: ErrorContext;
    cause?: Error;
  }) {
    super(opts.message);
    this.name = 'LineTagError';
    this.code = opts.code;
    this.severity = opts.severity;
    this.userMessage = opts.userMessage;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
  }
}

// === Environment Configuration ===

export interface EnvConfig {
  log_level: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  repo_root?: string;
}

// === LineTag Config (.linetag.yml) ===

export interface LineTagConfig {
  delimiters?: Record<string, string>;
  column?: number;
  marker_offset?: number;
  removal_keywords?: string[];
  base_branch?: string;
  fallback_branch?: string;
  hook_command?: string;
}
