import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { lineTagConfigSchema } from './schema';
import type { LineTagConfig } from '../shared/types';

export const CONFIG_FILE_NAME = '.linetag.yml';

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: Required<LineTagConfig>;
  warnings: ConfigWarning[];
}

/** Default LineTagConfig values used when file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: Required<LineTagConfig> = {
  delimiters: {
    '.py': '#',
    '.c': '//',
    '.cpp': '//',
    '.h': '//',
    '.hpp': '//',
    '.rs': '//',
    '.adb': '--',
    '.ads': '--',
    '.ada': '--',
  },
  column: 80,
  marker_offset: 40,
  removal_keywords: ['deleted', 'delete', 'removed', 'remove', 'moved', 'move'],
  base_branch: 'develop',
  fallback_branch: 'main',
  hook_command: 'npx --no-install linetag tag',
};

/**
 * Load and validate a .linetag.yml configuration file.
 * Returns fully-populated config with defaults applied.
 *
 * - Missing file → defaults
 * - Empty file → defaults
 * - Invalid YAML → E501 warning + defaults
 * - Invalid values → E502 warning + field defaults
 * - Unknown keys → E502 warning with "did you mean?"
 *
 * Entries under `delimiters` extend the built-in table rather than replace it.
 */
export function loadLineTagConfig(filePath?: string): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  const resolvedPath = filePath ?? CONFIG_FILE_NAME;
  let rawContent: string;

  try {
    rawContent = fs.readFileSync(resolvedPath, 'utf-8');
  } catch {
    return { config: withDefaults({}), warnings };
  }

  if (rawContent.trim() === '') {
    return { config: withDefaults({}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: withDefaults({}), warnings };
  }

  // A file holding only comments parses to null
  if (parsed === null || parsed === undefined) {
    return { config: withDefaults({}), warnings };
  }

  if (!isRecord(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: withDefaults({}), warnings };
  }

  const result = lineTagConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: withDefaults(result.data), warnings };
  }

  const invalidFields = new Set<string>();
  for (const issue of result.error.issues) {
    const fieldPath = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key);
        const msg = suggestion
          ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
          : `E502: Unknown key "${key}".`;
        warnings.push({ field: fieldPath || key, message: msg });
      }
    } else {
      const topLevel = issue.path[0];
      if (typeof topLevel === 'string') invalidFields.add(topLevel);
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
    }
  }

  // Keep the known, valid fields and re-parse
  const stripped = stripKeys(parsed, invalidFields);
  const retryResult = lineTagConfigSchema.safeParse(stripped);
  if (retryResult.success) {
    return { config: withDefaults(retryResult.data), warnings };
  }

  return { config: withDefaults({}), warnings };
}

/** Known top-level keys for "did you mean?" suggestions. */
const KNOWN_KEYS: Array<keyof LineTagConfig> = [
  'delimiters',
  'column',
  'marker_offset',
  'removal_keywords',
  'base_branch',
  'fallback_branch',
  'hook_command',
];

function findSimilarKey(key: string): string | null {
  const lower = key.toLowerCase();
  for (const known of KNOWN_KEYS) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stripKeys(obj: Record<string, unknown>, invalid: Set<string>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const key of KNOWN_KEYS) {
    if (key in obj && !invalid.has(key)) {
      result[key] = obj[key];
    }
  }
  return result;
}

function withDefaults(overrides: LineTagConfig): Required<LineTagConfig> {
  return {
    delimiters: { ...CONFIG_DEFAULTS.delimiters, ...normalizeDelimiterKeys(overrides.delimiters ?? {}) },
    column: overrides.column ?? CONFIG_DEFAULTS.column,
    marker_offset: overrides.marker_offset ?? CONFIG_DEFAULTS.marker_offset,
    removal_keywords: overrides.removal_keywords ?? [...CONFIG_DEFAULTS.removal_keywords],
    base_branch: overrides.base_branch ?? CONFIG_DEFAULTS.base_branch,
    fallback_branch: overrides.fallback_branch ?? CONFIG_DEFAULTS.fallback_branch,
    hook_command: overrides.hook_command ?? CONFIG_DEFAULTS.hook_command,
  };
}

function normalizeDelimiterKeys(delimiters: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [ext, delimiter] of Object.entries(delimiters)) {
    const lower = ext.toLowerCase();
    result[lower.startsWith('.') ? lower : `.${lower}`] = delimiter;
  }
  return result;
}
