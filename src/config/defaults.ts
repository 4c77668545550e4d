import { z } from 'zod';
import type { EnvConfig } from '../shared/types';

const envConfigSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  LINETAG_REPO_ROOT: z.string().min(1).optional(),
});

export interface LoadEnvConfigResult {
  config: EnvConfig;
  /** Names of variables that failed validation and fell back to defaults. */
  invalid: string[];
}

/**
 * Read the process environment. Unlike the YAML config, bad values never
 * abort a commit hook: the offending variable is reported and defaulted.
 */
export function loadEnvConfig(env: Record<string, string | undefined> = process.env): LoadEnvConfigResult {
  const result = envConfigSchema.safeParse(env);

  if (result.success) {
    return {
      config: { log_level: result.data.LOG_LEVEL, repo_root: result.data.LINETAG_REPO_ROOT },
      invalid: [],
    };
  }

  const invalid = result.error.issues.map((issue) => issue.path.join('.'));
  const cleaned = { ...env };
  for (const key of invalid) {
    delete cleaned[key];
  }
  const retry = envConfigSchema.parse(cleaned);
  return {
    config: { log_level: retry.LOG_LEVEL, repo_root: retry.LINETAG_REPO_ROOT },
    invalid,
  };
}
