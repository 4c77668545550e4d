#!/usr/bin/env node
/**
 * linetag CLI binary entry point.
 * Resolves the repository root, then dispatches to the command router.
 */

import { needsRepository, run } from './index';
import { label } from './output';
import { loadEnvConfig } from '../config';
import { resolveRepoRoot } from '../lib/repo-root-resolver';
import { createRootLogger, setRootLogger, getLogger } from '../shared/logger';
import { LineTagError } from '../shared/types';

async function main(): Promise<void> {
  const { config: env, invalid } = loadEnvConfig();
  setRootLogger(createRootLogger(undefined, env.log_level));
  if (invalid.length > 0) {
    getLogger().warn({ invalid }, 'ignoring invalid environment variables');
  }

  // help and version work outside a repository
  const root = needsRepository(process.argv)
    ? resolveRepoRoot({ cwd: process.cwd(), override: env.repo_root }).root
    : process.cwd();

  const exitCode = await run(root);
  process.exit(exitCode);
}

main().catch((err) => {
  if (err instanceof LineTagError) {
    console.error(`${label.error()} ${err.userMessage ?? err.message}`);
    process.exit(1);
  }
  console.error('Fatal error:', err);
  process.exit(2);
});
