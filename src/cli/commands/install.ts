/**
 * `linetag install`: install linetag as the repository's pre-commit hook.
 *
 * Writes:
 *   <hooks>/pre-commit      shell wrapper running `linetag tag`
 *   <hooks>/pre-commit.bak  copy of a previous, different hook
 */

import fs from 'fs';
import path from 'path';
import { LineTagError } from '../../shared/types';
import { createLogger } from '../../shared/logger';
import { color, label } from '../output';

export const HOOK_MARKER = '# Installed by linetag';

export interface InstallOptions {
  hooksDir: string;
  command: string;
}

export function renderHook(command: string): string {
  return ['#!/bin/sh', HOOK_MARKER, `exec ${command} "$@"`, ''].join('\n');
}

export async function runInstall(
  options: InstallOptions,
  write: (msg: string) => void = console.log,
): Promise<number> {
  const log = createLogger({ module: 'install' });
  const hookPath = path.join(options.hooksDir, 'pre-commit');
  const content = renderHook(options.command);

  try {
    fs.mkdirSync(options.hooksDir, { recursive: true });

    if (fs.existsSync(hookPath)) {
      const existing = fs.readFileSync(hookPath, 'utf-8');
      if (existing === content) {
        write(`${label.info()} linetag hook already installed at: ${color.cyan(hookPath)}`);
        return 0;
      }
      const backupPath = `${hookPath}.bak`;
      fs.copyFileSync(hookPath, backupPath);
      write(`${color.yellow('[BACKUP]')} Existing pre-commit hook backed up to: ${color.cyan(backupPath)}`);
    }

    fs.writeFileSync(hookPath, content, 'utf-8');
    fs.chmodSync(hookPath, 0o755);
  } catch (err) {
    const cause = err instanceof Error ? err : undefined;
    log.error({ err: cause, hookPath }, 'hook install failed');
    throw new LineTagError({
      code: 'E401',
      severity: 'high',
      message: `Could not install hook at ${hookPath}: ${cause?.message ?? String(err)}`,
      userMessage: `Could not install the pre-commit hook at ${hookPath}.`,
      context: { file: hookPath },
      cause,
    });
  }

  log.debug({ hookPath }, 'hook installed');
  write(`${label.success()} linetag hook installed at: ${color.cyan(hookPath)}`);
  return 0;
}
