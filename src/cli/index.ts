/**
 * linetag CLI router.
 *
 * Usage:
 *   linetag tag [--tag=ABC-1234] [--dry-run] [--scope=staged|base] [--base=BRANCH]
 *   linetag install
 */

import path from 'path';
import { runTag } from './commands/tag';
import { runInstall } from './commands/install';
import { GitClient } from './git-utils';
import { getGlobalHelp, getCommandHelp, VERSION } from './help';
import { label } from './output';
import { loadLineTagConfig, CONFIG_FILE_NAME } from '../config';
import type { ChangeScope } from '../shared/types';
import { LineTagError } from '../shared/types';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'dry-run', 'version'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-') && !BOOLEAN_FLAGS.includes(arg.slice(2))) {
        // --key value
        options[arg.slice(2)] = args[++i];
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

const COMMANDS = ['tag', 'install'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/** Whether argv runs a command that needs the repository root (not help or version). */
export function needsRepository(argv: string[]): boolean {
  const { command, flags } = parseArgs(argv);
  if (flags.help || flags.h || flags.version || flags.v) return false;
  return isCommand(command);
}

function parseScope(raw: string | undefined): ChangeScope | null {
  if (raw === undefined || raw === 'staged') return 'staged';
  if (raw === 'base') return 'base';
  return null;
}

export async function run(
  root: string,
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
): Promise<number> {
  const { command, flags, options } = parseArgs(argv);

  if (flags.version || flags.v) {
    write(`linetag v${VERSION}`);
    return 0;
  }

  // Handle --help flag for any command
  if (flags.help || flags.h) {
    if (command) {
      const cmdHelp = getCommandHelp(command);
      if (cmdHelp) {
        write(cmdHelp);
        return 0;
      }
    }
    write(getGlobalHelp());
    return 0;
  }

  if (command === 'help' || command === '') {
    write(getGlobalHelp());
    return 0;
  }

  if (!isCommand(command)) {
    write(`Unknown command: ${command}. Run \`linetag help\` for usage.`);
    return 2;
  }

  const { config, warnings } = loadLineTagConfig(path.join(root, CONFIG_FILE_NAME));
  for (const warning of warnings) {
    write(`${label.warn()} ${CONFIG_FILE_NAME}: ${warning.message}`);
  }
  const git = new GitClient(root);

  switch (command) {
    case 'tag': {
      const scope = parseScope(options.scope);
      if (!scope) {
        write(`${label.error()} Unknown scope "${options.scope}". Use staged or base.`);
        return 2;
      }
      return runTag({ git, config, root }, {
        tag: options.tag,
        dryRun: !!flags['dry-run'],
        scope,
        baseBranch: options.base,
      }, write);
    }

    case 'install':
      try {
        return await runInstall({ hooksDir: git.hooksDir(), command: config.hook_command }, write);
      } catch (err) {
        if (err instanceof LineTagError) {
          write(`${label.error()} ${err.userMessage ?? err.message}`);
          return 1;
        }
        throw err;
      }
  }
}
