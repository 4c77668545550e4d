/**
 * CLI help text for global and per-command --help output.
 *
 * Each subcommand help follows a consistent structure:
 *   SYNOPSIS, DESCRIPTION, FLAGS, EXAMPLES
 */

export const VERSION = '0.1.0';

const COMMAND_HELP: Record<string, string> = {
  tag: `
SYNOPSIS
  linetag tag [--tag=TAG] [--dry-run] [--scope=staged|base] [--base=BRANCH]

DESCRIPTION
  Append an issue tag (e.g. ABC-1234) to every added or modified line of
  the changed source files. The tag comes from --tag or from the current
  branch name. Code lines get the tag in a trailing comment aligned to
  column 80; comment lines marking removed code ("# deleted ...") are
  tagged too. Tagged files are re-staged.

FLAGS
  --tag=TAG           Tag to apply; overrides the tag in the branch name
  --dry-run           Show what would be tagged without modifying files
  --scope=SCOPE       staged (default): lines added in the index
                      base: lines added since the merge-base with --base
  --base=BRANCH       Base branch for --scope=base (default: develop,
                      falls back to main when develop does not exist)

EXAMPLES
  linetag tag
  linetag tag --tag=ABC-1234 --dry-run
  linetag tag --scope=base --base=release/2.1
`.trim(),

  install: `
SYNOPSIS
  linetag install

DESCRIPTION
  Install linetag as the repository's git pre-commit hook. An existing,
  different pre-commit hook is copied to pre-commit.bak first. The hook
  command can be changed with hook_command in .linetag.yml.

FLAGS
  (no flags)

EXAMPLES
  cd my-project && linetag install
`.trim(),
};

export function getGlobalHelp(): string {
  const lines: string[] = [
    'Usage: linetag <command> [options]',
    '',
    'Tags modified source lines with the issue id of the current branch.',
    '',
    'Commands:',
    '  tag                   Tag changed lines (staged, or since a base branch)',
    '  install               Install linetag as a git pre-commit hook',
    '',
    'Run `linetag <command> --help` for detailed usage of each command.',
    '',
    'Global Options:',
    '  --help                Show help (global or per-command)',
    '  --version             Show the linetag version',
    '',
    'Environment:',
    '  LOG_LEVEL             Log level for stderr diagnostics (default: warn)',
    '  LINETAG_REPO_ROOT     Repository root override',
  ];
  return lines.join('\n');
}

export function getCommandHelp(command: string): string | undefined {
  return COMMAND_HELP[command];
}
