import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { needsRepository, parseArgs, run } from '../../src/cli/index';
import { getGlobalHelp, getCommandHelp } from '../../src/cli/help';
import { createTempDir, removeTempDir, writeFile } from './helpers/cli-test-helpers';

describe('parseArgs', () => {
  it('parses the command and --key=value options', () => {
    const parsed = parseArgs(['node', 'linetag', 'tag', '--tag=ABC-1', '--scope=base']);

    expect(parsed.command).toBe('tag');
    expect(parsed.options).toEqual({ tag: 'ABC-1', scope: 'base' });
    expect(parsed.flags).toEqual({});
  });

  it('parses --key value options', () => {
    const parsed = parseArgs(['node', 'linetag', 'tag', '--base', 'release/2.1']);

    expect(parsed.options).toEqual({ base: 'release/2.1' });
  });

  it('never consumes a value for boolean flags', () => {
    const parsed = parseArgs(['node', 'linetag', '--dry-run', 'tag']);

    expect(parsed.command).toBe('tag');
    expect(parsed.flags).toEqual({ 'dry-run': true });
    expect(parsed.options).toEqual({});
  });

  it('parses short flags and extra positionals', () => {
    const parsed = parseArgs(['node', 'linetag', 'tag', 'extra', '-h']);

    expect(parsed.args).toEqual(['extra']);
    expect(parsed.flags).toEqual({ h: true });
  });

  it('returns an empty command when none is given', () => {
    expect(parseArgs(['node', 'linetag']).command).toBe('');
  });
});

describe('needsRepository', () => {
  it('finds the command after leading flags', () => {
    expect(needsRepository(['node', 'linetag', '--dry-run', 'tag'])).toBe(true);
    expect(needsRepository(['node', 'linetag', '--tag', 'ABC-1', 'tag'])).toBe(true);
    expect(needsRepository(['node', 'linetag', '--tag=ABC-1', 'install'])).toBe(true);
  });

  it('is false for help, version and unknown commands', () => {
    expect(needsRepository(['node', 'linetag', 'tag', '--help'])).toBe(false);
    expect(needsRepository(['node', 'linetag', '--version'])).toBe(false);
    expect(needsRepository(['node', 'linetag', 'help'])).toBe(false);
    expect(needsRepository(['node', 'linetag', 'retag'])).toBe(false);
  });
});

describe('run', () => {
  let root: string;
  const messages: string[] = [];
  const write = (msg: string) => messages.push(msg);

  beforeEach(() => {
    root = createTempDir();
    messages.length = 0;
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('prints the version', async () => {
    const code = await run(root, ['node', 'linetag', '--version'], write);

    expect(code).toBe(0);
    expect(messages).toEqual(['linetag v0.1.0']);
  });

  it('prints global help for help or no command', async () => {
    expect(await run(root, ['node', 'linetag', 'help'], write)).toBe(0);
    expect(await run(root, ['node', 'linetag'], write)).toBe(0);
    expect(messages).toEqual([getGlobalHelp(), getGlobalHelp()]);
    expect(messages[0].split('\n')[0]).toBe('Usage: linetag <command> [options]');
  });

  it('prints command help for --help after a command', async () => {
    const code = await run(root, ['node', 'linetag', 'install', '--help'], write);

    expect(code).toBe(0);
    expect(messages).toEqual([getCommandHelp('install')]);
  });

  it('rejects an unknown command with exit code 2', async () => {
    const code = await run(root, ['node', 'linetag', 'retag'], write);

    expect(code).toBe(2);
    expect(messages).toEqual(['Unknown command: retag. Run `linetag help` for usage.']);
  });

  it('rejects an unknown scope with exit code 2', async () => {
    const code = await run(root, ['node', 'linetag', 'tag', '--scope=all'], write);

    expect(code).toBe(2);
    expect(messages).toEqual(['[ERROR] Unknown scope "all". Use staged or base.']);
  });

  it('prints config warnings before running a command', async () => {
    writeFile(root, '.linetag.yml', 'colum: 100\n');

    await run(root, ['node', 'linetag', 'tag', '--scope=all'], write);

    expect(messages[0]).toBe('[WARN] .linetag.yml: E502: Unknown key "colum". Did you mean "column"?');
  });
});
