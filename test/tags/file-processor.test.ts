import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { processFile, tagContent } from '../../src/tags/file-processor';
import { createTempDir, readFile, removeTempDir, writeFile } from '../cli/helpers/cli-test-helpers';

const TAGGED_A = `${'int a = 1;'.padEnd(70)}// ABC-123`;

describe('tagContent', () => {
  const content = 'int a = 1;\nint b = 2;\n// plain comment\n\nint c = 3; // ABC-123\n';

  it('tags changed code lines and passes the rest through', () => {
    const result = tagContent(content, { delimiter: '//', tag: 'ABC-123', changedLines: new Set([1, 3, 4, 5]) });

    expect(result.content).toBe(`${TAGGED_A}\nint b = 2;\n// plain comment\n\nint c = 3; // ABC-123\n`);
    expect(result.tagged).toBe(1);
    expect(result.skipped).toBe(1);
    expect(result.records.map((r) => [r.line, r.kind])).toEqual([
      [1, 'code'],
      [3, 'skip'],
      [4, 'skip'],
      [5, 'code'],
    ]);
    expect(result.records[0].rewritten).toBe(TAGGED_A);
    expect(result.records[3].rewritten).toBeUndefined();
  });

  it('never alters lines outside the change set', () => {
    const result = tagContent(content, { delimiter: '//', tag: 'ABC-123', changedLines: new Set([2]) });
    const before = content.split('\n');
    const after = result.content.split('\n');
    expect(after).toHaveLength(before.length);
    for (let i = 0; i < before.length; i++) {
      if (i + 1 !== 2) expect(after[i]).toBe(before[i]);
    }
  });

  it('keeps CRLF line endings', () => {
    const result = tagContent('int a = 1;\r\nint b = 2;\r\n', {
      delimiter: '//',
      tag: 'ABC-123',
      changedLines: new Set([1]),
    });
    expect(result.content).toBe(`${TAGGED_A}\r\nint b = 2;\r\n`);
  });

  it('tags removal markers with the configured keywords', () => {
    const result = tagContent('# dropped old_call()\n', {
      delimiter: '#',
      tag: 'PY-4',
      changedLines: new Set([1]),
      removalKeywords: ['dropped'],
    });
    expect(result.content).toBe(`# dropped old_call()${' '.repeat(54)}# PY-4\n`);
  });

  it('uses the configured column', () => {
    const result = tagContent('x = 1', {
      delimiter: '#',
      tag: 'A-1',
      changedLines: new Set([1]),
      rewrite: { column: 20, markerOffset: 10 },
    });
    expect(result.content).toBe(`x = 1${' '.repeat(10)}# A-1`);
  });

  it('ignores change-set lines past the end of the file', () => {
    const result = tagContent('x = 1\n', { delimiter: '#', tag: 'A-1', changedLines: new Set([7]) });
    expect(result.content).toBe('x = 1\n');
    expect(result.records).toEqual([]);
  });
});

describe('processFile', () => {
  let root: string;
  const messages: string[] = [];
  const write = (msg: string) => messages.push(msg);
  const stager = { stage: vi.fn() };

  beforeEach(() => {
    root = createTempDir();
    messages.length = 0;
    writeFile(root, 'src/main.c', 'int a = 1;\nint b = 2; // ABC-123\n');
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('writes the tagged file and re-stages it', () => {
    const result = processFile('src/main.c', new Set([1, 2]), {
      delimiter: '//',
      tag: 'ABC-123',
      dryRun: false,
      root,
    }, { stager, write });

    expect(result).toEqual({ file: 'src/main.c', tagged: 1, skipped: 1, written: true });
    expect(readFile(root, 'src/main.c')).toBe(`${TAGGED_A}\nint b = 2; // ABC-123\n`);
    expect(stager.stage).toHaveBeenCalledWith('src/main.c');
    expect(messages).toEqual([
      '[TAGGED] src/main.c:1',
      '  - int a = 1;',
      `  + ${TAGGED_A}`,
      '[SKIP] src/main.c:2 already tagged with ABC-123',
    ]);
  });

  it('reports without writing in dry-run mode', () => {
    const result = processFile('src/main.c', new Set([1]), {
      delimiter: '//',
      tag: 'ABC-123',
      dryRun: true,
      root,
    }, { stager, write });

    expect(result).toEqual({ file: 'src/main.c', tagged: 1, skipped: 0, written: false });
    expect(readFile(root, 'src/main.c')).toBe('int a = 1;\nint b = 2; // ABC-123\n');
    expect(stager.stage).not.toHaveBeenCalled();
    expect(messages[0]).toBe('[DRY-RUN] src/main.c:1');
  });

  it('leaves the file alone when every line is already tagged', () => {
    const result = processFile('src/main.c', new Set([2]), {
      delimiter: '//',
      tag: 'ABC-123',
      dryRun: false,
      root,
    }, { stager, write });

    expect(result.written).toBe(false);
    expect(stager.stage).not.toHaveBeenCalled();
  });
});
