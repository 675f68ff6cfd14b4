/**
 * End-to-end searches over the fixture corpus through the CLI entry.
 */
import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { fileURLToPath } from 'url';
import { runCli } from '../../src/cli/index.js';

const CORPUS_DIR = fileURLToPath(new URL('../fixtures/corpus/', import.meta.url));

describe('tsgrep over a corpus', () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const tsgrep = (...args: string[]): Promise<number> => runCli(['node', 'tsgrep', '--no-color', ...args]);
  const printedLines = (): string[] => logSpy.mock.calls.flatMap((call) => String(call[0]).split('\n'));

  beforeEach(() => {
    vi.spyOn(process, 'cwd').mockReturnValue(CORPUS_DIR);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should find calls by method name regex', async () => {
    expect(await tsgrep('-x', 'console.$(_, /log|warn/)($*_)')).toBe(0);

    expect(printedLines()).toEqual([
      'calls.ts:4:3: console.log(format(values))',
      "calls.ts:5:3: console.warn('empty')",
    ]);
  });

  it('should find self-assignments', async () => {
    expect(await tsgrep('-x', '$x = $x')).toBe(0);

    expect(printedLines()).toEqual(['format.ts:4:3: count = count']);
  });

  it('should find statements with a block body', async () => {
    expect(await tsgrep('if ($c) { return; }', '.')).toBe(0);

    expect(printedLines()).toEqual(['calls.ts:7:3: if (values.length === 0) { return; }']);
  });

  it('should only search the named file unless recursive', async () => {
    await tsgrep('-x', '$_.length', 'calls.ts');
    expect(printedLines()).toEqual(['calls.ts:6:17: values.length', 'calls.ts:7:7: values.length']);

    logSpy.mockClear();
    await tsgrep('-r', '-x', '$_.length', 'calls.ts');
    expect(printedLines()).toEqual([
      'calls.ts:6:17: values.length',
      'calls.ts:7:7: values.length',
      'format.ts:3:15: values.length',
    ]);
  });

  it('should search a type-checked corpus', async () => {
    expect(await tsgrep('--typed', '-x', '$x = $x')).toBe(0);

    expect(printedLines()).toEqual(['format.ts:4:3: count = count']);
  });

  it('should report bindings as JSON', async () => {
    expect(await tsgrep('--json', '-x', 'console.$m($*args)', 'calls.ts')).toBe(0);

    const output = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(output).toHaveLength(3);
    expect(output[0]).toEqual({
      file: 'calls.ts',
      line: 4,
      column: 3,
      text: 'console.log(format(values))',
      bindings: { m: 'log', args: 'format(values)' },
    });
    expect(output[2].bindings).toEqual({ m: 'error', args: "values.length, 'values'" });
  });

  it('should exit with 1 on a pattern that does not parse', async () => {
    expect(await tsgrep('-x', 'if (')).toBe(1);

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
