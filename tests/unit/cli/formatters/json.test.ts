/**
 * Tests for the JSON formatter.
 */
import { describe, it, expect } from 'vitest';
import { Project } from 'ts-morph';
import { JsonFormatter, createFormatter, HumanFormatter } from '../../../../src/cli/formatters/index.js';
import { compilePattern } from '../../../../src/core/pattern/compiler.js';
import { search } from '../../../../src/core/match/search.js';
import type { Match } from '../../../../src/core/match/types.js';

function matches(pattern: string, text: string): Match[] {
  const project = new Project({ useInMemoryFileSystem: true });
  const sourceFile = project.createSourceFile('/project/src/a.ts', text);
  return search(compilePattern(pattern), sourceFile.compilerNode);
}

describe('JsonFormatter', () => {
  it('should output matches with their named bindings', () => {
    const formatter = new JsonFormatter({ cwd: '/project' });

    const output = JSON.parse(formatter.formatMatches(matches('$x + $_', 'let a = b + 1;\n')));

    expect(output).toEqual([{ file: 'src/a.ts', line: 1, column: 9, text: 'b + 1', bindings: { x: 'b' } }]);
  });

  it('should render any-count bindings as one line', () => {
    const formatter = new JsonFormatter({ cwd: '/project' });

    const output = JSON.parse(formatter.formatMatches(matches('f($*args)', 'f(1,\n  2);\n')));

    expect(output).toEqual([{ file: 'src/a.ts', line: 1, column: 1, text: 'f(1, 2)', bindings: { args: '1, 2' } }]);
  });

  it('should output an empty array for no matches', () => {
    expect(new JsonFormatter().formatMatches([])).toBe('[]');
  });
});

describe('createFormatter', () => {
  it('should pick the formatter for the format', () => {
    const options = { colors: false, relativePaths: true, cwd: '/project' };

    expect(createFormatter({ ...options, format: 'json' })).toBeInstanceOf(JsonFormatter);
    expect(createFormatter({ ...options, format: 'human' })).toBeInstanceOf(HumanFormatter);
  });
});
