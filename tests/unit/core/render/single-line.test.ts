/**
 * Tests for single-line rendering.
 */
import { describe, it, expect } from 'vitest';
import { ts } from 'ts-morph';
import { renderSingleLine, joinLines } from '../../../../src/core/render/single-line.js';
import { NodeSequence } from '../../../../src/core/match/sequence.js';

function parse(text: string): ts.SourceFile {
  return ts.createSourceFile('/test.ts', text, ts.ScriptTarget.Latest, true);
}

describe('joinLines', () => {
  it('should trim lines and drop empty ones', () => {
    expect(joinLines('if (a) {\n    b();\n\n}\n')).toBe('if (a) { b(); }');
  });
});

describe('renderSingleLine', () => {
  it('should fold a multi-line statement onto one line', () => {
    const sourceFile = parse('function f(a) {\n  return a;\n}\n');

    expect(renderSingleLine(sourceFile.statements[0], sourceFile)).toBe('function f(a) { return a; }');
  });

  it('should drop comments', () => {
    const sourceFile = parse('f(/* one */ 1); // done\n');

    expect(renderSingleLine(sourceFile.statements[0], sourceFile)).toBe('f(1);');
  });

  it('should render a whole file', () => {
    const sourceFile = parse('a();\nb();\n');

    expect(renderSingleLine(sourceFile, sourceFile)).toBe('a(); b();');
  });

  it('should join statement sequences with spaces', () => {
    const sourceFile = parse('a();\nb();\n');

    expect(renderSingleLine(new NodeSequence(sourceFile.statements, 'statements'), sourceFile)).toBe('a(); b();');
  });

  it('should join other sequences with commas', () => {
    const sourceFile = parse('f(1, x);\n');
    const stmt = sourceFile.statements[0];
    if (!ts.isExpressionStatement(stmt) || !ts.isCallExpression(stmt.expression)) {
      throw new Error('unexpected parse');
    }

    expect(renderSingleLine(new NodeSequence(stmt.expression.arguments), sourceFile)).toBe('1, x');
  });

  it('should render an empty sequence as empty text', () => {
    expect(renderSingleLine(new NodeSequence([]), parse(''))).toBe('');
  });
});
