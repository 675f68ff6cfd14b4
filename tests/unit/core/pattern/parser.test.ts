/**
 * Tests for category detection and error positions of the pattern parser.
 */
import { describe, it, expect } from 'vitest';
import { ts } from 'ts-morph';
import { parsePattern, type ParsedPattern } from '../../../../src/core/pattern/parser.js';
import { encodePattern, tokenize } from '../../../../src/core/pattern/tokenizer.js';
import { NodeSequence } from '../../../../src/core/match/sequence.js';
import { CompileError, ErrorCodes } from '../../../../src/utils/errors.js';

function parse(pattern: string): ParsedPattern {
  const encoded = encodePattern(pattern, tokenize(pattern));
  return parsePattern(encoded.text, encoded.offsets, pattern);
}

function compileError(pattern: string): CompileError {
  try {
    parse(pattern);
  } catch (error) {
    if (error instanceof CompileError) {
      return error;
    }
    throw error;
  }
  throw new Error(`expected ${pattern} to fail`);
}

function rootKind(parsed: ParsedPattern): ts.SyntaxKind | string {
  return parsed.root instanceof NodeSequence ? parsed.root.listKind : parsed.root.kind;
}

describe('parsePattern', () => {
  describe('category', () => {
    it('should prefer an expression over an expression statement', () => {
      const parsed = parse('x');

      expect(parsed.category).toBe('expression');
      expect(rootKind(parsed)).toBe(ts.SyntaxKind.Identifier);
    });

    it('should parse comma-separated expressions as an expression list', () => {
      const parsed = parse('a, $*_');

      expect(parsed.category).toBe('expression-list');
      expect(parsed.root).toBeInstanceOf(NodeSequence);
      expect(rootKind(parsed)).toBe('expressions');
      expect(parsed.root instanceof NodeSequence && parsed.root.length).toBe(2);
    });

    it('should parse a terminated statement as a statement', () => {
      const parsed = parse('f(x);');

      expect(parsed.category).toBe('statement');
      expect(rootKind(parsed)).toBe(ts.SyntaxKind.ExpressionStatement);
    });

    it('should parse several statements as a statement list', () => {
      const parsed = parse('a(); b();');

      expect(parsed.category).toBe('statement-list');
      expect(rootKind(parsed)).toBe('statements');
      expect(parsed.root instanceof NodeSequence && parsed.root.length).toBe(2);
    });

    it('should allow await and yield in statements', () => {
      expect(parse('await $x; yield $y;').category).toBe('statement-list');
    });

    it('should parse type-only syntax as a type', () => {
      const parsed = parse('keyof $T');

      expect(parsed.category).toBe('type');
      expect(rootKind(parsed)).toBe(ts.SyntaxKind.TypeOperator);
    });

    it('should parse a named function as a declaration statement', () => {
      const parsed = parse('function $f($*_) {}');

      expect(parsed.category).toBe('statement');
      expect(rootKind(parsed)).toBe(ts.SyntaxKind.FunctionDeclaration);
    });

    it('should parse a named class as a declaration statement', () => {
      expect(rootKind(parse('class $C { $*_ }'))).toBe(ts.SyntaxKind.ClassDeclaration);
    });

    it('should keep anonymous functions as expressions', () => {
      const parsed = parse('function () {}');

      expect(parsed.category).toBe('expression');
      expect(rootKind(parsed)).toBe(ts.SyntaxKind.FunctionExpression);
    });

    it('should read braces alone as an object literal', () => {
      expect(rootKind(parse('{ $*_ }'))).toBe(ts.SyntaxKind.ObjectLiteralExpression);
    });

    it('should keep an explicitly parenthesized expression', () => {
      expect(rootKind(parse('(a + b)'))).toBe(ts.SyntaxKind.ParenthesizedExpression);
    });
  });

  describe('errors', () => {
    it('should reject an empty pattern', () => {
      const error = compileError('   ');

      expect(error.code).toBe(ErrorCodes.EMPTY_PATTERN);
      expect(error.message).toBe('empty pattern');
    });

    it('should reject a pattern holding only the aggressive marker', () => {
      expect(compileError('$~').code).toBe(ErrorCodes.EMPTY_PATTERN);
    });

    it('should report the statement-list diagnostic at the original position', () => {
      const error = compileError('a +');

      expect(error.code).toBe(ErrorCodes.PATTERN_SYNTAX);
      expect(error.message).toBe('1:4: Expression expected.');
    });

    it('should correct positions after a shortened wildcard', () => {
      const error = compileError('$longname + )');

      expect(error.position).toEqual({ offset: 12, line: 1, column: 13 });
      expect(error.message).toBe('1:13: Expression expected.');
    });

    it('should correct positions after a regex wildcard', () => {
      const error = compileError('$(_, /foo/) + )');

      expect(error.position).toEqual({ offset: 14, line: 1, column: 15 });
      expect(error.message).toBe('1:15: Expression expected.');
    });

    it('should correct positions after the aggressive marker', () => {
      expect(compileError('$~ $x + )').position?.column).toBe(9);
    });
  });
});
