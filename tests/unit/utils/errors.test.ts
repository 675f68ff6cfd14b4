/**
 * Tests for error classes and codes.
 */
import { describe, it, expect } from 'vitest';
import {
  TsgrepError,
  TokenizeError,
  CompileError,
  LoadError,
  ConfigError,
  UsageError,
  ErrorCodes,
} from '../../../src/utils/errors.js';

describe('TsgrepError', () => {
  it('should create error with code and message', () => {
    const error = new TsgrepError('L001', 'Test error message');

    expect(error.code).toBe('L001');
    expect(error.message).toBe('Test error message');
    expect(error.name).toBe('TsgrepError');
  });

  it('should include optional details', () => {
    const details = { file: 'test.ts', line: 10 };
    const error = new TsgrepError('L001', 'Test error', details);

    expect(error.details).toEqual(details);
  });

  it('should be instance of Error', () => {
    const error = new TsgrepError('L001', 'Test');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(TsgrepError);
  });

  describe('toJSON', () => {
    it('should serialize error to JSON', () => {
      const error = new TsgrepError('L001', 'Test error', { key: 'value' });

      expect(error.toJSON()).toEqual({
        name: 'TsgrepError',
        code: 'L001',
        message: 'Test error',
        details: { key: 'value' },
      });
    });
  });
});

describe('TokenizeError', () => {
  it('should prefix the message with the pattern position', () => {
    const error = new TokenizeError(ErrorCodes.INVALID_REGEX, 'invalid regex', {
      offset: 4,
      line: 1,
      column: 5,
    });

    expect(error.message).toBe('1:5: invalid regex');
    expect(error.position).toEqual({ offset: 4, line: 1, column: 5 });
    expect(error.details).toEqual({ position: { offset: 4, line: 1, column: 5 } });
    expect(error.name).toBe('TokenizeError');
    expect(error).toBeInstanceOf(TsgrepError);
  });
});

describe('CompileError', () => {
  it('should prefix the message when a position is known', () => {
    const error = new CompileError(ErrorCodes.PATTERN_SYNTAX, 'Expression expected.', {
      offset: 14,
      line: 1,
      column: 15,
    });

    expect(error.message).toBe('1:15: Expression expected.');
    expect(error.code).toBe('C002');
  });

  it('should keep the bare message without a position', () => {
    const error = new CompileError(ErrorCodes.EMPTY_PATTERN, 'empty pattern');

    expect(error.message).toBe('empty pattern');
    expect(error.position).toBeUndefined();
  });
});

describe('other error classes', () => {
  it('should set distinct names', () => {
    expect(new LoadError(ErrorCodes.PATH_NOT_FOUND, 'x').name).toBe('LoadError');
    expect(new ConfigError(ErrorCodes.CONFIG_LOAD, 'x').name).toBe('ConfigError');
    expect(new UsageError(ErrorCodes.MISSING_COMMAND, 'x').name).toBe('UsageError');
  });
});

describe('ErrorCodes', () => {
  it('should group codes by prefix', () => {
    expect(ErrorCodes.MISSING_WILDCARD_NAME).toBe('T001');
    expect(ErrorCodes.EMPTY_PATTERN).toBe('C001');
    expect(ErrorCodes.TYPE_CHECK).toBe('L004');
    expect(ErrorCodes.INVALID_CONFIG).toBe('CFG003');
    expect(ErrorCodes.COMMAND_COMPOSITION).toBe('U002');
  });

  it('should have unique values', () => {
    const values = Object.values(ErrorCodes);
    expect(new Set(values).size).toBe(values.length);
  });
});
