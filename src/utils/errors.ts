/**
 * Error types and codes for tsgrep.
 * This is the error contract - all errors should extend TsgrepError.
 */

/**
 * A location inside a pattern string.
 * `offset` is 0-based, `line` and `column` are 1-based.
 */
export interface PatternPosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * Base error class for all tsgrep errors.
 */
export class TsgrepError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TsgrepError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Malformed wildcard syntax in a pattern.
 * Error codes: T001-T005
 */
export class TokenizeError extends TsgrepError {
  constructor(
    code: string,
    message: string,
    public readonly position: PatternPosition,
    details?: Record<string, unknown>
  ) {
    super(code, `${position.line}:${position.column}: ${message}`, { ...details, position });
    this.name = 'TokenizeError';
  }
}

/**
 * A pattern that no syntactic category could parse.
 * Error codes: C001-C002
 */
export class CompileError extends TsgrepError {
  constructor(
    code: string,
    message: string,
    public readonly position?: PatternPosition,
    details?: Record<string, unknown>
  ) {
    super(
      code,
      position ? `${position.line}:${position.column}: ${message}` : message,
      { ...details, position }
    );
    this.name = 'CompileError';
  }
}

/**
 * Corpus loading errors (missing paths, unparsable or ill-typed sources).
 * Error codes: L001-L004
 */
export class LoadError extends TsgrepError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'LoadError';
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends TsgrepError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Command-line usage errors.
 * Error codes: U001-U002
 */
export class UsageError extends TsgrepError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'UsageError';
  }
}

export const ErrorCodes = {
  // Tokenize errors (T001-T005)
  MISSING_WILDCARD_NAME: 'T001',
  INVALID_WILDCARD_NAME: 'T002',
  UNTERMINATED_WILDCARD: 'T003',
  INVALID_REGEX: 'T004',
  MISPLACED_AGGRESSIVE_MARKER: 'T005',

  // Compile errors (C001-C002)
  EMPTY_PATTERN: 'C001',
  PATTERN_SYNTAX: 'C002',

  // Load errors (L001-L004)
  PATH_NOT_FOUND: 'L001',
  NO_FILES_MATCHED: 'L002',
  SOURCE_SYNTAX: 'L003',
  TYPE_CHECK: 'L004',

  // Config errors
  CONFIG_LOAD: 'CFG001',
  PARSE_ERROR: 'CFG002',
  INVALID_CONFIG: 'CFG003',

  // Usage errors (U001-U002)
  MISSING_COMMAND: 'U001',
  COMMAND_COMPOSITION: 'U002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
