/**
 * Pattern barrel export.
 */
export { compilePattern } from './compiler.js';
export { tokenize, encodePattern, encodeWildcard, WILDCARD_SIGIL, BLANK_NAME } from './tokenizer.js';
export type { EncodedPattern } from './tokenizer.js';
export { parsePattern } from './parser.js';
export type { ParsedPattern } from './parser.js';
export { PositionTracker, correctOffset, positionAt } from './position.js';
export type { PosOffset } from './position.js';
export type {
  CompileOptions,
  CompiledPattern,
  PatternCategory,
  PatternRoot,
  PatternToken,
  TokenizeResult,
  WildcardInfo,
} from './types.js';
