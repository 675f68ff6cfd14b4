/**
 * Pattern compilation types.
 */
import type { ts } from 'ts-morph';
import type { NodeSequence } from '../match/sequence.js';

/**
 * A wildcard occurrence in a pattern.
 * Ids are dense and allocated per occurrence in source order.
 */
export interface WildcardInfo {
  id: number;
  /** Binding name; `_` binds nothing and has no consistency constraint */
  name: string;
  /** `$*name`: matches any number of sibling nodes */
  any: boolean;
  /** `$(name, /re/)`: the matched node must be an identifier whose whole name matches */
  nameRx?: RegExp;
}

/**
 * A lexical unit of a pattern.
 * `start` and `end` are offsets into the original pattern text.
 */
export interface PatternToken {
  kind: ts.SyntaxKind;
  text: string;
  start: number;
  end: number;
  /** Set on wildcard tokens, which span the whole wildcard syntax */
  wildcardId?: number;
}

export interface TokenizeResult {
  /** Tokens in source order, without the aggressive marker */
  tokens: PatternToken[];
  wildcards: WildcardInfo[];
  aggressive: boolean;
  /** Span of the leading `$~` marker, when present */
  marker?: { start: number; end: number };
}

/**
 * Syntactic category a pattern was parsed as, narrowest first.
 */
export type PatternCategory =
  | 'expression'
  | 'expression-list'
  | 'statement'
  | 'statement-list'
  | 'type'
  | 'declarations'
  | 'file';

/** A compiled pattern root: one node, or a sibling sequence. */
export type PatternRoot = ts.Node | NodeSequence;

export interface CompileOptions {
  /** Force aggressive mode even without the `$~` marker */
  aggressive?: boolean;
}

/**
 * A pattern ready for matching. Immutable and safe to share between searches.
 */
export interface CompiledPattern {
  /** The pattern text as written */
  readonly source: string;
  readonly category: PatternCategory;
  readonly root: PatternRoot;
  /** Wildcard table indexed by id */
  readonly wildcards: readonly WildcardInfo[];
  /** Pattern nodes standing for a wildcard, keyed by node identity */
  readonly wildcardIds: ReadonlyMap<ts.Node, number>;
  readonly aggressive: boolean;
}
