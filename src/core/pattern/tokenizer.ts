/**
 * Wildcard tokenizer.
 *
 * Lexes a pattern with the TypeScript scanner and recognizes the wildcard forms
 * layered on top of it:
 *
 *   $name            one node, bound to `name`
 *   $_               one node, unbound
 *   $*name  $*_      any number of sibling nodes
 *   $(name, /re/)    one identifier whose name matches `re`
 *   $~               leading marker enabling aggressive mode
 *
 * Every `$`-prefixed identifier of a pattern is wildcard syntax. encodePattern()
 * then rewrites each wildcard to the plain identifier `$<id>`, which the
 * TypeScript parser accepts anywhere a name is allowed.
 */
import { ts } from 'ts-morph';
import { TokenizeError, ErrorCodes } from '../../utils/errors.js';
import { PositionTracker, positionAt, type PosOffset } from './position.js';
import type { PatternToken, TokenizeResult, WildcardInfo } from './types.js';

export const WILDCARD_SIGIL = '$';

/** Name of a wildcard that binds nothing. */
export const BLANK_NAME = '_';

/** Tokens after which a `/` is division rather than the start of a regex. */
const DIVISION_PRECEDERS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.Identifier,
  ts.SyntaxKind.PrivateIdentifier,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CloseBraceToken,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword,
  ts.SyntaxKind.PlusPlusToken,
  ts.SyntaxKind.MinusMinusToken,
]);

/**
 * Identifier text a wildcard is encoded as.
 */
export function encodeWildcard(id: number): string {
  return `${WILDCARD_SIGIL}${id}`;
}

/**
 * Tokenize a pattern, allocating one wildcard id per wildcard occurrence.
 */
export function tokenize(pattern: string): TokenizeResult {
  return new WildcardTokenizer(pattern).run();
}

class WildcardTokenizer {
  private readonly scanner: ts.Scanner;
  private readonly tokens: PatternToken[] = [];
  private readonly wildcards: WildcardInfo[] = [];
  private readonly braces: Array<'brace' | 'template'> = [];
  private previous: ts.SyntaxKind | undefined;
  private aggressive = false;
  private marker: { start: number; end: number } | undefined;

  constructor(private readonly pattern: string) {
    this.scanner = ts.createScanner(
      ts.ScriptTarget.Latest,
      /* skipTrivia */ true,
      ts.LanguageVariant.Standard,
      pattern
    );
  }

  run(): TokenizeResult {
    for (let kind = this.scan(); kind !== ts.SyntaxKind.EndOfFileToken; kind = this.scan()) {
      const text = this.scanner.getTokenText();
      if (kind === ts.SyntaxKind.Identifier && text.startsWith(WILDCARD_SIGIL)) {
        this.wildcard(text);
        continue;
      }
      this.tokens.push({
        kind,
        text,
        start: this.scanner.getTokenStart(),
        end: this.scanner.getTokenEnd(),
      });
    }

    return {
      tokens: this.tokens,
      wildcards: this.wildcards,
      aggressive: this.aggressive,
      marker: this.marker,
    };
  }

  /**
   * Scan the next token, rescanning regexes and template continuations in context.
   */
  private scan(): ts.SyntaxKind {
    let kind = this.scanner.scan();

    if (
      (kind === ts.SyntaxKind.SlashToken || kind === ts.SyntaxKind.SlashEqualsToken) &&
      (this.previous === undefined || !DIVISION_PRECEDERS.has(this.previous))
    ) {
      kind = this.scanner.reScanSlashToken();
    } else if (kind === ts.SyntaxKind.CloseBraceToken && this.braces[this.braces.length - 1] === 'template') {
      kind = this.scanner.reScanTemplateToken(/* isTaggedTemplate */ false);
    }

    switch (kind) {
      case ts.SyntaxKind.OpenBraceToken:
        this.braces.push('brace');
        break;
      case ts.SyntaxKind.TemplateHead:
        this.braces.push('template');
        break;
      case ts.SyntaxKind.CloseBraceToken:
      case ts.SyntaxKind.TemplateTail:
        this.braces.pop();
        break;
    }

    this.previous = kind;
    return kind;
  }

  private wildcard(text: string): void {
    const start = this.scanner.getTokenStart();

    if (text.length > 1) {
      const name = text.slice(1);
      this.checkName(name, start + 1);
      this.push(start, this.scanner.getTokenEnd(), { name, any: false });
      return;
    }

    const kind = this.scanAdjacent(start + 1);
    switch (kind) {
      case ts.SyntaxKind.AsteriskToken:
        this.anyCount(start);
        return;
      case ts.SyntaxKind.OpenParenToken:
        this.constrained(start, false);
        return;
      case ts.SyntaxKind.TildeToken:
        this.aggressiveMarker(start);
        return;
      default:
        throw this.error(ErrorCodes.MISSING_WILDCARD_NAME, 'expected a wildcard name after $', start + 1);
    }
  }

  /** `$*name`, `$*_` or `$*(name, /re/)` */
  private anyCount(start: number): void {
    const kind = this.scanAdjacent(this.scanner.getTokenEnd());
    if (kind === ts.SyntaxKind.OpenParenToken) {
      this.constrained(start, true);
      return;
    }
    const name = this.scanner.getTokenText();
    if (kind !== ts.SyntaxKind.Identifier) {
      throw this.error(ErrorCodes.MISSING_WILDCARD_NAME, 'expected a wildcard name after $*', this.scanner.getTokenStart());
    }
    this.checkName(name, this.scanner.getTokenStart());
    this.push(start, this.scanner.getTokenEnd(), { name, any: true });
  }

  /** `$(name, /re/)`; the comma is optional */
  private constrained(start: number, any: boolean): void {
    let kind = this.scan();
    if (kind !== ts.SyntaxKind.Identifier) {
      throw this.unterminatedOr(kind, ErrorCodes.MISSING_WILDCARD_NAME, 'expected a wildcard name after $(');
    }
    const name = this.scanner.getTokenText();
    this.checkName(name, this.scanner.getTokenStart());

    kind = this.scan();
    if (kind === ts.SyntaxKind.CommaToken) {
      kind = this.scan();
    }
    if (kind === ts.SyntaxKind.SlashToken || kind === ts.SyntaxKind.SlashEqualsToken) {
      kind = this.scanner.reScanSlashToken();
    }
    if (kind !== ts.SyntaxKind.RegularExpressionLiteral) {
      throw this.unterminatedOr(kind, ErrorCodes.INVALID_REGEX, 'expected a /regex/ in wildcard');
    }
    const regexStart = this.scanner.getTokenStart();
    if (this.scanner.isUnterminated()) {
      throw this.error(ErrorCodes.INVALID_REGEX, 'unterminated regex in wildcard', regexStart);
    }
    const nameRx = this.compileRegex(this.scanner.getTokenText(), regexStart);

    kind = this.scan();
    if (kind !== ts.SyntaxKind.CloseParenToken) {
      throw this.unterminatedOr(kind, ErrorCodes.UNTERMINATED_WILDCARD, 'expected ) to close wildcard');
    }
    this.push(start, this.scanner.getTokenEnd(), { name, any, nameRx });
  }

  private aggressiveMarker(start: number): void {
    if (this.tokens.length > 0 || this.wildcards.length > 0 || this.marker) {
      throw this.error(
        ErrorCodes.MISPLACED_AGGRESSIVE_MARKER,
        'the aggressive marker $~ must start the pattern',
        start
      );
    }
    this.aggressive = true;
    this.marker = { start, end: this.scanner.getTokenEnd() };
    this.previous = undefined;
  }

  /**
   * Scan a token that must begin exactly at `expected`, with no trivia before it.
   */
  private scanAdjacent(expected: number): ts.SyntaxKind {
    const kind = this.scan();
    if (kind === ts.SyntaxKind.EndOfFileToken || this.scanner.getTokenStart() !== expected) {
      throw this.error(ErrorCodes.MISSING_WILDCARD_NAME, 'expected a wildcard name after $', expected);
    }
    return kind;
  }

  private checkName(name: string, offset: number): void {
    if (name.startsWith(WILDCARD_SIGIL)) {
      throw this.error(ErrorCodes.INVALID_WILDCARD_NAME, `invalid wildcard name "${name}"`, offset);
    }
  }

  private compileRegex(literal: string, offset: number): RegExp {
    const lastSlash = literal.lastIndexOf('/');
    const body = literal.slice(1, lastSlash);
    // g and y would make test() stateful across candidates
    const flags = literal.slice(lastSlash + 1).replace(/[gy]/g, '');
    try {
      return new RegExp(`^(?:${body})$`, flags);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw this.error(ErrorCodes.INVALID_REGEX, `invalid regex ${literal}: ${reason}`, offset);
    }
  }

  private push(start: number, end: number, info: Omit<WildcardInfo, 'id'>): void {
    const id = this.wildcards.length;
    this.wildcards.push({ id, ...info });
    this.tokens.push({
      kind: ts.SyntaxKind.Identifier,
      text: this.pattern.slice(start, end),
      start,
      end,
      wildcardId: id,
    });
    this.previous = ts.SyntaxKind.Identifier;
  }

  private unterminatedOr(kind: ts.SyntaxKind, code: string, message: string): TokenizeError {
    if (kind === ts.SyntaxKind.EndOfFileToken) {
      return this.error(ErrorCodes.UNTERMINATED_WILDCARD, 'unterminated wildcard', this.pattern.length);
    }
    return this.error(code, message, this.scanner.getTokenStart());
  }

  private error(code: string, message: string, offset: number): TokenizeError {
    return new TokenizeError(code, message, positionAt(this.pattern, offset));
  }
}

export interface EncodedPattern {
  /** Pattern text with every wildcard replaced by `$<id>` */
  text: string;
  offsets: readonly PosOffset[];
}

/**
 * Rewrite a tokenized pattern into text the TypeScript parser accepts.
 * Trivia between tokens is copied verbatim so parser positions stay close to
 * the original; every length change is recorded for correctOffset().
 */
export function encodePattern(pattern: string, result: TokenizeResult): EncodedPattern {
  const tracker = new PositionTracker();
  let cursor = 0;

  if (result.marker) {
    tracker.write(pattern.slice(cursor, result.marker.start));
    tracker.substitute(pattern.slice(result.marker.start, result.marker.end), '');
    cursor = result.marker.end;
  }

  for (const token of result.tokens) {
    tracker.write(pattern.slice(cursor, token.start));
    const original = pattern.slice(token.start, token.end);
    if (token.wildcardId === undefined) {
      tracker.write(original);
    } else {
      let replacement = encodeWildcard(token.wildcardId);
      // `$(_, /re/)x` must not fuse into the identifier `$0x`
      if (isIdentifierPart(pattern.charCodeAt(token.end))) {
        replacement += ' ';
      }
      tracker.substitute(original, replacement);
    }
    cursor = token.end;
  }
  tracker.write(pattern.slice(cursor));

  return { text: tracker.text, offsets: tracker.offsets };
}

function isIdentifierPart(code: number): boolean {
  return !Number.isNaN(code) && ts.isIdentifierPart(code, ts.ScriptTarget.Latest);
}
