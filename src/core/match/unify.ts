/**
 * Wildcard-aware structural unification of a compiled pattern against corpus nodes.
 */
import { ts } from 'ts-morph';
import type { CompiledPattern, WildcardInfo } from '../pattern/types.js';
import { BLANK_NAME } from '../pattern/tokenizer.js';
import { NodeSequence, childSlots, type ChildSlot } from './sequence.js';
import { MatchState, type Binding } from './types.js';

/** Statement kinds a one-statement block may stand in for under aggressive matching. */
const STATEMENT_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.VariableStatement,
  ts.SyntaxKind.EmptyStatement,
  ts.SyntaxKind.ExpressionStatement,
  ts.SyntaxKind.IfStatement,
  ts.SyntaxKind.DoStatement,
  ts.SyntaxKind.WhileStatement,
  ts.SyntaxKind.ForStatement,
  ts.SyntaxKind.ForInStatement,
  ts.SyntaxKind.ForOfStatement,
  ts.SyntaxKind.ContinueStatement,
  ts.SyntaxKind.BreakStatement,
  ts.SyntaxKind.ReturnStatement,
  ts.SyntaxKind.WithStatement,
  ts.SyntaxKind.SwitchStatement,
  ts.SyntaxKind.LabeledStatement,
  ts.SyntaxKind.ThrowStatement,
  ts.SyntaxKind.TryStatement,
  ts.SyntaxKind.DebuggerStatement,
  ts.SyntaxKind.FunctionDeclaration,
  ts.SyntaxKind.ClassDeclaration,
]);

/**
 * Text carried by a node outside of its children, or undefined for nodes that
 * have none. Two nodes of the same kind are only equal if this matches.
 */
function literalText(node: ts.Node): string | undefined {
  if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) {
    return node.text;
  }
  if (
    ts.isStringLiteral(node) ||
    ts.isNumericLiteral(node) ||
    ts.isBigIntLiteral(node) ||
    ts.isRegularExpressionLiteral(node) ||
    ts.isNoSubstitutionTemplateLiteral(node) ||
    ts.isTemplateHead(node) ||
    ts.isTemplateMiddle(node) ||
    ts.isTemplateTail(node) ||
    ts.isJsxText(node)
  ) {
    return node.text;
  }
  return undefined;
}

/**
 * Compare the non-child fields of two nodes already known to share a kind.
 */
function sameFields(p: ts.Node, c: ts.Node, aggressive: boolean): boolean {
  if (literalText(p) !== literalText(c)) {
    return false;
  }

  if (ts.isPrefixUnaryExpression(p) && ts.isPrefixUnaryExpression(c)) {
    return p.operator === c.operator;
  }
  if (ts.isPostfixUnaryExpression(p) && ts.isPostfixUnaryExpression(c)) {
    return p.operator === c.operator;
  }
  if (ts.isTypeOperatorNode(p) && ts.isTypeOperatorNode(c)) {
    return p.operator === c.operator;
  }
  if (ts.isHeritageClause(p) && ts.isHeritageClause(c)) {
    return p.token === c.token;
  }
  if (ts.isMetaProperty(p) && ts.isMetaProperty(c)) {
    return p.keywordToken === c.keywordToken;
  }
  if (ts.isVariableDeclarationList(p) && ts.isVariableDeclarationList(c)) {
    return aggressive || (p.flags & ts.NodeFlags.BlockScoped) === (c.flags & ts.NodeFlags.BlockScoped);
  }
  if (ts.isImportClause(p) && ts.isImportClause(c)) {
    return p.isTypeOnly === c.isTypeOnly;
  }
  if (
    (ts.isImportSpecifier(p) && ts.isImportSpecifier(c)) ||
    (ts.isExportSpecifier(p) && ts.isExportSpecifier(c)) ||
    (ts.isExportDeclaration(p) && ts.isExportDeclaration(c))
  ) {
    return p.isTypeOnly === c.isTypeOnly;
  }
  if (ts.isImportEqualsDeclaration(p) && ts.isImportEqualsDeclaration(c)) {
    return p.isTypeOnly === c.isTypeOnly;
  }
  if (ts.isImportTypeNode(p) && ts.isImportTypeNode(c)) {
    return p.isTypeOf === c.isTypeOf;
  }
  if (ts.isExportAssignment(p) && ts.isExportAssignment(c)) {
    return p.isExportEquals === c.isExportEquals;
  }
  if (ts.isModuleDeclaration(p) && ts.isModuleDeclaration(c)) {
    // `namespace`, `module` and `declare global` share a kind
    const keyword = ts.NodeFlags.Namespace | ts.NodeFlags.GlobalAugmentation;
    return (p.flags & keyword) === (c.flags & keyword);
  }
  return true;
}

const DECLARATION_STATEMENT_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.Block,
  ts.SyntaxKind.InterfaceDeclaration,
  ts.SyntaxKind.TypeAliasDeclaration,
  ts.SyntaxKind.EnumDeclaration,
  ts.SyntaxKind.ModuleDeclaration,
  ts.SyntaxKind.ImportDeclaration,
  ts.SyntaxKind.ImportEqualsDeclaration,
  ts.SyntaxKind.ExportDeclaration,
  ts.SyntaxKind.ExportAssignment,
]);

function isStatementNode(node: ts.Node): boolean {
  return STATEMENT_KINDS.has(node.kind) || DECLARATION_STATEMENT_KINDS.has(node.kind);
}

/**
 * Whether a wildcard carried by pattern node `p` may bind `c`. A bare
 * identifier binds anything; a wrapper such as `$x;` only binds nodes that
 * could stand in its position.
 */
function wrapperAccepts(p: ts.Node, c: ts.Node): boolean {
  if (ts.isIdentifier(p)) {
    return true;
  }
  if (ts.isExpressionStatement(p)) {
    return isStatementNode(c);
  }
  if (ts.isTypeReferenceNode(p)) {
    return ts.isTypeNode(c);
  }
  if (ts.isPropertyDeclaration(p)) {
    return ts.isClassElement(c);
  }
  if (ts.isShorthandPropertyAssignment(p)) {
    return ts.isObjectLiteralElementLike(c);
  }
  return p.kind === c.kind;
}

function skipParentheses(node: ts.Node): ts.Node {
  let current = node;
  while (ts.isParenthesizedExpression(current) || ts.isParenthesizedTypeNode(current)) {
    current = ts.isParenthesizedExpression(current) ? current.expression : current.type;
  }
  return current;
}

function asElements(binding: Binding): readonly ts.Node[] {
  return binding instanceof NodeSequence ? binding.elements : [binding];
}

/**
 * Unifies one compiled pattern with candidate nodes.
 *
 * Holds no per-attempt state; callers pass a fresh MatchState for every
 * top-level attempt, so one Unifier may be reused across a whole search.
 */
export class Unifier {
  private readonly aggressive: boolean;

  constructor(private readonly pattern: CompiledPattern) {
    this.aggressive = pattern.aggressive;
  }

  /**
   * Unify a pattern node with a candidate node, adding bindings to `state`.
   * On failure `state` may hold partial bindings and must be discarded.
   */
  unify(p: ts.Node, c: ts.Node, state: MatchState): boolean {
    if (this.aggressive) {
      p = skipParentheses(p);
      c = skipParentheses(c);
    }

    const wildcard = this.wildcardOf(p);
    if (wildcard) {
      return wrapperAccepts(p, c) && this.bindSingle(wildcard, c, state);
    }

    if (this.aggressive) {
      if (ts.isBlock(p) && !ts.isBlock(c) && p.statements.length === 1 && STATEMENT_KINDS.has(c.kind)) {
        return this.unify(p.statements[0], c, state);
      }
      if (ts.isBlock(c) && !ts.isBlock(p) && c.statements.length === 1 && STATEMENT_KINDS.has(p.kind)) {
        return this.unify(p, c.statements[0], state);
      }
    }

    if (p.kind !== c.kind || !sameFields(p, c, this.aggressive)) {
      return false;
    }

    const pSlots = childSlots(p);
    const cSlots = new Map(childSlots(c).map((slot): [string, ChildSlot] => [slot.field, slot]));
    if (pSlots.length !== cSlots.size) {
      return false;
    }
    for (const ps of pSlots) {
      const cs = cSlots.get(ps.field);
      if (!cs) {
        return false;
      }
      if (ps.kind === 'node' && cs.kind === 'node') {
        if (!this.unify(ps.node, cs.node, state)) return false;
      } else if (ps.kind === 'list' && cs.kind === 'list') {
        if (!this.unifySequence(ps.nodes, cs.nodes, state)) return false;
      } else {
        return false;
      }
    }
    return true;
  }

  /**
   * Align a pattern sequence with a candidate sequence.
   *
   * Fixed elements match one candidate each, in order. Each any-count wildcard
   * takes the shortest run that lets the rest of the sequence match, growing one
   * element at a time on backtrack; that leftmost-shortest split is the one
   * reported when several exist.
   */
  unifySequence(ps: readonly ts.Node[], cs: readonly ts.Node[], state: MatchState): boolean {
    const fixedAfter = new Array<number>(ps.length + 1).fill(0);
    for (let i = ps.length - 1; i >= 0; i--) {
      fixedAfter[i] = fixedAfter[i + 1] + (this.anyCountOf(ps[i]) ? 0 : 1);
    }
    if (fixedAfter[0] > cs.length || (fixedAfter[0] === ps.length && ps.length !== cs.length)) {
      return false;
    }

    const branch = state.fork();
    if (!this.align(ps, 0, cs, 0, fixedAfter, branch)) {
      return false;
    }
    state.adopt(branch);
    return true;
  }

  /**
   * Structural equality of two bindings, ignoring positions.
   */
  equal(a: Binding, b: Binding): boolean {
    const left = asElements(a);
    const right = asElements(b);
    if (left.length !== right.length) {
      return false;
    }
    // corpus nodes are never wildcards, so unification is plain equality here
    return left.every((node, i) => this.unify(node, right[i], new MatchState()));
  }

  private align(
    ps: readonly ts.Node[],
    i: number,
    cs: readonly ts.Node[],
    j: number,
    fixedAfter: readonly number[],
    state: MatchState
  ): boolean {
    if (i === ps.length) {
      return j === cs.length;
    }

    const anyCount = this.anyCountOf(ps[i]);
    if (anyCount) {
      const longest = cs.length - fixedAfter[i + 1];
      for (let k = j; k <= longest; k++) {
        const branch = state.fork();
        if (this.bindRun(anyCount, cs.slice(j, k), branch) && this.align(ps, i + 1, cs, k, fixedAfter, branch)) {
          state.adopt(branch);
          return true;
        }
      }
      return false;
    }

    if (j >= cs.length) {
      return false;
    }
    return this.unify(ps[i], cs[j], state) && this.align(ps, i + 1, cs, j + 1, fixedAfter, state);
  }

  private bindSingle(wildcard: WildcardInfo, c: ts.Node, state: MatchState): boolean {
    if (wildcard.nameRx && !this.nameMatches(wildcard.nameRx, c)) {
      return false;
    }
    return this.bindValue(wildcard.name, c, state);
  }

  private bindRun(wildcard: WildcardInfo, run: readonly ts.Node[], state: MatchState): boolean {
    const { nameRx } = wildcard;
    if (nameRx && !run.every((node) => this.nameMatches(nameRx, node))) {
      return false;
    }
    return this.bindValue(wildcard.name, new NodeSequence(run), state);
  }

  private bindValue(name: string, value: Binding, state: MatchState): boolean {
    if (name === BLANK_NAME) {
      return true;
    }
    const existing = state.get(name);
    if (existing !== undefined) {
      return this.equal(existing, value);
    }
    state.bind(name, value);
    return true;
  }

  private nameMatches(nameRx: RegExp, node: ts.Node): boolean {
    return ts.isIdentifier(node) && nameRx.test(node.text);
  }

  private wildcardOf(node: ts.Node): WildcardInfo | undefined {
    const id = this.pattern.wildcardIds.get(node);
    return id === undefined ? undefined : this.pattern.wildcards[id];
  }

  private anyCountOf(node: ts.Node): WildcardInfo | undefined {
    const wildcard = this.wildcardOf(node);
    return wildcard?.any ? wildcard : undefined;
  }
}
