/**
 * Synthetic sibling sequences.
 *
 * The TypeScript tree has no node for "the arguments of this call" or "the
 * statements of this block"; they are NodeArrays on the parent. NodeSequence
 * wraps such a run so it can be matched, bound and reported as one unit.
 */
import { ts } from 'ts-morph';

/**
 * What a sequence holds. Sequence patterns only match sequences of the same kind.
 */
export type SequenceKind = 'statements' | 'expressions' | 'nodes';

export class NodeSequence {
  constructor(
    readonly elements: readonly ts.Node[],
    readonly listKind: SequenceKind = 'nodes'
  ) {}

  get length(): number {
    return this.elements.length;
  }

  /** Start of the first element, including leading trivia */
  get pos(): number {
    return this.elements.length > 0 ? this.elements[0].pos : -1;
  }

  get end(): number {
    return this.elements.length > 0 ? this.elements[this.elements.length - 1].end : -1;
  }

  getStart(sourceFile?: ts.SourceFile): number {
    return this.elements.length > 0 ? this.elements[0].getStart(sourceFile) : -1;
  }
}

/**
 * Classify a child NodeArray by the parent field holding it.
 */
export function sequenceKindOf(parent: ts.Node, list: ts.NodeArray<ts.Node>): SequenceKind {
  if (
    (ts.isBlock(parent) ||
      ts.isSourceFile(parent) ||
      ts.isModuleBlock(parent) ||
      ts.isCaseClause(parent) ||
      ts.isDefaultClause(parent)) &&
    parent.statements === list
  ) {
    return 'statements';
  }
  if ((ts.isCallExpression(parent) || ts.isNewExpression(parent)) && parent.arguments === list) {
    return 'expressions';
  }
  if (ts.isArrayLiteralExpression(parent) && parent.elements === list) {
    return 'expressions';
  }
  return 'nodes';
}

/**
 * Whether a corpus node can be reported as a match on its own.
 * Punctuation, modifiers and the end-of-file token are structure, not subtrees.
 */
export function isSearchable(node: ts.Node): boolean {
  if (node.kind >= ts.SyntaxKind.FirstPunctuation && node.kind <= ts.SyntaxKind.LastPunctuation) {
    return false;
  }
  if (node.kind === ts.SyntaxKind.EndOfFileToken) {
    return false;
  }
  return !ts.isModifier(node);
}

/**
 * A populated child field of a node: a single child or a child list.
 * `field` is the property of the parent holding it, such as `initializer`.
 */
export type ChildSlot =
  | { kind: 'node'; field: string; node: ts.Node }
  | { kind: 'list'; field: string; nodes: ts.NodeArray<ts.Node> };

/** Properties of every node that never hold a syntactic child. */
const NON_CHILD_FIELDS = new Set(['parent', 'original', 'emitNode', 'symbol', 'localSymbol', 'jsDoc']);

/**
 * Populated child fields of a node in source order. Optional fields left
 * empty do not appear, so two nodes of one kind only line up field by field
 * when the same fields are present in both.
 */
export function childSlots(node: ts.Node): ChildSlot[] {
  const fields = Object.keys(node).filter((key) => !NON_CHILD_FIELDS.has(key));
  const fieldOf = (child: ts.Node | ts.NodeArray<ts.Node>, index: number): string =>
    fields.find((key) => Reflect.get(node, key) === child) ?? `#${index}`;

  const slots: ChildSlot[] = [];
  ts.forEachChild(
    node,
    (child) => {
      slots.push({ kind: 'node', field: fieldOf(child, slots.length), node: child });
    },
    (nodes) => {
      slots.push({ kind: 'list', field: fieldOf(nodes, slots.length), nodes });
    }
  );
  return slots;
}
