/**
 * Search a corpus tree for every subtree or sibling sequence a compiled pattern matches.
 */
import { ts } from 'ts-morph';
import type { CompiledPattern } from '../pattern/types.js';
import { NodeSequence, isSearchable, sequenceKindOf } from './sequence.js';
import { MatchState, type Binding, type Match, type MatchPosition } from './types.js';
import { Unifier } from './unify.js';

/**
 * Find all matches of `pattern` in `tree`, in pre-order.
 *
 * Matches are not exclusive: an outer node and a node nested inside it are
 * both reported when each matches on its own. Every attempt starts from empty
 * bindings, and a failed attempt leaves nothing behind.
 */
export function search(
  pattern: CompiledPattern,
  tree: ts.Node,
  sourceFile: ts.SourceFile = tree.getSourceFile()
): Match[] {
  const unifier = new Unifier(pattern);
  const matches: Match[] = [];
  const root = pattern.root;

  const report = (node: Binding, state: MatchState): void => {
    matches.push({
      node,
      sourceFile,
      position: positionOf(node, sourceFile),
      bindings: state.entries(),
    });
  };

  const visitList = (parent: ts.Node, list: ts.NodeArray<ts.Node>): void => {
    if (
      root instanceof NodeSequence &&
      list.length > 0 &&
      sequenceKindOf(parent, list) === root.listKind
    ) {
      const state = new MatchState();
      if (unifier.unifySequence(root.elements, list, state)) {
        report(new NodeSequence(list, root.listKind), state);
      }
    }
    list.forEach(visit);
  };

  const visit = (node: ts.Node): void => {
    if (!(root instanceof NodeSequence) && isSearchable(node)) {
      const state = new MatchState();
      if (unifier.unify(root, node, state)) {
        report(node, state);
      }
    }
    ts.forEachChild(node, visit, (list) => visitList(node, list));
  };

  visit(tree);
  return matches;
}

/**
 * Source position of a match; line and column are 1-based.
 */
export function positionOf(node: Binding, sourceFile: ts.SourceFile): MatchPosition {
  const offset = node.getStart(sourceFile);
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(offset);
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    offset,
  };
}
