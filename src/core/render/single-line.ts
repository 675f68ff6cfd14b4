/**
 * Single-line rendering of matched nodes and bindings.
 */
import { ts } from 'ts-morph';
import { NodeSequence } from '../match/sequence.js';
import type { Binding } from '../match/types.js';

const printer = ts.createPrinter({ removeComments: true, newLine: ts.NewLineKind.LineFeed });

/**
 * Print a node or sequence with the TypeScript printer and fold it onto one line.
 */
export function renderSingleLine(binding: Binding, sourceFile: ts.SourceFile): string {
  if (binding instanceof NodeSequence) {
    const separator = binding.listKind === 'statements' ? ' ' : ', ';
    return binding.elements.map((node) => renderNode(node, sourceFile)).join(separator);
  }
  return renderNode(binding, sourceFile);
}

function renderNode(node: ts.Node, sourceFile: ts.SourceFile): string {
  const printed = ts.isSourceFile(node)
    ? printer.printFile(node)
    : printer.printNode(ts.EmitHint.Unspecified, node, sourceFile);
  return joinLines(printed);
}

/**
 * Trim every line and join the non-empty ones with single spaces.
 */
export function joinLines(text: string): string {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(' ');
}
