/**
 * Pattern compiler: tokenize, encode, parse, then index wildcard nodes.
 */
import { ts } from 'ts-morph';
import { logger } from '../../utils/logger.js';
import { NodeSequence } from '../match/sequence.js';
import { parsePattern } from './parser.js';
import { encodePattern, tokenize, WILDCARD_SIGIL } from './tokenizer.js';
import type { CompileOptions, CompiledPattern, PatternRoot, WildcardInfo } from './types.js';

const ENCODED_WILDCARD = new RegExp(`^\\${WILDCARD_SIGIL}(\\d+)$`);

/**
 * Compile pattern text into a CompiledPattern.
 *
 * @throws TokenizeError on malformed wildcard syntax
 * @throws CompileError when the pattern parses under no syntactic category
 */
export function compilePattern(source: string, options: CompileOptions = {}): CompiledPattern {
  const tokenized = tokenize(source);
  const encoded = encodePattern(source, tokenized);
  const parsed = parsePattern(encoded.text, encoded.offsets, source);
  const wildcardIds = indexWildcards(parsed.root, parsed.sourceFile, tokenized.wildcards);

  if (wildcardIds.size < tokenized.wildcards.length) {
    logger.debug(`${tokenized.wildcards.length - wildcardIds.size} wildcard(s) not found as identifiers`);
  }

  return {
    source,
    category: parsed.category,
    root: parsed.root,
    wildcards: tokenized.wildcards,
    wildcardIds,
    aggressive: Boolean(options.aggressive) || tokenized.aggressive,
  };
}

/**
 * Map every pattern node standing for a wildcard to the wildcard's id.
 */
function indexWildcards(
  root: PatternRoot,
  sourceFile: ts.SourceFile,
  wildcards: readonly WildcardInfo[]
): Map<ts.Node, number> {
  const ids = new Map<ts.Node, number>();

  const visit = (node: ts.Node): void => {
    if (ts.isIdentifier(node)) {
      const id = wildcardIdOf(node, sourceFile, wildcards);
      if (id !== undefined) {
        ids.set(node, id);
        const wrapper = wrapperOf(node);
        // a regex constrains the identifier, so its wrapper is matched structurally
        if (wrapper && !wildcards[id].nameRx) {
          ids.set(wrapper, id);
        }
      }
      return;
    }
    ts.forEachChild(node, visit);
  };

  const roots = root instanceof NodeSequence ? root.elements : [root];
  roots.forEach(visit);
  return ids;
}

function wildcardIdOf(
  identifier: ts.Identifier,
  sourceFile: ts.SourceFile,
  wildcards: readonly WildcardInfo[]
): number | undefined {
  // raw text, so an escaped `$` spelling is never read as a wildcard
  const raw = sourceFile.text.slice(identifier.getStart(sourceFile), identifier.end);
  const match = ENCODED_WILDCARD.exec(raw);
  if (!match) {
    return undefined;
  }
  const id = Number(match[1]);
  return id < wildcards.length ? id : undefined;
}

/**
 * The node that exists only to hold `identifier` in a position where a bare
 * expression cannot appear, such as `$x;` in a statement list.
 */
function wrapperOf(identifier: ts.Identifier): ts.Node | undefined {
  const parent = identifier.parent;

  if (ts.isExpressionStatement(parent) && parent.expression === identifier) {
    return parent;
  }
  if (ts.isTypeReferenceNode(parent) && parent.typeName === identifier && !parent.typeArguments) {
    return parent;
  }
  if (ts.isExpressionWithTypeArguments(parent) && parent.expression === identifier && !parent.typeArguments) {
    return parent;
  }
  if (
    ts.isParameter(parent) &&
    parent.name === identifier &&
    !parent.modifiers &&
    !parent.dotDotDotToken &&
    !parent.questionToken &&
    !parent.type &&
    !parent.initializer
  ) {
    return parent;
  }
  if (
    ts.isPropertyDeclaration(parent) &&
    parent.name === identifier &&
    !parent.modifiers &&
    !parent.questionToken &&
    !parent.exclamationToken &&
    !parent.type &&
    !parent.initializer
  ) {
    return parent;
  }
  if (ts.isShorthandPropertyAssignment(parent) && parent.name === identifier && !parent.objectAssignmentInitializer) {
    return parent;
  }
  if (
    (ts.isImportSpecifier(parent) || ts.isExportSpecifier(parent)) &&
    parent.name === identifier &&
    !parent.propertyName &&
    !parent.isTypeOnly
  ) {
    return parent;
  }
  if (
    ts.isBindingElement(parent) &&
    parent.name === identifier &&
    !parent.propertyName &&
    !parent.dotDotDotToken &&
    !parent.initializer
  ) {
    return parent;
  }
  if (ts.isEnumMember(parent) && parent.name === identifier && !parent.initializer) {
    return parent;
  }
  if (
    ts.isTypeParameterDeclaration(parent) &&
    parent.name === identifier &&
    !parent.modifiers &&
    !parent.constraint &&
    !parent.default
  ) {
    return parent;
  }
  return undefined;
}
