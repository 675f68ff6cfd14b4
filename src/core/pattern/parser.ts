/**
 * Pattern parser.
 *
 * A pattern fragment does not say which syntactic category it belongs to, so it
 * is parsed under successive hypotheses, narrowest first, and the first one
 * that parses cleanly into the expected shape wins. `x` is therefore an
 * identifier expression, not an expression statement wrapping one.
 */
import { Project, ts } from 'ts-morph';
import { CompileError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { NodeSequence } from '../match/sequence.js';
import { correctOffset, positionAt, type PosOffset } from './position.js';
import type { PatternCategory, PatternRoot } from './types.js';

export interface ParsedPattern {
  category: PatternCategory;
  root: PatternRoot;
  sourceFile: ts.SourceFile;
}

/**
 * One syntactic guess: the encoded text is spliced between `prefix` and
 * `suffix`, and `extract` pulls the pattern root out of the parsed wrapper.
 */
interface Hypothesis {
  category: PatternCategory;
  prefix: string;
  suffix: string;
  extract(sourceFile: ts.SourceFile, wrapped: string): PatternRoot | undefined;
}

/** Wrapper identifier; `$` alone can never appear in encoded pattern text. */
const WRAPPER_NAME = '$';

const DECLARATION_KINDS = new Set<ts.SyntaxKind>([
  ts.SyntaxKind.FunctionDeclaration,
  ts.SyntaxKind.ClassDeclaration,
  ts.SyntaxKind.InterfaceDeclaration,
  ts.SyntaxKind.TypeAliasDeclaration,
  ts.SyntaxKind.EnumDeclaration,
  ts.SyntaxKind.ModuleDeclaration,
  ts.SyntaxKind.VariableStatement,
  ts.SyntaxKind.ImportDeclaration,
  ts.SyntaxKind.ImportEqualsDeclaration,
  ts.SyntaxKind.ExportDeclaration,
  ts.SyntaxKind.ExportAssignment,
]);

function soleStatement(sourceFile: ts.SourceFile): ts.Statement | undefined {
  return sourceFile.statements.length === 1 ? sourceFile.statements[0] : undefined;
}

/** Statements of the generator body wrapping statement hypotheses. */
function wrapperBody(sourceFile: ts.SourceFile): ts.NodeArray<ts.Statement> | undefined {
  const fn = soleStatement(sourceFile);
  if (!fn || !ts.isFunctionDeclaration(fn) || fn.name?.text !== WRAPPER_NAME || !fn.body) {
    return undefined;
  }
  return fn.body.statements;
}

function spansWrapper(node: ts.Node, sourceFile: ts.SourceFile, wrapped: string): boolean {
  return node.getStart(sourceFile) === 0 && node.end === wrapped.trimEnd().length;
}

const HYPOTHESES: readonly Hypothesis[] = [
  {
    category: 'expression',
    prefix: '(',
    suffix: '\n)',
    extract(sourceFile, wrapped) {
      const stmt = soleStatement(sourceFile);
      if (!stmt || !ts.isExpressionStatement(stmt)) return undefined;
      const paren = stmt.expression;
      if (!ts.isParenthesizedExpression(paren) || !spansWrapper(paren, sourceFile, wrapped)) {
        return undefined;
      }
      const inner = paren.expression;
      // `a, b` is an expression list, not a comma expression
      if (ts.isBinaryExpression(inner) && inner.operatorToken.kind === ts.SyntaxKind.CommaToken) {
        return undefined;
      }
      // `function f() {}` and `class C {}` are declarations when written alone
      if ((ts.isFunctionExpression(inner) || ts.isClassExpression(inner)) && inner.name) {
        return undefined;
      }
      return inner;
    },
  },
  {
    category: 'expression-list',
    prefix: `${WRAPPER_NAME}(`,
    suffix: '\n)',
    extract(sourceFile, wrapped) {
      const stmt = soleStatement(sourceFile);
      if (!stmt || !ts.isExpressionStatement(stmt)) return undefined;
      const call = stmt.expression;
      if (
        !ts.isCallExpression(call) ||
        !ts.isIdentifier(call.expression) ||
        call.expression.text !== WRAPPER_NAME ||
        call.typeArguments ||
        call.arguments.length === 0 ||
        !spansWrapper(call, sourceFile, wrapped)
      ) {
        return undefined;
      }
      return new NodeSequence(call.arguments, 'expressions');
    },
  },
  {
    category: 'statement',
    prefix: `async function* ${WRAPPER_NAME}() { `,
    suffix: '\n}',
    extract(sourceFile) {
      const body = wrapperBody(sourceFile);
      return body && body.length === 1 ? body[0] : undefined;
    },
  },
  {
    category: 'statement-list',
    prefix: `async function* ${WRAPPER_NAME}() { `,
    suffix: '\n}',
    extract(sourceFile) {
      const body = wrapperBody(sourceFile);
      return body && body.length > 1 ? new NodeSequence(body, 'statements') : undefined;
    },
  },
  {
    category: 'type',
    prefix: `type ${WRAPPER_NAME} = `,
    suffix: '\n;',
    extract(sourceFile) {
      const alias = soleStatement(sourceFile);
      if (!alias || !ts.isTypeAliasDeclaration(alias) || alias.name.text !== WRAPPER_NAME) {
        return undefined;
      }
      return alias.type;
    },
  },
  {
    category: 'declarations',
    prefix: '',
    suffix: '\n',
    extract(sourceFile) {
      const statements = sourceFile.statements;
      if (statements.length === 0 || !statements.every((s) => DECLARATION_KINDS.has(s.kind))) {
        return undefined;
      }
      return statements.length === 1 ? statements[0] : new NodeSequence(statements, 'statements');
    },
  },
  {
    category: 'file',
    prefix: '',
    suffix: '\n',
    extract(sourceFile) {
      return sourceFile.statements.length > 0 ? sourceFile : undefined;
    },
  },
];

/** The hypothesis whose diagnostic is reported when nothing parses. */
const REPORTED_CATEGORY: PatternCategory = 'statement-list';

interface Attempt {
  sourceFile: ts.SourceFile;
  wrapped: string;
  prefixLength: number;
  diagnostic?: ts.Diagnostic;
}

/**
 * Parse encoded pattern text, trying each syntactic category in turn.
 *
 * @param encoded - Pattern text after wildcard encoding
 * @param offsets - Corrections recorded while encoding
 * @param original - The pattern as the user wrote it, for error positions
 */
export function parsePattern(
  encoded: string,
  offsets: readonly PosOffset[],
  original: string
): ParsedPattern {
  if (encoded.trim() === '') {
    throw new CompileError(ErrorCodes.EMPTY_PATTERN, 'empty pattern');
  }

  const project = new Project({
    useInMemoryFileSystem: true,
    compilerOptions: { target: ts.ScriptTarget.Latest },
  });
  const attempts = new Map<PatternCategory, Attempt>();

  for (const [index, hypothesis] of HYPOTHESES.entries()) {
    const attempt = parseWrapped(project, `/pattern-${index}.ts`, hypothesis, encoded);
    attempts.set(hypothesis.category, attempt);
    if (attempt.diagnostic) {
      continue;
    }
    const root = hypothesis.extract(attempt.sourceFile, attempt.wrapped);
    if (root) {
      logger.debug(`Parsed pattern as ${hypothesis.category}`);
      return { category: hypothesis.category, root, sourceFile: attempt.sourceFile };
    }
  }

  const reported = attempts.get(REPORTED_CATEGORY);
  const failed = reported?.diagnostic ? reported : [...attempts.values()].find((a) => a.diagnostic);
  throw patternSyntaxError(failed, offsets, original);
}

function parseWrapped(project: Project, fileName: string, hypothesis: Hypothesis, encoded: string): Attempt {
  const wrapped = `${hypothesis.prefix}${encoded}${hypothesis.suffix}`;
  const sourceFile = project.createSourceFile(fileName, wrapped, { overwrite: true });
  const [diagnostic] = project.getProgram().getSyntacticDiagnostics(sourceFile);
  return {
    sourceFile: sourceFile.compilerNode,
    wrapped,
    prefixLength: hypothesis.prefix.length,
    diagnostic: diagnostic?.compilerObject,
  };
}

function patternSyntaxError(
  attempt: Attempt | undefined,
  offsets: readonly PosOffset[],
  original: string
): CompileError {
  if (!attempt?.diagnostic) {
    return new CompileError(ErrorCodes.PATTERN_SYNTAX, 'pattern does not parse as any syntactic category');
  }
  const diagnostic = attempt.diagnostic;
  const encodedOffset = Math.max(0, (diagnostic.start ?? 0) - attempt.prefixLength);
  const position = positionAt(original, correctOffset(encodedOffset, offsets));
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  return new CompileError(ErrorCodes.PATTERN_SYNTAX, message, position);
}
