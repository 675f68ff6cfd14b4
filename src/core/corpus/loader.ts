/**
 * Corpus loader.
 *
 * Expands path arguments into source files and parses them with ts-morph.
 * The untyped loader only requires each file to parse; the typed loader also
 * requires the whole corpus to type-check.
 */
import * as path from 'node:path';
import { Project, ts, type SourceFile } from 'ts-morph';
import { fileExists, globFiles, isDirectory, isGlobPattern } from '../../utils/file-system.js';
import { loadIgnoreFile } from '../../utils/ignore-file.js';
import { LoadError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_INCLUDE, getDefaultConfig } from '../config/index.js';
import type { CorpusOptions, CorpusPackage, TypedProgram } from './types.js';

const log = logger.child('corpus');

/**
 * Resolve path arguments to a sorted, de-duplicated list of absolute file paths.
 *
 * Files are taken as given. Directories are expanded with the include and
 * exclude globs, and glob arguments are expanded from `cwd`; files found by
 * expansion are then filtered through .tsgrepignore. No paths means `.`.
 *
 * @throws LoadError if a path does not exist or a glob matches nothing
 */
export async function resolveCorpusFiles(
  paths: string[],
  options: CorpusOptions = {}
): Promise<string[]> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const include = options.include ?? DEFAULT_INCLUDE;
  const exclude = options.exclude ?? getDefaultConfig().files.exclude;
  const ignoreFilter = options.ignoreFilter ?? (await loadIgnoreFile(cwd));
  const targets = paths.length > 0 ? paths : ['.'];

  const files = new Set<string>();
  const notIgnored = (file: string): boolean => !ignoreFilter.ignores(path.relative(cwd, file));

  for (const target of targets) {
    if (isGlobPattern(target)) {
      const matched = (await globFiles(target, { cwd, ignore: exclude })).filter(notIgnored);
      if (matched.length === 0) {
        throw new LoadError(ErrorCodes.NO_FILES_MATCHED, `no files match ${target}`, { path: target });
      }
      matched.forEach((file) => files.add(path.normalize(file)));
      continue;
    }

    const absolute = path.resolve(cwd, target);
    if (!(await fileExists(absolute))) {
      throw new LoadError(ErrorCodes.PATH_NOT_FOUND, `${target}: no such file or directory`, { path: target });
    }
    if (await isDirectory(absolute)) {
      const found = await globFiles(include, { cwd: absolute, ignore: exclude });
      found.filter(notIgnored).forEach((file) => files.add(path.normalize(file)));
    } else {
      files.add(absolute);
    }
  }

  log.debug(`Resolved ${files.size} corpus file(s)`);
  return [...files].sort();
}

/**
 * Parse the corpus without type information.
 *
 * @param recursive - Also load every file reached through resolvable imports
 * @throws LoadError on a missing path or a file that does not parse
 */
export async function loadUntyped(
  paths: string[],
  recursive: boolean,
  options: CorpusOptions = {}
): Promise<ts.SourceFile[]> {
  const { project, roots } = await loadProject(paths, recursive, options);
  const sourceFiles = corpusFiles(roots, recursive);

  for (const sourceFile of sourceFiles) {
    const [diagnostic] = project.getProgram().getSyntacticDiagnostics(sourceFile);
    if (diagnostic) {
      throw diagnosticError(ErrorCodes.SOURCE_SYNTAX, diagnostic.compilerObject, options.cwd);
    }
  }

  return sourceFiles.map((sourceFile) => sourceFile.compilerNode);
}

/**
 * Parse and type-check the corpus, grouping files per directory.
 *
 * @throws LoadError on a missing path, a syntax error, or a type error
 */
export async function loadTyped(
  paths: string[],
  recursive: boolean,
  options: CorpusOptions = {}
): Promise<TypedProgram> {
  const { project, roots } = await loadProject(paths, recursive, options);

  const errors = project
    .getPreEmitDiagnostics()
    .map((diagnostic) => diagnostic.compilerObject)
    .filter((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    log.debug(`Type check reported ${errors.length} error(s)`);
    throw diagnosticError(ErrorCodes.TYPE_CHECK, errors[0], options.cwd, errors.length);
  }

  const packages = new Map<string, CorpusPackage>();
  for (const sourceFile of corpusFiles(roots, recursive)) {
    const directory = path.dirname(sourceFile.getFilePath());
    const pkg = packages.get(directory) ?? { directory, files: [] };
    pkg.files.push(sourceFile.compilerNode);
    packages.set(directory, pkg);
  }

  return { packages: [...packages.values()] };
}

interface LoadedProject {
  project: Project;
  /** Files named by the path arguments */
  roots: SourceFile[];
}

/**
 * Create a project for the corpus, using the tsconfig.json of `cwd` for
 * compiler options when there is one.
 */
async function loadProject(paths: string[], recursive: boolean, options: CorpusOptions): Promise<LoadedProject> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const files = await resolveCorpusFiles(paths, options);

  const tsconfigPath = path.join(cwd, 'tsconfig.json');
  const hasTsconfig = await fileExists(tsconfigPath);

  const project = new Project({
    tsConfigFilePath: hasTsconfig ? tsconfigPath : undefined,
    compilerOptions: hasTsconfig
      ? undefined
      : {
          allowJs: true,
          target: ts.ScriptTarget.ES2022,
          module: ts.ModuleKind.ESNext,
          moduleResolution: ts.ModuleResolutionKind.Bundler,
          skipLibCheck: true,
          noEmit: true,
        },
    skipAddingFilesFromTsConfig: true,
    skipFileDependencyResolution: !recursive,
  });

  const roots = files.map((file) => project.addSourceFileAtPath(file));
  if (recursive) {
    const added = project.resolveSourceFileDependencies();
    log.debug(`Resolved ${added.length} dependency file(s)`);
  }

  return { project, roots };
}

/**
 * The files to search: the roots, plus everything they reach through imports
 * and exports when recursive. Type directives and default libraries pulled in
 * by the compiler are not part of the corpus.
 */
function corpusFiles(roots: readonly SourceFile[], recursive: boolean): SourceFile[] {
  const seen = new Map<string, SourceFile>();
  const pending = [...roots];

  for (let sourceFile = pending.pop(); sourceFile; sourceFile = pending.pop()) {
    const filePath = sourceFile.getFilePath();
    if (seen.has(filePath)) {
      continue;
    }
    seen.set(filePath, sourceFile);
    if (recursive) {
      pending.push(...sourceFile.getReferencedSourceFiles());
    }
  }

  return [...seen.values()].sort((a, b) =>
    a.getFilePath() < b.getFilePath() ? -1 : a.getFilePath() > b.getFilePath() ? 1 : 0
  );
}

function diagnosticError(code: string, diagnostic: ts.Diagnostic, cwd?: string, total = 1): LoadError {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  const more = total > 1 ? ` (and ${total - 1} more)` : '';

  if (!diagnostic.file || diagnostic.start === undefined) {
    return new LoadError(code, `${message}${more}`);
  }

  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  const base = path.resolve(cwd ?? process.cwd());
  const relative = path.relative(base, diagnostic.file.fileName);
  const file = relative.startsWith('..') ? diagnostic.file.fileName : relative;
  return new LoadError(code, `${file}:${line + 1}:${character + 1}: ${message}${more}`, {
    file: diagnostic.file.fileName,
    line: line + 1,
    column: character + 1,
  });
}
