/**
 * Corpus loading types.
 */
import type { ts } from 'ts-morph';
import type { IgnoreFilter } from '../../utils/ignore-file.js';

export interface CorpusOptions {
  /** Directory relative paths are resolved against (default: process.cwd()) */
  cwd?: string;
  /** Globs selecting files inside directory arguments */
  include?: string[];
  /** Globs excluded from directory and glob arguments */
  exclude?: string[];
  /** Overrides the .tsgrepignore file of `cwd` */
  ignoreFilter?: IgnoreFilter;
}

/**
 * Files of one directory of a type-checked corpus.
 */
export interface CorpusPackage {
  /** Absolute directory path */
  directory: string;
  files: ts.SourceFile[];
}

/**
 * A type-checked corpus, grouped per directory.
 */
export interface TypedProgram {
  packages: CorpusPackage[];
}
