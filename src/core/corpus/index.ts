/**
 * Corpus barrel export.
 */
export { resolveCorpusFiles, loadUntyped, loadTyped } from './loader.js';
export type { CorpusOptions, CorpusPackage, TypedProgram } from './types.js';
