/**
 * .tsgrepignore file support - gitignore-style patterns for excluding corpus files.
 */
import { readFile } from 'fs/promises';
import { join } from 'path';
import ignore, { type Ignore } from 'ignore';
import { fileExists } from './file-system.js';

export const IGNORE_FILENAME = '.tsgrepignore';

/**
 * Filter for paths excluded from a search.
 */
export interface IgnoreFilter {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from the working directory
   */
  ignores(filePath: string): boolean;
}

/**
 * Load .tsgrepignore from a directory.
 * Returns an empty filter if the file doesn't exist.
 */
export async function loadIgnoreFile(root: string): Promise<IgnoreFilter> {
  const ignorePath = join(root, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createIgnoreFilter([]);
  }
  const content = await readFile(ignorePath, 'utf-8');
  return createIgnoreFilter(parseIgnoreFile(content));
}

/**
 * Create an IgnoreFilter from patterns.
 */
export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add(patterns);

  return {
    ignores(filePath: string): boolean {
      const normalizedPath = filePath.replace(/\\/g, '/');
      // ignore() rejects paths that leave the root
      if (normalizedPath.startsWith('../') || normalizedPath === '..') {
        return false;
      }
      return ig.ignores(normalizedPath);
    },
  };
}

/**
 * Parse .tsgrepignore content.
 * Follows gitignore syntax: `#` comments, blank lines skipped, `!` negations.
 */
export function parseIgnoreFile(content: string): string[] {
  const patterns: string[] = [];

  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    patterns.push(trimmed);
  }

  return patterns;
}
