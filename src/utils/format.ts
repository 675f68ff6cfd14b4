/**
 * Formatting utilities for display purposes.
 */
import * as path from 'node:path';

/**
 * Path as shown to the user: relative to `cwd` when the file lies under it,
 * unchanged otherwise.
 */
export function displayPath(file: string, cwd: string, relative = true): string {
  if (!relative) {
    return file;
  }
  const rel = path.relative(cwd, file);
  if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) {
    return file;
  }
  return rel;
}

/**
 * Pluralize a count: `1 match`, `2 matches`.
 */
export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
