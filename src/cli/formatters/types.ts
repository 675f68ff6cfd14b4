/**
 * Formatter type definitions.
 */
import type { Match } from '../../core/match/types.js';
import type { OutputFormat } from '../../core/config/schema.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Output format */
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Print paths under `cwd` relative to it */
  relativePaths: boolean;
  /** Working directory paths are shown relative to */
  cwd: string;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  /**
   * Format every match of a run. Returns an empty string when a format
   * prints nothing for zero matches.
   */
  formatMatches(matches: readonly Match[]): string;
}
