/**
 * Human-readable output formatter.
 * Format: file:line:col: single-line rendering of the match
 */
import chalk from 'chalk';
import { renderSingleLine } from '../../core/render/single-line.js';
import { displayPath } from '../../utils/format.js';
import type { Match } from '../../core/match/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      relativePaths: options.relativePaths ?? true,
      cwd: options.cwd ?? process.cwd(),
    };
  }

  formatMatches(matches: readonly Match[]): string {
    return matches.map((match) => this.formatMatch(match)).join('\n');
  }

  formatMatch(match: Match): string {
    const { position } = match;
    const file = displayPath(position.file, this.options.cwd, this.options.relativePaths);
    const location = `${this.colorize(file, 'cyan')}:${this.colorize(`${position.line}:${position.column}`, 'dim')}`;
    return `${location}: ${renderSingleLine(match.node, match.sourceFile)}`;
  }

  private colorize(text: string, color: 'cyan' | 'dim'): string {
    if (!this.options.colors) {
      return text;
    }
    return color === 'cyan' ? chalk.cyan(text) : chalk.dim(text);
  }
}
