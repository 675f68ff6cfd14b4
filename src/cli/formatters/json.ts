/**
 * JSON output formatter for machine consumption.
 */
import { renderSingleLine } from '../../core/render/single-line.js';
import { displayPath } from '../../utils/format.js';
import type { Match } from '../../core/match/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export interface JsonMatch {
  file: string;
  line: number;
  column: number;
  text: string;
  /** Named wildcard bindings, each rendered on one line */
  bindings: Record<string, string>;
}

export class JsonFormatter implements IFormatter {
  private relativePaths: boolean;
  private cwd: string;

  constructor(options: Partial<FormatOptions> = {}) {
    this.relativePaths = options.relativePaths ?? true;
    this.cwd = options.cwd ?? process.cwd();
  }

  formatMatches(matches: readonly Match[]): string {
    return JSON.stringify(matches.map((m) => this.transformMatch(m)), null, 2);
  }

  private transformMatch(match: Match): JsonMatch {
    const bindings: Record<string, string> = {};
    for (const [name, value] of match.bindings) {
      bindings[name] = renderSingleLine(value, match.sourceFile);
    }
    return {
      file: displayPath(match.position.file, this.cwd, this.relativePaths),
      line: match.position.line,
      column: match.position.column,
      text: renderSingleLine(match.node, match.sourceFile),
      bindings,
    };
  }
}
