/**
 * Position bookkeeping for synthesized pattern text.
 *
 * Wildcards are rewritten into shorter or longer identifiers before parsing, so
 * parser diagnostics point into text the user never wrote. Each substitution
 * records a PosOffset; correctOffset() walks them to get back to the original.
 */
import type { PatternPosition } from '../../utils/errors.js';

/**
 * A correction applied to every synthesized offset at or after `atOffset`.
 * `length` is the synthesized length minus the original length.
 */
export interface PosOffset {
  atLine: number;
  atCol: number;
  atOffset: number;
  length: number;
}

/**
 * Builds synthesized text while tracking line, column and offset.
 */
export class PositionTracker {
  private chunks: string[] = [];
  private readonly recorded: PosOffset[] = [];
  private line = 1;
  private col = 1;
  private offs = 0;

  write(text: string): void {
    for (const ch of text) {
      if (ch === '\n') {
        this.line++;
        this.col = 1;
      } else {
        this.col += ch.length;
      }
    }
    this.offs += text.length;
    this.chunks.push(text);
  }

  /**
   * Write `replacement` in place of `original`, recording the length change.
   */
  substitute(original: string, replacement: string): void {
    this.write(replacement);
    const length = replacement.length - original.length;
    if (length !== 0) {
      this.recorded.push({
        atLine: this.line,
        atCol: this.col,
        atOffset: this.offs,
        length,
      });
    }
  }

  get text(): string {
    return this.chunks.join('');
  }

  get offsets(): readonly PosOffset[] {
    return this.recorded;
  }
}

/**
 * Map an offset in synthesized text back to the original text.
 */
export function correctOffset(offset: number, offsets: readonly PosOffset[]): number {
  let corrected = offset;
  for (const o of offsets) {
    if (o.atOffset <= offset) {
      corrected -= o.length;
    }
  }
  return Math.max(0, corrected);
}

/**
 * Line and column (both 1-based) of an offset in `text`.
 * Offsets past the end are clamped to the end.
 */
export function positionAt(text: string, offset: number): PatternPosition {
  const clamped = Math.min(Math.max(0, offset), text.length);
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { offset: clamped, line, column: clamped - lineStart + 1 };
}
