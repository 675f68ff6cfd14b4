/**
 * Match result types and per-attempt binding state.
 */
import type { ts } from 'ts-morph';
import type { NodeSequence } from './sequence.js';

/** What a named wildcard is bound to. Any-count wildcards bind sequences. */
export type Binding = ts.Node | NodeSequence;

/**
 * Wildcard bindings of one match attempt.
 *
 * Bindings are only ever added. A branch that may fail works on a fork() and
 * is either adopted as a whole or dropped; nothing is rolled back entry by entry.
 */
export class MatchState {
  private values: Map<string, Binding>;

  constructor(values?: ReadonlyMap<string, Binding>) {
    this.values = new Map(values);
  }

  get(name: string): Binding | undefined {
    return this.values.get(name);
  }

  bind(name: string, value: Binding): void {
    if (this.values.has(name)) {
      throw new Error(`wildcard "${name}" is already bound`);
    }
    this.values.set(name, value);
  }

  fork(): MatchState {
    return new MatchState(this.values);
  }

  /** Take over every binding of a successful fork. */
  adopt(branch: MatchState): void {
    this.values = branch.values;
  }

  get size(): number {
    return this.values.size;
  }

  entries(): ReadonlyMap<string, Binding> {
    return this.values;
  }
}

export interface MatchPosition {
  file: string;
  /** 1-based */
  line: number;
  /** 1-based, in UTF-16 code units */
  column: number;
  offset: number;
}

/**
 * One matching subtree (or sibling sequence) of a corpus tree.
 */
export interface Match {
  node: Binding;
  sourceFile: ts.SourceFile;
  position: MatchPosition;
  bindings: ReadonlyMap<string, Binding>;
}
