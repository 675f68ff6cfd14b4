/**
 * Matcher barrel export.
 */
export { NodeSequence, sequenceKindOf, isSearchable, childSlots } from './sequence.js';
export type { SequenceKind, ChildSlot } from './sequence.js';
export { MatchState } from './types.js';
export type { Binding, Match, MatchPosition } from './types.js';
export { Unifier } from './unify.js';
export { search, positionOf } from './search.js';
