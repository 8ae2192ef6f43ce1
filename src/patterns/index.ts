/**
 * Patterns Module - Public API
 *
 * Grammar nodes, the combinators that build them, and the error taxonomy.
 */

export {
  atomic,
  literal,
  charClass,
  caseless,
  notPrecededBy,
  notFollowedBy,
  followedBy,
  union,
  sequence,
  repeat,
  optional,
  oneOrMore,
  zeroOrMore,
  isolated,
  named,
  toSource,
  alternativesOf,
  canMatchEmpty,
  sourceCanMatchEmpty,
  escapeRegex,
} from './combinators.js';
export type { RepeatOptions } from './combinators.js';

export type {
  Pattern,
  PatternKind,
  AtomicPattern,
  UnionPattern,
  SequencePattern,
  RepetitionPattern,
} from './types.js';
export { PatternError, PatternErrorCode, DuplicateNameError, UnknownPatternError } from './types.js';
