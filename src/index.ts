/**
 * patternsift - Main Entry Point
 *
 * Exports all public APIs: combinators, the category registry, selection,
 * the extraction engine and the scanner facade.
 */

// Patterns Module
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
  PatternError,
  PatternErrorCode,
  DuplicateNameError,
  UnknownPatternError,
} from './patterns/index.js';
export type {
  Pattern,
  PatternKind,
  AtomicPattern,
  UnionPattern,
  SequencePattern,
  RepetitionPattern,
  RepeatOptions,
} from './patterns/index.js';

// Registry Module
export {
  PatternRegistry,
  CUSTOM_PATTERN_NAME,
  getDefaultRegistry,
  createRegistry,
  BUILTIN_CATEGORIES,
  registerBuiltinCategories,
} from './registry/index.js';
export type {
  CategoryGroup,
  PatternDefinition,
  RegisterOptions,
  DefinitionQueryFilter,
} from './registry/index.js';

// Scanner Module
export { PatternScanner, resolveSelection, extract, extractStream, MatchCursor } from './scanner/index.js';
export type {
  ScannerConfig,
  Finding,
  ScanResult,
  SelectionInput,
  Selection,
  CompiledSelection,
  Alternative,
  Match,
  StreamOptions,
  ChunkSource,
} from './scanner/index.js';

// Shared
export { createLogger, setLogLevel, getLogLevel } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
export { DEFAULT_ENGINE_CONFIG, loadEngineDefaults } from './shared/config.js';
export type { EngineDefaults } from './shared/config.js';

export const VERSION = '0.1.0';
