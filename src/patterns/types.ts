/**
 * Pattern Module Types
 *
 * Grammar nodes built by the combinators, plus the error taxonomy shared by
 * the registry, the selection layer and the engine.
 */

// ═══════════════════════════════════════════════════════════════
// GRAMMAR NODES
// ═══════════════════════════════════════════════════════════════

export type PatternKind = 'atomic' | 'union' | 'sequence' | 'repetition';

interface PatternBase {
  readonly kind: PatternKind;
  /** Set once the pattern is registered as a category. */
  readonly name?: string;
}

/** A host regex fragment: a character class, a literal, or a zero-width assertion. */
export interface AtomicPattern extends PatternBase {
  readonly kind: 'atomic';
  readonly source: string;
  /** True for lookaround assertions that consume no input. */
  readonly zeroWidth: boolean;
}

export interface UnionPattern extends PatternBase {
  readonly kind: 'union';
  readonly members: readonly Pattern[];
}

export interface SequencePattern extends PatternBase {
  readonly kind: 'sequence';
  readonly parts: readonly Pattern[];
}

export interface RepetitionPattern extends PatternBase {
  readonly kind: 'repetition';
  readonly pattern: Pattern;
  readonly min: number;
  /** null = unbounded. */
  readonly max: number | null;
  readonly greedy: boolean;
}

export type Pattern = AtomicPattern | UnionPattern | SequencePattern | RepetitionPattern;

// ═══════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════

export enum PatternErrorCode {
  INVALID_COMBINATOR = 'PAT_INVALID_COMBINATOR',
  INVALID_NAME = 'PAT_INVALID_NAME',
  EMPTY_MATCH = 'PAT_EMPTY_MATCH',
  DUPLICATE_NAME = 'PAT_DUPLICATE_NAME',
  UNKNOWN_PATTERN = 'PAT_UNKNOWN_PATTERN',
  MALFORMED_CUSTOM_PATTERN = 'PAT_MALFORMED_CUSTOM_PATTERN',
  REGISTRY_SEALED = 'PAT_REGISTRY_SEALED',
  INVALID_OPTION = 'PAT_INVALID_OPTION',
}

/** Base error class for all pattern, registry and selection failures. */
export class PatternError extends Error {
  public readonly code: PatternErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: PatternErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PatternError';
    this.code = code;
    this.details = details;
  }
}

/** A category name was registered twice. Raised while building a registry. */
export class DuplicateNameError extends PatternError {
  public readonly patternName: string;

  constructor(patternName: string) {
    super(PatternErrorCode.DUPLICATE_NAME, `Pattern "${patternName}" is already registered.`, { patternName });
    this.name = 'DuplicateNameError';
    this.patternName = patternName;
  }
}

/**
 * The caller asked for a category that does not exist, or supplied a custom
 * pattern the host engine cannot compile.
 */
export class UnknownPatternError extends PatternError {
  public readonly patternName: string;
  public readonly suggestions: readonly string[];

  constructor(
    patternName: string,
    options: { suggestions?: readonly string[]; reason?: string; code?: PatternErrorCode } = {}
  ) {
    const suggestions = options.suggestions ?? [];
    const hint = suggestions.length > 0 ? ` Did you mean: ${suggestions.join(', ')}?` : '';
    const message = options.reason
      ? `Invalid pattern "${patternName}": ${options.reason}`
      : `Unknown pattern "${patternName}".${hint}`;

    super(options.code ?? PatternErrorCode.UNKNOWN_PATTERN, message, { patternName, suggestions });
    this.name = 'UnknownPatternError';
    this.patternName = patternName;
    this.suggestions = suggestions;
  }
}
