/**
 * Pattern Combinators
 *
 * Pure constructors for grammar nodes and their compilation to host regex
 * sources. Every node is frozen on creation; composites only take nodes that
 * already exist, so a pattern graph is acyclic by construction.
 *
 * Compiled sources never contain capturing groups. Numbered backreferences in
 * a caller's custom pattern therefore keep their meaning when it is unioned
 * with built-in categories.
 */

import {
  PatternError,
  PatternErrorCode,
  type AtomicPattern,
  type Pattern,
  type RepetitionPattern,
  type SequencePattern,
  type UnionPattern,
} from './types.js';

// ═══════════════════════════════════════════════════════════════
// ATOMIC CONSTRUCTORS
// ═══════════════════════════════════════════════════════════════

/** Wraps a raw host regex fragment. The fragment must not capture. */
export function atomic(source: string): AtomicPattern {
  if (source.length === 0) {
    throw new PatternError(PatternErrorCode.INVALID_COMBINATOR, 'Atomic pattern source must not be empty.');
  }
  return Object.freeze({ kind: 'atomic', source: asUnit(source), zeroWidth: false });
}

/** Matches `text` exactly. */
export function literal(text: string): AtomicPattern {
  return atomic(escapeRegex(text));
}

/** Matches one character from a bracket expression body, e.g. `0-9A-Fa-f`. */
export function charClass(body: string): AtomicPattern {
  return atomic(`[${body}]`);
}

/** Matches `text` ignoring ASCII letter case. */
export function caseless(text: string): AtomicPattern {
  let source = '';
  for (const ch of text) {
    const lower = ch.toLowerCase();
    const upper = ch.toUpperCase();
    source += lower !== upper ? `[${upper}${lower}]` : escapeRegex(ch);
  }
  return atomic(source);
}

/** Zero-width: the previous character is not in `charClassBody`. Start of input passes. */
export function notPrecededBy(charClassBody: string): AtomicPattern {
  return assertion(`(?<![${charClassBody}])`);
}

/** Zero-width: the text ahead does not match `source`. End of input passes. */
export function notFollowedBy(source: string): AtomicPattern {
  return assertion(`(?!${source})`);
}

/** Zero-width: the text ahead matches `source`. */
export function followedBy(source: string): AtomicPattern {
  return assertion(`(?=${source})`);
}

function assertion(source: string): AtomicPattern {
  return Object.freeze({ kind: 'atomic', source, zeroWidth: true });
}

// ═══════════════════════════════════════════════════════════════
// COMPOSITES
// ═══════════════════════════════════════════════════════════════

/** Alternation. Members keep their order; it is the tie-break order. */
export function union(...members: Pattern[]): UnionPattern {
  if (members.length === 0) {
    throw new PatternError(PatternErrorCode.INVALID_COMBINATOR, 'union() needs at least one member.');
  }
  return Object.freeze({ kind: 'union', members: Object.freeze([...members]) });
}

/** Concatenation. */
export function sequence(...parts: Pattern[]): SequencePattern {
  if (parts.length === 0) {
    throw new PatternError(PatternErrorCode.INVALID_COMBINATOR, 'sequence() needs at least one part.');
  }
  return Object.freeze({ kind: 'sequence', parts: Object.freeze([...parts]) });
}

export interface RepeatOptions {
  /** Lazy repetition stops at the shortest run that lets the rest match. Default: true */
  greedy?: boolean;
}

/** Bounded repetition; `max` of null means unbounded. */
export function repeat(pattern: Pattern, min: number, max: number | null, options: RepeatOptions = {}): RepetitionPattern {
  if (!Number.isInteger(min) || min < 0) {
    throw new PatternError(PatternErrorCode.INVALID_COMBINATOR, `Invalid repetition minimum: ${min}`, { min, max });
  }
  if (max !== null && (!Number.isInteger(max) || max < min || max === 0)) {
    throw new PatternError(PatternErrorCode.INVALID_COMBINATOR, `Invalid repetition bounds: {${min},${max}}`, { min, max });
  }
  if (pattern.kind === 'atomic' && pattern.zeroWidth) {
    throw new PatternError(PatternErrorCode.INVALID_COMBINATOR, 'Zero-width assertions cannot be repeated.');
  }
  return Object.freeze({ kind: 'repetition', pattern, min, max, greedy: options.greedy ?? true });
}

export function optional(pattern: Pattern): RepetitionPattern {
  return repeat(pattern, 0, 1);
}

export function oneOrMore(pattern: Pattern, options?: RepeatOptions): RepetitionPattern {
  return repeat(pattern, 1, null, options);
}

export function zeroOrMore(pattern: Pattern, options?: RepeatOptions): RepetitionPattern {
  return repeat(pattern, 0, null, options);
}

/**
 * Surrounds a pattern with boundary assertions: no character of `before`
 * immediately precedes the match, and the text after it does not start with
 * `after` (a regex source).
 */
export function isolated(pattern: Pattern, boundary: { before?: string; after?: string }): SequencePattern {
  const parts: Pattern[] = [];
  if (boundary.before !== undefined) parts.push(notPrecededBy(boundary.before));
  parts.push(pattern);
  if (boundary.after !== undefined) parts.push(notFollowedBy(boundary.after));
  return sequence(...parts);
}

/** Returns a frozen copy of `pattern` carrying `name`. Children are shared. */
export function named(pattern: Pattern, name: string): Pattern {
  return Object.freeze({ ...pattern, name });
}

// ═══════════════════════════════════════════════════════════════
// COMPILATION
// ═══════════════════════════════════════════════════════════════

const sourceCache = new WeakMap<Pattern, string>();

/** Compiles a pattern to a host regex source (no flags, no anchors). */
export function toSource(pattern: Pattern): string {
  const cached = sourceCache.get(pattern);
  if (cached !== undefined) return cached;

  let source: string;
  switch (pattern.kind) {
    case 'atomic':
      source = pattern.source;
      break;
    case 'union':
      source = pattern.members.length === 1
        ? toSource(pattern.members[0])
        : `(?:${pattern.members.map(toSource).join('|')})`;
      break;
    case 'sequence':
      source = pattern.parts.map(toSource).join('');
      break;
    case 'repetition':
      source = asUnit(toSource(pattern.pattern)) + quantifier(pattern);
      break;
  }

  sourceCache.set(pattern, source);
  return source;
}

/**
 * Flattens nested unions into their leaves, in order. Each leaf is matched
 * on its own so the engine can pick the longest one.
 */
export function alternativesOf(pattern: Pattern): Pattern[] {
  if (pattern.kind !== 'union') return [pattern];
  return pattern.members.flatMap(alternativesOf);
}

/** True when the pattern accepts the empty string. */
export function canMatchEmpty(pattern: Pattern): boolean {
  switch (pattern.kind) {
    case 'atomic':
      return pattern.zeroWidth || sourceCanMatchEmpty(pattern.source);
    case 'union':
      return pattern.members.some(canMatchEmpty);
    case 'sequence':
      return pattern.parts.every(canMatchEmpty);
    case 'repetition':
      return pattern.min === 0 || canMatchEmpty(pattern.pattern);
  }
}

/**
 * True when a raw regex source can match empty text. Assertions are removed
 * before a second check, since `\b` or `(?=x)` only fail on `""` for lack of
 * surrounding text.
 */
export function sourceCanMatchEmpty(source: string): boolean {
  if (new RegExp(`^(?:${source})$`).test('')) return true;
  try {
    return new RegExp(`^(?:${withoutAssertions(source)})$`).test('');
  } catch {
    // Removing an assertion left a bare quantifier.
    return true;
  }
}

const LOOKAROUND_OPEN = /^\(\?<?[=!]/;

/** `source` with `\b`, `\B`, `^`, `$` and lookaround groups removed. Classes are kept as is. */
function withoutAssertions(source: string): string {
  let out = '';
  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (ch === '\\') {
      const next = source.charAt(i + 1);
      if (next !== 'b' && next !== 'B') out += ch + next;
      i++;
    } else if (ch === '[') {
      const end = closingIndex(source, i, '[', ']');
      if (end === -1) return source;
      out += source.slice(i, end + 1);
      i = end;
    } else if (ch === '(' && LOOKAROUND_OPEN.test(source.slice(i, i + 4))) {
      const end = closingIndex(source, i, '(', ')');
      if (end === -1) return source;
      i = end;
    } else if (ch !== '^' && ch !== '$') {
      out += ch;
    }
  }
  return out;
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
}

function quantifier(pattern: RepetitionPattern): string {
  const { min, max } = pattern;
  let q: string;
  if (min === 0 && max === 1) q = '?';
  else if (min === 0 && max === null) q = '*';
  else if (min === 1 && max === null) q = '+';
  else if (max === null) q = `{${min},}`;
  else if (min === max) q = `{${min}}`;
  else q = `{${min},${max}}`;
  return pattern.greedy ? q : `${q}?`;
}

/** Groups a source unless it is already a single quantifiable unit. */
function asUnit(source: string): string {
  return isSingleUnit(source) ? source : `(?:${source})`;
}

function isSingleUnit(source: string): boolean {
  const first = source[0];
  if (source.length === 1) return !'|()[]{}*+?^$.'.includes(source) || source === '.';
  if (first === '\\') return source.length === 2;
  if (first === '[') return closingIndex(source, 0, '[', ']') === source.length - 1;
  if (first === '(') return closingIndex(source, 0, '(', ')') === source.length - 1;
  return false;
}

/** Index of the bracket closing the one at `start`, honouring escapes and classes. */
function closingIndex(source: string, start: number, open: string, close: string): number {
  let depth = 0;
  let inClass = false;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\') {
      i++;
      continue;
    }
    if (open === '[') {
      if (ch === ']') return i;
      continue;
    }
    if (inClass) {
      if (ch === ']') inClass = false;
      continue;
    }
    if (ch === '[') inClass = true;
    else if (ch === open) depth++;
    else if (ch === close && --depth === 0) return i;
  }
  return -1;
}
