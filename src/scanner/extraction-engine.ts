/**
 * Extraction Engine
 *
 * Leftmost-longest, non-overlapping extraction over a compiled selection.
 *
 * The prefilter finds the leftmost position where any alternative can start.
 * Every alternative is then tried there on its own; the longest non-empty
 * match wins and equal lengths go to the earliest alternative. After a match
 * the scan resumes at its end, otherwise one position further.
 *
 * Offsets are UTF-16 code unit indexes into the decoded input.
 */

import { PatternError, PatternErrorCode } from '../patterns/types.js';
import { DEFAULT_ENGINE_CONFIG } from '../shared/config.js';
import { createLogger } from '../shared/logger.js';
import type { CompiledSelection } from './selection.js';

const logger = createLogger('engine');

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

/** One extracted occurrence; the range is half-open. */
export interface Match {
  readonly startOffset: number;
  readonly endOffset: number;
  readonly matchedText: string;
  readonly patternName: string;
}

export interface StreamOptions {
  /**
   * Look-ahead buffered before a position is decided. Matches longer than
   * this may be cut short at chunk boundaries. Default: 16384
   */
  maxMatchLength?: number;
  /** Characters kept behind the cursor for boundary assertions. Default: 256 */
  lookbehindLength?: number;
  /**
   * Characters that must follow a match before it is emitted, so trailing
   * assertions see real text. Default: 16
   */
  lookaheadLength?: number;
}

/** Source chunks; bytes are decoded as UTF-8. */
export type ChunkSource = AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

interface LocalMatch {
  start: number;
  end: number;
  patternName: string;
}

// ═══════════════════════════════════════════════════════════════
// MATCHING PRIMITIVES
// ═══════════════════════════════════════════════════════════════

/** Leftmost position at or after `from` where some alternative can start, or -1. */
function nextCandidate(selection: CompiledSelection, text: string, from: number): number {
  const { prefilter } = selection;
  prefilter.lastIndex = from;
  const found = prefilter.exec(text);
  return found === null ? -1 : found.index;
}

/** Longest non-empty match starting exactly at `position`. */
function longestAt(selection: CompiledSelection, text: string, position: number): LocalMatch | null {
  let best: LocalMatch | null = null;

  for (const { regex, patternName } of selection.alternatives) {
    regex.lastIndex = position;
    const found = regex.exec(text);
    if (found === null) continue;

    const end = position + found[0].length;
    if (end > position && (best === null || end > best.end)) {
      best = { start: position, end, patternName };
    }
  }

  return best;
}

// ═══════════════════════════════════════════════════════════════
// WHOLE-TEXT EXTRACTION
// ═══════════════════════════════════════════════════════════════

/**
 * Lazily yields every match in `text`, in order.
 */
export function* extract(text: string, selection: CompiledSelection): Generator<Match> {
  let cursor = 0;

  while (cursor < text.length) {
    const position = nextCandidate(selection, text, cursor);
    if (position === -1) return;

    const found = longestAt(selection, text, position);
    if (found === null) {
      cursor = position + 1;
      continue;
    }

    yield {
      startOffset: found.start,
      endOffset: found.end,
      matchedText: text.slice(found.start, found.end),
      patternName: found.patternName,
    };
    cursor = found.end;
  }
}

// ═══════════════════════════════════════════════════════════════
// STREAMING EXTRACTION
// ═══════════════════════════════════════════════════════════════

/**
 * Incremental scanner over text arriving in pieces.
 *
 * A position is decided once `maxMatchLength + lookaheadLength` characters
 * after it are buffered, or when the input has ended. Text behind the cursor is dropped
 * except for `lookbehindLength` characters of context.
 */
export class MatchCursor {
  private readonly maxMatchLength: number;
  private readonly lookbehindLength: number;
  private readonly lookaheadLength: number;

  private buffer = '';
  /** Input offset of `buffer[0]`. */
  private base = 0;
  /** Input offset of the first undecided position. */
  private cursor = 0;
  private ended = false;
  private emitted = 0;

  constructor(private readonly selection: CompiledSelection, options: StreamOptions = {}) {
    this.maxMatchLength = positiveInteger('maxMatchLength', options.maxMatchLength ?? DEFAULT_ENGINE_CONFIG.maxMatchLength);
    this.lookbehindLength = positiveInteger('lookbehindLength', options.lookbehindLength ?? DEFAULT_ENGINE_CONFIG.lookbehindLength);
    this.lookaheadLength = positiveInteger('lookaheadLength', options.lookaheadLength ?? DEFAULT_ENGINE_CONFIG.lookaheadLength);
  }

  /** Appends text and returns every match that can now be decided. */
  push(text: string): Match[] {
    if (this.ended) {
      throw new PatternError(PatternErrorCode.INVALID_OPTION, 'Cannot push to a cursor after end().');
    }
    this.buffer += text;
    const matches = this.drain();
    this.compact();
    return matches;
  }

  /** Marks the input complete and returns the remaining matches. */
  end(): Match[] {
    if (this.ended) return [];
    this.ended = true;
    const matches = this.drain();
    this.base += this.buffer.length;
    this.buffer = '';
    logger.debug({ inputLength: this.base, matches: this.emitted }, 'Stream finished');
    return matches;
  }

  /** Total characters consumed so far. */
  get inputLength(): number {
    return this.base + this.buffer.length;
  }

  private drain(): Match[] {
    const matches: Match[] = [];
    const { buffer } = this;
    const horizon = this.ended ? buffer.length - 1 : buffer.length - this.maxMatchLength - this.lookaheadLength;

    while (this.cursor - this.base <= horizon) {
      const local = this.cursor - this.base;
      const position = nextCandidate(this.selection, buffer, local);

      if (position === -1 || position > horizon) {
        this.cursor = this.base + horizon + 1;
        break;
      }

      const found = longestAt(this.selection, buffer, position);
      if (found === null) {
        this.cursor = this.base + position + 1;
        continue;
      }

      // The match may continue, or its trailing assertions fail, in text not yet received.
      const pending = found.end + this.lookaheadLength > buffer.length;
      if (!this.ended && pending && found.end - position < 4 * this.maxMatchLength) {
        this.cursor = this.base + position;
        break;
      }

      matches.push({
        startOffset: this.base + found.start,
        endOffset: this.base + found.end,
        matchedText: buffer.slice(found.start, found.end),
        patternName: found.patternName,
      });
      this.cursor = this.base + found.end;
    }

    this.emitted += matches.length;
    return matches;
  }

  private compact(): void {
    const drop = this.cursor - this.base - this.lookbehindLength;
    if (drop <= this.lookbehindLength) return;

    this.buffer = this.buffer.slice(drop);
    this.base += drop;
  }
}

/**
 * Lazily yields every match in a chunked source. Stream errors propagate;
 * leaving the loop early releases the source.
 */
export async function* extractStream(
  source: ChunkSource,
  selection: CompiledSelection,
  options: StreamOptions = {}
): AsyncGenerator<Match> {
  const cursor = new MatchCursor(selection, options);
  const decoder = new TextDecoder('utf-8');

  for await (const chunk of source) {
    const text = typeof chunk === 'string'
      ? decoder.decode() + chunk
      : decoder.decode(chunk, { stream: true });
    yield* cursor.push(text);
  }

  const tail = decoder.decode();
  if (tail.length > 0) yield* cursor.push(tail);
  yield* cursor.end();
}

function positiveInteger(option: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new PatternError(PatternErrorCode.INVALID_OPTION, `${option} must be a positive integer, got ${value}.`, { option, value });
  }
  return value;
}
