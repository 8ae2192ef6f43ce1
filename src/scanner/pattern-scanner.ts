/**
 * PatternScanner - extraction facade over a pattern registry.
 *
 * Compiles selections against the registry and runs the extraction engine
 * over strings or chunked streams. `scan()` collects a summary with context
 * snippets; `scanText()` and `scanStream()` stay lazy.
 */

import { randomUUID } from 'crypto';
import { getDefaultRegistry } from '../registry/default-registry.js';
import { CUSTOM_PATTERN_NAME, type PatternRegistry } from '../registry/pattern-registry.js';
import type { CategoryGroup, PatternDefinition } from '../registry/types.js';
import { loadEngineDefaults } from '../shared/config.js';
import { createLogger, type Logger } from '../shared/logger.js';
import { extract, extractStream, type ChunkSource, type Match } from './extraction-engine.js';
import { resolveSelection, type CompiledSelection, type Selection } from './selection.js';

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

/** Configuration for the PatternScanner. */
export interface ScannerConfig {
  /** Category source. Default: the shared built-in registry */
  registry?: PatternRegistry;
  /** Stream look-ahead. Default: 16384, or PATTERNSIFT_MAX_MATCH_LENGTH */
  maxMatchLength?: number;
  /** Context kept behind the stream cursor. Default: 256 */
  lookbehindLength?: number;
  /** Text required past a streamed match before it is emitted. Default: 16 */
  lookaheadLength?: number;
  /** Context snippet size (chars before/after match). Default: 30, or PATTERNSIFT_CONTEXT_SIZE */
  contextSize?: number;
  logger?: Logger;
}

/** A match with its category details and surrounding text. */
export interface Finding extends Match {
  /** Unique finding identifier. */
  id: string;
  displayName: string;
  group: CategoryGroup | typeof CUSTOM_PATTERN_NAME;
  /** Context snippet, match in brackets. */
  context: string;
}

/** Result of a scan operation. */
export interface ScanResult {
  /** Unique scan identifier. */
  scanId: string;
  /** ISO timestamp when scan was performed. */
  scannedAt: string;
  /** Length of input text in characters. */
  inputLength: number;
  /** Scan duration in milliseconds. */
  durationMs: number;
  findings: Finding[];
  findingCount: number;
  /** Findings per category name. */
  categoryCounts: Record<string, number>;
  verdict: 'clean' | 'matched';
}

/** A selection as given by the caller, or one already compiled. */
export type SelectionInput = Selection | CompiledSelection;

// ═══════════════════════════════════════════════════════════════
// PATTERN SCANNER
// ═══════════════════════════════════════════════════════════════

export class PatternScanner {
  private readonly config: Required<Omit<ScannerConfig, 'registry' | 'logger'>>;
  private readonly registry: PatternRegistry;
  private readonly logger: Logger;

  /**
   * Creates a new PatternScanner instance.
   * @param config - Scanner configuration
   */
  constructor(config: ScannerConfig = {}) {
    const defaults = loadEngineDefaults();
    this.config = {
      maxMatchLength: config.maxMatchLength ?? defaults.maxMatchLength,
      lookbehindLength: config.lookbehindLength ?? defaults.lookbehindLength,
      lookaheadLength: config.lookaheadLength ?? defaults.lookaheadLength,
      contextSize: config.contextSize ?? defaults.contextSize,
    };
    this.registry = config.registry ?? getDefaultRegistry();
    this.logger = config.logger ?? createLogger('scanner');
  }

  /** Category names in registration (tie-break) order. */
  listCategories(): string[] {
    return this.registry.listCategories();
  }

  /**
   * @throws UnknownPatternError if `name` is not registered
   */
  describe(name: string): PatternDefinition {
    return this.registry.resolve(name);
  }

  /**
   * Resolves and compiles a selection once, for reuse across scans.
   * @throws UnknownPatternError for unknown names or a malformed custom pattern
   */
  compile(selection: Selection = {}): CompiledSelection {
    const compiled = resolveSelection(this.registry, selection);
    this.logger.debug(
      { categories: compiled.categories, custom: compiled.customPattern !== null },
      'Compiled selection'
    );
    return compiled;
  }

  /** Lazily extracts matches from a string. */
  scanText(text: string, selection: SelectionInput = {}): Generator<Match> {
    return extract(text, this.compiled(selection));
  }

  /** Lazily extracts matches from chunks of text or UTF-8 bytes. */
  scanStream(source: ChunkSource, selection: SelectionInput = {}): AsyncGenerator<Match> {
    return extractStream(source, this.compiled(selection), {
      maxMatchLength: this.config.maxMatchLength,
      lookbehindLength: this.config.lookbehindLength,
      lookaheadLength: this.config.lookaheadLength,
    });
  }

  /**
   * Scans text and summarises the findings.
   * @param text - Text content to scan
   * @param selection - Categories to look for (default: all)
   * @returns Scan result with findings in input order
   */
  scan(text: string, selection: SelectionInput = {}): ScanResult {
    const compiled = this.compiled(selection);
    const scanId = randomUUID();
    const startTime = performance.now();

    const findings: Finding[] = [];
    const categoryCounts: Record<string, number> = {};

    for (const match of extract(text, compiled)) {
      findings.push(this.toFinding(text, match));
      categoryCounts[match.patternName] = (categoryCounts[match.patternName] ?? 0) + 1;
    }

    const durationMs = performance.now() - startTime;
    this.logger.debug({ scanId, inputLength: text.length, findingCount: findings.length, durationMs }, 'Scan complete');

    return {
      scanId,
      scannedAt: new Date().toISOString(),
      inputLength: text.length,
      durationMs,
      findings,
      findingCount: findings.length,
      categoryCounts,
      verdict: findings.length > 0 ? 'matched' : 'clean',
    };
  }

  /**
   * Scans multiple text contents with one compiled selection.
   * @param texts - Array of text contents to scan
   * @param selection - Categories to look for (default: all)
   * @returns Array of scan results
   */
  scanMultiple(texts: string[], selection: SelectionInput = {}): ScanResult[] {
    const compiled = this.compiled(selection);
    return texts.map(text => this.scan(text, compiled));
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private compiled(selection: SelectionInput): CompiledSelection {
    return 'prefilter' in selection ? selection : this.compile(selection);
  }

  private toFinding(text: string, match: Match): Finding {
    const definition = this.registry.get(match.patternName);
    return {
      ...match,
      id: randomUUID(),
      displayName: definition?.displayName ?? 'custom pattern',
      group: definition?.group ?? CUSTOM_PATTERN_NAME,
      context: this.extractContext(text, match.startOffset, match.endOffset),
    };
  }

  /** Extracts context snippet around a match. */
  private extractContext(text: string, start: number, end: number): string {
    const ctxSize = this.config.contextSize;
    const before = text.slice(Math.max(0, start - ctxSize), start);
    const matched = text.slice(start, end);
    const after = text.slice(end, Math.min(text.length, end + ctxSize));

    const prefix = start > ctxSize ? '...' : '';
    const suffix = end + ctxSize < text.length ? '...' : '';

    return `${prefix}${before}[${matched}]${after}${suffix}`;
  }
}

export default PatternScanner;
