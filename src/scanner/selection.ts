/**
 * Selection Layer
 *
 * Turns a caller's choice of categories (plus an optional custom regex) into
 * one compiled, frozen selection the extraction engine can run repeatedly.
 */

import { alternativesOf, sourceCanMatchEmpty, toSource } from '../patterns/combinators.js';
import type { Pattern } from '../patterns/types.js';
import { PatternErrorCode, UnknownPatternError } from '../patterns/types.js';
import { CUSTOM_PATTERN_NAME, type PatternRegistry } from '../registry/pattern-registry.js';
import type { PatternDefinition } from '../registry/types.js';
import { createLogger } from '../shared/logger.js';

const logger = createLogger('selection');

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

export interface Selection {
  /** Category names. Order and duplicates are irrelevant. Empty = every category. */
  readonly categories?: readonly string[];
  /** Host regex source, reported under the `custom` tag. */
  readonly customPattern?: string;
}

/** One leaf of the selected union, matched on its own. */
export interface Alternative {
  /** Top-level category the leaf was selected through, or `custom`. */
  readonly patternName: string;
  /** Sticky regex; set `lastIndex` before each `exec`. */
  readonly regex: RegExp;
}

export interface CompiledSelection {
  /** Selected category names in registration order. `custom` is not listed. */
  readonly categories: readonly string[];
  readonly customPattern: string | null;
  /** In tie-break order. */
  readonly alternatives: readonly Alternative[];
  /** Global regex matching wherever any alternative can start. */
  readonly prefilter: RegExp;
}

// Never matches; used when nothing is selected.
const NOTHING = '(?!)';

// ═══════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════

/**
 * Resolves names against `registry` and compiles the selection.
 * @throws UnknownPatternError for an unknown name or an unusable custom pattern
 */
export function resolveSelection(registry: PatternRegistry, selection: Selection = {}): CompiledSelection {
  const requested = selection.categories ?? [];
  const customPattern = selection.customPattern ?? null;

  const definitions = selectDefinitions(registry, requested, customPattern !== null);

  const seen = new Set<Pattern>();
  const alternatives: Alternative[] = [];
  const sources: string[] = [];

  for (const definition of definitions) {
    for (const leaf of alternativesOf(definition.pattern)) {
      if (seen.has(leaf)) continue;
      seen.add(leaf);

      const source = toSource(leaf);
      sources.push(source);
      alternatives.push(Object.freeze({ patternName: definition.name, regex: new RegExp(source, 'y') }));
    }
  }

  if (customPattern !== null) {
    validateCustomPattern(customPattern);
    // Only the custom source can capture; listing it first keeps its group numbers.
    sources.unshift(customPattern);
    alternatives.push(Object.freeze({ patternName: CUSTOM_PATTERN_NAME, regex: new RegExp(customPattern, 'y') }));
  }

  const prefilterSource = sources.length > 0 ? sources.map(s => `(?:${s})`).join('|') : NOTHING;
  const categories = definitions.map(d => d.name);

  logger.debug({ categories, custom: customPattern !== null, alternatives: alternatives.length }, 'Selection compiled');

  return Object.freeze({
    categories: Object.freeze(categories),
    customPattern,
    alternatives: Object.freeze(alternatives),
    prefilter: new RegExp(prefilterSource, 'g'),
  });
}

function selectDefinitions(registry: PatternRegistry, requested: readonly string[], hasCustom: boolean): PatternDefinition[] {
  if (requested.length === 0) {
    return hasCustom ? [] : registry.listDefinitions();
  }

  const unique = new Map<string, PatternDefinition>();
  for (const name of requested) {
    if (!unique.has(name)) unique.set(name, registry.resolve(name));
  }
  return [...unique.values()].sort((a, b) => a.index - b.index);
}

/**
 * @throws UnknownPatternError (MALFORMED_CUSTOM_PATTERN) on a syntax error
 *   or a pattern that accepts empty text, assertions aside
 */
function validateCustomPattern(source: string): void {
  let emptyMatch: boolean;
  try {
    new RegExp(source);
    emptyMatch = sourceCanMatchEmpty(source);
  } catch (error) {
    throw new UnknownPatternError(source, {
      reason: error instanceof Error ? error.message : String(error),
      code: PatternErrorCode.MALFORMED_CUSTOM_PATTERN,
    });
  }

  if (emptyMatch) {
    throw new UnknownPatternError(source, {
      reason: 'pattern matches empty text',
      code: PatternErrorCode.MALFORMED_CUSTOM_PATTERN,
    });
  }
}
