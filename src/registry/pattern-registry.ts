/**
 * PatternRegistry - named categories over immutable patterns.
 *
 * Built once, then sealed. A sealed registry is read-only and can be shared
 * by any number of concurrent scans.
 */

import Fuse from 'fuse.js';
import { canMatchEmpty, named } from '../patterns/combinators.js';
import type { Pattern } from '../patterns/types.js';
import {
  DuplicateNameError,
  PatternError,
  PatternErrorCode,
  UnknownPatternError,
} from '../patterns/types.js';
import { createLogger } from '../shared/logger.js';
import type { CategoryGroup, DefinitionQueryFilter, PatternDefinition, RegisterOptions } from './types.js';

const logger = createLogger('registry');

const NAME_FORMAT = /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/;

/** Tag the selection layer gives to a caller-supplied pattern. */
export const CUSTOM_PATTERN_NAME = 'custom';

interface SearchableName {
  name: string;
  displayName: string;
}

export class PatternRegistry {
  private readonly definitions = new Map<string, PatternDefinition>();
  private sealed = false;
  private fuseIndex: Fuse<SearchableName> | null = null;

  /**
   * Adds a named category.
   * @throws DuplicateNameError if the name is taken
   * @throws PatternError if the name is malformed, the pattern accepts empty
   *   text, or the registry is sealed
   */
  register(name: string, pattern: Pattern, options: RegisterOptions): PatternDefinition {
    if (this.sealed) {
      throw new PatternError(PatternErrorCode.REGISTRY_SEALED, `Cannot register "${name}": registry is sealed.`, { name });
    }
    if (!NAME_FORMAT.test(name) || name === CUSTOM_PATTERN_NAME) {
      throw new PatternError(PatternErrorCode.INVALID_NAME, `Invalid pattern name "${name}".`, { name });
    }
    if (this.definitions.has(name)) {
      throw new DuplicateNameError(name);
    }
    if (canMatchEmpty(pattern)) {
      throw new PatternError(PatternErrorCode.EMPTY_MATCH, `Pattern "${name}" can match empty text.`, { name });
    }

    const definition: PatternDefinition = Object.freeze({
      name,
      pattern: named(pattern, name),
      displayName: options.displayName ?? name.replace(/-/g, ' '),
      group: options.group,
      description: options.description ?? '',
      index: this.definitions.size,
    });

    this.definitions.set(name, definition);
    this.fuseIndex = null;
    logger.debug({ name, group: options.group }, 'Registered pattern');
    return definition;
  }

  /**
   * Returns the definition for `name`.
   * @throws UnknownPatternError with close names as suggestions
   */
  resolve(name: string): PatternDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownPatternError(name, { suggestions: this.suggest(name) });
    }
    return definition;
  }

  get(name: string): PatternDefinition | null {
    return this.definitions.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  /** Category names in registration order. */
  listCategories(): string[] {
    return [...this.definitions.keys()];
  }

  listDefinitions(filter?: DefinitionQueryFilter): PatternDefinition[] {
    const all = [...this.definitions.values()];
    return filter?.group ? all.filter(d => d.group === filter.group) : all;
  }

  listGroups(): CategoryGroup[] {
    return [...new Set([...this.definitions.values()].map(d => d.group))];
  }

  get size(): number {
    return this.definitions.size;
  }

  /** Disallows further registration. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Fuzzy-matches registered names, for "did you mean" hints.
   * @param query - Name as typed by the caller
   * @param limit - Maximum suggestions
   */
  suggest(query: string, limit = 3): string[] {
    if (!query || this.definitions.size === 0) return [];

    if (!this.fuseIndex) {
      const docs = [...this.definitions.values()].map(d => ({ name: d.name, displayName: d.displayName }));
      this.fuseIndex = new Fuse(docs, {
        keys: ['name', 'displayName'],
        threshold: 0.4,
        ignoreLocation: true,
      });
    }

    return this.fuseIndex.search(query, { limit }).map(r => r.item.name);
  }
}

export default PatternRegistry;
