/**
 * Registry Module Types
 */

import type { Pattern } from '../patterns/types.js';

/** Coarse grouping used for help output and filtering. */
export type CategoryGroup =
  | 'numeric'
  | 'network'
  | 'personal'
  | 'financial'
  | 'crypto'
  | 'filesystem'
  | 'source'
  | 'encoding';

export interface PatternDefinition {
  /** Unique kebab-case category name. */
  readonly name: string;
  /** The registered pattern; its `name` equals the category name. */
  readonly pattern: Pattern;
  readonly displayName: string;
  readonly group: CategoryGroup;
  readonly description: string;
  /** Registration position. Lower wins equal-length ties. */
  readonly index: number;
}

export interface RegisterOptions {
  group: CategoryGroup;
  /** Defaults to the name with dashes replaced by spaces. */
  displayName?: string;
  description?: string;
}

export interface DefinitionQueryFilter {
  group?: CategoryGroup;
}
