/**
 * Registry Module - Public API
 */

export { PatternRegistry, CUSTOM_PATTERN_NAME, default } from './pattern-registry.js';
export { getDefaultRegistry, createRegistry } from './default-registry.js';
export { BUILTIN_CATEGORIES, registerBuiltinCategories } from './builtin.js';
export type { CategoryGroup, PatternDefinition, RegisterOptions, DefinitionQueryFilter } from './types.js';
