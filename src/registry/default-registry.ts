/**
 * Process-wide registry holding the built-in catalogue.
 */

import { createLogger } from '../shared/logger.js';
import { registerBuiltinCategories } from './builtin.js';
import { PatternRegistry } from './pattern-registry.js';

const logger = createLogger('registry');

let registryInstance: PatternRegistry | null = null;

/**
 * Get or create the shared registry. Built on first use, then sealed.
 */
export function getDefaultRegistry(): PatternRegistry {
  if (registryInstance !== null) {
    return registryInstance;
  }

  const registry = new PatternRegistry();
  const count = registerBuiltinCategories(registry);
  registry.seal();

  logger.debug({ count }, 'Built-in categories registered');

  registryInstance = registry;
  return registryInstance;
}

/**
 * A fresh, unsealed registry pre-loaded with the built-in catalogue, for
 * callers that add categories of their own.
 */
export function createRegistry(): PatternRegistry {
  const registry = new PatternRegistry();
  registerBuiltinCategories(registry);
  return registry;
}
