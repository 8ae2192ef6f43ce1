/**
 * Engine configuration defaults, overridable from the environment.
 *
 * Environment variables:
 *   PATTERNSIFT_MAX_MATCH_LENGTH  - longest match the stream scanner guarantees to find (default: 16384)
 *   PATTERNSIFT_CONTEXT_SIZE      - context snippet size around findings (default: 30)
 *   LOG_LEVEL                     - logging level (debug, info, warn, error)
 */

import { createLogger } from './logger.js';

const logger = createLogger('config');

export interface EngineDefaults {
  /** Look-ahead the stream scanner buffers before deciding a position. */
  maxMatchLength: number;
  /** Characters kept before the cursor for boundary assertions. */
  lookbehindLength: number;
  /** Characters past a match end buffered before it is emitted. */
  lookaheadLength: number;
  /** Context snippet size (chars before/after a finding). */
  contextSize: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineDefaults = {
  maxMatchLength: 16 * 1024,
  lookbehindLength: 256,
  lookaheadLength: 16,
  contextSize: 30,
};

/**
 * Resolve defaults from the environment. Invalid values are logged and ignored.
 */
export function loadEngineDefaults(env: NodeJS.ProcessEnv = process.env): EngineDefaults {
  return {
    maxMatchLength: readPositiveInt(env, 'PATTERNSIFT_MAX_MATCH_LENGTH', DEFAULT_ENGINE_CONFIG.maxMatchLength),
    lookbehindLength: DEFAULT_ENGINE_CONFIG.lookbehindLength,
    lookaheadLength: DEFAULT_ENGINE_CONFIG.lookaheadLength,
    contextSize: readPositiveInt(env, 'PATTERNSIFT_CONTEXT_SIZE', DEFAULT_ENGINE_CONFIG.contextSize),
  };
}

function readPositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn({ key, value: raw, fallback }, 'Ignoring invalid configuration value');
    return fallback;
  }
  return value;
}
