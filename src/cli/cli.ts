#!/usr/bin/env node
/**
 * patternsift CLI entry point
 *
 * Usage:
 *   npx tsx src/cli/cli.ts --ipv4-address access.log
 *   cat notes.txt | npm run sift -- -E -U
 *
 * Environment variables:
 *   PATTERNSIFT_MAX_MATCH_LENGTH - Longest match guaranteed across chunk boundaries
 *   LOG_LEVEL                    - Logging level (debug, info, warn, error)
 */

import { runCli } from './run.js';

runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
}).catch((err) => {
  console.error('patternsift: unexpected failure:', err);
  process.exitCode = 1;
});
