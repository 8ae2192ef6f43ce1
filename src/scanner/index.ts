/**
 * Scanner Module - Public API
 *
 * Selection compilation, the extraction engine and the scanner facade.
 */

export { PatternScanner, default } from './pattern-scanner.js';
export type { ScannerConfig, Finding, ScanResult, SelectionInput } from './pattern-scanner.js';
export { resolveSelection } from './selection.js';
export type { Selection, CompiledSelection, Alternative } from './selection.js';
export { extract, extractStream, MatchCursor } from './extraction-engine.js';
export type { Match, StreamOptions, ChunkSource } from './extraction-engine.js';
