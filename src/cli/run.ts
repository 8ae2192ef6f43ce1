/**
 * patternsift command - extracts matches from files or standard input,
 * one per line.
 */

import { createReadStream } from 'fs';
import { PatternError } from '../patterns/types.js';
import type { PatternRegistry } from '../registry/pattern-registry.js';
import { getDefaultRegistry } from '../registry/default-registry.js';
import type { ChunkSource } from '../scanner/extraction-engine.js';
import { PatternScanner } from '../scanner/pattern-scanner.js';
import type { CompiledSelection } from '../scanner/selection.js';
import { createLogger, setLogLevel } from '../shared/logger.js';
import { CliUsageError, SHORT_ALIASES, parseArgs, type CliOptions } from './flags.js';

const logger = createLogger('cli');

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdin: ChunkSource;
  stdout: OutputSink;
  stderr: OutputSink;
  openFile(path: string): ChunkSource;
  registry?: PatternRegistry;
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export function processIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    openFile: path => createReadStream(path),
  };
}

/**
 * Runs the command.
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    return fail(io, error);
  }

  if (options.verbose) setLogLevel('debug');

  const registry = io.registry ?? getDefaultRegistry();

  if (options.help) {
    io.stdout.write(helpText(registry));
    return EXIT_SUCCESS;
  }
  if (options.list) {
    io.stdout.write(listText(registry));
    return EXIT_SUCCESS;
  }

  const scanner = new PatternScanner({ registry });

  let selection: CompiledSelection;
  try {
    selection = scanner.compile({
      categories: options.categories,
      ...(options.customPattern !== null ? { customPattern: options.customPattern } : {}),
    });
  } catch (error) {
    return fail(io, error);
  }

  const inputs = options.files.length > 0 ? options.files : ['-'];
  for (const input of inputs) {
    const source = input === '-' ? io.stdin : io.openFile(input);
    logger.debug({ input }, 'Scanning input');

    try {
      for await (const match of scanner.scanStream(source, selection)) {
        const line = options.withCategory ? `${match.patternName}\t${match.matchedText}` : match.matchedText;
        io.stdout.write(`${line}\n`);
      }
    } catch (error) {
      return fail(io, error, input);
    }
  }

  return EXIT_SUCCESS;
}

function fail(io: CliIo, error: unknown, input?: string): number {
  const message = error instanceof Error ? error.message : String(error);
  if (!(error instanceof PatternError) && !(error instanceof CliUsageError)) {
    logger.debug({ err: error, input }, 'Input failed');
  }
  io.stderr.write(`patternsift: ${input !== undefined ? `${input}: ` : ''}${message}\n`);
  return EXIT_FAILURE;
}

// ─── Help ────────────────────────────────────────────────────

function helpText(registry: PatternRegistry): string {
  const aliasFor = new Map(Object.entries(SHORT_ALIASES).map(([letter, name]) => [name, letter]));
  const categoryLines = registry.listCategories().map(name => {
    const letter = aliasFor.get(name);
    const flags = letter !== undefined ? `-${letter}, --${name}` : `    --${name}`;
    return `  ${flags}`;
  });

  return `Usage: patternsift [options] [file ...]

Extracts every match of the selected categories, one per line.
Reads standard input when no file is given. Without a category or
--regexp every category is selected.

Options:
  -e, --regexp <pattern>  Also match a custom regular expression
      --with-category     Prefix each match with its category and a tab
      --list              List categories with descriptions
  -v, --verbose           Debug logging on stderr
  -h, --help              Show this help message

Categories:
${categoryLines.join('\n')}

Environment variables:
  PATTERNSIFT_MAX_MATCH_LENGTH  Longest match guaranteed across chunk boundaries
  LOG_LEVEL                     Logging level (debug, info, warn, error)
`;
}

function listText(registry: PatternRegistry): string {
  const definitions = registry.listDefinitions();
  const width = Math.max(...definitions.map(d => d.name.length));
  return definitions.map(d => `${d.name.padEnd(width)}  ${d.description}\n`).join('');
}
