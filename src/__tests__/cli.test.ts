/**
 * Unit tests for the command-line front end
 */

import { describe, it, expect } from 'vitest';
import { charClass, oneOrMore } from '../patterns/combinators.js';
import { PatternRegistry } from '../registry/pattern-registry.js';
import { CliUsageError, parseArgs } from '../cli/flags.js';
import { EXIT_FAILURE, EXIT_SUCCESS, runCli, type CliIo } from '../cli/run.js';
import type { ChunkSource } from '../scanner/extraction-engine.js';

interface MemoryIo extends CliIo {
  out: string[];
  err: string[];
}

function memoryIo(stdin: string[], files: Record<string, string[]> = {}, registry?: PatternRegistry): MemoryIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdin,
    stdout: { write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) },
    openFile(path: string): ChunkSource {
      const chunks = files[path];
      if (chunks === undefined) return unreadable(path);
      return chunks;
    },
    ...(registry !== undefined ? { registry } : {}),
  };
}

async function* unreadable(path: string): AsyncGenerator<string> {
  throw new Error(`ENOENT: no such file or directory, open '${path}'`);
}

function smallRegistry(): PatternRegistry {
  const registry = new PatternRegistry();
  registry.register('digits', oneOrMore(charClass('0-9')), { group: 'numeric', description: 'Decimal digits' });
  registry.register('letters', oneOrMore(charClass('a-z')), { group: 'source' });
  return registry;
}

describe('parseArgs', () => {
  it('should expand clustered short aliases', () => {
    const options = parseArgs(['-NI', 'a.txt']);
    expect(options.categories).toEqual(['number', 'ipv4-address']);
    expect(options.files).toEqual(['a.txt']);
  });

  it('should take long category flags as given', () => {
    expect(parseArgs(['--url', '--mac-address']).categories).toEqual(['url', 'mac-address']);
  });

  it('should read the custom pattern in every form', () => {
    expect(parseArgs(['-e', 'x+', '--url'])).toMatchObject({ customPattern: 'x+', categories: ['url'] });
    expect(parseArgs(['-Nex+'])).toMatchObject({ customPattern: 'x+', categories: ['number'] });
    expect(parseArgs(['--regexp=a|b']).customPattern).toBe('a|b');
    expect(parseArgs(['--regexp', '[0-9]+', 'log.txt'])).toMatchObject({ customPattern: '[0-9]+', files: ['log.txt'] });
  });

  it('should treat everything after -- as files', () => {
    expect(parseArgs(['-W', '--', '-N', '--url']).files).toEqual(['-N', '--url']);
  });

  it('should keep a lone dash as standard input', () => {
    expect(parseArgs(['-']).files).toEqual(['-']);
  });

  it('should set switches', () => {
    expect(parseArgs(['-hv', '--list', '--with-category'])).toMatchObject({
      help: true,
      verbose: true,
      list: true,
      withCategory: true,
      categories: [],
    });
  });

  it('should reject malformed command lines', () => {
    expect(() => parseArgs(['-Z'])).toThrow(new CliUsageError('Unknown option -Z.'));
    expect(() => parseArgs(['-e'])).toThrow('Option -e requires a pattern.');
    expect(() => parseArgs(['--regexp'])).toThrow('Option --regexp requires a pattern.');
    expect(() => parseArgs(['--url=x'])).toThrow('Option --url does not take a value.');
  });
});

describe('runCli', () => {
  it('should print one match per line from standard input', async () => {
    const io = memoryIo(['ping 10.0.0.5 ', 'and 10.0.0.6'], {});
    expect(await runCli(['-I'], io)).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('10.0.0.5\n10.0.0.6\n');
    expect(io.err).toEqual([]);
  });

  it('should prefix matches with their category', async () => {
    const io = memoryIo(['count 42']);
    expect(await runCli(['--with-category', '-N', '-W'], io)).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('word\tcount\nnumber\t42\n');
  });

  it('should scan files in the order given', async () => {
    const io = memoryIo([], { 'a.txt': ['one 1'], 'b.txt': ['two 2'] });
    expect(await runCli(['-N', 'b.txt', 'a.txt'], io)).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('2\n1\n');
  });

  it('should read standard input for a dash among files', async () => {
    const io = memoryIo(['from stdin 3'], { 'a.txt': ['one 1'] });
    expect(await runCli(['-N', 'a.txt', '-'], io)).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('1\n3\n');
  });

  it('should report custom matches', async () => {
    const io = memoryIo(['ids: AB-123, CD-456']);
    expect(await runCli(['--with-category', '-e', '[A-Z]{2}-\\d{3}'], io)).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('custom\tAB-123\ncustom\tCD-456\n');
  });

  it('should fail on an unknown category', async () => {
    const io = memoryIo(['text'], {}, smallRegistry());
    expect(await runCli(['--zzzz'], io)).toBe(EXIT_FAILURE);
    expect(io.err.join('')).toBe('patternsift: Unknown pattern "zzzz".\n');
    expect(io.out).toEqual([]);
  });

  it('should fail on a malformed custom pattern', async () => {
    const io = memoryIo(['text']);
    expect(await runCli(['-e', 'a|'], io)).toBe(EXIT_FAILURE);
    expect(io.err.join('')).toBe('patternsift: Invalid pattern "a|": pattern matches empty text\n');
  });

  it('should fail on a usage error', async () => {
    const io = memoryIo([]);
    expect(await runCli(['-Z'], io)).toBe(EXIT_FAILURE);
    expect(io.err.join('')).toBe('patternsift: Unknown option -Z.\n');
  });

  it('should name the input that could not be read', async () => {
    const io = memoryIo([], { 'a.txt': ['one 1'] });
    expect(await runCli(['-N', 'a.txt', 'missing.txt'], io)).toBe(EXIT_FAILURE);
    expect(io.out.join('')).toBe('1\n');
    expect(io.err.join('')).toBe(
      "patternsift: missing.txt: ENOENT: no such file or directory, open 'missing.txt'\n"
    );
  });

  it('should list categories with descriptions', async () => {
    const io = memoryIo([], {}, smallRegistry());
    expect(await runCli(['--list'], io)).toBe(EXIT_SUCCESS);
    expect(io.out.join('')).toBe('digits   Decimal digits\nletters  \n');
  });

  it('should show aliases in the help text', async () => {
    const io = memoryIo([]);
    expect(await runCli(['--help'], io)).toBe(EXIT_SUCCESS);
    const lines = io.out.join('').split('\n');
    expect(lines).toContain('  -I, --ipv4-address');
    expect(lines).toContain('      --uri');
    expect(lines[0]).toBe('Usage: patternsift [options] [file ...]');
  });
});
