/**
 * Command-line flag parsing.
 *
 * Every `--<category>` flag selects a category; names are checked later
 * against the registry so typos get "did you mean" suggestions. The short
 * aliases below cover the most used categories.
 */

export const SHORT_ALIASES: Readonly<Record<string, string>> = {
  N: 'number',
  X: 'hex-number',
  V: 'version-number',
  I: 'ipv4-address',
  '6': 'ipv6-address',
  M: 'mac-address',
  D: 'domain-name',
  U: 'url',
  E: 'email-address',
  P: 'phone-number',
  S: 'ssn',
  C: 'credit-card',
  H: 'hash',
  K: 'api-key',
  A: 'path',
  Q: 'string',
  W: 'word',
  B: 'base64',
};

export interface CliOptions {
  /** Category names in the order given. */
  categories: string[];
  customPattern: string | null;
  /** Input files; empty means standard input. `-` is standard input. */
  files: string[];
  list: boolean;
  help: boolean;
  verbose: boolean;
  withCategory: boolean;
}

/** Malformed command line. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parses arguments (without the node and script paths).
 * @throws CliUsageError for an unknown short flag or a missing value
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    categories: [],
    customPattern: null,
    files: [],
    list: false,
    help: false,
    verbose: false,
    withCategory: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    if (arg === '--') {
      options.files.push(...argv.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const [flag, inlineValue] = splitInlineValue(arg.slice(2));
      switch (flag) {
        case 'regexp':
          if (inlineValue !== null) {
            options.customPattern = inlineValue;
          } else {
            options.customPattern = requireValue(argv, i, '--regexp');
            i++;
          }
          break;
        case 'list':
          options.list = true;
          break;
        case 'help':
          options.help = true;
          break;
        case 'verbose':
          options.verbose = true;
          break;
        case 'with-category':
          options.withCategory = true;
          break;
        default:
          if (inlineValue !== null) {
            throw new CliUsageError(`Option --${flag} does not take a value.`);
          }
          options.categories.push(flag);
      }
      continue;
    }

    if (arg.startsWith('-') && arg.length > 1) {
      const consumedNext = parseShortCluster(arg.slice(1), argv, i, options);
      if (consumedNext) i++;
      continue;
    }

    options.files.push(arg);
  }

  return options;
}

/** Handles `-NI`, `-e PATTERN`, `-ePATTERN`. Returns true if the next argument was used. */
function parseShortCluster(cluster: string, argv: readonly string[], index: number, options: CliOptions): boolean {
  for (let j = 0; j < cluster.length; j++) {
    const letter = cluster.charAt(j);

    if (letter === 'e') {
      const rest = cluster.slice(j + 1);
      if (rest.length > 0) {
        options.customPattern = rest;
        return false;
      }
      options.customPattern = requireValue(argv, index, '-e');
      return true;
    }

    if (letter === 'h') options.help = true;
    else if (letter === 'v') options.verbose = true;
    else {
      const category: string | undefined = SHORT_ALIASES[letter];
      if (category === undefined) {
        throw new CliUsageError(`Unknown option -${letter}.`);
      }
      options.categories.push(category);
    }
  }
  return false;
}

function splitInlineValue(flag: string): [string, string | null] {
  const eq = flag.indexOf('=');
  return eq === -1 ? [flag, null] : [flag.slice(0, eq), flag.slice(eq + 1)];
}

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (value === undefined) {
    throw new CliUsageError(`Option ${flag} requires a pattern.`);
  }
  return value;
}
