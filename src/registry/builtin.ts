/**
 * Built-in Category Catalogue
 *
 * Registration order is the tie-break order for equal-length matches, so
 * specific shapes come before the generic ones that also accept them
 * (`md5` before `word`, `number` before `version-number`, `domain-name`
 * before `file-name`).
 */

import { union } from '../patterns/combinators.js';
import type { Pattern } from '../patterns/types.js';
import * as crypto from './categories/crypto.js';
import * as filesystem from './categories/filesystem.js';
import * as financial from './categories/financial.js';
import * as network from './categories/network.js';
import * as numeric from './categories/numeric.js';
import * as personal from './categories/personal.js';
import * as source from './categories/source.js';
import type { PatternRegistry } from './pattern-registry.js';
import type { CategoryGroup } from './types.js';

type Member = string | Pattern;

interface BuiltinCategory {
  name: string;
  group: CategoryGroup;
  description: string;
  displayName?: string;
  /** A pattern, or a union of already-registered categories (by name) and extra patterns. */
  pattern: Pattern | readonly Member[];
}

export const BUILTIN_CATEGORIES: readonly BuiltinCategory[] = [
  // network
  { name: 'mac-address', group: 'network', displayName: 'MAC address', description: 'Six hex pairs separated by ":" or "-"', pattern: network.macAddress },
  { name: 'ipv4-address', group: 'network', displayName: 'IPv4 address', description: 'Dotted quad with octets 0-255', pattern: network.ipv4Address },
  { name: 'ipv6-address', group: 'network', displayName: 'IPv6 address', description: 'Full or "::"-compressed IPv6 address', pattern: network.ipv6Address },
  { name: 'ip-address', group: 'network', displayName: 'IP address', description: 'IPv4 or IPv6 address', pattern: ['ipv4-address', 'ipv6-address'] },
  { name: 'url', group: 'network', displayName: 'URL', description: 'Network URI with an authority', pattern: network.url },
  { name: 'uri', group: 'network', displayName: 'URI', description: 'Any "scheme:" URI', pattern: network.uri },
  { name: 'email-address', group: 'network', description: 'local-part@domain', pattern: network.emailAddress },
  { name: 'obfuscated-email-address', group: 'network', description: 'E-mail address with "at"/"dot" spelled out', pattern: network.obfuscatedEmailAddress },

  // personal
  { name: 'phone-number', group: 'personal', description: 'North American, local or international phone number', pattern: personal.phoneNumber },
  { name: 'ssn', group: 'personal', displayName: 'SSN', description: 'US social security number (3-2-4)', pattern: personal.ssn },

  // financial
  { name: 'amex-cc', group: 'financial', displayName: 'AMEX card', description: 'American Express card number (4-6-5)', pattern: financial.amexCard },
  { name: 'discover-cc', group: 'financial', displayName: 'Discover card', description: 'Discover card number', pattern: financial.discoverCard },
  { name: 'mastercard-cc', group: 'financial', displayName: 'MasterCard', description: 'MasterCard card number', pattern: financial.mastercardCard },
  { name: 'visa-cc', group: 'financial', displayName: 'Visa card', description: 'Visa card number', pattern: financial.visaCard },
  { name: 'credit-card', group: 'financial', description: 'Any supported card number shape', pattern: ['amex-cc', 'discover-cc', 'mastercard-cc', 'visa-cc'] },

  // digests and credentials
  { name: 'md5', group: 'crypto', displayName: 'MD5', description: '32 hex characters', pattern: crypto.md5 },
  { name: 'sha1', group: 'crypto', displayName: 'SHA-1', description: '40 hex characters', pattern: crypto.sha1 },
  { name: 'sha256', group: 'crypto', displayName: 'SHA-256', description: '64 hex characters', pattern: crypto.sha256 },
  { name: 'sha512', group: 'crypto', displayName: 'SHA-512', description: '128 hex characters', pattern: crypto.sha512 },
  { name: 'hash', group: 'crypto', description: 'MD5, SHA-1, SHA-256 or SHA-512 digest', pattern: ['md5', 'sha1', 'sha256', 'sha512'] },
  { name: 'aws-access-key-id', group: 'crypto', displayName: 'AWS access key ID', description: 'AKIA/ASIA/... prefixed 20-character key ID', pattern: crypto.awsAccessKeyId },
  { name: 'aws-secret-access-key', group: 'crypto', displayName: 'AWS secret access key', description: '40 base64-alphabet characters', pattern: crypto.awsSecretAccessKey },
  { name: 'api-key', group: 'crypto', displayName: 'API key', description: 'Digest-shaped token or AWS credential', pattern: ['hash', 'aws-access-key-id', 'aws-secret-access-key'] },

  // key material
  { name: 'ssh-public-key', group: 'crypto', displayName: 'SSH public key', description: 'RFC 4716 block or authorized_keys line', pattern: crypto.sshPublicKey },
  { name: 'rsa-public-key', group: 'crypto', displayName: 'RSA public key', description: 'PEM "RSA PUBLIC KEY" block', pattern: crypto.rsaPublicKey },
  { name: 'dsa-public-key', group: 'crypto', displayName: 'DSA public key', description: 'PEM "DSA PUBLIC KEY" block', pattern: crypto.dsaPublicKey },
  { name: 'ec-public-key', group: 'crypto', displayName: 'EC public key', description: 'PEM "EC PUBLIC KEY" block', pattern: crypto.ecPublicKey },
  { name: 'public-key', group: 'crypto', description: 'Any public key block', pattern: ['ssh-public-key', 'rsa-public-key', 'dsa-public-key', 'ec-public-key', crypto.genericPublicKey] },
  { name: 'rsa-private-key', group: 'crypto', displayName: 'RSA private key', description: 'PEM "RSA PRIVATE KEY" block', pattern: crypto.rsaPrivateKey },
  { name: 'dsa-private-key', group: 'crypto', displayName: 'DSA private key', description: 'PEM "DSA PRIVATE KEY" block', pattern: crypto.dsaPrivateKey },
  { name: 'ec-private-key', group: 'crypto', displayName: 'EC private key', description: 'PEM "EC PRIVATE KEY" block', pattern: crypto.ecPrivateKey },
  { name: 'openssh-private-key', group: 'crypto', displayName: 'OpenSSH private key', description: 'PEM "OPENSSH PRIVATE KEY" block', pattern: crypto.opensshPrivateKey },
  { name: 'private-key', group: 'crypto', description: 'Any private key block', pattern: ['rsa-private-key', 'dsa-private-key', 'ec-private-key', 'openssh-private-key', ...crypto.genericPrivateKeys] },

  { name: 'domain-name', group: 'network', description: 'Dot-separated labels ending in an alphabetic TLD', pattern: network.domainName },

  // paths
  { name: 'absolute-unix-path', group: 'filesystem', description: 'Path starting at "/"', pattern: filesystem.absoluteUnixPath },
  { name: 'relative-unix-path', group: 'filesystem', description: 'Path with at least one "/" not starting at the root', pattern: filesystem.relativeUnixPath },
  { name: 'unix-path', group: 'filesystem', description: 'Absolute or relative Unix path', pattern: ['absolute-unix-path', 'relative-unix-path'] },
  { name: 'absolute-windows-path', group: 'filesystem', description: 'Drive-letter or UNC path', pattern: filesystem.absoluteWindowsPath },
  { name: 'relative-windows-path', group: 'filesystem', description: 'Path with at least one "\\" and no drive', pattern: filesystem.relativeWindowsPath },
  { name: 'windows-path', group: 'filesystem', description: 'Absolute or relative Windows path', pattern: ['absolute-windows-path', 'relative-windows-path'] },
  { name: 'absolute-path', group: 'filesystem', description: 'Absolute Unix or Windows path', pattern: ['absolute-unix-path', 'absolute-windows-path'] },
  { name: 'relative-path', group: 'filesystem', description: 'Relative Unix or Windows path', pattern: ['relative-unix-path', 'relative-windows-path'] },
  { name: 'path', group: 'filesystem', description: 'Any path', pattern: ['unix-path', 'windows-path'] },

  // strings
  { name: 'double-quoted-string', group: 'source', description: 'Text between double quotes, backslash escapes honoured', pattern: source.doubleQuotedString },
  { name: 'single-quoted-string', group: 'source', description: 'Text between single quotes, backslash escapes honoured', pattern: source.singleQuotedString },
  { name: 'string', group: 'source', description: 'Single- or double-quoted string', pattern: ['double-quoted-string', 'single-quoted-string'] },

  // numbers
  { name: 'hex-number', group: 'numeric', description: '0x-prefixed hexadecimal literal', pattern: numeric.hexNumber },
  { name: 'number', group: 'numeric', description: 'Integer or decimal with optional sign and exponent', pattern: numeric.number },
  { name: 'version-number', group: 'numeric', description: 'Two or more dot-separated numeric groups, optional "v" prefix', pattern: numeric.versionNumber },

  // identifiers
  { name: 'function-name', group: 'source', description: 'Identifier followed by "("', pattern: source.functionName },
  { name: 'word', group: 'source', description: 'Run of letters, digits and underscores', pattern: source.word },
  { name: 'host-name', group: 'network', description: 'Domain name or single word', pattern: ['domain-name', 'word'] },
  { name: 'variable-name', group: 'source', description: 'Identifier', pattern: source.variableName },
  { name: 'file-name', group: 'filesystem', description: 'Name with an extension', pattern: filesystem.fileName },
  { name: 'dir-name', group: 'filesystem', description: 'Single path segment', pattern: filesystem.dirName },

  { name: 'base64', group: 'encoding', description: 'Base64 quads with optional padding', pattern: crypto.base64 },
];

/**
 * Registers every built-in category, in table order.
 * @returns the number of categories added
 */
export function registerBuiltinCategories(registry: PatternRegistry): number {
  for (const category of BUILTIN_CATEGORIES) {
    registry.register(category.name, resolvePattern(registry, category.pattern), {
      group: category.group,
      displayName: category.displayName,
      description: category.description,
    });
  }
  return BUILTIN_CATEGORIES.length;
}

function resolvePattern(registry: PatternRegistry, pattern: Pattern | readonly Member[]): Pattern {
  if (isMemberList(pattern)) {
    return union(...pattern.map(member => (typeof member === 'string' ? registry.resolve(member).pattern : member)));
  }
  return pattern;
}

function isMemberList(pattern: Pattern | readonly Member[]): pattern is readonly Member[] {
  return Array.isArray(pattern);
}
