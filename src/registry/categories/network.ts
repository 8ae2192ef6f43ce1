/**
 * Network categories: hardware and IP addresses, host and domain names,
 * URIs, URLs and e-mail addresses.
 */

import {
  atomic,
  caseless,
  charClass,
  isolated,
  literal,
  notPrecededBy,
  oneOrMore,
  optional,
  repeat,
  sequence,
  union,
  zeroOrMore,
} from '../../patterns/combinators.js';
import type { Pattern } from '../../patterns/types.js';
import { ALNUM, HEX, digit, digits, hexDigits } from './common.js';

// ─── Hardware addresses ──────────────────────────────────────

function macWith(separator: string): Pattern {
  return sequence(hexDigits(2), repeat(sequence(literal(separator), hexDigits(2)), 5, 5));
}

/** Six hex pairs joined consistently by `:` or `-`. */
export const macAddress = isolated(
  union(macWith(':'), macWith('-')),
  { before: `${HEX}:\\-`, after: `[${HEX}]|[:\\-][${HEX}]` }
);

// ─── IPv4 ────────────────────────────────────────────────────

const octet = union(
  sequence(literal('25'), charClass('0-5')),
  sequence(literal('2'), charClass('0-4'), digit),
  sequence(literal('1'), digit, digit),
  sequence(optional(charClass('1-9')), digit)
);

const ipv4Core = sequence(octet, repeat(sequence(literal('.'), octet), 3, 3));

export const ipv4Address = isolated(ipv4Core, { before: '\\d.', after: '\\d|\\.\\d' });

// ─── IPv6 ────────────────────────────────────────────────────

const h16 = hexDigits(1, 4);
const h16Colon = sequence(h16, literal(':'));
const ls32 = union(ipv4Core, sequence(h16, literal(':'), h16));
const doubleColon = literal('::');

/** Up to `count` groups before a `::`, e.g. `fe80:0:1` for count 3. */
function compressedHead(count: number): Pattern {
  return count === 1 ? h16 : sequence(repeat(h16Colon, 0, count - 1), h16);
}

/** Ordered as the address grammar of RFC 3986 §3.2.2. */
const ipv6Forms: Pattern[] = [
  sequence(repeat(h16Colon, 6, 6), ls32),
  sequence(doubleColon, repeat(h16Colon, 5, 5), ls32),
  sequence(optional(h16), doubleColon, repeat(h16Colon, 4, 4), ls32),
  sequence(optional(compressedHead(2)), doubleColon, repeat(h16Colon, 3, 3), ls32),
  sequence(optional(compressedHead(3)), doubleColon, repeat(h16Colon, 2, 2), ls32),
  sequence(optional(compressedHead(4)), doubleColon, h16Colon, ls32),
  sequence(optional(compressedHead(5)), doubleColon, ls32),
  sequence(optional(compressedHead(6)), doubleColon, h16),
  // a bare "::" is too common in source code to report
  sequence(compressedHead(7), doubleColon),
];

const ipv6Core = union(...ipv6Forms);

export const ipv6Address = union(
  ...ipv6Forms.map(form => isolated(form, { before: '\\w:', after: '[\\w:]|\\.\\d' }))
);

// ─── Domain and host names ───────────────────────────────────

const alnum = charClass(ALNUM);
const label = sequence(alnum, optional(sequence(repeat(charClass(`${ALNUM}\\-`), 0, 61), alnum)));
const topLevelLabel = repeat(charClass('A-Za-z'), 2, 63);

export const DOMAIN_BOUNDARY = { before: '\\w.\\-', after: '[\\w\\-]|\\.[A-Za-z0-9]' };

const domainCore = sequence(oneOrMore(sequence(label, literal('.'))), topLevelLabel);

/** Two or more labels, the last one alphabetic. */
export const domainName = isolated(domainCore, DOMAIN_BOUNDARY);

// ─── URIs and URLs ───────────────────────────────────────────

const TRAILING_PUNCTUATION = ".,;:!?)'";
const URI_CHARS = "A-Za-z0-9._~%!$&'()*+,;=:@/?#\\[\\]\\-";

const uriScheme = sequence(charClass('A-Za-z'), zeroOrMore(charClass('A-Za-z0-9+.\\-')));

/** `scheme:` followed by an opaque or hierarchical part. */
export const uri = sequence(
  notPrecededBy('\\w+.\\-'),
  uriScheme,
  literal(':'),
  // a second colon right after the scheme is a scope operator, not a URI
  charClass(URI_CHARS.replace(':', '')),
  zeroOrMore(charClass(URI_CHARS)),
  notPrecededBy(TRAILING_PUNCTUATION)
);

const NETWORK_SCHEMES = [
  'https', 'http', 'ftps', 'ftp', 'sftp', 'ssh', 'telnet', 'smb',
  'git', 'wss', 'ws', 'ldaps', 'ldap', 'irc', 'rtsp',
];

const PATH_CHARS = "A-Za-z0-9._~%!$&'()*+,;=:@/\\-";

const userInfo = sequence(oneOrMore(charClass("A-Za-z0-9._~%!$&'()*+,;=:\\-")), literal('@'));
const host = union(
  sequence(literal('['), ipv6Core, literal(']')),
  sequence(label, zeroOrMore(sequence(literal('.'), label)))
);
const port = sequence(literal(':'), digits(1, 5));
const urlPath = sequence(literal('/'), zeroOrMore(charClass(PATH_CHARS)));
const query = sequence(literal('?'), zeroOrMore(charClass(`${PATH_CHARS}?`)));
const fragment = sequence(literal('#'), zeroOrMore(charClass(`${PATH_CHARS}?`)));

/** A URI with a network scheme and an authority. */
export const url = sequence(
  notPrecededBy('\\w+.\\-'),
  union(...NETWORK_SCHEMES.map(caseless)),
  literal('://'),
  optional(userInfo),
  host,
  optional(port),
  optional(urlPath),
  optional(query),
  optional(fragment),
  notPrecededBy(TRAILING_PUNCTUATION)
);

// ─── E-mail addresses ────────────────────────────────────────

const LOCAL_CHARS = "A-Za-z0-9!#$%&'*+/=?^_`{|}~\\-";

const localPart = sequence(
  oneOrMore(charClass(LOCAL_CHARS)),
  zeroOrMore(sequence(literal('.'), oneOrMore(charClass(LOCAL_CHARS))))
);

export const emailAddress = sequence(
  notPrecededBy(`${LOCAL_CHARS}.`),
  localPart,
  literal('@'),
  domainName
);

const optionalSpace = atomic('\\s*');

/** `[at]`, `(at)`, `{ AT }`, `<at>` or a spaced-out ` at `. */
function spelledOut(word: string): Pattern {
  return union(
    sequence(optionalSpace, charClass('\\[({<'), optionalSpace, caseless(word), optionalSpace, charClass('\\])}>'), optionalSpace),
    sequence(atomic('\\s+'), caseless(word), atomic('\\s+'))
  );
}

const obfuscatedDomain = sequence(
  oneOrMore(sequence(label, union(literal('.'), spelledOut('dot')))),
  topLevelLabel
);

export const obfuscatedEmailAddress = isolated(
  sequence(notPrecededBy(`${LOCAL_CHARS}.`), localPart, spelledOut('at'), obfuscatedDomain),
  { after: '[\\w\\-]' }
);
