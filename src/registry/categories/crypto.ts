/**
 * Cryptographic material: hex digests, cloud credentials, PEM and OpenSSH
 * key blocks, base64 blobs.
 */

import {
  atomic,
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
import { BASE64, HEX, hexDigits } from './common.js';

// ─── Digests ─────────────────────────────────────────────────

/** A run of exactly `length` hex characters, not adjacent to other hex characters. */
export function hexDigest(length: number): Pattern {
  return isolated(hexDigits(length), { before: HEX, after: `[${HEX}]` });
}

export const md5 = hexDigest(32);
export const sha1 = hexDigest(40);
export const sha256 = hexDigest(64);
export const sha512 = hexDigest(128);

// ─── Cloud credentials ───────────────────────────────────────

const AWS_KEY_PREFIXES = ['AKIA', 'ASIA', 'AGPA', 'AIDA', 'AROA', 'AIPA', 'ANPA', 'ANVA'];

const upperAlnum = charClass('A-Z0-9');

/** 20 characters: a four-character prefix and 16 uppercase alphanumerics. */
export const awsAccessKeyId = isolated(
  sequence(
    union(...AWS_KEY_PREFIXES.map(literal), sequence(literal('A3T'), upperAlnum)),
    repeat(upperAlnum, 16, 16)
  ),
  { before: 'A-Za-z0-9', after: '[A-Za-z0-9]' }
);

/** 40 characters of the base64 alphabet. */
export const awsSecretAccessKey = isolated(
  repeat(charClass(BASE64), 40, 40),
  { before: BASE64, after: `[${BASE64}=]` }
);

// ─── Key blocks ──────────────────────────────────────────────

const newline = atomic('\\r?\\n');
const base64Line = oneOrMore(charClass(`${BASE64}=`));

/** `Proc-Type: 4,ENCRYPTED` style header line. */
const headerLine = sequence(
  charClass('A-Za-z'),
  zeroOrMore(charClass('A-Za-z0-9\\-')),
  literal(':'),
  atomic('[^\\r\\n]*'),
  newline
);

/** Base64 lines; wrapping is optional and the last line may end without a newline. */
const base64Body = sequence(base64Line, zeroOrMore(sequence(newline, base64Line)), optional(newline));

/** `-----BEGIN <label>-----` ... `-----END <label>-----` */
export function pemBlock(label: string): Pattern {
  return sequence(
    literal(`-----BEGIN ${label}-----`),
    newline,
    optional(sequence(oneOrMore(headerLine), newline)),
    base64Body,
    literal(`-----END ${label}-----`)
  );
}

/** RFC 4716 public key file. */
const ssh2PublicKeyBlock = sequence(
  literal('---- BEGIN SSH2 PUBLIC KEY ----'),
  newline,
  zeroOrMore(headerLine),
  base64Body,
  literal('---- END SSH2 PUBLIC KEY ----')
);

const SSH_KEY_TYPES = ['ssh-rsa', 'ssh-dss', 'ssh-ed25519', 'ecdsa-sha2-nistp256', 'ecdsa-sha2-nistp384', 'ecdsa-sha2-nistp521'];

/** One authorized_keys line: type, base64 blob, optional comment. */
const authorizedKey = sequence(
  notPrecededBy('\\w\\-'),
  union(...SSH_KEY_TYPES.map(literal)),
  atomic('[ \\t]+'),
  literal('AAAA'),
  oneOrMore(charClass(BASE64)),
  repeat(literal('='), 0, 2),
  optional(atomic('[ \\t]+[^\\s]+'))
);

export const sshPublicKey = union(ssh2PublicKeyBlock, authorizedKey);
export const rsaPublicKey = pemBlock('RSA PUBLIC KEY');
export const dsaPublicKey = pemBlock('DSA PUBLIC KEY');
export const ecPublicKey = pemBlock('EC PUBLIC KEY');
/** SubjectPublicKeyInfo, algorithm unspecified. */
export const genericPublicKey = pemBlock('PUBLIC KEY');

export const rsaPrivateKey = pemBlock('RSA PRIVATE KEY');
export const dsaPrivateKey = pemBlock('DSA PRIVATE KEY');
export const ecPrivateKey = pemBlock('EC PRIVATE KEY');
export const opensshPrivateKey = pemBlock('OPENSSH PRIVATE KEY');
/** PKCS#8, plain and encrypted. */
export const genericPrivateKeys = [pemBlock('PRIVATE KEY'), pemBlock('ENCRYPTED PRIVATE KEY')];

// ─── Encodings ───────────────────────────────────────────────

const base64Char = charClass(BASE64);

const base64Padded = union(
  sequence(repeat(base64Char, 2, 2), literal('==')),
  sequence(repeat(base64Char, 3, 3), literal('='))
);

/** Quads of the base64 alphabet, the last one optionally `=`/`==` padded. */
export const base64 = isolated(
  union(sequence(oneOrMore(repeat(base64Char, 4, 4)), optional(base64Padded)), base64Padded),
  { before: BASE64, after: `[${BASE64}=]` }
);
