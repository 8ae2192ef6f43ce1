/**
 * Source-code tokens: quoted strings, identifiers, words.
 */

import { atomic, charClass, followedBy, isolated, literal, sequence, zeroOrMore, oneOrMore } from '../../patterns/combinators.js';
import type { Pattern } from '../../patterns/types.js';

/**
 * Delimited run ending at the nearest unescaped closing delimiter. A
 * backslash escapes any character, newlines included.
 */
function quoted(delimiter: string): Pattern {
  return sequence(
    literal(delimiter),
    zeroOrMore(atomic('\\\\[\\s\\S]|[^\\\\]'), { greedy: false }),
    literal(delimiter)
  );
}

export const doubleQuotedString = quoted('"');
export const singleQuotedString = quoted("'");

const identifier = sequence(charClass('A-Za-z_'), zeroOrMore(charClass('A-Za-z0-9_')));

export const variableName = isolated(identifier, { before: '\\w', after: '\\w' });

/** An identifier directly followed by `(`. */
export const functionName = isolated(sequence(identifier, followedBy('\\(')), { before: '\\w' });

export const word = isolated(oneOrMore(charClass('\\w')), { before: '\\w', after: '\\w' });
