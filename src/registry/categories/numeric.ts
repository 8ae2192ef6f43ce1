/**
 * Numeric categories: decimal and hexadecimal numbers, version strings.
 */

import { charClass, isolated, literal, oneOrMore, optional, repeat, sequence, zeroOrMore } from '../../patterns/combinators.js';
import { ALNUM, digit, hexDigit } from './common.js';

const sign = charClass('+\\-');
const digitRun = oneOrMore(digit);

/** Optional sign, digits, optional fraction and exponent. A dotted quad is not a number. */
export const number = isolated(
  sequence(
    optional(sign),
    digitRun,
    optional(sequence(literal('.'), digitRun)),
    optional(sequence(charClass('eE'), optional(sign), digitRun))
  ),
  { before: '\\w.', after: '\\w|\\.\\d' }
);

export const hexNumber = isolated(
  sequence(literal('0'), charClass('xX'), oneOrMore(hexDigit)),
  { before: '\\w', after: '\\w' }
);

const preRelease = sequence(
  literal('-'),
  oneOrMore(charClass(ALNUM)),
  zeroOrMore(sequence(literal('.'), oneOrMore(charClass(ALNUM))))
);

/** Two or more dot-separated numeric groups, e.g. `1.2`, `v10.4.3-rc.1`. */
export const versionNumber = isolated(
  sequence(optional(charClass('vV')), digitRun, repeat(sequence(literal('.'), digitRun), 1, null), optional(preRelease)),
  { before: '\\w.', after: '\\w|\\.\\d' }
);
