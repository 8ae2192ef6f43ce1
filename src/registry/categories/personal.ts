/**
 * Personal identifiers: telephone numbers and US social security numbers.
 */

import { atomic, caseless, charClass, isolated, literal, optional, repeat, sequence, union } from '../../patterns/combinators.js';
import type { Pattern } from '../../patterns/types.js';
import { digit, digits } from './common.js';

const separator = charClass(' .\\-');

const areaCode = union(sequence(literal('('), digits(3), literal(')')), digits(3));

const extension = optional(
  sequence(atomic('\\s?'), union(caseless('ext'), caseless('x')), optional(literal('.')), atomic('\\s?'), digits(1, 5))
);

/** `+1 (555) 123-4567`, `555.123.4567`, `555-123-4567` */
const northAmerican = sequence(
  optional(sequence(optional(literal('+')), literal('1'), optional(separator))),
  areaCode,
  optional(separator),
  digits(3),
  separator,
  digits(4)
);

/** `555-1234` */
const local = sequence(digits(3), separator, digits(4));

/** `+44 20 7946 0958` */
const international = sequence(
  literal('+'),
  digits(1, 3),
  repeat(sequence(separator, repeat(digit, 1, 4)), 2, 5)
);

function phoneTemplate(template: Pattern): Pattern {
  return isolated(sequence(template, extension), { before: '\\d+', after: '\\d' });
}

export const phoneNumber = union(phoneTemplate(northAmerican), phoneTemplate(local), phoneTemplate(international));

/** 3-2-4 digit groups separated by dashes. */
export const ssn = isolated(
  sequence(digits(3), literal('-'), digits(2), literal('-'), digits(4)),
  { before: '\\d\\-', after: '\\d|-\\d' }
);
