/**
 * Payment card numbers, by issuer.
 *
 * These are shape matchers: digit-group templates and issuer prefixes. No
 * Luhn checksum is applied.
 */

import { charClass, isolated, literal, optional, sequence, union } from '../../patterns/combinators.js';
import type { Pattern } from '../../patterns/types.js';
import { digits } from './common.js';

const groupSeparator = optional(charClass(' \\-'));

/** A leading group followed by digit groups of the given sizes, each optionally separated. */
function cardTemplate(leadingGroup: Pattern, groups: number[]): Pattern {
  const parts: Pattern[] = [leadingGroup];
  for (const size of groups) {
    parts.push(groupSeparator, digits(size));
  }
  return isolated(sequence(...parts), { before: '\\d', after: '\\d' });
}

/** 34xx / 37xx, 4-6-5. */
export const amexCard = cardTemplate(sequence(literal('3'), charClass('47'), digits(2)), [6, 5]);

/** 6011 / 65xx, 4-4-4-4. */
export const discoverCard = cardTemplate(
  union(literal('6011'), sequence(literal('65'), digits(2))),
  [4, 4, 4]
);

/** 51-55 and 22-27 series, 4-4-4-4. */
export const mastercardCard = cardTemplate(
  sequence(union(sequence(literal('5'), charClass('1-5')), sequence(literal('2'), charClass('2-7'))), digits(2)),
  [4, 4, 4]
);

const visaLeadingGroup = sequence(literal('4'), digits(3));

/** Leading 4: 4-4-4-4, 4-4-4-4-3 or 13 digits without separators. */
export const visaCard = union(
  cardTemplate(visaLeadingGroup, [4, 4, 4, 3]),
  cardTemplate(visaLeadingGroup, [4, 4, 4]),
  isolated(sequence(literal('4'), digits(12)), { before: '\\d', after: '\\d' })
);
