/**
 * Building blocks shared by several category families.
 */

import { charClass, repeat } from '../../patterns/combinators.js';
import type { Pattern } from '../../patterns/types.js';

/** Bracket-expression bodies. */
export const DIGIT = '0-9';
export const HEX = '0-9A-Fa-f';
export const ALNUM = 'A-Za-z0-9';
export const WORD = '\\w';
export const BASE64 = 'A-Za-z0-9+/';

export const digit = charClass(DIGIT);
export const hexDigit = charClass(HEX);

/** Exactly `count` digits, or between `count` and `max`. */
export function digits(count: number, max: number | null = count): Pattern {
  return repeat(digit, count, max);
}

export function hexDigits(count: number, max: number | null = count): Pattern {
  return repeat(hexDigit, count, max);
}
