/**
 * Unit tests for the pattern combinators
 */

import { describe, it, expect } from 'vitest';
import {
  alternativesOf,
  atomic,
  canMatchEmpty,
  caseless,
  charClass,
  escapeRegex,
  isolated,
  literal,
  named,
  notFollowedBy,
  notPrecededBy,
  oneOrMore,
  optional,
  repeat,
  sequence,
  sourceCanMatchEmpty,
  toSource,
  union,
  zeroOrMore,
} from '../patterns/combinators.js';
import { PatternError, PatternErrorCode } from '../patterns/types.js';

function expectCombinatorError(fn: () => unknown): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(PatternError);
  if (caught instanceof PatternError) {
    expect(caught.code).toBe(PatternErrorCode.INVALID_COMBINATOR);
  }
}

describe('Pattern combinators', () => {
  describe('Atomic constructors', () => {
    it('should escape literal text', () => {
      expect(toSource(literal('a.b'))).toBe('(?:a\\.b)');
      expect(toSource(literal('x'))).toBe('x');
    });

    it('should wrap a bracket expression body', () => {
      expect(toSource(charClass('0-9'))).toBe('[0-9]');
    });

    it('should expand caseless text into per-letter classes', () => {
      expect(toSource(caseless('at'))).toBe('(?:[Aa][Tt])');
      expect(toSource(caseless('a1'))).toBe('(?:[Aa]1)');
    });

    it('should build zero-width boundary assertions', () => {
      const before = notPrecededBy('\\w');
      expect(before.zeroWidth).toBe(true);
      expect(toSource(before)).toBe('(?<![\\w])');
      expect(toSource(notFollowedBy('\\d'))).toBe('(?!\\d)');
    });

    it('should reject an empty source', () => {
      expectCombinatorError(() => atomic(''));
    });

    it('should escape every regex metacharacter', () => {
      expect(escapeRegex('a-b/c(d)')).toBe('a\\-b\\/c\\(d\\)');
    });
  });

  describe('Composites', () => {
    it('should compile a union as a non-capturing alternation', () => {
      expect(toSource(union(literal('a'), literal('b')))).toBe('(?:a|b)');
    });

    it('should compile a single-member union as its member', () => {
      expect(toSource(union(charClass('ab')))).toBe('[ab]');
    });

    it('should concatenate sequence parts', () => {
      expect(toSource(sequence(literal('a'), charClass('bc')))).toBe('a[bc]');
    });

    it('should quantify repetitions', () => {
      const d = charClass('0-9');
      expect(toSource(repeat(d, 2, 4))).toBe('[0-9]{2,4}');
      expect(toSource(repeat(d, 3, 3))).toBe('[0-9]{3}');
      expect(toSource(repeat(d, 2, null))).toBe('[0-9]{2,}');
      expect(toSource(optional(literal('x')))).toBe('x?');
      expect(toSource(zeroOrMore(d))).toBe('[0-9]*');
      expect(toSource(oneOrMore(literal('ab'), { greedy: false }))).toBe('(?:ab)+?');
    });

    it('should surround an isolated pattern with boundary assertions', () => {
      expect(toSource(isolated(literal('x'), { before: '\\w', after: '\\w' }))).toBe('(?<![\\w])x(?!\\w)');
      expect(toSource(isolated(literal('x'), { after: '\\d' }))).toBe('x(?!\\d)');
    });

    it('should reject empty member lists', () => {
      expectCombinatorError(() => union());
      expectCombinatorError(() => sequence());
    });

    it('should reject invalid repetition bounds', () => {
      const d = charClass('0-9');
      expectCombinatorError(() => repeat(d, -1, null));
      expectCombinatorError(() => repeat(d, 3, 2));
      expectCombinatorError(() => repeat(d, 0, 0));
      expectCombinatorError(() => repeat(d, 1.5, 2));
    });

    it('should refuse to repeat a zero-width assertion', () => {
      expectCombinatorError(() => oneOrMore(notFollowedBy('x')));
    });

    it('should freeze every node', () => {
      const node = union(literal('a'), literal('b'));
      expect(Object.isFrozen(node)).toBe(true);
      expect(Object.isFrozen(node.members)).toBe(true);
      expect(Object.isFrozen(repeat(literal('a'), 1, 2))).toBe(true);
    });
  });

  describe('named', () => {
    it('should return a named copy and leave the original untouched', () => {
      const original = sequence(literal('a'), literal('b'));
      const copy = named(original, 'ab');
      expect(copy.name).toBe('ab');
      expect(original.name).toBeUndefined();
      expect(Object.isFrozen(copy)).toBe(true);
      expect(toSource(copy)).toBe(toSource(original));
    });
  });

  describe('alternativesOf', () => {
    it('should flatten nested unions in order', () => {
      const a = literal('a');
      const b = literal('b');
      const c = literal('c');
      const leaves = alternativesOf(union(a, union(b, c)));
      expect(leaves).toHaveLength(3);
      expect(leaves[0]).toBe(a);
      expect(leaves[1]).toBe(b);
      expect(leaves[2]).toBe(c);
    });

    it('should treat a non-union as a single leaf', () => {
      const seq = sequence(literal('a'), literal('b'));
      expect(alternativesOf(seq)).toEqual([seq]);
    });
  });

  describe('canMatchEmpty', () => {
    it('should detect patterns accepting empty text', () => {
      expect(canMatchEmpty(optional(literal('a')))).toBe(true);
      expect(canMatchEmpty(union(literal('a'), zeroOrMore(literal('b'))))).toBe(true);
      expect(canMatchEmpty(atomic('a*'))).toBe(true);
      expect(canMatchEmpty(notPrecededBy('a'))).toBe(true);
      expect(canMatchEmpty(isolated(optional(literal('a')), { before: '\\w' }))).toBe(true);
    });

    it('should treat a raw assertion as matching empty text', () => {
      expect(canMatchEmpty(atomic('\\b'))).toBe(true);
      expect(canMatchEmpty(atomic('(?=a)'))).toBe(true);
      expect(canMatchEmpty(atomic('^'))).toBe(true);
      expect(canMatchEmpty(atomic('\\bfoo\\b'))).toBe(false);
    });

    it('should accept patterns that consume input', () => {
      expect(canMatchEmpty(literal('a'))).toBe(false);
      expect(canMatchEmpty(sequence(optional(literal('a')), literal('b')))).toBe(false);
      expect(canMatchEmpty(isolated(oneOrMore(charClass('\\w')), { before: '\\w', after: '\\w' }))).toBe(false);
    });
  });

  describe('sourceCanMatchEmpty', () => {
    it('should look past assertions', () => {
      expect(sourceCanMatchEmpty('\\b|foo')).toBe(true);
      expect(sourceCanMatchEmpty('(?<!\\w)')).toBe(true);
      expect(sourceCanMatchEmpty('x(?=y)|$')).toBe(true);
      expect(sourceCanMatchEmpty('\\Bfoo')).toBe(false);
      expect(sourceCanMatchEmpty('(?<![a-z])\\d+(?!\\d)')).toBe(false);
    });

    it('should keep character classes and escapes intact', () => {
      expect(sourceCanMatchEmpty('[\\b^$]')).toBe(false);
      expect(sourceCanMatchEmpty('\\$')).toBe(false);
      expect(sourceCanMatchEmpty('[^(?=]+')).toBe(false);
    });
  });

  describe('Compiled behaviour', () => {
    it('should keep group numbering free for callers', () => {
      const compiled = toSource(union(sequence(literal('ab'), optional(literal('c'))), literal('d')));
      expect(new RegExp(`(x)${compiled}\\1`).test('xabx')).toBe(true);
    });

    it('should stop lazy repetition at the first closing delimiter', () => {
      const quoted = sequence(literal('"'), zeroOrMore(atomic('[^\\n]'), { greedy: false }), literal('"'));
      const match = new RegExp(toSource(quoted)).exec('"a" "b"');
      expect(match?.[0]).toBe('"a"');
    });
  });
});
