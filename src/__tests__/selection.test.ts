/**
 * Unit tests for the selection layer
 */

import { describe, it, expect } from 'vitest';
import { PatternErrorCode, UnknownPatternError } from '../patterns/types.js';
import { getDefaultRegistry } from '../registry/default-registry.js';
import { PatternRegistry } from '../registry/pattern-registry.js';
import { resolveSelection } from '../scanner/selection.js';

const registry = getDefaultRegistry();

function malformedReason(customPattern: string): string {
  try {
    resolveSelection(registry, { customPattern });
  } catch (error) {
    if (error instanceof UnknownPatternError && error.code === PatternErrorCode.MALFORMED_CUSTOM_PATTERN) {
      return error.message;
    }
    throw error;
  }
  throw new Error(`custom pattern ${customPattern} was accepted`);
}

describe('resolveSelection', () => {
  describe('Categories', () => {
    it('should ignore duplicates and caller order', () => {
      const selection = resolveSelection(registry, { categories: ['word', 'number', 'word'] });
      expect(selection.categories).toEqual(['number', 'word']);
      expect(selection.alternatives.map(a => a.patternName)).toEqual(['number', 'word']);
    });

    it('should select every category when none are named', () => {
      const all = resolveSelection(registry);
      expect(all.categories).toEqual(registry.listCategories());
      expect(resolveSelection(registry, { categories: [] }).categories).toHaveLength(56);
    });

    it('should throw UnknownPatternError for an unknown name', () => {
      expect(() => resolveSelection(registry, { categories: ['ipv5-address'] })).toThrow(UnknownPatternError);
    });

    it('should give a shared leaf to the earliest registered selected category', () => {
      const selection = resolveSelection(registry, { categories: ['host-name', 'word'] });
      expect(selection.alternatives.map(a => a.patternName)).toEqual(['word', 'host-name']);
    });

    it('should not duplicate leaves reached through composites', () => {
      const selection = resolveSelection(registry, { categories: ['hash', 'md5', 'api-key'] });
      expect(selection.categories).toEqual(['md5', 'hash', 'api-key']);
      expect(selection.alternatives.map(a => a.patternName)).toEqual([
        'md5',
        'hash',
        'hash',
        'hash',
        'api-key',
        'api-key',
      ]);
    });
  });

  describe('Custom pattern', () => {
    it('should select only the custom pattern when no categories are named', () => {
      const selection = resolveSelection(registry, { customPattern: '[A-Z]{2}-\\d{3}' });
      expect(selection.categories).toEqual([]);
      expect(selection.customPattern).toBe('[A-Z]{2}-\\d{3}');
      expect(selection.alternatives.map(a => a.patternName)).toEqual(['custom']);
    });

    it('should order the custom pattern after every category', () => {
      const selection = resolveSelection(registry, { categories: ['number'], customPattern: 'x+' });
      expect(selection.alternatives.map(a => a.patternName)).toEqual(['number', 'custom']);
    });

    it('should reject a pattern with a syntax error', () => {
      expect(malformedReason('(')).toMatch(/^Invalid pattern "\(": /);
    });

    it('should reject a pattern that matches empty text', () => {
      expect(malformedReason('a|')).toBe('Invalid pattern "a|": pattern matches empty text');
      expect(malformedReason('\\d*')).toBe('Invalid pattern "\\d*": pattern matches empty text');
    });

    it('should reject a pattern whose assertions alone can match', () => {
      expect(malformedReason('\\b|foo')).toBe('Invalid pattern "\\b|foo": pattern matches empty text');
      expect(malformedReason('(?=a)')).toBe('Invalid pattern "(?=a)": pattern matches empty text');
    });

    it('should accept assertions around consumed text', () => {
      const selection = resolveSelection(registry, { customPattern: '\\bfoo\\b' });
      expect(selection.alternatives.map(a => a.patternName)).toEqual(['custom']);
    });
  });

  describe('Compiled form', () => {
    it('should compile sticky alternatives and a global prefilter', () => {
      const selection = resolveSelection(registry, { categories: ['number'] });
      expect(selection.alternatives[0]?.regex.sticky).toBe(true);
      expect(selection.prefilter.global).toBe(true);
    });

    it('should compile an empty selection that never matches', () => {
      const selection = resolveSelection(new PatternRegistry());
      expect(selection.alternatives).toEqual([]);
      expect(selection.prefilter.test('abc 123')).toBe(false);
    });

    it('should freeze the result', () => {
      const selection = resolveSelection(registry, { categories: ['word'] });
      expect(Object.isFrozen(selection)).toBe(true);
      expect(Object.isFrozen(selection.categories)).toBe(true);
      expect(Object.isFrozen(selection.alternatives)).toBe(true);
    });
  });
});
