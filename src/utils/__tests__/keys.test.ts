import { describe, it, expect } from 'vitest';
import { compareEntries, parseKey, validateKey } from '../keys.js';
import { InvalidKeyError } from '../error-utils.js';

describe('Key Utils', () => {
  describe('parseKey', () => {
    it('should parse number keys', () => {
      expect(parseKey('42', 'number')).toBe(42);
      expect(parseKey(' -1.5 ', 'number')).toBe(-1.5);
      expect(parseKey('1e3', 'number')).toBe(1000);
    });

    it('should reject keys that are not finite numbers', () => {
      expect(() => parseKey('abc', 'number')).toThrow(InvalidKeyError);
      expect(() => parseKey('', 'number')).toThrow('Key "" is not a finite number');
      expect(() => parseKey('Infinity', 'number')).toThrow('Key "Infinity" is not a finite number');
    });

    it('should take string keys as-is', () => {
      expect(parseKey('007', 'string')).toBe('007');
      expect(parseKey(' padded ', 'string')).toBe(' padded ');
    });
  });

  describe('validateKey', () => {
    it('should accept keys of the index type', () => {
      expect(validateKey(3, 'number')).toBe(3);
      expect(validateKey('a', 'string')).toBe('a');
    });

    it('should reject keys of another type', () => {
      expect(() => validateKey('3', 'number')).toThrow('Key "3" is not a finite number');
      expect(() => validateKey(3, 'string')).toThrow('Key 3 is not a string');
      expect(() => validateKey(null, 'string')).toThrow('Key null is not a string');
      expect(() => validateKey(Number.POSITIVE_INFINITY, 'number')).toThrow(InvalidKeyError);
    });
  });

  describe('compareEntries', () => {
    it('should order entries by key and ignore values', () => {
      expect(compareEntries({ key: 1, value: 'z' }, { key: 2, value: 'a' })).toBeLessThan(0);
      expect(compareEntries({ key: 'b', value: null }, { key: 'a', value: null })).toBeGreaterThan(0);
      expect(compareEntries({ key: 5, value: 'x' }, { key: 5, value: 'y' })).toBe(0);
    });

    it('should put numbers before strings', () => {
      expect(compareEntries({ key: 100, value: null }, { key: '1', value: null })).toBe(-1);
      expect(compareEntries({ key: '1', value: null }, { key: 100, value: null })).toBe(1);
    });
  });
});
