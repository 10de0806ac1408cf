/**
 * Key parsing and ordering for keyed index entries
 */
import { CompareFn, compareNumbers, compareStrings } from '../core/index.js';
import { IndexEntry, IndexKey, KeyType } from '../types/ordered-index.js';
import { InvalidKeyError } from './error-utils.js';

/**
 * Parses a key taken from a URL path or query string
 * Number keys must be finite; string keys are taken as-is.
 */
export function parseKey(raw: string, keyType: KeyType): IndexKey {
  if (keyType === 'string') {
    return raw;
  }
  const trimmed = raw.trim();
  const num = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(num)) {
    throw new InvalidKeyError(`Key "${raw}" is not a finite number`);
  }
  return num;
}

/**
 * Checks a key that arrived already typed (e.g. in a JSON body)
 */
export function validateKey(key: unknown, keyType: KeyType): IndexKey {
  if (keyType === 'number') {
    if (typeof key !== 'number' || !Number.isFinite(key)) {
      throw new InvalidKeyError(`Key ${JSON.stringify(key)} is not a finite number`);
    }
    return key;
  }
  if (typeof key !== 'string') {
    throw new InvalidKeyError(`Key ${JSON.stringify(key)} is not a string`);
  }
  return key;
}

/**
 * Orders entries by key only. An index holds keys of a single type; should
 * the types ever mix, numbers sort before strings.
 */
export const compareEntries: CompareFn<IndexEntry> = (a, b) => {
  if (typeof a.key === 'number' && typeof b.key === 'number') {
    return compareNumbers(a.key, b.key);
  }
  if (typeof a.key === 'string' && typeof b.key === 'string') {
    return compareStrings(a.key, b.key);
  }
  return typeof a.key === 'number' ? -1 : 1;
};
