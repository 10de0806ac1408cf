import { describe, it, expect, beforeEach } from 'vitest';
import { faker } from '@faker-js/faker';
import { RedBlackTree, compareNumbers } from '../red-black-tree.js';
import { TreeIterator } from '../tree-iterator.js';

/**
 * Sorted-array model of the tree used as an oracle
 * Positions are array indexes; `data.length` plays the role of End.
 */
class SortedArrayOracle {
  readonly data: number[] = [];

  insert(key: number): boolean {
    const index = this.lowerBound(key);
    if (this.data[index] === key) return false;
    this.data.splice(index, 0, key);
    return true;
  }

  delete(key: number): boolean {
    const index = this.lowerBound(key);
    if (this.data[index] !== key) return false;
    this.data.splice(index, 1);
    return true;
  }

  findGE(key: number): number {
    return this.lowerBound(key);
  }

  findLE(key: number): number {
    const index = this.lowerBound(key);
    if (this.data[index] === key) return index;
    return index === 0 ? this.data.length : index - 1;
  }

  randomKey(): number {
    return faker.helpers.arrayElement(this.data);
  }

  private lowerBound(key: number): number {
    let lo = 0;
    let hi = this.data.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const value = this.data[mid];
      if (value !== undefined && value < key) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}

/**
 * Walks forward to End and backward to Begin from matching positions and
 * checks that the tree and the oracle agree at every step
 */
function compareContents(oracle: SortedArrayOracle, start: number, titer: TreeIterator<number>): void {
  const { data } = oracle;

  let index = start;
  let iter = titer;
  while (index < data.length && !iter.isEnd()) {
    expect(iter.item()).toBe(data[index]);
    index++;
    iter = iter.next();
  }
  expect(iter.isEnd()).toBe(true);
  expect(index).toBe(data.length);

  index = start;
  iter = titer;
  while (index > 0 && !iter.isBegin()) {
    if (index >= data.length) {
      expect(iter.isEnd()).toBe(true);
    } else {
      expect(iter.item()).toBe(data[index]);
    }
    index--;
    iter = iter.prev();
  }
  expect(iter.isBegin()).toBe(true);
  expect(index).toBe(0);
}

describe('RedBlackTree randomized model equivalence', () => {
  beforeEach(() => {
    faker.seed(20121006);
  });

  it('should match a sorted array under random inserts, deletes and searches', () => {
    const numKeys = 1000;
    const oracle = new SortedArrayOracle();
    const tree = new RedBlackTree<number>(compareNumbers);
    let inserted = 0;
    let deleted = 0;

    for (let i = 0; i < 5000; i++) {
      const op = faker.number.int({ min: 0, max: 99 });

      if (op < 50) {
        const key = faker.number.int({ min: 0, max: numKeys - 1 });
        const expected = oracle.insert(key);
        expect(tree.insert(key)).toBe(expected);
        if (expected) inserted++;
        tree.assertInvariants();
        compareContents(oracle, oracle.findGE(-1), tree.findGE(-1));
      } else if (op < 90 && oracle.data.length > 0) {
        const key = oracle.randomKey();
        oracle.delete(key);
        expect(tree.deleteWithKey(key)).toBe(true);
        deleted++;
        tree.assertInvariants();
        compareContents(oracle, oracle.findGE(-1), tree.findGE(-1));
      } else if (op < 95) {
        const key = faker.number.int({ min: 0, max: numKeys - 1 });
        compareContents(oracle, oracle.findGE(key), tree.findGE(key));
      } else {
        const key = faker.number.int({ min: 0, max: numKeys - 1 });
        compareContents(oracle, oracle.findLE(key), tree.findLE(key));
      }

      expect(tree.getSize()).toBe(inserted - deleted);
    }
  });

  it('should reject absent keys exactly like the oracle', () => {
    const oracle = new SortedArrayOracle();
    const tree = new RedBlackTree<number>(compareNumbers);

    for (let i = 0; i < 2000; i++) {
      const key = faker.number.int({ min: 0, max: 199 });
      if (faker.datatype.boolean()) {
        expect(tree.insert(key)).toBe(oracle.insert(key));
      } else {
        expect(tree.deleteWithKey(key)).toBe(oracle.delete(key));
      }
    }

    tree.assertInvariants();
    expect([...tree]).toEqual(oracle.data);
    expect(tree.findMin()).toBe(oracle.data[0] ?? null);
    expect(tree.findMax()).toBe(oracle.data[oracle.data.length - 1] ?? null);
  });

  it('should keep every other cursor valid while small trees are emptied', () => {
    // Small trees put the in-order predecessor next to the deleted node often
    for (let round = 0; round < 300; round++) {
      const tree = new RedBlackTree<number>(compareNumbers);
      const size = faker.number.int({ min: 2, max: 12 });
      const keys = faker.helpers.shuffle(Array.from({ length: size }, (_, i) => i));
      keys.forEach(key => tree.insert(key));

      const cursors = new Map<number, TreeIterator<number>>();
      for (const key of keys) {
        cursors.set(key, tree.findGE(key));
      }

      for (const key of faker.helpers.shuffle([...keys])) {
        const cursor = cursors.get(key);
        expect(cursor).toBeDefined();
        if (!cursor) continue;

        tree.deleteWithIterator(cursor);
        cursors.delete(key);
        tree.assertInvariants();

        for (const [otherKey, other] of cursors) {
          expect(other.item()).toBe(otherKey);
        }
      }

      expect(tree.isEmpty()).toBe(true);
    }
  });

  it('should keep invariants while deleting interior nodes of a large tree', () => {
    // Interior nodes of a large tree mostly have a predecessor deep in the left subtree
    const tree = new RedBlackTree<number>(compareNumbers);
    const keys = faker.helpers.shuffle(Array.from({ length: 2000 }, (_, i) => i));
    keys.forEach(key => tree.insert(key));

    const remaining = new Set(keys);
    for (let i = 0; i < 1000; i++) {
      const key = faker.helpers.arrayElement([...remaining]);
      const before = tree.findGE(key);
      const neighbour = before.isBegin() ? null : before.prev();

      tree.deleteWithKey(key);
      remaining.delete(key);

      if (neighbour) {
        const expectedNext = tree.findGE(key);
        expect(neighbour.next().equals(expectedNext)).toBe(true);
      }
      if (i % 50 === 0) {
        tree.assertInvariants();
      }
    }

    tree.assertInvariants();
    expect([...tree]).toEqual([...remaining].sort((a, b) => a - b));
  });
});
