import { describe, it, expect, beforeEach } from 'vitest';
import { faker } from '@faker-js/faker';
import { RedBlackTree, compareNumbers } from '../red-black-tree.js';
import { SortedIndex } from '../sorted-index.js';

describe('Performance Tests', () => {
  describe('Red-Black Tree Performance', () => {
    let tree: RedBlackTree<number>;

    beforeEach(() => {
      tree = new RedBlackTree<number>(compareNumbers);
    });

    it('should handle 100K insertions in under 5 seconds', () => {
      const numInsertions = 100000;
      const startTime = Date.now();

      for (let i = 0; i < numInsertions; i++) {
        tree.insert(Math.floor(Math.random() * numInsertions * 2));
      }

      const duration = Date.now() - startTime;
      console.log(`${numInsertions} insertions took ${duration}ms`);

      expect(duration).toBeLessThan(5000);
      expect(tree.getSize()).toBeGreaterThan(numInsertions * 0.7); // Allow for duplicates
      expect(tree.height()).toBeLessThanOrEqual(2 * Math.log2(tree.getSize() + 1));
    });

    it('should handle 50K lookups in under 1 second', () => {
      const numItems = 10000;
      for (let i = 0; i < numItems; i++) {
        tree.insert(i * 2);
      }

      const numLookups = 50000;
      const startTime = Date.now();
      let hits = 0;

      for (let i = 0; i < numLookups; i++) {
        const key = Math.floor(Math.random() * numItems) * 2;
        if (tree.get(key) === key) hits++;
      }

      const duration = Date.now() - startTime;
      console.log(`${numLookups} lookups took ${duration}ms`);

      expect(hits).toBe(numLookups);
      expect(duration).toBeLessThan(1000);
    });

    it('should handle mixed operations under load', () => {
      const operations = 50000;
      const startTime = Date.now();
      let insertCount = 0;
      let deleteCount = 0;
      let findCount = 0;

      for (let i = 0; i < operations; i++) {
        const operation = Math.random();
        const key = Math.floor(Math.random() * 10000);

        if (operation < 0.5) {
          tree.insert(key);
          insertCount++;
        } else if (operation < 0.7) {
          tree.deleteWithKey(key);
          deleteCount++;
        } else {
          tree.findLE(key);
          findCount++;
        }
      }

      const duration = Date.now() - startTime;
      console.log(`Mixed operations (${insertCount} inserts, ${deleteCount} deletes, ${findCount} finds) took ${duration}ms`);

      expect(duration).toBeLessThan(3000);
      tree.assertInvariants();
    });

    it('should iterate 100K items in under 1 second', () => {
      for (let i = 0; i < 100000; i++) {
        tree.insert(i);
      }

      const startTime = Date.now();
      let count = 0;
      for (let iter = tree.begin(); !iter.isEnd(); iter = iter.next()) {
        count++;
      }
      const duration = Date.now() - startTime;
      console.log(`Cursor walk over ${count} items took ${duration}ms`);

      expect(count).toBe(100000);
      expect(duration).toBeLessThan(1000);
    });
  });

  describe('SortedIndex Performance', () => {
    it('should serve 10K range pages of 50 entries in under 3 seconds', () => {
      const index = new SortedIndex('bench', 'string');
      for (let i = 0; i < 50000; i++) {
        index.put(faker.string.alphanumeric(12), i);
      }

      const startTime = Date.now();
      for (let i = 0; i < 10000; i++) {
        const page = index.range({
          from: faker.string.alphanumeric(4),
          direction: i % 2 === 0 ? 'asc' : 'desc',
          limit: 50
        });
        expect(page.entries.length).toBeLessThanOrEqual(50);
      }
      const duration = Date.now() - startTime;
      console.log(`10000 range pages took ${duration}ms`);

      expect(duration).toBeLessThan(3000);
    });
  });
});
