import { RedBlackTree } from './red-black-tree.js';
import { TreeIterator } from './tree-iterator.js';
import { IndexEntry, IndexKey, IndexStats, KeyType, RangeQuery, RangeResult, SeekOp } from '../types/ordered-index.js';
import { compareEntries } from '../utils/keys.js';

/**
 * Named ordered index of `{ key, value }` entries
 * Entries live in a Red-Black tree compared by key, so point operations are
 * O(log n) and a range page of k entries costs O(log n + k).
 */
export class SortedIndex {
  private readonly name: string;
  private readonly keyType: KeyType;
  private readonly tree: RedBlackTree<IndexEntry>;
  private lastUpdateTime: number;                      // Timestamp of last modification

  constructor(name: string, keyType: KeyType) {
    this.name = name;
    this.keyType = keyType;
    this.tree = new RedBlackTree<IndexEntry>(compareEntries);
    this.lastUpdateTime = Date.now();
  }

  getKeyType(): KeyType {
    return this.keyType;
  }

  getSize(): number {
    return this.tree.getSize();
  }

  /**
   * Adds an entry
   * @returns false if the key is already present; the stored value is kept
   */
  put(key: IndexKey, value: unknown): boolean {
    const inserted = this.tree.insert({ key, value });
    if (inserted) {
      this.lastUpdateTime = Date.now();
    }
    return inserted;
  }

  get(key: IndexKey): IndexEntry | null {
    return this.tree.get(probe(key));
  }

  /**
   * @returns false if the key was not present
   */
  remove(key: IndexKey): boolean {
    const removed = this.tree.deleteWithKey(probe(key));
    if (removed) {
      this.lastUpdateTime = Date.now();
    }
    return removed;
  }

  /**
   * Nearest entry at or above ('ge') or at or below ('le') the key
   */
  seek(key: IndexKey, op: SeekOp): IndexEntry | null {
    const iter = op === 'ge' ? this.tree.findGE(probe(key)) : this.tree.findLE(probe(key));
    return iter.isEnd() ? null : iter.item();
  }

  /**
   * Reads up to `limit` entries starting at `from` and walking in `direction`
   */
  range(query: RangeQuery): RangeResult {
    const { from, direction, limit, exclusive = false } = query;
    const ascending = direction === 'asc';

    let iter: TreeIterator<IndexEntry>;
    if (from === undefined) {
      iter = ascending ? this.tree.begin() : this.lastEntry();
    } else {
      iter = ascending ? this.tree.findGE(probe(from)) : this.tree.findLE(probe(from));
      if (exclusive && !iter.isEnd() && iter.item().key === from) {
        iter = this.step(iter, ascending);
      }
    }

    const entries: IndexEntry[] = [];
    while (!iter.isEnd() && entries.length < limit) {
      entries.push(iter.item());
      iter = this.step(iter, ascending);
    }

    return {
      entries,
      nextKey: iter.isEnd() ? null : iter.item().key
    };
  }

  stats(): IndexStats {
    const min = this.tree.findMin();
    const max = this.tree.findMax();
    return {
      name: this.name,
      keyType: this.keyType,
      size: this.tree.getSize(),
      min: min ? min.key : null,
      max: max ? max.key : null,
      height: this.tree.height(),
      lastUpdateTime: this.lastUpdateTime
    };
  }

  entries(): IterableIterator<IndexEntry> {
    return this.tree.inOrderTraversal();
  }

  /**
   * Removes every entry
   */
  clear(): void {
    // Deleting through the Begin cursor never invalidates the next one
    let iter = this.tree.begin();
    while (!iter.isEnd()) {
      const next = iter.next();
      this.tree.deleteWithIterator(iter);
      iter = next;
    }
    this.lastUpdateTime = Date.now();
  }

  /** @internal */
  assertInvariants(): void {
    this.tree.assertInvariants();
  }

  // Last entry, or End when the index is empty
  private lastEntry(): TreeIterator<IndexEntry> {
    const end = this.tree.end();
    return end.isBegin() ? end : end.prev();
  }

  // Moving past the first entry in descending order lands on End
  private step(iter: TreeIterator<IndexEntry>, ascending: boolean): TreeIterator<IndexEntry> {
    if (ascending) {
      return iter.next();
    }
    return iter.isBegin() ? this.tree.end() : iter.prev();
  }
}

function probe(key: IndexKey): IndexEntry {
  return { key, value: undefined };
}
