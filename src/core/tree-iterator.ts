import type { RedBlackTree } from './red-black-tree.js';
import { RBNode, successor, predecessor } from './node.js';
import { assertPrecondition } from './errors.js';

/**
 * Cursor into a RedBlackTree
 *
 * A cursor is an immutable (tree, node) pair; `next()` and `prev()` return new
 * cursors. A null node is End, the position just past the maximum. Movement
 * walks parent links, so no stack is kept and a cursor stays valid while
 * other items are inserted or deleted. Using a cursor whose own item has been
 * deleted throws a PreconditionError.
 */
export class TreeIterator<T> {
  private readonly tree: RedBlackTree<T>;
  private readonly node: RBNode<T> | null;

  constructor(tree: RedBlackTree<T>, node: RBNode<T> | null) {
    this.tree = tree;
    this.node = node;
  }

  /**
   * True when the cursor is past the maximum item
   */
  isEnd(): boolean {
    return this.node === null;
  }

  /**
   * True when the cursor is at the minimum item. An empty tree's cursors are
   * both Begin and End.
   */
  isBegin(): boolean {
    return this.node === this.tree.firstNode();
  }

  /**
   * Returns the item under the cursor
   * REQUIRES: !isEnd()
   */
  item(): T {
    return this.liveNode('item()').item;
  }

  /**
   * Returns a cursor on the next larger item, or End after the maximum
   * REQUIRES: !isEnd()
   */
  next(): TreeIterator<T> {
    return new TreeIterator(this.tree, successor(this.liveNode('next()')));
  }

  /**
   * Returns a cursor on the next smaller item. From End this is the maximum.
   * REQUIRES: !isBegin()
   */
  prev(): TreeIterator<T> {
    assertPrecondition(!this.isBegin(), 'prev() called on a Begin iterator');
    if (this.node === null) {
      // Not Begin, so the tree has at least one item
      return new TreeIterator(this.tree, this.tree.lastNode());
    }
    return new TreeIterator(this.tree, predecessor(this.liveNode('prev()')));
  }

  /**
   * Two cursors are equal when they belong to the same tree and position
   */
  equals(other: TreeIterator<T>): boolean {
    return this.tree === other.tree && this.node === other.node;
  }

  /** @internal */
  belongsTo(tree: RedBlackTree<T>): boolean {
    return this.tree === tree;
  }

  /** @internal */
  currentNode(): RBNode<T> | null {
    return this.node;
  }

  private liveNode(operation: string): RBNode<T> {
    assertPrecondition(this.node !== null, `${operation} called on an End iterator`);
    assertPrecondition(!this.node.removed, `${operation} called on an iterator whose item was deleted`);
    return this.node;
  }
}
