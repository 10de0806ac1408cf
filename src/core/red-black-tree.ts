import {
  Color,
  RBNode,
  createNode,
  colorOf,
  isLeftChild,
  isRightChild,
  leftmost,
  rightmost,
  successor,
  predecessor
} from './node.js';
import { TreeIterator } from './tree-iterator.js';
import { assertPrecondition, requireNode } from './errors.js';
import { verifyTree, treeHeight } from './invariants.js';

/**
 * Total order over items: <0 if a<b, 0 if a==b, >0 if a>b
 * Must stay fixed for the lifetime of a tree.
 */
export type CompareFn<T> = (a: T, b: T) => number;

// Equal infinities must compare as 0, so no subtraction
export const compareNumbers: CompareFn<number> = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

// Code-unit order, so it agrees with === on equality
export const compareStrings: CompareFn<string> = (a, b) => (a < b ? -1 : a > b ? 1 : 0);

interface SearchResult<T> {
  node: RBNode<T> | null;   // Smallest node >= key, null when every item < key
  exact: boolean;           // node.item == key
}

/**
 * Self-balancing binary search tree used as a sorted set
 * Guarantees O(log n) insert, delete and search, and keeps the minimum and
 * maximum nodes cached so Begin and a step back from End are O(1).
 *
 * Key properties:
 * - All RED nodes have BLACK children (no consecutive RED nodes)
 * - Every path from a node to a leaf contains the same number of BLACK nodes
 * - Root is always BLACK
 * - New insertions are always RED initially
 *
 * Items equal under the comparator are rejected, so a map is built by storing
 * `{ key, value }` items and comparing keys only.
 */
export class RedBlackTree<T> implements Iterable<T> {
  private root: RBNode<T> | null = null;      // Root of the tree
  private minNode: RBNode<T> | null = null;   // Leftmost node, null iff empty
  private maxNode: RBNode<T> | null = null;   // Rightmost node, null iff empty
  private size = 0;                           // Node count for O(1) size queries
  private readonly compareFn: CompareFn<T>;

  /**
   * @param compareFn - Comparison function defining the order of items
   *                    For numbers: compareNumbers ascending, (a, b) => compareNumbers(b, a) descending
   */
  constructor(compareFn: CompareFn<T>) {
    this.compareFn = compareFn;
  }

  /**
   * Returns the number of items in the tree
   */
  getSize(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Finds the stored item equal to key
   * @returns The stored item (not `key` itself), or null if not found
   */
  get(key: T): T | null {
    const { node, exact } = this.findGENode(key);
    return exact && node ? node.item : null;
  }

  has(key: T): boolean {
    return this.findGENode(key).exact;
  }

  /**
   * Iterator on the minimum item, or End when the tree is empty
   */
  begin(): TreeIterator<T> {
    return new TreeIterator(this, this.minNode);
  }

  /**
   * Iterator positioned past the maximum item
   */
  end(): TreeIterator<T> {
    return new TreeIterator(this, null);
  }

  /**
   * Finds the smallest item >= key
   * @returns Iterator on that item, End if every item is smaller than key
   */
  findGE(key: T): TreeIterator<T> {
    return new TreeIterator(this, this.findGENode(key).node);
  }

  /**
   * Finds the largest item <= key
   * @returns Iterator on that item, End if every item is larger than key
   */
  findLE(key: T): TreeIterator<T> {
    const { node, exact } = this.findGENode(key);
    if (exact) {
      return new TreeIterator(this, node);
    }
    if (node) {
      return new TreeIterator(this, predecessor(node));
    }
    // key is above every item
    return new TreeIterator(this, this.maxNode);
  }

  findMin(): T | null {
    return this.minNode ? this.minNode.item : null;
  }

  findMax(): T | null {
    return this.maxNode ? this.maxNode.item : null;
  }

  /**
   * Inserts an item unless an equal one is already present
   * Time complexity: O(log n)
   * @returns false if an equal item exists (the tree is left unchanged)
   */
  insert(item: T): boolean {
    const node = createNode(item);
    if (!this.attach(node)) {
      return false;
    }
    this.fixAfterInsertion(node);
    return true;
  }

  /**
   * Removes the item equal to key
   * Time complexity: O(log n)
   * @returns false if no equal item is present
   */
  deleteWithKey(key: T): boolean {
    const { node, exact } = this.findGENode(key);
    if (!exact || !node) {
      return false;
    }
    this.deleteNode(node);
    return true;
  }

  /**
   * Removes the item under the iterator. Iterators on other items stay valid;
   * the passed iterator and its copies become unusable.
   * REQUIRES: iter belongs to this tree, is not End and its item is still present
   */
  deleteWithIterator(iter: TreeIterator<T>): void {
    assertPrecondition(iter.belongsTo(this), 'deleteWithIterator() called with an iterator of another tree');
    const node = iter.currentNode();
    assertPrecondition(node !== null, 'deleteWithIterator() called with an End iterator');
    assertPrecondition(!node.removed, 'deleteWithIterator() called with an iterator whose item was already deleted');
    this.deleteNode(node);
  }

  /**
   * Items in ascending order
   */
  *inOrderTraversal(): IterableIterator<T> {
    for (let node = this.minNode; node; node = successor(node)) {
      yield node.item;
    }
  }

  /**
   * Items in descending order
   */
  *reverseOrderTraversal(): IterableIterator<T> {
    for (let node = this.maxNode; node; node = predecessor(node)) {
      yield node.item;
    }
  }

  [Symbol.iterator](): Iterator<T> {
    return this.inOrderTraversal();
  }

  /**
   * Checks ordering, coloring, black-height, parent links and the cached
   * min/max/count. O(n); meant for tests and debugging.
   * @throws InvariantViolationError naming the first violated property
   */
  assertInvariants(): void {
    verifyTree({
      root: this.root,
      minNode: this.minNode,
      maxNode: this.maxNode,
      size: this.size,
      compareFn: this.compareFn
    });
  }

  /**
   * Number of nodes on the longest root-to-leaf path
   */
  height(): number {
    return treeHeight(this.root);
  }

  /** @internal */
  firstNode(): RBNode<T> | null {
    return this.minNode;
  }

  /** @internal */
  lastNode(): RBNode<T> | null {
    return this.maxNode;
  }

  /**
   * Descends towards key and returns the smallest node >= key
   */
  private findGENode(key: T): SearchResult<T> {
    let current = this.root;
    while (current) {
      const cmp = this.compareFn(key, current.item);
      if (cmp === 0) {
        return { node: current, exact: true };
      }
      if (cmp < 0) {
        if (!current.left) {
          // current is the first node above key
          return { node: current, exact: false };
        }
        current = current.left;
      } else {
        if (!current.right) {
          const next = successor(current);
          if (!next) {
            return { node: null, exact: false };
          }
          return { node: next, exact: this.compareFn(key, next.item) === 0 };
        }
        current = current.right;
      }
    }
    return { node: null, exact: false };
  }

  /**
   * Plain BST insertion of a detached red node, keeping count and the
   * min/max cache current
   * @returns false when an equal item is already present
   */
  private attach(node: RBNode<T>): boolean {
    if (!this.root) {
      this.root = node;
      this.minNode = node;
      this.maxNode = node;
      this.size++;
      return true;
    }

    let parent = this.root;
    for (;;) {
      const cmp = this.compareFn(node.item, parent.item);
      if (cmp === 0) {
        return false;
      }
      const next = cmp < 0 ? parent.left : parent.right;
      if (next) {
        parent = next;
        continue;
      }

      node.parent = parent;
      if (cmp < 0) {
        parent.left = node;
        // Only a left attachment can produce a new minimum
        if (this.minNode && this.compareFn(node.item, this.minNode.item) < 0) {
          this.minNode = node;
        }
      } else {
        parent.right = node;
        if (this.maxNode && this.compareFn(node.item, this.maxNode.item) > 0) {
          this.maxNode = node;
        }
      }
      this.size++;
      return true;
    }
  }

  /**
   * Restores the red-black properties after a red leaf was attached
   * Iterates up the tree rather than recursing.
   */
  private fixAfterInsertion(node: RBNode<T>): void {
    let n = node;
    for (;;) {
      const parent = n.parent;

      // Case 1: n is the root
      if (!parent) {
        n.color = Color.BLACK;
        return;
      }

      // Case 2: black parent, nothing is violated
      if (parent.color === Color.BLACK) {
        return;
      }

      // A red parent is never the root, so the grandparent exists
      const grandparent = requireNode(parent.parent, 'grandparent of a red node');
      const uncle = isLeftChild(parent) ? grandparent.right : grandparent.left;

      // Case 3: red uncle - recolor and continue from the grandparent
      if (uncle && uncle.color === Color.RED) {
        parent.color = Color.BLACK;
        uncle.color = Color.BLACK;
        grandparent.color = Color.RED;
        n = grandparent;
        continue;
      }

      // Case 4: inner grandchild - rotate it to the outside and retry from the old parent
      if (isRightChild(n) && isLeftChild(parent)) {
        this.rotateLeft(parent);
        n = parent;
        continue;
      }
      if (isLeftChild(n) && isRightChild(parent)) {
        this.rotateRight(parent);
        n = parent;
        continue;
      }

      // Case 5: outer grandchild - rotate the grandparent away from n
      parent.color = Color.BLACK;
      grandparent.color = Color.RED;
      if (isLeftChild(n)) {
        this.rotateRight(grandparent);
      } else {
        this.rotateLeft(grandparent);
      }
      return;
    }
  }

  /**
   * Unlinks a live node and rebalances
   * A node with two children first trades places with its in-order
   * predecessor, so the node being unlinked always has at most one child.
   */
  private deleteNode(node: RBNode<T>): void {
    if (this.minNode === node) {
      this.minNode = null;
    }
    if (this.maxNode === node) {
      this.maxNode = null;
    }
    this.size--;

    if (node.left && node.right) {
      this.swapWithPredecessor(node, node.left, node.right);
    }

    const child = node.right ?? node.left;

    // Removing a black node shortens its paths; fix up while the sibling is still in place
    if (node.color === Color.BLACK) {
      this.fixAfterDeletion(node);
    }

    const wasRoot = node.parent === null;
    this.replaceNode(node, child);
    if (wasRoot && child) {
      child.color = Color.BLACK;
    }

    node.parent = null;
    node.left = null;
    node.right = null;
    node.removed = true;

    if (this.root) {
      if (!this.minNode) {
        this.minNode = leftmost(this.root);
      }
      if (!this.maxNode) {
        this.maxNode = rightmost(this.root);
      }
    }
  }

  /**
   * Exchanges the tree positions and colors of `node` and its in-order
   * predecessor by relinking. Items stay in their nodes, so iterators keep
   * pointing at the same items. Afterwards `node` sits in the predecessor's
   * old slot with no right child.
   */
  private swapWithPredecessor(node: RBNode<T>, left: RBNode<T>, right: RBNode<T>): void {
    const pred = rightmost(left);
    const predParent = requireNode(pred.parent, 'parent of the predecessor');
    const predLeft = pred.left;
    const predColor = pred.color;

    // pred takes node's slot and color
    this.replaceNode(node, pred);
    pred.color = node.color;
    pred.right = right;
    right.parent = pred;

    if (predParent === node) {
      // Adjacent: pred was node's left child, node drops in as pred's left child
      pred.left = node;
      node.parent = pred;
    } else {
      // pred was the right child of a node deeper in the left subtree
      pred.left = left;
      left.parent = pred;
      predParent.right = node;
      node.parent = predParent;
    }

    // node takes pred's old children (pred had no right child) and color
    node.left = predLeft;
    if (predLeft) {
      predLeft.parent = node;
    }
    node.right = null;
    node.color = predColor;
  }

  /**
   * Restores black-height around a black node that is about to be unlinked
   * `node` is still in the tree, so its sibling can be read directly.
   */
  private fixAfterDeletion(node: RBNode<T>): void {
    let n = node;
    for (;;) {
      const parent = n.parent;
      if (!parent) {
        return;
      }
      const nIsLeft = parent.left === n;
      let sibling = requireNode(nIsLeft ? parent.right : parent.left, 'sibling of a black node');

      // Case 1: red sibling - rotate it above the parent so the new sibling is black
      if (sibling.color === Color.RED) {
        parent.color = Color.RED;
        sibling.color = Color.BLACK;
        if (nIsLeft) {
          this.rotateLeft(parent);
        } else {
          this.rotateRight(parent);
        }
        sibling = requireNode(nIsLeft ? parent.right : parent.left, 'sibling after rotation');
      }

      const nephewsBlack = colorOf(sibling.left) === Color.BLACK && colorOf(sibling.right) === Color.BLACK;

      // Case 2: everything black - push the deficit up to the parent
      if (parent.color === Color.BLACK && sibling.color === Color.BLACK && nephewsBlack) {
        sibling.color = Color.RED;
        n = parent;
        continue;
      }

      // Case 3/4: red parent, black sibling and nephews - swap parent and sibling colors
      if (parent.color === Color.RED && sibling.color === Color.BLACK && nephewsBlack) {
        sibling.color = Color.RED;
        parent.color = Color.BLACK;
        return;
      }

      // Case 5: near nephew red, far nephew black - rotate the red nephew outward
      const nearNephew = nIsLeft ? sibling.left : sibling.right;
      const farNephew = nIsLeft ? sibling.right : sibling.left;
      if (colorOf(nearNephew) === Color.RED && colorOf(farNephew) === Color.BLACK) {
        const near = requireNode(nearNephew, 'near nephew');
        sibling.color = Color.RED;
        near.color = Color.BLACK;
        if (nIsLeft) {
          this.rotateRight(sibling);
        } else {
          this.rotateLeft(sibling);
        }
        sibling = near;
      }

      // Case 6: far nephew red - rotate the parent toward n
      sibling.color = parent.color;
      parent.color = Color.BLACK;
      const far = requireNode(nIsLeft ? sibling.right : sibling.left, 'red far nephew');
      far.color = Color.BLACK;
      if (nIsLeft) {
        this.rotateLeft(parent);
      } else {
        this.rotateRight(parent);
      }
      return;
    }
  }

  /**
   * Points whichever link referenced oldNode (root or a parent's child slot)
   * at newNode
   */
  private replaceNode(oldNode: RBNode<T>, newNode: RBNode<T> | null): void {
    const parent = oldNode.parent;
    if (!parent) {
      this.root = newNode;
    } else if (parent.left === oldNode) {
      parent.left = newNode;
    } else {
      parent.right = newNode;
    }
    if (newNode) {
      newNode.parent = parent;
    }
  }

  /*
   *     X              Y
   *   A   Y    =>    X   C
   *      B C        A B
   */
  private rotateLeft(x: RBNode<T>): void {
    const y = requireNode(x.right, 'right child to rotate left');

    // Move B under X
    x.right = y.left;
    if (y.left) {
      y.left.parent = x;
    }

    this.replaceNode(x, y);
    y.left = x;
    x.parent = y;
  }

  /*
   *       Y          X
   *     X   C  =>  A   Y
   *    A B            B C
   */
  private rotateRight(y: RBNode<T>): void {
    const x = requireNode(y.left, 'left child to rotate right');

    // Move B under Y
    y.left = x.right;
    if (x.right) {
      x.right.parent = y;
    }

    this.replaceNode(y, x);
    x.right = y;
    y.parent = x;
  }
}
