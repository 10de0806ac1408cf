import { Color, RBNode, leftmost, rightmost } from './node.js';
import { assertInvariant } from './errors.js';
import type { CompareFn } from './red-black-tree.js';

/**
 * Snapshot of the tree fields the checker needs
 */
export interface TreeShape<T> {
  root: RBNode<T> | null;
  minNode: RBNode<T> | null;
  maxNode: RBNode<T> | null;
  size: number;
  compareFn: CompareFn<T>;
}

/**
 * Verifies every red-black property plus the cached fields
 * Walks the whole tree with an explicit stack; O(n).
 * Throws InvariantViolationError naming the first broken property.
 */
export function verifyTree<T>(shape: TreeShape<T>): void {
  const { root, minNode, maxNode, size, compareFn } = shape;

  if (!root) {
    assertInvariant(size === 0, `count is ${size} but the tree is empty`);
    assertInvariant(minNode === null && maxNode === null, 'min/max cache is set on an empty tree');
    return;
  }

  assertInvariant(root.parent === null, 'root has a parent link');
  assertInvariant(root.color === Color.BLACK, 'root is red');
  assertInvariant(minNode === leftmost(root), 'cached minimum is not the leftmost node');
  assertInvariant(maxNode === rightmost(root), 'cached maximum is not the rightmost node');

  // Each frame carries the black count above the node and its exclusive bounds
  interface Frame {
    node: RBNode<T>;
    blacksAbove: number;
    lower: RBNode<T> | null;
    upper: RBNode<T> | null;
  }

  let blackHeight = -1;
  let reachable = 0;
  const stack: Frame[] = [{ node: root, blacksAbove: 0, lower: null, upper: null }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, lower, upper } = frame;
    reachable++;

    assertInvariant(!node.removed, 'a deleted node is still linked');
    if (lower) {
      assertInvariant(compareFn(lower.item, node.item) < 0, 'order violated: item not greater than its lower bound');
    }
    if (upper) {
      assertInvariant(compareFn(node.item, upper.item) < 0, 'order violated: item not less than its upper bound');
    }

    const blacks = frame.blacksAbove + (node.color === Color.BLACK ? 1 : 0);

    for (const child of [node.left, node.right]) {
      if (!child) {
        // A null child position ends a path
        if (blackHeight === -1) {
          blackHeight = blacks;
        }
        assertInvariant(blacks === blackHeight, 'black-height differs between paths');
        continue;
      }
      assertInvariant(child.parent === node, 'child does not link back to its parent');
      if (node.color === Color.RED) {
        assertInvariant(child.color === Color.BLACK, 'red node has a red child');
      }
    }

    if (node.right) {
      stack.push({ node: node.right, blacksAbove: blacks, lower: node, upper });
    }
    if (node.left) {
      stack.push({ node: node.left, blacksAbove: blacks, lower, upper: node });
    }
  }

  assertInvariant(reachable === size, `count is ${size} but ${reachable} nodes are reachable`);
}

/**
 * Height of the tree, counting nodes on the longest root-to-leaf path
 */
export function treeHeight<T>(root: RBNode<T> | null): number {
  if (!root) return 0;

  let height = 0;
  const stack: Array<[RBNode<T>, number]> = [[root, 1]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const [node, depth] = entry;
    height = Math.max(height, depth);
    if (node.left) stack.push([node.left, depth + 1]);
    if (node.right) stack.push([node.right, depth + 1]);
  }
  return height;
}
