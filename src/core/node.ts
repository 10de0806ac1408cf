/**
 * Node colors used to maintain the balance properties
 * RED = 0: new nodes start red so an insertion never changes black-height
 * BLACK = 1: black nodes carry the height balance constraint
 */
export enum Color {
  RED = 0,
  BLACK = 1
}

/**
 * Red-Black tree vertex
 * `left` and `right` own their subtrees; `parent` is only a back-reference
 * used for traversal and by the fixups.
 */
export interface RBNode<T> {
  item: T;                       // Stored item, ordered by the tree's comparator
  color: Color;                  // RED or BLACK for balancing
  left: RBNode<T> | null;        // Left child (smaller items)
  right: RBNode<T> | null;       // Right child (larger items)
  parent: RBNode<T> | null;      // Parent node, null at the root
  removed: boolean;              // Set once deletion unlinks the node
}

export function createNode<T>(item: T): RBNode<T> {
  return {
    item,
    color: Color.RED,
    left: null,
    right: null,
    parent: null,
    removed: false
  };
}

// Missing children count as black leaves.
export function colorOf<T>(node: RBNode<T> | null): Color {
  return node ? node.color : Color.BLACK;
}

export function isLeftChild<T>(node: RBNode<T>): boolean {
  return node.parent !== null && node.parent.left === node;
}

export function isRightChild<T>(node: RBNode<T>): boolean {
  return node.parent !== null && node.parent.right === node;
}

/**
 * Finds the minimum node in a subtree (leftmost node)
 */
export function leftmost<T>(node: RBNode<T>): RBNode<T> {
  while (node.left) {
    node = node.left;
  }
  return node;
}

/**
 * Finds the maximum node in a subtree (rightmost node)
 */
export function rightmost<T>(node: RBNode<T>): RBNode<T> {
  while (node.right) {
    node = node.right;
  }
  return node;
}

/**
 * In-order successor using parent links only
 * @returns The next larger node, or null when `node` is the maximum
 */
export function successor<T>(node: RBNode<T>): RBNode<T> | null {
  if (node.right) {
    return leftmost(node.right);
  }

  // Climb until we arrive at an ancestor through its left edge
  let current = node;
  let parent = current.parent;
  while (parent && parent.right === current) {
    current = parent;
    parent = parent.parent;
  }
  return parent;
}

/**
 * In-order predecessor, the mirror of `successor`
 * @returns The next smaller node, or null when `node` is the minimum
 */
export function predecessor<T>(node: RBNode<T>): RBNode<T> | null {
  if (node.left) {
    return rightmost(node.left);
  }

  let current = node;
  let parent = current.parent;
  while (parent && parent.left === current) {
    current = parent;
    parent = parent.parent;
  }
  return parent;
}
