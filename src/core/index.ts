export { RedBlackTree, compareNumbers, compareStrings } from './red-black-tree.js';
export type { CompareFn } from './red-black-tree.js';
export { TreeIterator } from './tree-iterator.js';
export { PreconditionError, InvariantViolationError } from './errors.js';
