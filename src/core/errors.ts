/**
 * Thrown when a caller breaks an operation's contract, e.g. reading the item
 * of an End iterator or deleting through an iterator that is already stale.
 * These are programming errors and are never used for ordinary misses.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

/**
 * Thrown when the tree reaches a state its algorithms rule out, or when
 * `assertInvariants()` finds a violated red-black property.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function assertPrecondition(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionError(message);
  }
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}

/**
 * Narrows a link the balancing algorithms depend on being present
 * @param what - Name of the link, used in the error message
 */
export function requireNode<N>(node: N | null, what: string): N {
  if (node === null) {
    throw new InvariantViolationError(`red-black tree is missing its ${what}`);
  }
  return node;
}
