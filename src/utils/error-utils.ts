/**
 * Error helpers shared by the index registry and the API routes
 */

/**
 * Extracts a printable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Base class for failures the API reports to clients
 * `statusCode` is the HTTP status the routes answer with.
 */
export class IndexError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode: number) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class IndexNotFoundError extends IndexError {
  constructor(name: string) {
    super(`Index ${name} does not exist`, 404);
  }
}

export class IndexExistsError extends IndexError {
  constructor(name: string) {
    super(`Index ${name} already exists`, 409);
  }
}

export class InvalidKeyError extends IndexError {
  constructor(message: string) {
    super(message, 400);
  }
}

export function isIndexError(error: unknown): error is IndexError {
  return error instanceof IndexError;
}
