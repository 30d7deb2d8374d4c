/**
 * Custom error types for the symbol table.
 *
 * Every error is raised synchronously before any structural change, so a
 * caught error never leaves the tree half rebalanced.
 */

export class SymbolTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SymbolTableError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Operation needs a non-empty table.
 */
export class UnderflowError extends SymbolTableError {
  constructor(operation: string) {
    super(`${operation}() called on an empty symbol table`);
    this.name = 'UnderflowError';
  }
}

export class InvalidArgumentError extends SymbolTableError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class OutOfRangeError extends SymbolTableError {
  constructor(public readonly rank: number, public readonly size: number) {
    super(`select() called with invalid rank ${rank}: expected 0 <= rank < ${size}`);
    this.name = 'OutOfRangeError';
  }
}

/**
 * No key satisfies a floor/ceil query on a non-empty table.
 */
export class NotFoundError extends SymbolTableError {
  constructor(operation: string, key: unknown) {
    super(`${operation}(${String(key)}): no such key`);
    this.name = 'NotFoundError';
  }
}

export class InvariantViolationError extends SymbolTableError {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
