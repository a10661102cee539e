/**
 * Raised by division when the divisor is zero (including `0 / 0`).
 */
export class DivisionByZeroError extends Error {
  constructor(message = 'Division by zero') {
    super(message);
    this.name = 'DivisionByZeroError';
  }
}

/**
 * Raised when a calculation is requested for an operation name outside the supported set.
 */
export class UnknownOperationError extends Error {
  constructor(
    readonly operationName: string,
    readonly supportedOperations: readonly string[]
  ) {
    super(`Unknown operation '${operationName}'. Supported operations: ${supportedOperations.join(', ')}`);
    this.name = 'UnknownOperationError';
  }
}
