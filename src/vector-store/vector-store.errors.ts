/**
 * Vector Store Error Definitions
 */

export class VectorStoreError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'VectorStoreError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class InvalidSearchParameterError extends VectorStoreError {
  constructor(parameter: string, value: unknown) {
    super(`Invalid search parameter ${parameter}: ${String(value)}`);
    this.name = 'InvalidSearchParameterError';
  }
}

export class VectorDimensionMismatchError extends VectorStoreError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Vector dimension mismatch: index holds ${expected}D vectors, got ${actual}D`,
    );
    this.name = 'VectorDimensionMismatchError';
  }
}

export class VectorStorePersistenceError extends VectorStoreError {
  constructor(
    public readonly location: string,
    message: string,
    originalError?: Error,
  ) {
    super(`${message} (${location})`, originalError);
    this.name = 'VectorStorePersistenceError';
  }
}
