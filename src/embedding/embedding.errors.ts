/**
 * Raised when the embedding service fails or times out. Never retried here.
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace(this, this.constructor);
  }
}
