export type EmbeddingErrorCode =
  | 'EMBEDDING_FAILED'
  | 'EMBEDDING_TIMEOUT'
  | 'EMBEDDING_DIMENSION_MISMATCH';

/**
 * Raised when the embedding provider fails, times out or returns vectors
 * that do not fit the collection.
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace(this, this.constructor);
  }

  get retryable(): boolean {
    return this.code !== 'EMBEDDING_DIMENSION_MISMATCH';
  }
}
