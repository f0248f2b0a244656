/**
 * Vector Store Error Classes
 */

export class VectorStoreError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'VectorStoreError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** The backend could not be reached or rejected the request */
export class StoreUnavailableError extends VectorStoreError {
  constructor(
    public readonly operation: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Vector store unavailable during ${operation}: ${originalError?.message ?? 'unknown error'}`,
      'STORE_UNAVAILABLE',
      true,
    );
    this.name = 'StoreUnavailableError';
  }
}

export class CollectionMismatchError extends VectorStoreError {
  constructor(
    public readonly collectionName: string,
    public readonly expectedSize: number,
    public readonly actualSize: number | undefined,
  ) {
    super(
      `Collection ${collectionName} stores ${actualSize ?? 'unknown'}-dimensional vectors, expected ${expectedSize}`,
      'COLLECTION_MISMATCH',
      false,
    );
    this.name = 'CollectionMismatchError';
  }
}
