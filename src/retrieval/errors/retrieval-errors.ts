/**
 * Retrieval Error Classes
 */

export class RetrievalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'RetrievalError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** The relevance judge was unavailable or answered with something unusable */
export class RerankFailure extends RetrievalError {
  constructor(reason: string, originalError?: Error) {
    super(`Rerank failed: ${reason}`, 'RERANK_FAILED', originalError);
    this.name = 'RerankFailure';
  }
}

export class LlmResponseError extends RetrievalError {
  constructor(
    public readonly operation: string,
    reason: string,
  ) {
    super(
      `Unusable ${operation} response: ${reason}`,
      'LLM_RESPONSE_INVALID',
    );
    this.name = 'LlmResponseError';
  }
}
