/**
 * Chunking Error Classes
 */

export class ChunkError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'ChunkError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a strategy cannot split its input. Recovered by the chunker,
 * which falls back to the recursive algorithm.
 */
export class ChunkingFailure extends ChunkError {
  constructor(
    public readonly strategy: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Strategy ${strategy} failed: ${originalError?.message ?? 'unknown error'}`,
      'CHUNK_STRATEGY_FAILED',
      false,
    );
    this.name = 'ChunkingFailure';
  }
}

export class InvalidChunkerConfigError extends ChunkError {
  constructor(public readonly issues: string[]) {
    super(
      `Invalid chunker configuration: ${issues.join('; ')}`,
      'CHUNK_INVALID_CONFIG',
      false,
    );
    this.name = 'InvalidChunkerConfigError';
  }
}

export class TokenizerError extends ChunkError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message, 'CHUNK_TOKENIZER_ERROR', true);
    this.name = 'TokenizerError';
  }
}
