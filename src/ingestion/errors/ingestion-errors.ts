/**
 * Ingestion Error Classes
 */

export class DocumentLoadError extends Error {
  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`Cannot load ${path}: ${reason}`);
    this.name = 'DocumentLoadError';
    Error.captureStackTrace(this, this.constructor);
  }
}
