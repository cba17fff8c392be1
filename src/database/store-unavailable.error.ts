/**
 * Raised when the token store cannot answer: the query failed or ran past
 * the configured timeout. Callers treat it as transient.
 */
export class StoreUnavailableError extends Error {
  constructor(
    readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(`Token store unavailable during ${operation}`, options);
    this.name = 'StoreUnavailableError';
  }
}
