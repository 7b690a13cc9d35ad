import type { EngineErrorCode } from '../schema/ConversionModelV1';

/**
 * Raised when the key-value store cannot be read or written, or when an
 * engine was built without one. In-memory state is unaffected and remains
 * usable for the rest of the session.
 */
export class PersistenceUnavailableError extends Error {
  readonly code: EngineErrorCode = 'PersistenceUnavailable';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceUnavailableError';
  }
}

export function toPersistenceError(operation: string, key: string, cause: unknown): PersistenceUnavailableError {
  if (cause instanceof PersistenceUnavailableError) return cause;
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new PersistenceUnavailableError(`Could not ${operation} "${key}": ${detail}`, { cause });
}
