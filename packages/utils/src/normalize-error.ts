import { serializeError } from 'serialize-error-cjs';

/**
 * Turns whatever was thrown into an `Error`, so callers can always rely on `.message`.
 * Objects are JSON-encoded; anything that cannot be encoded falls back to `String(value)`.
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) return error;

  if (typeof error === 'string') return new Error(error);
  if (error === null) return new Error('null');
  if (error === undefined) return new Error('undefined');
  if (typeof error === 'symbol') return new Error(error.toString());
  if (typeof error === 'function') return new Error(String(error));

  if (typeof error === 'object') {
    try {
      return new Error(JSON.stringify(error));
    } catch {
      return new Error(String(error));
    }
  }

  return new Error(String(error));
}

export function sanitizeError(error: unknown) {
  return serializeError(normalizeError(error));
}
