import { PersistenceError } from '../../application/errors.js';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '53300', // too_many_connections
]);

export function pgErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return pgErrorCode(error) === '23505';
}

/**
 * Storage that is down or unreachable becomes a PersistenceError (retryable);
 * anything else is returned as is.
 */
export function toPersistenceError(error: unknown): unknown {
  const code = pgErrorCode(error);
  const unreachable =
    (code !== undefined && (CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'))) ||
    (error instanceof Error && error.message.includes('timeout exceeded when trying to connect'));

  if (unreachable) {
    const message = error instanceof Error ? error.message : String(error);
    return new PersistenceError(`Storage unavailable: ${message}`, error);
  }
  return error;
}
