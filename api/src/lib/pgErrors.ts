import { StorageUnavailableError } from '../services/ledger.errors.js';

// SQLSTATEs that mean "nothing was committed, try the whole thing again".
const TRANSIENT_SQLSTATES = new Set([
  '55P03', // lock_not_available (lock_timeout)
  '57014', // query_canceled (statement_timeout)
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

const TRANSIENT_SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE']);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isTransientStorageError(error: unknown): boolean {
  const code = errorCode(error);

  if (code) {
    // Class 08: connection exception
    return TRANSIENT_SQLSTATES.has(code) || code.startsWith('08') || TRANSIENT_SOCKET_CODES.has(code);
  }

  // pg-pool rejects with a bare Error when no client frees up in time
  return error instanceof Error && error.message.includes('timeout exceeded when trying to connect');
}

/**
 * Turns transient pg/driver failures (possibly wrapped by the query builder
 * as `cause`) into StorageUnavailableError. Anything else is returned as is.
 */
export function toStorageError(error: unknown): unknown {
  if (error instanceof StorageUnavailableError) {
    return error;
  }

  const candidates = [error, error instanceof Error ? error.cause : undefined];
  const transient = candidates.find((candidate) => candidate !== undefined && isTransientStorageError(candidate));

  if (transient === undefined) {
    return error;
  }

  const message = transient instanceof Error ? transient.message : 'unknown storage failure';
  return new StorageUnavailableError(`Wallet storage unavailable: ${message}`, transient);
}
