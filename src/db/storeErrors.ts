/**
 * Store Error Classification
 *
 * Maps driver errors to the relay's error types. Connection-level failures
 * mean the store is unreachable and the tick must stop; anything else is a
 * failure of the single operation.
 */

import { DatabaseError, StoreUnavailableError, toError } from '../errors/index.js';

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH', 'EPIPE']);

/**
 * SQLSTATE classes: 08 connection exception, 57P operator intervention
 * (admin shutdown, crash shutdown, cannot connect now), 53300 too many connections.
 */
function isUnavailableSqlState(code: string): boolean {
  return code.startsWith('08') || code.startsWith('57P') || code === '53300';
}

function errorCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

/**
 * True when the error means the database cannot be reached at all
 */
export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err);
  if (code && (NETWORK_CODES.has(code) || isUnavailableSqlState(code))) return true;
  // pg-pool reports acquisition timeouts and dropped sockets without a code
  const message = err instanceof Error ? err.message : '';
  return /timeout exceeded when trying to connect|Connection terminated/i.test(message);
}

/**
 * Wraps a driver error for the named store operation
 *
 * @example
 * try { await pool.query(sql) } catch (err) { throw toStoreError(err, 'claimBatch') }
 */
export function toStoreError(err: unknown, operation: string): StoreUnavailableError | DatabaseError {
  const error = toError(err);
  if (isConnectionError(err)) {
    return new StoreUnavailableError(`Message store unavailable during ${operation}: ${error.message}`, operation, error);
  }
  return new DatabaseError(`Failed to ${operation}: ${error.message}`, operation, error);
}
