import { describe, it, expect } from 'vitest';
import { isConnectionError, toStoreError } from '../../src/db/storeErrors.js';
import { DatabaseError, StoreUnavailableError } from '../../src/errors/index.js';

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('isConnectionError', () => {
  it('should treat network failures as unavailability', () => {
    expect(isConnectionError(pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED'))).toBe(true);
    expect(isConnectionError(pgError('terminating connection due to administrator command', '57P01'))).toBe(true);
    expect(isConnectionError(pgError('sorry, too many clients already', '53300'))).toBe(true);
    expect(isConnectionError(pgError('connection failure', '08006'))).toBe(true);
  });

  it('should recognize pool errors that carry no code', () => {
    expect(isConnectionError(new Error('timeout exceeded when trying to connect'))).toBe(true);
    expect(isConnectionError(new Error('Connection terminated unexpectedly'))).toBe(true);
  });

  it('should not treat query errors as unavailability', () => {
    expect(isConnectionError(pgError('duplicate key value violates unique constraint', '23505'))).toBe(false);
    expect(isConnectionError(new Error('syntax error'))).toBe(false);
    expect(isConnectionError('ECONNREFUSED')).toBe(false);
  });
});

describe('toStoreError', () => {
  it('should wrap connection failures as StoreUnavailableError', () => {
    const cause = pgError('connect ECONNREFUSED 127.0.0.1:5432', 'ECONNREFUSED');

    const err = toStoreError(cause, 'claimBatch');

    expect(err).toBeInstanceOf(StoreUnavailableError);
    expect(err.message).toBe('Message store unavailable during claimBatch: connect ECONNREFUSED 127.0.0.1:5432');
    expect(err.operation).toBe('claimBatch');
  });

  it('should wrap other failures as DatabaseError', () => {
    const err = toStoreError(pgError('value too long for type character varying(200)', '22001'), 'enqueue');

    expect(err).toBeInstanceOf(DatabaseError);
    expect(err.message).toBe('Failed to enqueue: value too long for type character varying(200)');
  });
});
