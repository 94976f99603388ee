/**
 * Database Client Module
 *
 * Shared PostgreSQL pool behind the message and subscription repositories.
 * The pool connects lazily, so importing this module opens no connection.
 */

import { Pool } from 'pg';
import type { PoolConfig } from 'pg';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

/**
 * Builds a pool from `cfg.database`; overrides win (the startup check uses max: 1)
 */
export function createPool(overrides: PoolConfig = {}): Pool {
  const { statementTimeoutMs, ...connection } = cfg.database;
  return new Pool({
    ...connection,
    application_name: cfg.kafka.clientId,
    // A claim or outcome update stuck behind a lock fails instead of stalling the tick
    statement_timeout: statementTimeoutMs,
    ...overrides
  });
}

export const db = createPool();

db.on('error', (err: Error) => {
  // Idle clients can fail (server restart); the next query reconnects
  logger.error({ err }, 'database pool error');
});

export async function closeDatabase(): Promise<void> {
  await db.end();
  logger.info('database connections closed');
}
