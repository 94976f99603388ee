/**
 * Database Migration Runner
 *
 * Runs SQL migration files in order to set up the relay schema.
 * Every statement is idempotent, so the runner applies all files on each start.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { db } from './client.js';
import { logger } from '../core/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const MIGRATIONS = ['001_relay_schema.sql', '002_payload_shape.sql'] as const;

/**
 * SQL files are not copied by tsc; from dist/ they are read from the source tree
 */
export function migrationsDir(moduleDir: string = __dirname, cwd: string = process.cwd()): string {
  return moduleDir.includes('/dist/') ? join(cwd, 'src/db/migrations') : join(moduleDir, 'migrations');
}

/**
 * Runs all migration files in order
 */
export async function runMigrations(): Promise<void> {
  const dir = migrationsDir();

  for (const migrationFile of MIGRATIONS) {
    const migrationPath = join(dir, migrationFile);
    try {
      const sql = readFileSync(migrationPath, 'utf-8');
      await db.query(sql);
      logger.info({ migration: migrationFile }, 'Migration applied successfully');
    } catch (err) {
      logger.error({ err, migration: migrationFile }, 'Failed to run migration');
      throw err;
    }
  }

  logger.info('All database migrations completed successfully');
}

// Run migrations if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}` || process.argv[1]?.includes('migrate.ts')) {
  runMigrations()
    .then(async () => {
      logger.info('Migrations completed');
      await db.end();
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
