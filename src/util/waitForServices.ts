/**
 * Wait for Services Utility
 *
 * Waits for the backing services the relay is configured to use (PostgreSQL,
 * and optionally Redis and Kafka) before the first tick runs.
 */

import { Redis } from 'ioredis';
import { Kafka } from 'kafkajs';
import { cfg } from '../core/config.js';
import { createPool } from '../db/client.js';
import { logger } from '../core/logger.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { pause } from '../services/scheduler.js';

const MAX_RETRIES = HEALTH_CHECK.MAX_RETRIES;
const RETRY_DELAY_MS = HEALTH_CHECK.RETRY_DELAY_MS;

/**
 * Retries `check` until it resolves, MAX_RETRIES times at most
 */
async function waitFor(name: string, check: () => Promise<void>, signal: AbortSignal): Promise<void> {
  logger.info(`Waiting for ${name} to be ready...`);

  for (let i = 0; i < MAX_RETRIES && !signal.aborted; i++) {
    try {
      await check();
      logger.info(`✓ ${name} is ready`);
      return;
    } catch (err) {
      if (i === MAX_RETRIES - 1) {
        throw new Error(`${name} failed to become ready after ${MAX_RETRIES} attempts: ${err}`);
      }
      logger.debug({ attempt: i + 1, maxRetries: MAX_RETRIES }, `${name} not ready, retrying...`);
      await pause(RETRY_DELAY_MS, signal);
    }
  }
}

async function pingRedis(): Promise<void> {
  const testRedis = new Redis(cfg.redis.url, {
    maxRetriesPerRequest: 1,
    retryStrategy: () => null, // Don't retry, just test connection
    connectTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    lazyConnect: true
  });
  try {
    await testRedis.connect();
    await testRedis.ping();
  } finally {
    testRedis.disconnect();
  }
}

async function pingKafka(): Promise<void> {
  const kafka = new Kafka({
    clientId: `${cfg.kafka.clientId}-health-check`,
    brokers: cfg.kafka.brokers,
    connectionTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    requestTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS
  });
  const admin = kafka.admin();
  try {
    await admin.connect();
    await admin.listTopics();
  } finally {
    await admin.disconnect();
  }
}

async function pingPostgres(): Promise<void> {
  const pool = createPool({ connectionTimeoutMillis: HEALTH_CHECK.CONNECTION_TIMEOUT_MS, max: 1 });
  try {
    await pool.query('SELECT 1');
  } finally {
    await pool.end();
  }
}

/**
 * Wait for all configured services to be ready
 *
 * @throws Error naming the first service that never became ready
 */
export async function waitForServices(signal: AbortSignal): Promise<void> {
  logger.info('Checking service availability...');

  const checks: Promise<void>[] = [];
  if (cfg.relay.store === 'postgres') checks.push(waitFor('PostgreSQL', pingPostgres, signal));
  if (cfg.redis.enabled) checks.push(waitFor('Redis', pingRedis, signal));
  if (cfg.kafka.enabled) checks.push(waitFor('Kafka', pingKafka, signal));

  // Run checks in parallel for faster startup
  const results = await Promise.allSettled(checks);
  const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failed) throw failed.reason;

  logger.info('Service availability check complete');
}
