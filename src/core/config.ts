/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { RELAY_DEFAULTS } from './constants.js';

/**
 * Reads a numeric environment variable, falling back to a default when unset
 */
function num(name: string, fallback: number): number {
  const v = process.env[name];
  return v === undefined || v === '' ? fallback : Number(v);
}

function flag(name: string): boolean {
  return process.env[name] === 'true';
}

export type StoreBackend = 'postgres' | 'memory';

function storeBackend(): StoreBackend {
  return process.env.RELAY_STORE === 'memory' ? 'memory' : 'postgres';
}

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // Relay tuning
  relay: {
    store: storeBackend(),
    lockTimeoutMs: num('RELAY_LOCK_TIMEOUT_MS', RELAY_DEFAULTS.LOCK_TIMEOUT_MS),
    maxConcurrentInstances: num('RELAY_MAX_CONCURRENT_INSTANCES', RELAY_DEFAULTS.MAX_CONCURRENT_INSTANCES),
    claimBatchSize: num('RELAY_CLAIM_BATCH_SIZE', RELAY_DEFAULTS.CLAIM_BATCH_SIZE),
    defaultMaxRetries: num('RELAY_DEFAULT_MAX_RETRIES', RELAY_DEFAULTS.MAX_RETRIES),
    tickIntervalMs: num('RELAY_TICK_INTERVAL_MS', RELAY_DEFAULTS.TICK_INTERVAL_MS),
    dedupeWindowMs: num('RELAY_DEDUPE_WINDOW_MS', RELAY_DEFAULTS.DEDUPE_WINDOW_MS),
    deadLetterThreshold: num('RELAY_DEAD_LETTER_THRESHOLD', RELAY_DEFAULTS.DEAD_LETTER_THRESHOLD)
  },
  // External configuration service; the URL takes precedence over the file
  configSource: {
    serviceUrl: process.env.CONFIG_SERVICE_URL || '',
    file: process.env.RELAY_CONFIG_FILE || ''
  },
  // Host running the concrete adapter bodies
  adapterHost: {
    url: process.env.ADAPTER_HOST_URL || 'http://localhost:7072',
    timeoutMs: num('ADAPTER_HOST_TIMEOUT_MS', 30000)
  },
  // Redis configuration (cross-process tick lease)
  redis: {
    enabled: flag('REDIS_ENABLED'),
    url: process.env.REDIS_URL || 'redis://localhost:6379'
  },
  // Kafka configuration (relay event stream)
  kafka: {
    enabled: flag('KAFKA_ENABLED'),
    brokers: (process.env.KAFKA_BROKERS || 'localhost:9092').split(',').map(b => b.trim()),
    clientId: process.env.KAFKA_CLIENT_ID || 'message-relay-service',
    topicEvents: process.env.KAFKA_TOPIC_EVENTS || 'relay.events'
  },
  // Database configuration
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: num('DB_PORT', 5432),
    user: process.env.DB_USER || 'relay',
    password: process.env.DB_PASSWORD || 'relay',
    database: process.env.DB_NAME || 'relay',
    ssl: process.env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
    max: num('DB_POOL_SIZE', 10),
    idleTimeoutMillis: num('DB_IDLE_TIMEOUT_MS', 30000),
    connectionTimeoutMillis: num('DB_CONNECTION_TIMEOUT_MS', 5000),
    statementTimeoutMs: num('DB_STATEMENT_TIMEOUT_MS', 30000)
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal)
};

export type RelayTuning = typeof cfg.relay;
