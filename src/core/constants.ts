/**
 * Application Constants
 *
 * Centralized defaults for relay tuning and service health checks.
 * Environment variables in config.ts override the relay values.
 */

/**
 * Relay tuning defaults
 */
export const RELAY_DEFAULTS = {
  /** A claim older than this is presumed abandoned (5 minutes) */
  LOCK_TIMEOUT_MS: 5 * 60 * 1000,

  /** Destination instances processed in parallel within one tick */
  MAX_CONCURRENT_INSTANCES: 5,

  /** Messages claimed per instance per tick */
  CLAIM_BATCH_SIZE: 100,

  /** Failed deliveries before a message is dead-lettered */
  MAX_RETRIES: 3,

  /** Delay between scheduler ticks (1 minute) */
  TICK_INTERVAL_MS: 60 * 1000,

  /** Identical payloads from the same producer inside this window are enqueued once (24 hours) */
  DEDUPE_WINDOW_MS: 24 * 60 * 60 * 1000,

  /** Dead-letter count above which the scheduler warns */
  DEAD_LETTER_THRESHOLD: 100,
} as const;

/**
 * Reporting limits
 */
export const REPORTING = {
  /** Configuration issues kept in memory by the orchestrator */
  MAX_RECENT_ISSUES: 50,

  /** Default page size for message listings */
  DEFAULT_LIST_LIMIT: 100,

  /** Most frequent error reasons reported per interface */
  TOP_ERRORS: 5,
} as const;

/**
 * Service health check configuration
 */
export const HEALTH_CHECK = {
  /** Maximum retries for service health checks */
  MAX_RETRIES: 30,

  /** Delay between retries (2 seconds) */
  RETRY_DELAY_MS: 2000,

  /** Connection timeout for health checks (1 second) */
  CONNECTION_TIMEOUT_MS: 1000,
} as const;
