import { describe, it, expect } from 'vitest';
import { RELAY_DEFAULTS, REPORTING, HEALTH_CHECK } from '../src/core/constants.js';

describe('constants', () => {
  it('should have the relay tuning defaults', () => {
    expect(RELAY_DEFAULTS.LOCK_TIMEOUT_MS).toBe(300000);
    expect(RELAY_DEFAULTS.MAX_CONCURRENT_INSTANCES).toBe(5);
    expect(RELAY_DEFAULTS.CLAIM_BATCH_SIZE).toBe(100);
    expect(RELAY_DEFAULTS.MAX_RETRIES).toBe(3);
    expect(RELAY_DEFAULTS.TICK_INTERVAL_MS).toBe(60000);
    expect(RELAY_DEFAULTS.DEDUPE_WINDOW_MS).toBe(86400000);
    expect(RELAY_DEFAULTS.DEAD_LETTER_THRESHOLD).toBe(100);
  });

  it('should have the reporting limits', () => {
    expect(REPORTING.MAX_RECENT_ISSUES).toBe(50);
    expect(REPORTING.DEFAULT_LIST_LIMIT).toBe(100);
    expect(REPORTING.TOP_ERRORS).toBe(5);
  });

  it('should have all required health check values', () => {
    expect(HEALTH_CHECK.MAX_RETRIES).toBe(30);
    expect(HEALTH_CHECK.RETRY_DELAY_MS).toBe(2000);
    expect(HEALTH_CHECK.CONNECTION_TIMEOUT_MS).toBe(1000);
  });
});
