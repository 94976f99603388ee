/**
 * Validation Utilities
 *
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

import { ValidationError } from '../errors/index.js';
import type { RelayTuning } from '../core/config.js';

export { ValidationError } from '../errors/index.js';

/**
 * Validates an adapter instance ID (UUID format)
 *
 * @param id - Instance ID to validate
 * @returns True if valid UUID format, false otherwise
 */
export function isValidInstanceId(id: string): boolean {
  const uuidRegex = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
  return uuidRegex.test(id);
}

/**
 * Validates an interface or adapter name: non-blank, at most 200 characters
 */
export function isValidName(name: string): boolean {
  return name.trim().length > 0 && name.length <= 200;
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(n: number): boolean {
  return Number.isInteger(n) && n > 0;
}

/**
 * Checks relay tuning values at startup
 *
 * @throws ValidationError naming the first invalid setting
 */
export function validateRelayTuning(tuning: RelayTuning): void {
  const positive: Array<[keyof RelayTuning, number]> = [
    ['lockTimeoutMs', tuning.lockTimeoutMs],
    ['maxConcurrentInstances', tuning.maxConcurrentInstances],
    ['claimBatchSize', tuning.claimBatchSize],
    ['defaultMaxRetries', tuning.defaultMaxRetries],
    ['tickIntervalMs', tuning.tickIntervalMs]
  ];
  for (const [field, value] of positive) {
    if (!isPositiveInteger(value)) {
      throw new ValidationError(`${field} must be a positive integer, got ${value}`, field);
    }
  }
  if (!Number.isInteger(tuning.dedupeWindowMs) || tuning.dedupeWindowMs < 0) {
    throw new ValidationError(`dedupeWindowMs must be zero or a positive integer, got ${tuning.dedupeWindowMs}`, 'dedupeWindowMs');
  }
  if (!Number.isInteger(tuning.deadLetterThreshold) || tuning.deadLetterThreshold < 0) {
    throw new ValidationError(`deadLetterThreshold must be zero or a positive integer, got ${tuning.deadLetterThreshold}`, 'deadLetterThreshold');
  }
}
