/**
 * Hash Utility Module
 *
 * Provides cryptographic hashing for duplicate detection.
 */

import crypto from 'crypto';

/**
 * Generates SHA256 hash of input data
 *
 * @param data - String data to hash (typically a serialized payload)
 * @returns Hexadecimal hash string (64 characters)
 *
 * @example
 * const hash = sha256(serializePayload(payload));
 * // Same payload from the same producer within the dedupe window is enqueued once
 */
export function sha256(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
