/**
 * Payload Codec
 *
 * Serializes the `{ headers, record }` envelope stored with each message and
 * validates envelopes read back from the store or received from callers.
 */

import { sha256 } from './hash.js';
import { isRecord, ValidationError } from './validation.js';
import type { MessagePayload } from '../models/messages.js';

/**
 * Type guard for a well-formed payload envelope
 */
export function isMessagePayload(value: unknown): value is MessagePayload {
  if (!isRecord(value)) return false;
  const { headers, record } = value;
  if (!Array.isArray(headers) || !headers.every(h => typeof h === 'string')) return false;
  if (!isRecord(record)) return false;
  return Object.values(record).every(v => typeof v === 'string');
}

/**
 * Parses a stored payload (already-decoded JSON or a JSON string)
 *
 * @throws ValidationError if the value is not a payload envelope
 */
export function parsePayload(value: unknown): MessagePayload {
  const decoded = typeof value === 'string' ? JSON.parse(value) : value;
  if (!isMessagePayload(decoded)) {
    throw new ValidationError('Stored payload is not a { headers, record } envelope', 'payload');
  }
  return { headers: [...decoded.headers], record: { ...decoded.record } };
}

/**
 * Serializes a payload with a stable key order: the record's fields follow
 * the header order, and fields missing from the headers come after in
 * insertion order.
 */
export function serializePayload(payload: MessagePayload): string {
  const record: Record<string, string> = {};
  for (const h of payload.headers) {
    if (h in payload.record) record[h] = payload.record[h];
  }
  for (const [k, v] of Object.entries(payload.record)) {
    if (!(k in record)) record[k] = v;
  }
  return JSON.stringify({ headers: payload.headers, record });
}

/**
 * Hash used to detect duplicate writes of the same record
 */
export function payloadHash(payload: MessagePayload): string {
  return sha256(serializePayload(payload));
}
