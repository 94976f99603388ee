/**
 * Database Entity Types
 *
 * TypeScript interfaces matching database schema, plus the mappers that
 * turn rows into domain records.
 */

import type { QueryResult, QueryResultRow } from 'pg';
import { MESSAGE_STATUSES } from '../models/messages.js';
import type { Message, MessageStatus } from '../models/messages.js';
import type { Subscription, SubscriptionFilter } from '../models/subscriptions.js';
import { parsePayload } from '../util/payload.js';
import { isRecord } from '../util/validation.js';
import { DatabaseError } from '../errors/index.js';

/**
 * The part of a pg Pool the repositories use
 */
export interface SqlClient {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

export interface MessageRow {
  id: string; // UUID
  interface_name: string;
  source_adapter_name: string;
  adapter_instance_id: string; // UUID of the producing instance
  payload: unknown; // JSONB { headers, record }
  payload_hash: string;
  status: string;
  claimed_by: string | null;
  claimed_at: Date | null;
  retry_count: number;
  last_error: string | null;
  created_at: Date;
  updated_at: Date;
  processed_at: Date | null;
}

export interface SubscriptionRow {
  id: string; // UUID
  destination_instance_id: string;
  interface_name: string;
  destination_adapter_name: string;
  filter_criteria: unknown; // JSONB
  enabled: boolean;
  created_at: Date;
  updated_at: Date;
}

function isMessageStatus(value: string): value is MessageStatus {
  return MESSAGE_STATUSES.some(s => s === value);
}

export function rowToMessage(row: MessageRow): Message {
  if (!isMessageStatus(row.status)) {
    throw new DatabaseError(`Message ${row.id} has unknown status '${row.status}'`, 'rowToMessage');
  }
  return {
    id: row.id,
    interfaceName: row.interface_name,
    sourceAdapterName: row.source_adapter_name,
    adapterInstanceId: row.adapter_instance_id,
    payload: parsePayload(row.payload),
    payloadHash: row.payload_hash,
    status: row.status,
    claimedBy: row.claimed_by,
    claimedAt: row.claimed_at,
    retryCount: row.retry_count,
    lastError: row.last_error,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    processedAt: row.processed_at
  };
}

function toFilter(value: unknown): SubscriptionFilter {
  if (isRecord(value) && typeof value.requiredProducerInstanceId === 'string' && value.requiredProducerInstanceId) {
    return { requiredProducerInstanceId: value.requiredProducerInstanceId };
  }
  return {};
}

export function rowToSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    destinationInstanceId: row.destination_instance_id,
    interfaceName: row.interface_name,
    destinationAdapterName: row.destination_adapter_name,
    filterCriteria: toFilter(row.filter_criteria),
    enabled: row.enabled,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}
