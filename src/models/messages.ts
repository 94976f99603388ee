/**
 * Message Models
 *
 * Defines the records staged in the mailbox and the outcomes adapters
 * report for them.
 */

/**
 * Persisted status vocabulary (case-sensitive)
 */
export const MESSAGE_STATUSES = ['Pending', 'Claimed', 'Processed', 'Failed', 'DeadLetter'] as const;

export type MessageStatus = (typeof MESSAGE_STATUSES)[number];

/**
 * One debatched record: ordered field names plus the field values.
 * The relay routes the envelope without interpreting the values.
 */
export interface MessagePayload {
  headers: string[];
  record: Record<string, string>;
}

/**
 * A record staged in the mailbox
 */
export interface Message {
  id: string;
  interfaceName: string;
  sourceAdapterName: string;

  /** Producer (source adapter instance) that wrote the record */
  adapterInstanceId: string;

  payload: MessagePayload;

  /** SHA256 of the serialized payload, used to drop duplicate writes */
  payloadHash: string;

  status: MessageStatus;
  claimedBy: string | null;
  claimedAt: Date | null;
  retryCount: number;
  lastError: string | null;
  createdAt: Date;

  /** Time of the last status change; the dead-letter time for DeadLetter rows */
  updatedAt: Date;

  processedAt: Date | null;
}

/**
 * Input for writing a single record to the mailbox
 */
export interface EnqueueInput {
  interfaceName: string;
  sourceAdapterName: string;
  producerInstanceId: string;
  payload: MessagePayload;
}

/**
 * Input for debatching several records that share headers
 */
export interface EnqueueBatchInput {
  interfaceName: string;
  sourceAdapterName: string;
  producerInstanceId: string;
  headers: string[];
  records: Record<string, string>[];
}

/**
 * Result of reporting a failed delivery
 */
export interface FailureResult {
  status: Extract<MessageStatus, 'Pending' | 'DeadLetter'>;
  retryCount: number;
}

/**
 * Query over stored messages for reporting
 */
export interface MessageQuery {
  status?: MessageStatus;
  interfaceName?: string;
  limit?: number;
}

/**
 * A recorded delivery error
 */
export interface ErrorRecord {
  messageId: string;
  interfaceName: string;
  status: MessageStatus;
  retryCount: number;
  error: string;
  at: Date;
}

/**
 * Per-message result reported by an adapter
 */
export type DeliveryOutcome =
  | { messageId: string; status: 'Processed' }
  | { messageId: string; status: 'Failed'; reason: string };
