/**
 * Message Store Contract
 *
 * The mailbox: a durable log of staged records plus their status and claim
 * metadata. All coordination between workers, in this process or others,
 * goes through the atomic operations declared here.
 */

import { ValidationError, isValidInstanceId, isValidName } from '../util/validation.js';
import { isMessagePayload } from '../util/payload.js';
import type {
  EnqueueBatchInput,
  EnqueueInput,
  ErrorRecord,
  FailureResult,
  Message,
  MessageQuery,
  MessageStatus
} from '../models/messages.js';
import type { SubscriptionFilter } from '../models/subscriptions.js';

/**
 * Claim operations. Only the LockManager calls these; they are the sole
 * writers of `claimedBy` / `claimedAt` apart from outcome reporting.
 */
export interface MessageLockOps {
  /**
   * Atomically moves up to `maxCount` Pending messages of the interface that
   * pass `filter` to Claimed, oldest first. Two concurrent callers never
   * receive the same message. Returns an empty array when nothing matches.
   */
  claimBatch(
    interfaceName: string,
    filter: SubscriptionFilter,
    claimantId: string,
    maxCount: number
  ): Promise<Message[]>;

  /**
   * Returns Claimed messages whose claim is at least `lockTimeoutMs` old to
   * Pending and clears their claim.
   *
   * @returns Number of messages released
   */
  releaseExpiredLocks(lockTimeoutMs: number): Promise<number>;
}

export interface MessageStore extends MessageLockOps {
  enqueue(input: EnqueueInput): Promise<string>;
  enqueueMany(input: EnqueueBatchInput): Promise<string[]>;

  /**
   * Claimed (by `claimantId`) → Processed.
   *
   * @throws InvalidTransitionError if the message is not Claimed by the caller
   */
  markProcessed(messageId: string, claimantId: string): Promise<void>;

  /**
   * Records a failed delivery. The message returns to Pending while
   * `retryCount < maxRetries`, and is dead-lettered otherwise.
   *
   * @throws InvalidTransitionError if the message is not Claimed by the caller
   */
  markFailed(messageId: string, claimantId: string, error: string, maxRetries: number): Promise<FailureResult>;

  getMessage(messageId: string): Promise<Message | null>;
  listMessages(query?: MessageQuery): Promise<Message[]>;
  countByStatus(interfaceName?: string): Promise<Record<MessageStatus, number>>;
  recentErrors(limit: number, interfaceName?: string): Promise<ErrorRecord[]>;
}

/**
 * Rejects enqueue input that would produce an unroutable message
 *
 * @throws ValidationError naming the offending field
 */
export function assertEnqueueInput(input: EnqueueInput): void {
  if (!isValidName(input.interfaceName)) {
    throw new ValidationError('Interface name cannot be empty', 'interfaceName');
  }
  if (!isValidName(input.sourceAdapterName)) {
    throw new ValidationError('Source adapter name cannot be empty', 'sourceAdapterName');
  }
  if (!isValidInstanceId(input.producerInstanceId)) {
    throw new ValidationError(`Invalid producer instance ID: ${input.producerInstanceId}`, 'producerInstanceId');
  }
  if (!isMessagePayload(input.payload)) {
    throw new ValidationError('Payload must be { headers: string[], record: Record<string, string> }', 'payload');
  }
}

/**
 * Splits a batch write into one enqueue input per record
 */
export function debatch(input: EnqueueBatchInput): EnqueueInput[] {
  return input.records.map(record => ({
    interfaceName: input.interfaceName,
    sourceAdapterName: input.sourceAdapterName,
    producerInstanceId: input.producerInstanceId,
    payload: { headers: input.headers, record }
  }));
}

export function emptyStatusCounts(): Record<MessageStatus, number> {
  return { Pending: 0, Claimed: 0, Processed: 0, Failed: 0, DeadLetter: 0 };
}
