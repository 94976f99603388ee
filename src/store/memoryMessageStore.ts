/**
 * In-Memory Message Store
 *
 * Single-process mailbox used for local development (RELAY_STORE=memory) and
 * tests. Each operation runs to completion without awaiting, so a claim is a
 * compare-and-set on status just like the PostgreSQL statement.
 */

import { randomUUID } from 'crypto';
import { InvalidTransitionError } from '../errors/index.js';
import { REPORTING, RELAY_DEFAULTS } from '../core/constants.js';
import { assertEnqueueInput, debatch, emptyStatusCounts } from '../relay/messageStore.js';
import type { MessageStore } from '../relay/messageStore.js';
import { payloadHash } from '../util/payload.js';
import { matchesFilter } from '../models/subscriptions.js';
import type { SubscriptionFilter } from '../models/subscriptions.js';
import type {
  EnqueueBatchInput,
  EnqueueInput,
  ErrorRecord,
  FailureResult,
  Message,
  MessageQuery,
  MessageStatus
} from '../models/messages.js';

export interface InMemoryMessageStoreOptions {
  /** Clock used for timestamps and lock expiry */
  now?: () => Date;
  dedupeWindowMs?: number;
}

function clone(m: Message): Message {
  return {
    ...m,
    payload: { headers: [...m.payload.headers], record: { ...m.payload.record } }
  };
}

export class InMemoryMessageStore implements MessageStore {
  private readonly rows = new Map<string, Message>();
  private readonly now: () => Date;
  private readonly dedupeWindowMs: number;

  constructor(options: InMemoryMessageStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.dedupeWindowMs = options.dedupeWindowMs ?? RELAY_DEFAULTS.DEDUPE_WINDOW_MS;
  }

  async enqueue(input: EnqueueInput): Promise<string> {
    assertEnqueueInput(input);
    const now = this.now();
    const hash = payloadHash(input.payload);

    if (this.dedupeWindowMs > 0) {
      const cutoff = now.getTime() - this.dedupeWindowMs;
      for (const m of this.rows.values()) {
        if (
          m.payloadHash === hash &&
          m.interfaceName === input.interfaceName &&
          m.sourceAdapterName === input.sourceAdapterName &&
          m.adapterInstanceId === input.producerInstanceId &&
          m.createdAt.getTime() > cutoff
        ) {
          return m.id;
        }
      }
    }

    const id = randomUUID();
    this.rows.set(id, {
      id,
      interfaceName: input.interfaceName,
      sourceAdapterName: input.sourceAdapterName,
      adapterInstanceId: input.producerInstanceId,
      payload: { headers: [...input.payload.headers], record: { ...input.payload.record } },
      payloadHash: hash,
      status: 'Pending',
      claimedBy: null,
      claimedAt: null,
      retryCount: 0,
      lastError: null,
      createdAt: now,
      updatedAt: now,
      processedAt: null
    });
    return id;
  }

  async enqueueMany(input: EnqueueBatchInput): Promise<string[]> {
    const ids: string[] = [];
    for (const single of debatch(input)) {
      ids.push(await this.enqueue(single));
    }
    return ids;
  }

  async claimBatch(
    interfaceName: string,
    filter: SubscriptionFilter,
    claimantId: string,
    maxCount: number
  ): Promise<Message[]> {
    if (maxCount <= 0) return [];
    const now = this.now();
    const candidates = [...this.rows.values()]
      .filter(m => m.status === 'Pending' && m.interfaceName === interfaceName && matchesFilter(filter, m.adapterInstanceId))
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id))
      .slice(0, maxCount);

    for (const m of candidates) {
      m.status = 'Claimed';
      m.claimedBy = claimantId;
      m.claimedAt = now;
      m.updatedAt = now;
    }
    return candidates.map(clone);
  }

  async releaseExpiredLocks(lockTimeoutMs: number): Promise<number> {
    const now = this.now();
    let released = 0;
    for (const m of this.rows.values()) {
      if (m.status !== 'Claimed' || !m.claimedAt) continue;
      if (now.getTime() - m.claimedAt.getTime() >= lockTimeoutMs) {
        m.status = 'Pending';
        m.claimedBy = null;
        m.claimedAt = null;
        m.updatedAt = now;
        released++;
      }
    }
    return released;
  }

  async markProcessed(messageId: string, claimantId: string): Promise<void> {
    const m = this.claimedBy(messageId, claimantId, 'Processed');
    const now = this.now();
    m.status = 'Processed';
    m.processedAt = now;
    m.updatedAt = now;
  }

  async markFailed(messageId: string, claimantId: string, error: string, maxRetries: number): Promise<FailureResult> {
    const m = this.claimedBy(messageId, claimantId, 'Failed');
    const now = this.now();
    m.retryCount += 1;
    m.lastError = error;
    m.updatedAt = now;
    const status: FailureResult['status'] = m.retryCount < maxRetries ? 'Pending' : 'DeadLetter';
    m.status = status;
    if (status === 'Pending') {
      m.claimedBy = null;
      m.claimedAt = null;
    }
    return { status, retryCount: m.retryCount };
  }

  async getMessage(messageId: string): Promise<Message | null> {
    const m = this.rows.get(messageId);
    return m ? clone(m) : null;
  }

  async listMessages(query: MessageQuery = {}): Promise<Message[]> {
    return [...this.rows.values()]
      .filter(m => (!query.status || m.status === query.status) && (!query.interfaceName || m.interfaceName === query.interfaceName))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, query.limit ?? REPORTING.DEFAULT_LIST_LIMIT)
      .map(clone);
  }

  async countByStatus(interfaceName?: string): Promise<Record<MessageStatus, number>> {
    const counts = emptyStatusCounts();
    for (const m of this.rows.values()) {
      if (!interfaceName || m.interfaceName === interfaceName) counts[m.status]++;
    }
    return counts;
  }

  async recentErrors(limit: number, interfaceName?: string): Promise<ErrorRecord[]> {
    const records: ErrorRecord[] = [];
    for (const m of this.rows.values()) {
      if (m.lastError === null) continue;
      if (interfaceName && m.interfaceName !== interfaceName) continue;
      records.push({
        messageId: m.id,
        interfaceName: m.interfaceName,
        status: m.status,
        retryCount: m.retryCount,
        error: m.lastError,
        at: m.updatedAt
      });
    }
    return records.sort((a, b) => b.at.getTime() - a.at.getTime()).slice(0, limit);
  }

  private claimedBy(messageId: string, claimantId: string, to: MessageStatus): Message {
    const m = this.rows.get(messageId);
    if (!m) throw new InvalidTransitionError(messageId, null, to, 'message not found');
    if (m.status !== 'Claimed') throw new InvalidTransitionError(messageId, m.status, to);
    if (m.claimedBy !== claimantId) {
      throw new InvalidTransitionError(messageId, m.status, to, `claimed by ${m.claimedBy ?? 'nobody'}, not ${claimantId}`);
    }
    return m;
  }
}
