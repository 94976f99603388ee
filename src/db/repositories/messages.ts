/**
 * Message Repository
 *
 * PostgreSQL mailbox. Claims use `FOR UPDATE SKIP LOCKED` inside a single
 * UPDATE, so concurrent relays (in this process or others) never receive
 * the same message; every status change is a conditional UPDATE on the
 * expected current state.
 */

import { logger } from '../../core/logger.js';
import { REPORTING, RELAY_DEFAULTS } from '../../core/constants.js';
import { AppError, InvalidTransitionError, toError } from '../../errors/index.js';
import { assertEnqueueInput, debatch, emptyStatusCounts } from '../../relay/messageStore.js';
import type { MessageStore } from '../../relay/messageStore.js';
import { payloadHash, serializePayload } from '../../util/payload.js';
import { toStoreError } from '../storeErrors.js';
import { rowToMessage } from '../types.js';
import type { MessageRow, SqlPool } from '../types.js';
import { MESSAGE_STATUSES } from '../../models/messages.js';
import type {
  EnqueueBatchInput,
  EnqueueInput,
  ErrorRecord,
  FailureResult,
  Message,
  MessageQuery,
  MessageStatus
} from '../../models/messages.js';
import type { SubscriptionFilter } from '../../models/subscriptions.js';

/**
 * Inserts unless the same producer wrote the same payload to the interface
 * inside the dedupe window; returns the new or the existing id.
 */
const ENQUEUE_SQL = `
  WITH existing AS (
    SELECT id FROM relay_messages
    WHERE payload_hash = $5::text
      AND interface_name = $1::text
      AND source_adapter_name = $2::text
      AND adapter_instance_id = $3::uuid
      AND $6::bigint > 0
      AND created_at > now() - ($6::bigint * interval '1 millisecond')
    ORDER BY created_at DESC
    LIMIT 1
  ), inserted AS (
    INSERT INTO relay_messages (interface_name, source_adapter_name, adapter_instance_id, payload, payload_hash)
    SELECT $1::text, $2::text, $3::uuid, $4::jsonb, $5::text
    WHERE NOT EXISTS (SELECT 1 FROM existing)
    RETURNING id
  )
  SELECT id FROM inserted
  UNION ALL
  SELECT id FROM existing
`;

const CLAIM_SQL = `
  UPDATE relay_messages
  SET status = 'Claimed', claimed_by = $3, claimed_at = now(), updated_at = now()
  WHERE id IN (
    SELECT id FROM relay_messages
    WHERE status = 'Pending'
      AND interface_name = $1
      AND ($2::uuid IS NULL OR adapter_instance_id = $2::uuid)
    ORDER BY created_at, id
    LIMIT $4
    FOR UPDATE SKIP LOCKED
  )
  AND status = 'Pending'
  RETURNING *
`;

const RELEASE_SQL = `
  UPDATE relay_messages
  SET status = 'Pending', claimed_by = NULL, claimed_at = NULL, updated_at = now()
  WHERE status = 'Claimed'
    AND claimed_at <= now() - ($1::bigint * interval '1 millisecond')
`;

const PROCESSED_SQL = `
  UPDATE relay_messages
  SET status = 'Processed', processed_at = now(), updated_at = now()
  WHERE id = $1 AND status = 'Claimed' AND claimed_by = $2
`;

// Right-hand sides see the row before the update
const FAILED_SQL = `
  UPDATE relay_messages
  SET retry_count = retry_count + 1,
      last_error = $3,
      status = CASE WHEN retry_count + 1 < $4 THEN 'Pending' ELSE 'DeadLetter' END,
      claimed_by = CASE WHEN retry_count + 1 < $4 THEN NULL ELSE claimed_by END,
      claimed_at = CASE WHEN retry_count + 1 < $4 THEN NULL ELSE claimed_at END,
      updated_at = now()
  WHERE id = $1 AND status = 'Claimed' AND claimed_by = $2
  RETURNING status, retry_count
`;

// A payload that cannot be read will never deliver; retrying it only holds up its interface
const UNREADABLE_SQL = `
  UPDATE relay_messages
  SET status = 'DeadLetter', last_error = $3, updated_at = now()
  WHERE id = $1 AND status = 'Claimed' AND claimed_by = $2
`;

function isMessageStatus(value: string): value is MessageStatus {
  return MESSAGE_STATUSES.some(s => s === value);
}

export interface PostgresMessageStoreOptions {
  dedupeWindowMs?: number;
}

export class PostgresMessageStore implements MessageStore {
  private readonly dedupeWindowMs: number;

  constructor(
    private readonly pool: SqlPool,
    options: PostgresMessageStoreOptions = {}
  ) {
    this.dedupeWindowMs = options.dedupeWindowMs ?? RELAY_DEFAULTS.DEDUPE_WINDOW_MS;
  }

  private enqueueParams(input: EnqueueInput): unknown[] {
    return [
      input.interfaceName,
      input.sourceAdapterName,
      input.producerInstanceId,
      serializePayload(input.payload),
      payloadHash(input.payload),
      this.dedupeWindowMs
    ];
  }

  async enqueue(input: EnqueueInput): Promise<string> {
    assertEnqueueInput(input);
    return this.run('enqueue', async () => {
      const result = await this.pool.query<{ id: string }>(ENQUEUE_SQL, this.enqueueParams(input));
      return result.rows[0].id;
    });
  }

  /**
   * Debatches the records and writes them in one transaction
   */
  async enqueueMany(input: EnqueueBatchInput): Promise<string[]> {
    const singles = debatch(input);
    singles.forEach(assertEnqueueInput);
    return this.run('enqueueMany', async () => {
      const client = await this.pool.connect();
      try {
        await client.query('BEGIN');
        const ids: string[] = [];
        for (const single of singles) {
          const result = await client.query<{ id: string }>(ENQUEUE_SQL, this.enqueueParams(single));
          ids.push(result.rows[0].id);
        }
        await client.query('COMMIT');
        return ids;
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          logger.warn({ err: rollbackErr }, 'rollback failed');
        });
        throw err;
      } finally {
        client.release();
      }
    });
  }

  async claimBatch(
    interfaceName: string,
    filter: SubscriptionFilter,
    claimantId: string,
    maxCount: number
  ): Promise<Message[]> {
    if (maxCount <= 0) return [];
    return this.run('claimBatch', async () => {
      const result = await this.pool.query<MessageRow>(CLAIM_SQL, [
        interfaceName,
        filter.requiredProducerInstanceId ?? null,
        claimantId,
        maxCount
      ]);
      const messages: Message[] = [];
      for (const row of result.rows) {
        try {
          messages.push(rowToMessage(row));
        } catch (err) {
          const reason = `Unreadable message: ${toError(err).message}`;
          logger.error({ messageId: row.id, interfaceName, err }, 'claimed message cannot be read, dead-lettering');
          await this.pool.query(UNREADABLE_SQL, [row.id, claimantId, reason]);
        }
      }
      // RETURNING does not keep the subquery order
      return messages.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.id.localeCompare(b.id));
    });
  }

  async releaseExpiredLocks(lockTimeoutMs: number): Promise<number> {
    return this.run('releaseExpiredLocks', async () => {
      const result = await this.pool.query(RELEASE_SQL, [lockTimeoutMs]);
      return result.rowCount ?? 0;
    });
  }

  async markProcessed(messageId: string, claimantId: string): Promise<void> {
    await this.run('markProcessed', async () => {
      const result = await this.pool.query(PROCESSED_SQL, [messageId, claimantId]);
      if (result.rowCount === 0) throw await this.transitionError(messageId, claimantId, 'Processed');
    });
  }

  async markFailed(messageId: string, claimantId: string, error: string, maxRetries: number): Promise<FailureResult> {
    return this.run('markFailed', async () => {
      const result = await this.pool.query<{ status: string; retry_count: number }>(FAILED_SQL, [
        messageId,
        claimantId,
        error,
        maxRetries
      ]);
      const row = result.rows[0];
      if (!row) throw await this.transitionError(messageId, claimantId, 'Failed');
      const status: FailureResult['status'] = row.status === 'DeadLetter' ? 'DeadLetter' : 'Pending';
      return { status, retryCount: row.retry_count };
    });
  }

  async getMessage(messageId: string): Promise<Message | null> {
    return this.run('getMessage', async () => {
      const result = await this.pool.query<MessageRow>('SELECT * FROM relay_messages WHERE id = $1', [messageId]);
      return result.rows[0] ? rowToMessage(result.rows[0]) : null;
    });
  }

  async listMessages(query: MessageQuery = {}): Promise<Message[]> {
    const where: string[] = [];
    const values: unknown[] = [];
    if (query.status) {
      values.push(query.status);
      where.push(`status = $${values.length}`);
    }
    if (query.interfaceName) {
      values.push(query.interfaceName);
      where.push(`interface_name = $${values.length}`);
    }
    values.push(query.limit ?? REPORTING.DEFAULT_LIST_LIMIT);
    const sql = `
      SELECT * FROM relay_messages
      ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
      ORDER BY created_at DESC
      LIMIT $${values.length}
    `;
    return this.run('listMessages', async () => {
      const result = await this.pool.query<MessageRow>(sql, values);
      return result.rows.map(rowToMessage);
    });
  }

  async countByStatus(interfaceName?: string): Promise<Record<MessageStatus, number>> {
    return this.run('countByStatus', async () => {
      const result = await this.pool.query<{ status: string; count: string }>(
        `SELECT status, COUNT(*) AS count FROM relay_messages
         WHERE ($1::text IS NULL OR interface_name = $1)
         GROUP BY status`,
        [interfaceName ?? null]
      );
      const counts = emptyStatusCounts();
      for (const row of result.rows) {
        if (isMessageStatus(row.status)) counts[row.status] = Number(row.count);
      }
      return counts;
    });
  }

  async recentErrors(limit: number, interfaceName?: string): Promise<ErrorRecord[]> {
    return this.run('recentErrors', async () => {
      const result = await this.pool.query<MessageRow>(
        `SELECT * FROM relay_messages
         WHERE last_error IS NOT NULL AND ($2::text IS NULL OR interface_name = $2)
         ORDER BY updated_at DESC
         LIMIT $1`,
        [limit, interfaceName ?? null]
      );
      return result.rows.map(row => {
        const m = rowToMessage(row);
        return {
          messageId: m.id,
          interfaceName: m.interfaceName,
          status: m.status,
          retryCount: m.retryCount,
          error: m.lastError ?? '',
          at: m.updatedAt
        };
      });
    });
  }

  /**
   * Explains why a conditional update matched no row
   */
  private async transitionError(messageId: string, claimantId: string, to: MessageStatus): Promise<InvalidTransitionError> {
    const result = await this.pool.query<{ status: string; claimed_by: string | null }>(
      'SELECT status, claimed_by FROM relay_messages WHERE id = $1',
      [messageId]
    );
    const row = result.rows[0];
    if (!row) return new InvalidTransitionError(messageId, null, to, 'message not found');
    const from = isMessageStatus(row.status) ? row.status : null;
    if (from === 'Claimed') {
      return new InvalidTransitionError(messageId, from, to, `claimed by ${row.claimed_by ?? 'nobody'}, not ${claimantId}`);
    }
    return new InvalidTransitionError(messageId, from, to);
  }

  /**
   * Runs a store operation, passing relay errors through and wrapping
   * driver errors
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof AppError) throw err;
      const wrapped = toStoreError(err, operation);
      logger.error({ err, operation }, 'message store query failed');
      throw wrapped;
    }
  }
}
