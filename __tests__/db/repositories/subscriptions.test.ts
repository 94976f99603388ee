import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PostgresSubscriptionStore } from '../../../src/db/repositories/subscriptions.js';
import type { SubscriptionRow } from '../../../src/db/types.js';
import { DatabaseError, StoreUnavailableError } from '../../../src/errors/index.js';
import { DEST_1, PRODUCER_A } from '../../helpers.js';

vi.mock('../../../src/core/logger.js', async () => {
  const { default: pino } = await import('pino');
  return { logger: pino({ level: 'silent' }) };
});

const AT = new Date('2026-01-05T09:00:00.000Z');

function subscriptionRow(overrides: Partial<SubscriptionRow> = {}): SubscriptionRow {
  return {
    id: 'sub-1',
    destination_instance_id: DEST_1,
    interface_name: 'Orders',
    destination_adapter_name: 'SqlServer',
    filter_criteria: { requiredProducerInstanceId: PRODUCER_A },
    enabled: true,
    created_at: AT,
    updated_at: AT,
    ...overrides
  };
}

function stubPool() {
  const client = { query: vi.fn(), release: vi.fn() };
  const pool = { query: vi.fn(), connect: vi.fn().mockResolvedValue(client) };
  return { pool, client };
}

function firstWords(calls: unknown[][]): string[] {
  return calls.map(call => String(call[0]).trim().split(/\s+/)[0]);
}

const input = {
  destinationInstanceId: DEST_1,
  interfaceName: 'Orders',
  destinationAdapterName: 'SqlServer',
  filterCriteria: { requiredProducerInstanceId: PRODUCER_A }
};

describe('PostgresSubscriptionStore', () => {
  let pool: ReturnType<typeof stubPool>['pool'];
  let client: ReturnType<typeof stubPool>['client'];
  let store: PostgresSubscriptionStore;

  beforeEach(() => {
    ({ pool, client } = stubPool());
    store = new PostgresSubscriptionStore(pool);
  });

  describe('findActive', () => {
    it('should map the enabled row', async () => {
      pool.query.mockResolvedValueOnce({ rows: [subscriptionRow()], rowCount: 1 });

      await expect(store.findActive(DEST_1, 'Orders')).resolves.toEqual({
        id: 'sub-1',
        destinationInstanceId: DEST_1,
        interfaceName: 'Orders',
        destinationAdapterName: 'SqlServer',
        filterCriteria: { requiredProducerInstanceId: PRODUCER_A },
        enabled: true,
        createdAt: AT,
        updatedAt: AT
      });
      expect(pool.query.mock.calls[0][1]).toEqual([DEST_1, 'Orders']);
    });

    it('should return null when nothing is active', async () => {
      pool.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await expect(store.findActive(DEST_1, 'Orders')).resolves.toBeNull();
    });
  });

  describe('replaceActive', () => {
    it('should disable the old subscription and insert the new one in one transaction', async () => {
      client.query.mockImplementation(async (sql: string) =>
        sql.includes('INSERT') ? { rows: [subscriptionRow({ id: 'sub-2' })], rowCount: 1 } : { rows: [], rowCount: 1 }
      );

      const created = await store.replaceActive(input);

      expect(created.id).toBe('sub-2');
      expect(firstWords(client.query.mock.calls)).toEqual(['BEGIN', 'UPDATE', 'INSERT', 'COMMIT']);
      expect(client.query.mock.calls[1][1]).toEqual([DEST_1, 'Orders']);
      expect(client.query.mock.calls[2][1]).toEqual([
        DEST_1,
        'Orders',
        'SqlServer',
        `{"requiredProducerInstanceId":"${PRODUCER_A}"}`
      ]);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back when the insert fails', async () => {
      client.query.mockImplementation(async (sql: string) => {
        if (sql.includes('INSERT')) {
          throw Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
        }
        return { rows: [], rowCount: 0 };
      });

      const err = await store.replaceActive(input).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(DatabaseError);
      expect(err).toMatchObject({ operation: 'replaceActiveSubscription' });
      expect(firstWords(client.query.mock.calls)).toEqual(['BEGIN', 'UPDATE', 'INSERT', 'ROLLBACK']);
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should report a failed connection as store unavailable', async () => {
      pool.connect.mockRejectedValueOnce(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

      const err = await store.replaceActive(input).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StoreUnavailableError);
      expect(client.query).not.toHaveBeenCalled();
    });
  });

  describe('disable', () => {
    it('should report whether the subscription exists', async () => {
      pool.query.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await expect(store.disable('sub-1')).resolves.toBe(true);
      await expect(store.disable('sub-404')).resolves.toBe(false);
    });
  });

  describe('listForInterface', () => {
    it('should map every row, disabled ones included', async () => {
      pool.query.mockResolvedValueOnce({
        rows: [subscriptionRow({ enabled: false, filter_criteria: {} }), subscriptionRow({ id: 'sub-2' })],
        rowCount: 2
      });

      const subs = await store.listForInterface('Orders');

      expect(subs.map(s => [s.id, s.enabled, s.filterCriteria])).toEqual([
        ['sub-1', false, {}],
        ['sub-2', true, { requiredProducerInstanceId: PRODUCER_A }]
      ]);
    });
  });
});
