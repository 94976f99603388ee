/**
 * Subscription Repository
 *
 * Functions for storing destination subscriptions. The partial unique index
 * on (destination_instance_id, interface_name) WHERE enabled backs the
 * one-active-subscription rule.
 */

import { logger } from '../../core/logger.js';
import { toStoreError } from '../storeErrors.js';
import { rowToSubscription } from '../types.js';
import type { SqlPool, SubscriptionRow } from '../types.js';
import type { SubscriptionStore } from '../../relay/subscriptionRegistry.js';
import type { Subscription, SubscriptionFilter } from '../../models/subscriptions.js';

export class PostgresSubscriptionStore implements SubscriptionStore {
  constructor(private readonly pool: SqlPool) {}

  async findActive(destinationInstanceId: string, interfaceName: string): Promise<Subscription | null> {
    try {
      const result = await this.pool.query<SubscriptionRow>(
        `SELECT * FROM relay_subscriptions
         WHERE destination_instance_id = $1 AND interface_name = $2 AND enabled`,
        [destinationInstanceId, interfaceName]
      );
      return result.rows[0] ? rowToSubscription(result.rows[0]) : null;
    } catch (err) {
      throw toStoreError(err, 'findActiveSubscription');
    }
  }

  /**
   * Disables the current subscription for the pair and inserts the new one
   * in a single transaction
   */
  async replaceActive(input: {
    destinationInstanceId: string;
    interfaceName: string;
    destinationAdapterName: string;
    filterCriteria: SubscriptionFilter;
  }): Promise<Subscription> {
    const client = await this.pool.connect().catch((err: unknown) => {
      throw toStoreError(err, 'replaceActiveSubscription');
    });

    try {
      await client.query('BEGIN');
      await client.query(
        `UPDATE relay_subscriptions SET enabled = false, updated_at = now()
         WHERE destination_instance_id = $1 AND interface_name = $2 AND enabled`,
        [input.destinationInstanceId, input.interfaceName]
      );
      const result = await client.query<SubscriptionRow>(
        `INSERT INTO relay_subscriptions (destination_instance_id, interface_name, destination_adapter_name, filter_criteria)
         VALUES ($1, $2, $3, $4::jsonb)
         RETURNING *`,
        [input.destinationInstanceId, input.interfaceName, input.destinationAdapterName, JSON.stringify(input.filterCriteria)]
      );
      await client.query('COMMIT');
      return rowToSubscription(result.rows[0]);
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        logger.warn({ err: rollbackErr }, 'rollback failed');
      });
      logger.error({ err, destinationInstanceId: input.destinationInstanceId }, 'Failed to replace subscription');
      throw toStoreError(err, 'replaceActiveSubscription');
    } finally {
      client.release();
    }
  }

  async disable(subscriptionId: string): Promise<boolean> {
    try {
      const result = await this.pool.query(
        `UPDATE relay_subscriptions SET enabled = false, updated_at = CASE WHEN enabled THEN now() ELSE updated_at END
         WHERE id = $1`,
        [subscriptionId]
      );
      return (result.rowCount ?? 0) > 0;
    } catch (err) {
      throw toStoreError(err, 'disableSubscription');
    }
  }

  async listForInterface(interfaceName: string): Promise<Subscription[]> {
    try {
      const result = await this.pool.query<SubscriptionRow>(
        'SELECT * FROM relay_subscriptions WHERE interface_name = $1 ORDER BY created_at',
        [interfaceName]
      );
      return result.rows.map(rowToSubscription);
    } catch (err) {
      throw toStoreError(err, 'listSubscriptions');
    }
  }
}
