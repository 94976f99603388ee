/**
 * In-Memory Subscription Store
 */

import { randomUUID } from 'crypto';
import type { SubscriptionStore } from '../relay/subscriptionRegistry.js';
import type { Subscription, SubscriptionFilter } from '../models/subscriptions.js';

function clone(s: Subscription): Subscription {
  return { ...s, filterCriteria: { ...s.filterCriteria } };
}

export class InMemorySubscriptionStore implements SubscriptionStore {
  private readonly rows: Subscription[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findActive(destinationInstanceId: string, interfaceName: string): Promise<Subscription | null> {
    const active = this.rows.find(
      s => s.enabled && s.destinationInstanceId === destinationInstanceId && s.interfaceName === interfaceName
    );
    return active ? clone(active) : null;
  }

  async replaceActive(input: {
    destinationInstanceId: string;
    interfaceName: string;
    destinationAdapterName: string;
    filterCriteria: SubscriptionFilter;
  }): Promise<Subscription> {
    const now = this.now();
    for (const s of this.rows) {
      if (s.enabled && s.destinationInstanceId === input.destinationInstanceId && s.interfaceName === input.interfaceName) {
        s.enabled = false;
        s.updatedAt = now;
      }
    }
    const created: Subscription = {
      id: randomUUID(),
      destinationInstanceId: input.destinationInstanceId,
      interfaceName: input.interfaceName,
      destinationAdapterName: input.destinationAdapterName,
      filterCriteria: { ...input.filterCriteria },
      enabled: true,
      createdAt: now,
      updatedAt: now
    };
    this.rows.push(created);
    return clone(created);
  }

  async disable(subscriptionId: string): Promise<boolean> {
    const s = this.rows.find(row => row.id === subscriptionId);
    if (!s) return false;
    if (s.enabled) {
      s.enabled = false;
      s.updatedAt = this.now();
    }
    return true;
  }

  async listForInterface(interfaceName: string): Promise<Subscription[]> {
    return this.rows.filter(s => s.interfaceName === interfaceName).map(clone);
  }
}
