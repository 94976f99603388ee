/**
 * Subscription Registry
 *
 * Binds destination adapter instances to the source instances they consume
 * from. At most one subscription per (destination, interface) is enabled;
 * replacing it disables the previous one, which is kept for audit.
 */

import type { Logger } from 'pino';
import { ValidationError, isValidInstanceId, isValidName } from '../util/validation.js';
import { WILDCARD_FILTER, sameFilter } from '../models/subscriptions.js';
import type { Subscription, SubscriptionFilter } from '../models/subscriptions.js';
import type { AdapterInstance } from '../models/configuration.js';

/**
 * Persistence behind the registry
 */
export interface SubscriptionStore {
  findActive(destinationInstanceId: string, interfaceName: string): Promise<Subscription | null>;

  /**
   * Disables any enabled subscription for the pair and stores a new enabled
   * one, as a single atomic step.
   */
  replaceActive(input: {
    destinationInstanceId: string;
    interfaceName: string;
    destinationAdapterName: string;
    filterCriteria: SubscriptionFilter;
  }): Promise<Subscription>;

  /**
   * @returns false when no subscription has this id
   */
  disable(subscriptionId: string): Promise<boolean>;

  listForInterface(interfaceName: string): Promise<Subscription[]>;
}

function normalizeFilter(filter: SubscriptionFilter): SubscriptionFilter {
  const required = filter.requiredProducerInstanceId;
  if (required === undefined || required === '') return {};
  if (!isValidInstanceId(required)) {
    throw new ValidationError(`Invalid producer instance ID in filter: ${required}`, 'filterCriteria');
  }
  return { requiredProducerInstanceId: required };
}

export class SubscriptionRegistry {
  constructor(
    private readonly store: SubscriptionStore,
    private readonly log: Logger
  ) {}

  /**
   * Enables a subscription for the destination on the interface, disabling
   * the previous one. Re-submitting the active wiring changes nothing.
   */
  async createOrUpdate(
    destinationInstanceId: string,
    interfaceName: string,
    adapterName: string,
    filterCriteria: SubscriptionFilter
  ): Promise<Subscription> {
    if (!isValidInstanceId(destinationInstanceId)) {
      throw new ValidationError(`Invalid destination instance ID: ${destinationInstanceId}`, 'destinationInstanceId');
    }
    if (!isValidName(interfaceName)) {
      throw new ValidationError('Interface name cannot be empty', 'interfaceName');
    }
    if (!isValidName(adapterName)) {
      throw new ValidationError('Adapter name cannot be empty', 'adapterName');
    }
    const filter = normalizeFilter(filterCriteria);

    const active = await this.store.findActive(destinationInstanceId, interfaceName);
    if (active && active.destinationAdapterName === adapterName && sameFilter(active.filterCriteria, filter)) {
      return active;
    }

    const subscription = await this.store.replaceActive({
      destinationInstanceId,
      interfaceName,
      destinationAdapterName: adapterName,
      filterCriteria: filter
    });
    this.log.info(
      { subscriptionId: subscription.id, destinationInstanceId, interfaceName, filter, replaced: active?.id ?? null },
      'subscription enabled'
    );
    return subscription;
  }

  /**
   * The active filter for the pair, or the wildcard when none is configured
   */
  async resolve(destinationInstanceId: string, interfaceName: string): Promise<SubscriptionFilter> {
    const active = await this.store.findActive(destinationInstanceId, interfaceName);
    return active ? active.filterCriteria : WILDCARD_FILTER;
  }

  /**
   * Idempotent
   */
  async disable(subscriptionId: string): Promise<boolean> {
    const found = await this.store.disable(subscriptionId);
    if (found) this.log.info({ subscriptionId }, 'subscription disabled');
    return found;
  }

  async clear(destinationInstanceId: string, interfaceName: string): Promise<void> {
    const active = await this.store.findActive(destinationInstanceId, interfaceName);
    if (active) await this.disable(active.id);
  }

  async listForInterface(interfaceName: string): Promise<Subscription[]> {
    return this.store.listForInterface(interfaceName);
  }

  /**
   * Applies the wiring an instance declares in the configuration snapshot
   */
  async sync(instance: AdapterInstance): Promise<void> {
    if (instance.subscription === undefined) return;
    if (instance.subscription === null) {
      await this.clear(instance.instanceId, instance.interfaceName);
      return;
    }
    await this.createOrUpdate(instance.instanceId, instance.interfaceName, instance.adapterName, instance.subscription);
  }
}
