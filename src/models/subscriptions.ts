/**
 * Subscription Models
 */

/**
 * Criteria restricting which producer's messages a destination claims.
 * An empty object is the wildcard (accept any source).
 */
export interface SubscriptionFilter {
  requiredProducerInstanceId?: string;
}

export const WILDCARD_FILTER: Readonly<SubscriptionFilter> = Object.freeze({});

export interface Subscription {
  id: string;
  destinationInstanceId: string;
  interfaceName: string;
  destinationAdapterName: string;
  filterCriteria: SubscriptionFilter;
  enabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * True when both filters select the same producers
 */
export function sameFilter(a: SubscriptionFilter, b: SubscriptionFilter): boolean {
  return (a.requiredProducerInstanceId ?? null) === (b.requiredProducerInstanceId ?? null);
}

/**
 * True when a message written by `producerInstanceId` passes the filter
 */
export function matchesFilter(filter: SubscriptionFilter, producerInstanceId: string): boolean {
  return !filter.requiredProducerInstanceId || filter.requiredProducerInstanceId === producerInstanceId;
}
