/**
 * Configuration Snapshot Models
 *
 * The relay reads interface and adapter instance configuration as a snapshot
 * taken at the start of each tick. Snapshots are frozen; instances refer to
 * their interface by name, never by object reference.
 */

import type { SubscriptionFilter } from './subscriptions.js';

export type AdapterRole = 'source' | 'destination';

export interface AdapterCapabilities {
  read: boolean;
  write: boolean;
}

export interface AdapterInstance {
  instanceId: string;
  instanceName: string;
  adapterName: string;
  interfaceName: string;
  role: AdapterRole;
  isEnabled: boolean;
  capabilities: AdapterCapabilities;
  maxRetries?: number;
  configuration: Readonly<Record<string, unknown>>;

  /** Set when the configuration blob could not be read */
  configurationError?: string;

  /**
   * Wiring declared by the configuration service.
   * undefined: not managed here; null: cleared; object: subscribe with this filter.
   */
  subscription?: SubscriptionFilter | null;
}

export interface InterfaceSnapshot {
  interfaceName: string;
  enabled: boolean;
  maxRetries?: number;
  batchSize?: number;
  destinations: ReadonlyArray<AdapterInstance>;
}

export interface ConfigurationSnapshot {
  takenAt: Date;
  interfaces: ReadonlyArray<InterfaceSnapshot>;
}

/**
 * Produces a fresh snapshot every time it is asked
 */
export interface ConfigurationSource {
  loadSnapshot(signal?: AbortSignal): Promise<ConfigurationSnapshot>;
}
