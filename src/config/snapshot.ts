/**
 * Configuration Snapshot Parser
 *
 * Turns the configuration service's JSON into a frozen snapshot. Problems
 * with a single instance are kept on the instance (so the orchestrator can
 * report it and skip it); entries that cannot be identified at all are
 * dropped with a warning. Only a document that is not a snapshot at all
 * is rejected.
 */

import { isRecord, ValidationError } from '../util/validation.js';
import type { AdapterInstance, AdapterRole, ConfigurationSnapshot, InterfaceSnapshot } from '../models/configuration.js';
import type { SubscriptionFilter } from '../models/subscriptions.js';

export interface ParsedSnapshot {
  snapshot: ConfigurationSnapshot;
  warnings: string[];
}

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function parseConfiguration(value: unknown): { configuration: Record<string, unknown>; error?: string } {
  if (value === undefined || value === null || value === '') return { configuration: {} };
  if (isRecord(value)) return { configuration: value };
  if (typeof value === 'string') {
    try {
      const decoded: unknown = JSON.parse(value);
      if (isRecord(decoded)) return { configuration: decoded };
      return { configuration: {}, error: 'configuration must be a JSON object' };
    } catch (err) {
      return { configuration: {}, error: `configuration is not valid JSON (${err instanceof Error ? err.message : String(err)})` };
    }
  }
  return { configuration: {}, error: 'configuration must be a JSON object' };
}

function parseSubscription(value: unknown): SubscriptionFilter | null | undefined {
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (!isRecord(value)) return undefined;
  const required = str(value.requiredProducerInstanceId);
  return required ? { requiredProducerInstanceId: required } : {};
}

function parseRole(value: unknown): AdapterRole {
  return value === 'source' ? 'source' : 'destination';
}

function parseInstance(raw: Record<string, unknown>, interfaceName: string): AdapterInstance {
  const { configuration, error } = parseConfiguration(raw.configuration);
  const caps = isRecord(raw.capabilities) ? raw.capabilities : {};
  const instance: AdapterInstance = {
    instanceId: str(raw.instanceId),
    instanceName: str(raw.instanceName) || str(raw.adapterName),
    adapterName: str(raw.adapterName),
    interfaceName: str(raw.interfaceName) || interfaceName,
    role: parseRole(raw.role),
    isEnabled: bool(raw.isEnabled ?? raw.enabled, true),
    // Omitted capabilities mean the service does not restrict the adapter
    capabilities: { read: bool(caps.read, true), write: bool(caps.write, true) },
    configuration
  };
  const maxRetries = optionalNumber(raw.maxRetries);
  if (maxRetries !== undefined) instance.maxRetries = maxRetries;
  if (error) instance.configurationError = error;
  const subscription = parseSubscription(raw.subscription);
  if (subscription !== undefined) instance.subscription = subscription;
  return instance;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Parses a configuration document into a frozen snapshot
 *
 * @throws ValidationError when the document has no `interfaces` array
 */
export function parseSnapshot(raw: unknown, takenAt: Date = new Date()): ParsedSnapshot {
  if (!isRecord(raw) || !Array.isArray(raw.interfaces)) {
    throw new ValidationError('Configuration document must contain an interfaces array', 'interfaces');
  }

  const warnings: string[] = [];
  const interfaces: InterfaceSnapshot[] = [];
  const seen = new Set<string>();

  raw.interfaces.forEach((entry: unknown, i: number) => {
    if (!isRecord(entry) || !str(entry.interfaceName).trim()) {
      warnings.push(`interfaces[${i}] has no interfaceName and was ignored`);
      return;
    }
    const interfaceName = str(entry.interfaceName);
    if (seen.has(interfaceName)) {
      warnings.push(`interface '${interfaceName}' is listed more than once; later entries were ignored`);
      return;
    }
    seen.add(interfaceName);

    const destinations: AdapterInstance[] = [];
    const rawDestinations: unknown[] = Array.isArray(entry.destinations) ? entry.destinations : [];
    rawDestinations.forEach((d, j) => {
      if (!isRecord(d)) {
        warnings.push(`interface '${interfaceName}' destinations[${j}] is not an object and was ignored`);
        return;
      }
      destinations.push(parseInstance(d, interfaceName));
    });

    const iface: InterfaceSnapshot = {
      interfaceName,
      enabled: bool(entry.enabled, true),
      destinations
    };
    const maxRetries = optionalNumber(entry.maxRetries);
    if (maxRetries !== undefined && Number.isInteger(maxRetries) && maxRetries > 0) {
      iface.maxRetries = maxRetries;
    } else if (maxRetries !== undefined) {
      warnings.push(`interface '${interfaceName}' maxRetries ${maxRetries} is not a positive integer; using the default`);
    }
    const batchSize = optionalNumber(entry.batchSize);
    if (batchSize !== undefined && Number.isInteger(batchSize) && batchSize > 0) iface.batchSize = batchSize;
    interfaces.push(iface);
  });

  return { snapshot: deepFreeze({ takenAt, interfaces }), warnings };
}
