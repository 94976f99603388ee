/**
 * Adapter Gateway Contract
 *
 * The boundary between the relay and the adapters that write to
 * destinations. Adapters receive a claimed batch and report an outcome per
 * message; retry policy stays with the store.
 */

import { ConfigurationError } from '../errors/index.js';
import { isValidInstanceId, isValidName } from '../util/validation.js';
import type { AdapterInstance, InterfaceSnapshot } from '../models/configuration.js';
import type { DeliveryOutcome, Message } from '../models/messages.js';

export interface AdapterGateway {
  /**
   * Delivers a batch to the instance's destination.
   * Must reject with the signal's reason (or an AbortError) when aborted.
   */
  deliver(instance: AdapterInstance, messages: readonly Message[], signal: AbortSignal): Promise<DeliveryOutcome[]>;
}

export const NO_OUTCOME_REASON = 'Adapter reported no outcome for this message';

function dispatchProblem(instance: AdapterInstance, iface: InterfaceSnapshot): string | null {
  if (!isValidInstanceId(instance.instanceId)) {
    return `Invalid instance ID: ${instance.instanceId}`;
  }
  if (!isValidName(instance.adapterName)) {
    return 'Adapter name cannot be empty';
  }
  if (instance.role !== 'destination') {
    return `Adapter '${instance.adapterName}' is configured as a ${instance.role}, not a destination`;
  }
  if (instance.interfaceName !== iface.interfaceName) {
    return `Instance belongs to interface '${instance.interfaceName}', listed under '${iface.interfaceName}'`;
  }
  if (instance.configurationError) {
    return `Malformed configuration: ${instance.configurationError}`;
  }
  if (!instance.capabilities.write) {
    return `Adapter '${instance.adapterName}' does not support writing and cannot be used as a destination`;
  }
  if (instance.maxRetries !== undefined && !(Number.isInteger(instance.maxRetries) && instance.maxRetries > 0)) {
    return `maxRetries must be a positive integer, got ${instance.maxRetries}`;
  }
  return null;
}

/**
 * Checks that an instance can be dispatched as a destination
 *
 * @throws ConfigurationError naming the first problem found
 */
export function assertDispatchable(instance: AdapterInstance, iface: InterfaceSnapshot): void {
  const problem = dispatchProblem(instance, iface);
  if (problem) throw new ConfigurationError(problem, instance.instanceId, iface.interfaceName);
}

/**
 * Matches reported outcomes to the delivered batch.
 * Messages without an outcome count as failed; outcomes for messages that
 * were not in the batch are returned separately so the caller can log them.
 * When an adapter reports a message twice, the first report wins.
 */
export function reconcileOutcomes(
  messages: readonly Message[],
  reported: readonly DeliveryOutcome[]
): { outcomes: DeliveryOutcome[]; unexpected: string[] } {
  const byId = new Map<string, DeliveryOutcome>();
  const unexpected: string[] = [];
  const batchIds = new Set(messages.map(m => m.id));

  for (const outcome of reported) {
    if (!batchIds.has(outcome.messageId)) {
      unexpected.push(outcome.messageId);
      continue;
    }
    if (!byId.has(outcome.messageId)) byId.set(outcome.messageId, outcome);
  }

  const outcomes = messages.map(
    (m): DeliveryOutcome => byId.get(m.id) ?? { messageId: m.id, status: 'Failed', reason: NO_OUTCOME_REASON }
  );
  return { outcomes, unexpected };
}
