import pino from 'pino';
import type { AdapterGateway } from '../src/relay/adapterGateway.js';
import type { TickLease } from '../src/relay/tickLease.js';
import type { RelayTelemetry } from '../src/relay/telemetry.js';
import type { AdapterInstance, ConfigurationSnapshot, ConfigurationSource, InterfaceSnapshot } from '../src/models/configuration.js';
import type { DeliveryOutcome, EnqueueInput, Message } from '../src/models/messages.js';
import type { ConfigurationIssue, DeadLetterEvent, TickReport } from '../src/models/ticks.js';

export const silentLogger = pino({ level: 'silent' });

export const PRODUCER_A = '11111111-1111-4111-8111-111111111111';
export const PRODUCER_B = '22222222-2222-4222-8222-222222222222';
export const DEST_1 = '33333333-3333-4333-8333-333333333333';
export const DEST_2 = '44444444-4444-4444-8444-444444444444';

/**
 * Manually advanced clock
 */
export class FakeClock {
  private current: number;

  constructor(start = Date.UTC(2026, 0, 5, 9, 0, 0)) {
    this.current = start;
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export function orderInput(orderId: string, producer = PRODUCER_A): EnqueueInput {
  return {
    interfaceName: 'Orders',
    sourceAdapterName: 'Csv',
    producerInstanceId: producer,
    payload: { headers: ['OrderId', 'Amount'], record: { OrderId: orderId, Amount: '10.00' } }
  };
}

export function destination(instanceId: string, overrides: Partial<AdapterInstance> = {}): AdapterInstance {
  return {
    instanceId,
    instanceName: `Destination ${instanceId.slice(0, 4)}`,
    adapterName: 'SqlServer',
    interfaceName: 'Orders',
    role: 'destination',
    isEnabled: true,
    capabilities: { read: true, write: true },
    configuration: {},
    ...overrides
  };
}

export function iface(destinations: AdapterInstance[], overrides: Partial<InterfaceSnapshot> = {}): InterfaceSnapshot {
  return { interfaceName: 'Orders', enabled: true, destinations, ...overrides };
}

/**
 * Configuration source returning whatever snapshot it currently holds
 */
export class StaticConfigurationSource implements ConfigurationSource {
  loads = 0;

  constructor(public interfaces: InterfaceSnapshot[] = []) {}

  async loadSnapshot(): Promise<ConfigurationSnapshot> {
    this.loads++;
    return { takenAt: new Date(), interfaces: this.interfaces };
  }
}

type DeliverFn = (instance: AdapterInstance, messages: readonly Message[], signal: AbortSignal) => Promise<DeliveryOutcome[]>;

/**
 * Gateway that records every batch and answers with a scripted function
 */
export class FakeGateway implements AdapterGateway {
  readonly batches: Array<{ instanceId: string; messageIds: string[] }> = [];

  constructor(private handler: DeliverFn = async (_instance, messages) => processAll(messages)) {}

  respondWith(handler: DeliverFn): void {
    this.handler = handler;
  }

  async deliver(instance: AdapterInstance, messages: readonly Message[], signal: AbortSignal): Promise<DeliveryOutcome[]> {
    this.batches.push({ instanceId: instance.instanceId, messageIds: messages.map(m => m.id) });
    return this.handler(instance, messages, signal);
  }
}

export function processAll(messages: readonly Message[]): DeliveryOutcome[] {
  return messages.map((m): DeliveryOutcome => ({ messageId: m.id, status: 'Processed' }));
}

export function failAll(messages: readonly Message[], reason: string): DeliveryOutcome[] {
  return messages.map((m): DeliveryOutcome => ({ messageId: m.id, status: 'Failed', reason }));
}

export class RecordingTelemetry implements RelayTelemetry {
  readonly reports: TickReport[] = [];
  readonly issues: ConfigurationIssue[] = [];
  readonly deadLetters: DeadLetterEvent[] = [];

  tickCompleted(report: TickReport): void {
    this.reports.push(report);
  }

  configurationIssue(issue: ConfigurationIssue): void {
    this.issues.push(issue);
  }

  messageDeadLettered(event: DeadLetterEvent): void {
    this.deadLetters.push(event);
  }
}

export class FakeLease implements TickLease {
  held = false;
  acquired = 0;
  released = 0;

  constructor(private readonly available = true) {}

  async acquire(): Promise<boolean> {
    if (!this.available || this.held) return false;
    this.held = true;
    this.acquired++;
    return true;
  }

  async release(): Promise<void> {
    this.held = false;
    this.released++;
  }
}

/**
 * Resolves once the returned release function is called
 */
export function gate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>(resolve => {
    open = resolve;
  });
  return { wait, open };
}
