import { describe, it, expect } from 'vitest';
import { EVENT_TYPES, KafkaTelemetry } from '../../src/bus/kafkaTelemetry.js';
import { KafkaError } from '../../src/errors/index.js';
import type { TickReport } from '../../src/models/ticks.js';
import { DEST_1 } from '../helpers.js';

const AT = new Date('2026-01-05T09:00:00.000Z');

function recorder(): { events: Array<{ key: string; value: object }>; publish: (key: string, value: object) => Promise<void> } {
  const events: Array<{ key: string; value: object }> = [];
  return {
    events,
    publish: async (key, value) => {
      events.push({ key, value });
    }
  };
}

describe('KafkaTelemetry', () => {
  it('should publish a tick summary keyed by tick id', async () => {
    const { events, publish } = recorder();
    const report: TickReport = {
      tickId: 'tick-1',
      status: 'completed',
      startedAt: AT,
      finishedAt: new Date(AT.getTime() + 250),
      releasedLocks: 1,
      interfaces: 2,
      units: [
        { kind: 'idle', instanceId: DEST_1, interfaceName: 'Orders', adapterName: 'SqlServer' }
      ],
      configurationIssues: [],
      totals: { claimed: 0, processed: 0, failed: 0, deadLettered: 0, lost: 0 }
    };

    await new KafkaTelemetry(publish).tickCompleted(report);

    expect(events).toEqual([
      {
        key: 'tick-1',
        value: {
          type: EVENT_TYPES.tickCompleted,
          tickId: 'tick-1',
          status: 'completed',
          skipReason: undefined,
          startedAt: '2026-01-05T09:00:00.000Z',
          finishedAt: '2026-01-05T09:00:00.250Z',
          releasedLocks: 1,
          interfaces: 2,
          units: 1,
          configurationIssues: 0,
          totals: { claimed: 0, processed: 0, failed: 0, deadLettered: 0, lost: 0 }
        }
      }
    ]);
  });

  it('should key configuration issues and dead letters by interface', async () => {
    const { events, publish } = recorder();
    const telemetry = new KafkaTelemetry(publish);

    await telemetry.configurationIssue({
      instanceId: DEST_1,
      interfaceName: 'Orders',
      adapterName: 'SqlServer',
      reason: 'adapter cannot write',
      at: AT
    });
    await telemetry.messageDeadLettered({
      messageId: 'm1',
      interfaceName: 'Invoices',
      instanceId: DEST_1,
      retryCount: 3,
      reason: 'timeout',
      at: AT
    });

    expect(events).toEqual([
      {
        key: 'Orders',
        value: {
          type: 'relay.configuration.issue',
          instanceId: DEST_1,
          interfaceName: 'Orders',
          adapterName: 'SqlServer',
          reason: 'adapter cannot write',
          at: '2026-01-05T09:00:00.000Z'
        }
      },
      {
        key: 'Invoices',
        value: {
          type: 'relay.message.dead_lettered',
          messageId: 'm1',
          interfaceName: 'Invoices',
          instanceId: DEST_1,
          retryCount: 3,
          reason: 'timeout',
          at: '2026-01-05T09:00:00.000Z'
        }
      }
    ]);
  });

  it('should wrap publish failures in KafkaError', async () => {
    const telemetry = new KafkaTelemetry(async () => {
      throw new Error('broker unreachable');
    });

    const attempt = telemetry.messageDeadLettered({
      messageId: 'm1',
      interfaceName: 'Orders',
      instanceId: DEST_1,
      retryCount: 3,
      reason: 'timeout',
      at: AT
    });

    await expect(attempt).rejects.toBeInstanceOf(KafkaError);
    await expect(attempt).rejects.toThrow('Failed to publish relay event: broker unreachable');
  });
});
