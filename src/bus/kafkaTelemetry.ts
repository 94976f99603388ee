/**
 * Kafka Telemetry Sink
 *
 * Publishes orchestrator events to the relay events topic. Publish failures
 * are wrapped in KafkaError; the telemetry port logs them and the tick
 * carries on.
 */

import { KafkaError, toError } from '../errors/index.js';
import type { RelayTelemetry } from '../relay/telemetry.js';
import type { ConfigurationIssue, DeadLetterEvent, TickReport } from '../models/ticks.js';

export type EventPublisher = (key: string, value: object) => Promise<void>;

export const EVENT_TYPES = {
  tickCompleted: 'relay.tick.completed',
  configurationIssue: 'relay.configuration.issue',
  messageDeadLettered: 'relay.message.dead_lettered',
} as const;

export class KafkaTelemetry implements RelayTelemetry {
  constructor(private readonly publish: EventPublisher) {}

  /**
   * Per-unit details stay in the logs; the event carries the summary
   */
  async tickCompleted(report: TickReport): Promise<void> {
    await this.send(report.tickId, {
      type: EVENT_TYPES.tickCompleted,
      tickId: report.tickId,
      status: report.status,
      skipReason: report.skipReason,
      startedAt: report.startedAt.toISOString(),
      finishedAt: report.finishedAt.toISOString(),
      releasedLocks: report.releasedLocks,
      interfaces: report.interfaces,
      units: report.units.length,
      configurationIssues: report.configurationIssues.length,
      totals: report.totals
    });
  }

  async configurationIssue(issue: ConfigurationIssue): Promise<void> {
    await this.send(issue.interfaceName, {
      type: EVENT_TYPES.configurationIssue,
      ...issue,
      at: issue.at.toISOString()
    });
  }

  async messageDeadLettered(event: DeadLetterEvent): Promise<void> {
    await this.send(event.interfaceName, {
      type: EVENT_TYPES.messageDeadLettered,
      ...event,
      at: event.at.toISOString()
    });
  }

  private async send(key: string, value: object): Promise<void> {
    try {
      await this.publish(key, value);
    } catch (err) {
      const error = toError(err);
      throw new KafkaError(`Failed to publish relay event: ${error.message}`, 'publishEvent', error);
    }
  }
}
