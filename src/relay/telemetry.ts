/**
 * Relay Telemetry Port
 *
 * Optional event sink injected into the orchestrator. A sink implements only
 * the events it cares about.
 */

import type { Logger } from 'pino';
import type { ConfigurationIssue, DeadLetterEvent, TickReport } from '../models/ticks.js';

export interface RelayTelemetry {
  tickCompleted?(report: TickReport): Promise<void> | void;
  configurationIssue?(issue: ConfigurationIssue): Promise<void> | void;
  messageDeadLettered?(event: DeadLetterEvent): Promise<void> | void;
}

/**
 * Forwards events to an optional sink. Methods the sink lacks are no-ops;
 * a sink that throws is logged and ignored.
 */
export class TelemetryPort {
  constructor(
    private readonly sink: RelayTelemetry | undefined,
    private readonly log: Logger
  ) {}

  tickCompleted(report: TickReport): Promise<void> {
    return this.guard('tickCompleted', () => this.sink?.tickCompleted?.(report));
  }

  configurationIssue(issue: ConfigurationIssue): Promise<void> {
    return this.guard('configurationIssue', () => this.sink?.configurationIssue?.(issue));
  }

  messageDeadLettered(event: DeadLetterEvent): Promise<void> {
    return this.guard('messageDeadLettered', () => this.sink?.messageDeadLettered?.(event));
  }

  private async guard(event: keyof RelayTelemetry, call: () => Promise<void> | void | undefined): Promise<void> {
    try {
      await call();
    } catch (err) {
      this.log.warn({ err, event }, 'telemetry sink failed');
    }
  }
}
