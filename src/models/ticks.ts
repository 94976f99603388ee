/**
 * Tick Models
 *
 * Results of one orchestrator tick (reclaim, resolve, dispatch).
 */

export type TickState = 'Idle' | 'ReclaimingLocks' | 'ResolvingInstances' | 'Dispatching';

interface UnitBase {
  instanceId: string;
  interfaceName: string;
  adapterName: string;
}

/**
 * Result of processing one destination instance.
 * Errors are values here so a failing unit never unwinds its siblings.
 */
export type UnitResult =
  | (UnitBase & {
      kind: 'delivered';
      claimed: number;
      processed: number;
      failed: number;
      deadLettered: number;
      /** Outcomes rejected because the claim was no longer ours */
      lost: number;
    })
  | (UnitBase & { kind: 'idle' })
  | (UnitBase & { kind: 'cancelled'; claimed: number })
  | (UnitBase & { kind: 'failed'; error: string; fatal: boolean });

/**
 * A destination instance skipped for the tick because it cannot be dispatched
 */
export interface ConfigurationIssue {
  instanceId: string;
  interfaceName: string;
  adapterName: string;
  reason: string;
  at: Date;
}

export interface TickTotals {
  claimed: number;
  processed: number;
  failed: number;
  deadLettered: number;
  lost: number;
}

export interface TickReport {
  tickId: string;
  status: 'completed' | 'cancelled' | 'skipped' | 'aborted';
  skipReason?: 'in-progress' | 'lease-held';
  startedAt: Date;
  finishedAt: Date;
  releasedLocks: number;
  interfaces: number;
  units: UnitResult[];
  configurationIssues: ConfigurationIssue[];
  totals: TickTotals;
}

/**
 * Event emitted when a failed delivery exhausts its retries
 */
export interface DeadLetterEvent {
  messageId: string;
  interfaceName: string;
  instanceId: string;
  retryCount: number;
  reason: string;
  at: Date;
}
