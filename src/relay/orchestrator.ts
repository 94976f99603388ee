/**
 * Orchestrator
 *
 * Drives one tick of the relay:
 *
 *   Idle → ReclaimingLocks → ResolvingInstances → Dispatching → Idle
 *
 * 1. Sweeps expired claims so messages stranded by crashed workers become
 *    claimable again.
 * 2. Takes a configuration snapshot and picks the enabled destination
 *    instances of every enabled interface. Instances that cannot be
 *    dispatched become configuration issues and are skipped.
 * 3. Processes every remaining instance in a bounded pool: resolve its
 *    subscription filter, claim a batch, deliver it, record the outcomes.
 *
 * A failing instance never affects its siblings. Losing the store is fatal
 * for the tick: no new instances start, claims already taken stay Claimed
 * for the next sweep, and runTick rejects with TickAbortedError.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { REPORTING } from '../core/constants.js';
import {
  ConfigurationError,
  InvalidTransitionError,
  StoreUnavailableError,
  TickAbortedError,
  ValidationError,
  toError
} from '../errors/index.js';
import { runBounded } from '../util/pool.js';
import { assertDispatchable, reconcileOutcomes } from './adapterGateway.js';
import type { AdapterGateway } from './adapterGateway.js';
import type { ClaimSession, LockManager } from './lockManager.js';
import type { MessageStore } from './messageStore.js';
import type { SubscriptionRegistry } from './subscriptionRegistry.js';
import { TelemetryPort } from './telemetry.js';
import type { RelayTelemetry } from './telemetry.js';
import type { TickLease } from './tickLease.js';
import type { AdapterInstance, ConfigurationSnapshot, ConfigurationSource, InterfaceSnapshot } from '../models/configuration.js';
import type { DeliveryOutcome, Message } from '../models/messages.js';
import type { ConfigurationIssue, TickReport, TickState, TickTotals, UnitResult } from '../models/ticks.js';

export interface OrchestratorOptions {
  maxConcurrentInstances: number;
  claimBatchSize: number;
  defaultMaxRetries: number;

  /** How long a tick lease is held before it lapses on its own */
  leaseTtlMs?: number;
}

export interface OrchestratorDeps {
  store: MessageStore;
  locks: LockManager;
  subscriptions: SubscriptionRegistry;
  gateway: AdapterGateway;
  config: ConfigurationSource;
  log: Logger;
  telemetry?: RelayTelemetry;
  lease?: TickLease;
  now?: () => Date;
}

interface DispatchUnit {
  instance: AdapterInstance;
  iface: InterfaceSnapshot;
}

type UnitIdentity = Pick<UnitResult, 'instanceId' | 'interfaceName' | 'adapterName'>;

function emptyTotals(): TickTotals {
  return { claimed: 0, processed: 0, failed: 0, deadLettered: 0, lost: 0 };
}

export class Orchestrator {
  private running = false;
  private currentState: TickState = 'Idle';
  private readonly issues: ConfigurationIssue[] = [];
  private readonly telemetry: TelemetryPort;
  private readonly now: () => Date;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions
  ) {
    for (const field of ['maxConcurrentInstances', 'claimBatchSize', 'defaultMaxRetries'] as const) {
      const value = options[field];
      if (!Number.isInteger(value) || value < 1) {
        throw new ValidationError(`${field} must be a positive integer, got ${value}`, field);
      }
    }
    this.telemetry = new TelemetryPort(deps.telemetry, deps.log);
    this.now = deps.now ?? (() => new Date());
  }

  get state(): TickState {
    return this.currentState;
  }

  /**
   * Configuration issues from recent ticks, newest first
   */
  recentConfigurationIssues(limit: number = REPORTING.MAX_RECENT_ISSUES): ConfigurationIssue[] {
    return this.issues.slice(-limit).reverse();
  }

  /**
   * Runs one tick. A call made while a tick is in flight returns a skipped
   * report without doing anything.
   *
   * @throws TickAbortedError when the store or the configuration source is unreachable
   */
  async runTick(signal: AbortSignal = new AbortController().signal): Promise<TickReport> {
    const tickId = randomUUID();
    const startedAt = this.now();

    if (this.running) {
      this.deps.log.warn({ tickId }, 'tick already in progress, skipping');
      return this.skipped(tickId, startedAt, 'in-progress');
    }
    this.running = true;

    let leased = false;
    try {
      if (this.deps.lease) {
        leased = await this.acquireLease(tickId);
        if (!leased) {
          this.deps.log.info({ tickId }, 'tick lease held by another process, skipping');
          return this.skipped(tickId, startedAt, 'lease-held');
        }
      }
      return await this.execute(tickId, startedAt, signal);
    } finally {
      if (leased) await this.releaseLease(tickId);
      this.currentState = 'Idle';
      this.running = false;
    }
  }

  private async execute(tickId: string, startedAt: Date, signal: AbortSignal): Promise<TickReport> {
    const log = this.deps.log.child({ tickId });
    const report: TickReport = {
      tickId,
      status: 'completed',
      startedAt,
      finishedAt: startedAt,
      releasedLocks: 0,
      interfaces: 0,
      units: [],
      configurationIssues: [],
      totals: emptyTotals()
    };

    this.currentState = 'ReclaimingLocks';
    let session: ClaimSession;
    try {
      session = await this.deps.locks.beginTick();
    } catch (err) {
      throw await this.abort(report, 'stale lock sweep failed', err, log);
    }
    report.releasedLocks = session.released;

    if (signal.aborted) return this.finish(report, 'cancelled', log);

    this.currentState = 'ResolvingInstances';
    let snapshot: ConfigurationSnapshot;
    try {
      snapshot = await this.deps.config.loadSnapshot(signal);
    } catch (err) {
      if (signal.aborted) return this.finish(report, 'cancelled', log);
      throw await this.abort(report, 'configuration snapshot unavailable', err, log);
    }

    let units: DispatchUnit[];
    try {
      units = await this.resolve(snapshot, report, log);
    } catch (err) {
      throw await this.abort(report, 'subscription sync failed', err, log);
    }

    this.currentState = 'Dispatching';
    const dispatch = new AbortController();
    const forwardCancel = () => dispatch.abort(signal.reason);
    if (signal.aborted) forwardCancel();
    else signal.addEventListener('abort', forwardCancel, { once: true });

    const fatal: { cause?: StoreUnavailableError } = {};
    try {
      const settled = await runBounded(
        units,
        this.options.maxConcurrentInstances,
        async unit => {
          const result = await this.processUnit(unit, session, dispatch.signal, log);
          if (result.kind === 'failed' && result.cause instanceof StoreUnavailableError && !fatal.cause) {
            fatal.cause = result.cause;
            dispatch.abort(result.cause);
          }
          return result.unit;
        },
        dispatch.signal
      );

      settled.forEach((outcome, i) => {
        const id = this.identity(units[i].instance);
        if (outcome.status === 'fulfilled') report.units.push(outcome.value);
        else if (outcome.status === 'skipped') report.units.push({ ...id, kind: 'cancelled', claimed: 0 });
        else report.units.push({ ...id, kind: 'failed', error: toError(outcome.reason).message, fatal: false });
      });
    } finally {
      signal.removeEventListener('abort', forwardCancel);
    }

    for (const unit of report.units) {
      if (unit.kind === 'delivered') {
        report.totals.claimed += unit.claimed;
        report.totals.processed += unit.processed;
        report.totals.failed += unit.failed;
        report.totals.deadLettered += unit.deadLettered;
        report.totals.lost += unit.lost;
      } else if (unit.kind === 'cancelled') {
        report.totals.claimed += unit.claimed;
      }
    }

    if (fatal.cause) throw await this.abort(report, 'message store unavailable', fatal.cause, log);
    return this.finish(report, signal.aborted ? 'cancelled' : 'completed', log);
  }

  /**
   * Picks the dispatchable destination instances from the snapshot
   */
  private async resolve(snapshot: ConfigurationSnapshot, report: TickReport, log: Logger): Promise<DispatchUnit[]> {
    const units: DispatchUnit[] = [];

    for (const iface of snapshot.interfaces) {
      if (!iface.enabled) continue;
      const enabled = iface.destinations.filter(d => d.isEnabled);
      if (enabled.length === 0) {
        log.debug({ interfaceName: iface.interfaceName }, 'no enabled destination instances');
        continue;
      }
      report.interfaces++;

      for (const instance of enabled) {
        try {
          assertDispatchable(instance, iface);
          await this.syncSubscription(instance);
          units.push({ instance, iface });
        } catch (err) {
          if (!(err instanceof ConfigurationError)) throw err;
          await this.recordIssue(report, instance, err, log);
        }
      }
    }

    log.info(
      { interfaces: report.interfaces, instances: units.length, issues: report.configurationIssues.length },
      'destination instances resolved'
    );
    return units;
  }

  /**
   * Applies the instance's declared subscription. Anything but a lost store
   * only takes this instance out of the tick.
   */
  private async syncSubscription(instance: AdapterInstance): Promise<void> {
    try {
      await this.deps.subscriptions.sync(instance);
    } catch (err) {
      if (err instanceof StoreUnavailableError) throw err;
      throw new ConfigurationError(
        `Subscription could not be applied: ${toError(err).message}`,
        instance.instanceId,
        instance.interfaceName
      );
    }
  }

  /**
   * Processes one destination instance. Never throws: errors come back as a
   * failed result, with the thrown error attached for the dispatcher.
   */
  private async processUnit(
    { instance, iface }: DispatchUnit,
    session: ClaimSession,
    signal: AbortSignal,
    tickLog: Logger
  ): Promise<{ unit: UnitResult; kind: 'ok' } | { unit: UnitResult; kind: 'failed'; cause: Error }> {
    const id = this.identity(instance);
    const log = tickLog.child({ instanceId: instance.instanceId, interfaceName: iface.interfaceName });
    const maxRetries = instance.maxRetries ?? iface.maxRetries ?? this.options.defaultMaxRetries;
    const batchSize = iface.batchSize ?? this.options.claimBatchSize;

    try {
      if (signal.aborted) return { kind: 'ok', unit: { ...id, kind: 'cancelled', claimed: 0 } };

      const filter = await this.deps.subscriptions.resolve(instance.instanceId, iface.interfaceName);
      const { claimToken, messages: claimed } = await session.claim(iface.interfaceName, filter, instance.instanceId, batchSize);
      if (claimed.length === 0) {
        log.debug('no pending messages');
        return { kind: 'ok', unit: { ...id, kind: 'idle' } };
      }
      log.info({ claimed: claimed.length, claimToken, filter }, 'messages claimed');

      const reported = await this.deliver(instance, claimed, signal, log);
      if (signal.aborted) {
        log.warn({ claimed: claimed.length }, 'dispatch cancelled, leaving messages claimed');
        return { kind: 'ok', unit: { ...id, kind: 'cancelled', claimed: claimed.length } };
      }

      const { outcomes, unexpected } = reconcileOutcomes(claimed, reported);
      if (unexpected.length > 0) {
        log.warn({ unexpected }, 'adapter reported outcomes for messages outside the batch');
      }
      return { kind: 'ok', unit: await this.applyOutcomes(id, claimToken, outcomes, maxRetries, log) };
    } catch (err) {
      const error = toError(err);
      log.error({ err: error }, 'destination instance failed');
      return {
        kind: 'failed',
        cause: error,
        unit: { ...id, kind: 'failed', error: error.message, fatal: error instanceof StoreUnavailableError }
      };
    }
  }

  /**
   * Calls the gateway. A delivery that throws fails the whole batch unless
   * the tick was cancelled, in which case the caller leaves the batch claimed.
   */
  private async deliver(
    instance: AdapterInstance,
    claimed: Message[],
    signal: AbortSignal,
    log: Logger
  ): Promise<DeliveryOutcome[]> {
    try {
      return await this.deps.gateway.deliver(instance, claimed, signal);
    } catch (err) {
      if (signal.aborted) return [];
      const reason = toError(err).message;
      log.warn({ err, count: claimed.length }, 'delivery failed for whole batch');
      return claimed.map((m): DeliveryOutcome => ({ messageId: m.id, status: 'Failed', reason }));
    }
  }

  private async applyOutcomes(
    id: UnitIdentity,
    claimToken: string,
    outcomes: DeliveryOutcome[],
    maxRetries: number,
    log: Logger
  ): Promise<UnitResult> {
    const unit = { ...id, kind: 'delivered' as const, claimed: outcomes.length, processed: 0, failed: 0, deadLettered: 0, lost: 0 };

    for (const outcome of outcomes) {
      try {
        if (outcome.status === 'Processed') {
          await this.deps.store.markProcessed(outcome.messageId, claimToken);
          unit.processed++;
          continue;
        }
        const result = await this.deps.store.markFailed(outcome.messageId, claimToken, outcome.reason, maxRetries);
        unit.failed++;
        if (result.status === 'DeadLetter') {
          unit.deadLettered++;
          log.warn({ messageId: outcome.messageId, retryCount: result.retryCount, reason: outcome.reason }, 'message dead-lettered');
          await this.telemetry.messageDeadLettered({
            messageId: outcome.messageId,
            interfaceName: id.interfaceName,
            instanceId: id.instanceId,
            retryCount: result.retryCount,
            reason: outcome.reason,
            at: this.now()
          });
        }
      } catch (err) {
        if (!(err instanceof InvalidTransitionError)) throw err;
        unit.lost++;
        log.warn({ messageId: outcome.messageId, err }, 'claim lost before outcome was recorded');
      }
    }

    log.info(
      { processed: unit.processed, failed: unit.failed, deadLettered: unit.deadLettered, lost: unit.lost },
      'batch outcomes recorded'
    );
    return unit;
  }

  private async recordIssue(report: TickReport, instance: AdapterInstance, err: ConfigurationError, log: Logger): Promise<void> {
    const issue: ConfigurationIssue = { ...this.identity(instance), reason: err.message, at: this.now() };
    report.configurationIssues.push(issue);
    this.issues.push(issue);
    if (this.issues.length > REPORTING.MAX_RECENT_ISSUES) this.issues.shift();
    log.warn({ instanceId: err.instanceId, interfaceName: err.interfaceName, reason: err.message }, 'destination instance skipped');
    await this.telemetry.configurationIssue(issue);
  }

  private async finish(report: TickReport, status: TickReport['status'], log: Logger): Promise<TickReport> {
    report.status = status;
    report.finishedAt = this.now();
    log.info(
      {
        status,
        releasedLocks: report.releasedLocks,
        units: report.units.length,
        issues: report.configurationIssues.length,
        ...report.totals
      },
      'tick finished'
    );
    await this.telemetry.tickCompleted(report);
    return report;
  }

  private async abort(report: TickReport, reason: string, err: unknown, log: Logger): Promise<TickAbortedError> {
    const cause = toError(err);
    report.status = 'aborted';
    report.finishedAt = this.now();
    log.error({ err: cause, units: report.units.length }, `tick aborted: ${reason}`);
    await this.telemetry.tickCompleted(report);
    return new TickAbortedError(`Tick aborted: ${reason}: ${cause.message}`, report, cause);
  }

  private skipped(tickId: string, at: Date, skipReason: TickReport['skipReason']): TickReport {
    return {
      tickId,
      status: 'skipped',
      skipReason,
      startedAt: at,
      finishedAt: at,
      releasedLocks: 0,
      interfaces: 0,
      units: [],
      configurationIssues: [],
      totals: emptyTotals()
    };
  }

  private identity(instance: AdapterInstance): UnitIdentity {
    return { instanceId: instance.instanceId, interfaceName: instance.interfaceName, adapterName: instance.adapterName };
  }

  private async acquireLease(tickId: string): Promise<boolean> {
    const lease = this.deps.lease;
    if (!lease) return true;
    try {
      return await lease.acquire(this.options.leaseTtlMs ?? this.deps.locks.lockTimeoutMs);
    } catch (err) {
      // Claims do not depend on the lease; run unguarded
      this.deps.log.warn({ err, tickId }, 'tick lease unavailable, running without it');
      return true;
    }
  }

  private async releaseLease(tickId: string): Promise<void> {
    try {
      await this.deps.lease?.release();
    } catch (err) {
      this.deps.log.warn({ err, tickId }, 'failed to release tick lease');
    }
  }
}
