/**
 * Tick Scheduler
 *
 * Runs orchestrator ticks back to back with a fixed pause between them
 * until the signal aborts. A tick that aborts is logged and the loop goes on;
 * the next tick retries from the sweep.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { Logger } from 'pino';
import { TickAbortedError } from '../errors/index.js';
import type { Orchestrator } from '../relay/orchestrator.js';
import type { DeadLetterMonitor } from '../relay/deadLetterMonitor.js';

export interface SchedulerOptions {
  intervalMs: number;
  deadLetterThreshold: number;
  log: Logger;
}

/**
 * Waits `ms`, or less if the signal aborts first
 */
export async function pause(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
}

export async function runScheduler(
  orchestrator: Pick<Orchestrator, 'runTick'>,
  monitor: Pick<DeadLetterMonitor, 'count'>,
  options: SchedulerOptions,
  signal: AbortSignal
): Promise<void> {
  const { log } = options;
  log.info({ intervalMs: options.intervalMs }, 'scheduler started');

  while (!signal.aborted) {
    try {
      const report = await orchestrator.runTick(signal);
      if (report.status === 'skipped') {
        log.debug({ tickId: report.tickId, reason: report.skipReason }, 'tick skipped');
      }
    } catch (err) {
      if (err instanceof TickAbortedError) {
        log.error({ tickId: err.report.tickId, err: err.cause }, 'tick aborted');
      } else {
        log.error({ err }, 'tick failed');
      }
    }

    try {
      const deadLetters = await monitor.count();
      if (deadLetters > options.deadLetterThreshold) {
        log.warn({ deadLetters, threshold: options.deadLetterThreshold }, 'dead-letter threshold exceeded');
      }
    } catch (err) {
      log.warn({ err }, 'dead-letter check failed');
    }

    await pause(options.intervalMs, signal);
  }

  log.info('scheduler stopped');
}
