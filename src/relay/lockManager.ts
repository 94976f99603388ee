/**
 * Lock Manager
 *
 * Owns the claim lifecycle on mailbox rows. A tick starts by sweeping
 * expired claims; the session returned by the sweep is the only way to
 * claim, so within a tick no claim can run before the sweep.
 *
 * Every claim gets its own token. Outcomes are recorded against the token,
 * so a worker whose claim expired and was taken again (even by the same
 * destination instance) can no longer change the message.
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import type { MessageLockOps } from './messageStore.js';
import type { Message } from '../models/messages.js';
import type { SubscriptionFilter } from '../models/subscriptions.js';

export interface ClaimedBatch {
  /** Claimant recorded on the rows; required to mark their outcomes */
  claimToken: string;
  messages: Message[];
}

/**
 * `<instanceId>:<uuid>`, so the claiming instance stays readable in the store
 */
export function newClaimToken(instanceId: string): string {
  return `${instanceId}:${randomUUID()}`;
}

export class ClaimSession {
  constructor(
    private readonly locks: MessageLockOps,
    /** Claims returned to Pending by the sweep that opened this session */
    readonly released: number
  ) {}

  async claim(interfaceName: string, filter: SubscriptionFilter, instanceId: string, maxCount: number): Promise<ClaimedBatch> {
    const claimToken = newClaimToken(instanceId);
    const messages = await this.locks.claimBatch(interfaceName, filter, claimToken, maxCount);
    return { claimToken, messages };
  }
}

export class LockManager {
  constructor(
    private readonly locks: MessageLockOps,
    readonly lockTimeoutMs: number,
    private readonly log: Logger
  ) {}

  /**
   * Releases stale claims, then opens a claim session for the tick
   */
  async beginTick(): Promise<ClaimSession> {
    const released = await this.locks.releaseExpiredLocks(this.lockTimeoutMs);
    if (released > 0) {
      this.log.info({ released, lockTimeoutMs: this.lockTimeoutMs }, 'released stale message locks');
    } else {
      this.log.debug({ lockTimeoutMs: this.lockTimeoutMs }, 'no stale message locks');
    }
    return new ClaimSession(this.locks, released);
  }
}
