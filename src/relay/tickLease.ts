/**
 * Tick Lease
 *
 * Cross-process skip-if-running guard. When several relay processes share a
 * store, at most one of them runs a tick at a time; the others skip.
 * Claim exclusivity does not depend on the lease.
 */

export interface TickLease {
  /**
   * @returns true when this process now holds the lease for `ttlMs`
   */
  acquire(ttlMs: number): Promise<boolean>;

  /** Releases the lease if this process still holds it */
  release(): Promise<void>;
}
