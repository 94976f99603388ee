/**
 * Redis Tick Lease
 *
 * `SET key token PX ttl NX` takes the lease; release deletes the key only
 * while it still holds this process's token, so a lease that lapsed and was
 * taken by another process is left alone.
 */

import { randomUUID } from 'crypto';
import { CacheError, toError } from '../errors/index.js';
import type { TickLease } from '../relay/tickLease.js';
import { KEYS } from './keys.js';

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

/**
 * Redis commands the lease needs (satisfied by an ioredis client)
 */
export interface LeaseCommands {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<'OK' | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

export class RedisTickLease implements TickLease {
  readonly token = randomUUID();

  constructor(
    private readonly redis: LeaseCommands,
    private readonly key: string = KEYS.tickLease()
  ) {}

  async acquire(ttlMs: number): Promise<boolean> {
    try {
      const reply = await this.redis.set(this.key, this.token, 'PX', ttlMs, 'NX');
      return reply === 'OK';
    } catch (err) {
      const error = toError(err);
      throw new CacheError(`Failed to acquire tick lease: ${error.message}`, 'acquireLease', error);
    }
  }

  async release(): Promise<void> {
    try {
      await this.redis.eval(RELEASE_SCRIPT, 1, this.key, this.token);
    } catch (err) {
      const error = toError(err);
      throw new CacheError(`Failed to release tick lease: ${error.message}`, 'releaseLease', error);
    }
  }
}
