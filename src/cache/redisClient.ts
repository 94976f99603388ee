/**
 * Redis Client Module
 *
 * Creates the Redis connection used for the cross-process tick lease.
 * Redis is optional (REDIS_ENABLED); without it each process guards only
 * its own ticks.
 */

import { Redis } from 'ioredis';
import { logger } from '../core/logger.js';

/**
 * Creates a Redis client that connects on first use
 *
 * @param url - Redis connection URL (redis://host:port)
 */
export function createRedis(url: string): Redis {
  const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 2 });

  // Log connection events for monitoring
  redis.on('connect', () => logger.info('Redis connected'));
  redis.on('error', (err: Error) => logger.error({ err }, 'Redis error'));
  return redis;
}
