/**
 * Application Service
 *
 * Wires the relay from configuration, runs the tick scheduler and shuts
 * everything down on SIGINT/SIGTERM.
 */

import type { Redis } from 'ioredis';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { publishEvent, startProducer, stopProducer } from '../bus/kafkaProducer.js';
import { KafkaTelemetry } from '../bus/kafkaTelemetry.js';
import { createRedis } from '../cache/redisClient.js';
import { RedisTickLease } from '../cache/redisTickLease.js';
import { createConfigurationSource } from '../config/source.js';
import { closeDatabase, db } from '../db/client.js';
import { runMigrations } from '../db/migrate.js';
import { PostgresMessageStore } from '../db/repositories/messages.js';
import { PostgresSubscriptionStore } from '../db/repositories/subscriptions.js';
import { HttpAdapterGateway } from '../http/adapterHostGateway.js';
import { DeadLetterMonitor } from '../relay/deadLetterMonitor.js';
import { LockManager } from '../relay/lockManager.js';
import type { MessageStore } from '../relay/messageStore.js';
import { Orchestrator } from '../relay/orchestrator.js';
import { SubscriptionRegistry } from '../relay/subscriptionRegistry.js';
import type { SubscriptionStore } from '../relay/subscriptionRegistry.js';
import type { RelayTelemetry } from '../relay/telemetry.js';
import type { TickLease } from '../relay/tickLease.js';
import { InMemoryMessageStore } from '../store/memoryMessageStore.js';
import { InMemorySubscriptionStore } from '../store/memorySubscriptionStore.js';
import { validateRelayTuning } from '../util/validation.js';
import { waitForServices } from '../util/waitForServices.js';
import { runScheduler } from './scheduler.js';

/**
 * Sets up graceful shutdown handlers
 *
 * The first signal stops the scheduler after the current tick; a second
 * one exits immediately.
 *
 * @param controller - AbortController to signal shutdown to the scheduler
 */
function setupShutdownHandlers(controller: AbortController): void {
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) {
      logger.warn(`${signal} received again, exiting`);
      process.exit(1);
    }
    logger.info(`${signal} received, shutting down`);
    controller.abort();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

async function createStores(): Promise<{ store: MessageStore; subscriptions: SubscriptionStore }> {
  if (cfg.relay.store === 'memory') {
    logger.warn('using in-memory message store; messages are lost on restart');
    return {
      store: new InMemoryMessageStore({ dedupeWindowMs: cfg.relay.dedupeWindowMs }),
      subscriptions: new InMemorySubscriptionStore()
    };
  }
  await runMigrations();
  return {
    store: new PostgresMessageStore(db, { dedupeWindowMs: cfg.relay.dedupeWindowMs }),
    subscriptions: new PostgresSubscriptionStore(db)
  };
}

/**
 * Main application logic
 *
 * 1. Validates relay tuning and waits for the configured services
 * 2. Builds the store, configuration source, gateway, lease and telemetry
 * 3. Runs ticks until a shutdown signal arrives, then closes connections
 */
export async function startApp(): Promise<void> {
  validateRelayTuning(cfg.relay);

  const controller = new AbortController();
  setupShutdownHandlers(controller);

  await waitForServices(controller.signal);

  const { store, subscriptions } = await createStores();
  const config = createConfigurationSource(cfg.configSource, logger);
  const gateway = new HttpAdapterGateway(cfg.adapterHost.url, cfg.adapterHost.timeoutMs);

  let redis: Redis | undefined;
  let lease: TickLease | undefined;
  if (cfg.redis.enabled) {
    redis = createRedis(cfg.redis.url);
    lease = new RedisTickLease(redis);
  }

  let telemetry: RelayTelemetry | undefined;
  if (cfg.kafka.enabled) {
    await startProducer();
    telemetry = new KafkaTelemetry(publishEvent);
  }

  const orchestrator = new Orchestrator(
    {
      store,
      locks: new LockManager(store, cfg.relay.lockTimeoutMs, logger),
      subscriptions: new SubscriptionRegistry(subscriptions, logger),
      gateway,
      config,
      log: logger,
      telemetry,
      lease
    },
    {
      maxConcurrentInstances: cfg.relay.maxConcurrentInstances,
      claimBatchSize: cfg.relay.claimBatchSize,
      defaultMaxRetries: cfg.relay.defaultMaxRetries
    }
  );

  logger.info(
    {
      store: cfg.relay.store,
      lockTimeoutMs: cfg.relay.lockTimeoutMs,
      maxConcurrentInstances: cfg.relay.maxConcurrentInstances,
      lease: Boolean(lease),
      telemetry: Boolean(telemetry)
    },
    'relay started'
  );

  try {
    await runScheduler(
      orchestrator,
      new DeadLetterMonitor(store),
      { intervalMs: cfg.relay.tickIntervalMs, deadLetterThreshold: cfg.relay.deadLetterThreshold, log: logger },
      controller.signal
    );
  } finally {
    await shutdownResources(redis);
  }
}

async function shutdownResources(redis: Redis | undefined): Promise<void> {
  try {
    await stopProducer();
  } catch (err) {
    logger.warn({ err }, 'Error stopping Kafka producer');
  }

  if (redis) {
    try {
      await redis.quit();
    } catch (err) {
      logger.warn({ err }, 'Error closing Redis connection');
    }
  }

  if (cfg.relay.store === 'postgres') {
    try {
      await closeDatabase();
    } catch (err) {
      logger.warn({ err }, 'Error closing database connections');
    }
  }
}
