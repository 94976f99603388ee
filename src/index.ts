/**
 * Message Relay Service - Main Entry Point
 *
 * Moves staged messages from the mailbox to their destination adapters on a
 * fixed tick: reclaims abandoned claims, resolves the enabled destination
 * instances from the configuration service, and delivers claimed batches
 * through the adapter host.
 */

import { logger } from './core/logger.js';
import { stopProducer } from './bus/kafkaProducer.js';
import { startApp } from './services/app.js';

// Start the service and handle any uncaught errors
startApp()
  .then(() => {
    logger.info('relay stopped');
    process.exit(0);
  })
  .catch(async (err: unknown) => {
    logger.error({ err }, 'Fatal error occurred');
    await stopProducer().catch((stopErr: unknown) => logger.warn({ err: stopErr }, 'Error stopping Kafka producer'));
    process.exit(1);
  });
