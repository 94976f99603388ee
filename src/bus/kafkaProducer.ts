/**
 * Kafka Producer Module
 *
 * Manages the Kafka producer connection used to publish relay events
 * (tick reports, configuration issues, dead letters). Kafka is optional
 * (KAFKA_ENABLED); the relay itself never reads from it.
 */

import { Kafka, logLevel } from 'kafkajs';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

/**
 * Log level set to ERROR to reduce noise from KafkaJS internal logs.
 */
const kafka = new Kafka({
  clientId: cfg.kafka.clientId,
  brokers: cfg.kafka.brokers,
  logLevel: logLevel.ERROR
});

export const producer = kafka.producer();

let connected = false;

/**
 * Connects the Kafka producer to the broker(s)
 *
 * Must be called before publishing any events.
 */
export async function startProducer(): Promise<void> {
  logger.info({ brokers: cfg.kafka.brokers }, 'Connecting to Kafka brokers...');
  await producer.connect();
  connected = true;
  logger.info({ brokers: cfg.kafka.brokers }, 'Kafka producer connected');
}

/**
 * Disconnects the Kafka producer if it was started
 *
 * Safe to call when the producer was never started.
 */
export async function stopProducer(): Promise<void> {
  if (!connected) return;
  await producer.disconnect();
  connected = false;
}

/**
 * Publishes a relay event to the events topic
 *
 * @param key - Message key (interface name or tick id)
 * @param value - Event object (will be JSON stringified)
 */
export async function publishEvent(key: string, value: object): Promise<void> {
  await producer.send({
    topic: cfg.kafka.topicEvents,
    messages: [{ key, value: JSON.stringify(value) }]
  });
}
