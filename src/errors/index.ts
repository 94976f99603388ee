/**
 * Custom Error Classes
 *
 * Standardized error types for better error handling and debugging.
 */

import type { MessageStatus } from '../models/messages.js';
import type { TickReport } from '../models/ticks.js';

/**
 * Base error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error for validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, public field: string) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

/**
 * Error for external API failures (configuration service, adapter host)
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public url: string,
    public statusCode: number,
    cause?: Error
  ) {
    super(message, 'API_ERROR', statusCode, cause);
  }
}

/**
 * Error for database operations
 */
export class DatabaseError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'DATABASE_ERROR', 500, cause);
  }
}

/**
 * The message store cannot be reached at all. Fatal for the current tick.
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'STORE_UNAVAILABLE', 503, cause);
  }
}

/**
 * A status change was requested that the message's current state does not allow
 */
export class InvalidTransitionError extends AppError {
  constructor(
    public messageId: string,
    public from: MessageStatus | null,
    public to: MessageStatus,
    detail?: string
  ) {
    super(
      `Cannot move message ${messageId} from ${from ?? 'missing'} to ${to}${detail ? `: ${detail}` : ''}`,
      'INVALID_TRANSITION',
      409
    );
  }
}

/**
 * A destination instance cannot be dispatched as configured
 */
export class ConfigurationError extends AppError {
  constructor(message: string, public instanceId: string, public interfaceName: string) {
    super(message, 'CONFIGURATION_ERROR', 422);
  }
}

/**
 * A tick stopped early on a fatal condition; claims already taken stay Claimed
 */
export class TickAbortedError extends AppError {
  constructor(message: string, public report: TickReport, cause?: Error) {
    super(message, 'TICK_ABORTED', 503, cause);
  }
}

/**
 * Error for cache/Redis operations
 */
export class CacheError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'CACHE_ERROR', 500, cause);
  }
}

/**
 * Error for Kafka operations
 */
export class KafkaError extends AppError {
  constructor(message: string, public operation: string, cause?: Error) {
    super(message, 'KAFKA_ERROR', 500, cause);
  }
}

/**
 * Normalizes an unknown thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
