/**
 * Base application error
 *
 * `retryable` tells the bus client whether a handler failure should be
 * retried with backoff or routed straight to the dead-letter queue.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Inbound event payload failed schema validation
 */
export class EventValidationError extends AppError {
  public readonly topic: string;
  public readonly details: unknown;

  constructor(topic: string, details?: unknown, message = `Invalid payload for topic ${topic}`) {
    super(message, 'EVENT_VALIDATION_ERROR');
    this.topic = topic;
    this.details = details;
  }
}

/**
 * Transient failure, safe to retry
 */
export class RetryableError extends AppError {
  constructor(message: string, code = 'RETRYABLE_ERROR') {
    super(message, code, true);
  }
}

/**
 * A record an event refers to does not exist
 */
export class ResourceNotFoundError extends AppError {
  public readonly resourceType: string;
  public readonly resourceId: string;

  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`, 'RESOURCE_NOT_FOUND');
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/**
 * External dependency error (database, Redis, storage)
 */
export class ExternalServiceError extends AppError {
  public readonly service: string;
  public readonly originalError?: Error;

  constructor(service: string, message: string, originalError?: Error) {
    super(`${service}: ${message}`, 'EXTERNAL_SERVICE_ERROR', true);
    this.service = service;
    this.originalError = originalError;
  }
}

/**
 * Bus used before connect() or after close()
 */
export class NotConnectedError extends AppError {
  constructor(message = 'Event bus not connected') {
    super(message, 'NOT_CONNECTED');
  }
}

/** Error names treated as transient when thrown by third-party code */
const RETRYABLE_ERROR_NAMES = [
  'ConnectionError',
  'TimeoutError',
  'HTTPStatusError',
  'NetworkError',
  'TemporaryFailure',
  'AbortError',
];

/** Node system error codes treated as transient */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

/**
 * Decide whether a handler failure should be retried
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  if (RETRYABLE_ERROR_NAMES.some((name) => error.name.includes(name))) {
    return true;
  }

  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && RETRYABLE_ERROR_CODES.has(code);
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
