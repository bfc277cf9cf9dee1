/**
 * Topic bus contract shared by the Redis-backed and in-memory implementations.
 *
 * Delivery is at-least-once. A handler that throws is retried with backoff
 * when the error is retryable and dead-lettered otherwise, so handlers must
 * not swallow errors they cannot recover from.
 */

export interface EventMetadata {
  timestamp: string;
  correlation_id: string;
  topic: string;
}

export interface EventContext {
  topic: string;
  correlationId: string;
  /** Zero-based delivery attempt */
  attempt: number;
}

export type EventHandler = (payload: unknown, context: EventContext) => Promise<void>;

export interface DeadLetter {
  payload: unknown;
  originalTopic: string;
  retryCount: number;
  failureReason: string;
  errorType: string;
  isRetryable: boolean;
}

export interface EventBus {
  publish(topic: string, payload: Record<string, unknown>, correlationId?: string): Promise<void>;
  subscribe(topic: string, handler: EventHandler): Promise<void>;
  close(): Promise<void>;
}

/** Longest failure reason kept on a dead-lettered message */
export const MAX_FAILURE_REASON_LENGTH = 500;

/**
 * Capped exponential backoff: base * 2^(attempt-1), at most maxMs
 */
export function computeBackoffDelay(attemptsMade: number, baseMs: number, maxMs: number): number {
  const exponent = Math.max(0, attemptsMade - 1);
  return Math.min(baseMs * Math.pow(2, exponent), maxMs);
}
