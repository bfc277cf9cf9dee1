import { randomUUID } from 'crypto';
import { createChildLogger } from '../utils/logger.js';
import { getErrorMessage, isRetryableError } from '../utils/errors.js';
import {
  MAX_FAILURE_REASON_LENGTH,
  type DeadLetter,
  type EventBus,
  type EventHandler,
} from './event-bus.js';

const logger = createChildLogger({ service: 'memory-bus' });

export interface PublishedEvent {
  topic: string;
  payload: Record<string, unknown>;
  correlationId: string;
}

export interface InMemoryEventBusOptions {
  /** Total delivery attempts for retryable failures (default: 4) */
  maxAttempts?: number;
}

/**
 * In-process topic bus.
 *
 * Records every published event and delivers it to subscribed handlers.
 * Retries run immediately (no backoff delay); exhausted or non-retryable
 * failures are kept in `deadLetters`.
 */
export class InMemoryEventBus implements EventBus {
  readonly published: PublishedEvent[] = [];
  readonly deadLetters: DeadLetter[] = [];
  private handlers = new Map<string, EventHandler[]>();
  private maxAttempts: number;
  private closed = false;

  constructor(options: InMemoryEventBusOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 4;
  }

  async publish(topic: string, payload: Record<string, unknown>, correlationId?: string): Promise<void> {
    if (this.closed) {
      throw new Error('Event bus closed');
    }

    const event: PublishedEvent = {
      topic,
      payload,
      correlationId: correlationId ?? randomUUID(),
    };
    this.published.push(event);

    const handlers = this.handlers.get(topic) ?? [];
    for (const handler of handlers) {
      await this.deliver(event, handler);
    }
  }

  async subscribe(topic: string, handler: EventHandler): Promise<void> {
    const handlers = this.handlers.get(topic);
    if (handlers) {
      handlers.push(handler);
    } else {
      this.handlers.set(topic, [handler]);
    }
  }

  /**
   * Deliver a raw payload to a topic's subscribers without recording it,
   * simulating a message produced by another service
   */
  async inject(topic: string, payload: unknown): Promise<void> {
    const handlers = this.handlers.get(topic) ?? [];
    const event = { topic, payload, correlationId: randomUUID() };
    for (const handler of handlers) {
      await this.deliver(event, handler);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
  }

  /**
   * Published events on a topic, in publish order
   */
  eventsFor(topic: string): Record<string, unknown>[] {
    return this.published.filter((e) => e.topic === topic).map((e) => e.payload);
  }

  private async deliver(
    event: { topic: string; payload: unknown; correlationId: string },
    handler: EventHandler
  ): Promise<void> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        await handler(event.payload, {
          topic: event.topic,
          correlationId: event.correlationId,
          attempt,
        });
        return;
      } catch (error) {
        const retryable = isRetryableError(error);
        const exhausted = attempt + 1 >= this.maxAttempts;

        if (retryable && !exhausted) {
          logger.info(
            { topic: event.topic, correlationId: event.correlationId, retryCount: attempt + 1 },
            'Retrying event'
          );
          continue;
        }

        this.deadLetters.push({
          payload: event.payload,
          originalTopic: event.topic,
          retryCount: attempt,
          failureReason: getErrorMessage(error).slice(0, MAX_FAILURE_REASON_LENGTH),
          errorType: error instanceof Error ? error.name : typeof error,
          isRetryable: retryable,
        });
        logger.error(
          {
            topic: event.topic,
            correlationId: event.correlationId,
            retryCount: attempt,
            isRetryable: retryable,
            reason: retryable ? 'max_retries' : 'fatal_error',
          },
          'Event sent to DLQ'
        );
        return;
      }
    }
  }
}
