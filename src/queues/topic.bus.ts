import { Queue, Worker, UnrecoverableError, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import { randomUUID } from 'crypto';
import { createChildLogger } from '../utils/logger.js';
import { getErrorMessage, isRetryableError, NotConnectedError } from '../utils/errors.js';
import { closeRedisConnection, createRedisConnection } from './redis.js';
import {
  computeBackoffDelay,
  MAX_FAILURE_REASON_LENGTH,
  type DeadLetter,
  type EventBus,
  type EventHandler,
  type EventMetadata,
} from './event-bus.js';

const logger = createChildLogger({ service: 'topic-bus' });

type BusMessage = Record<string, unknown> & { _metadata: EventMetadata };

export interface BullTopicBusOptions {
  redisUrl: string;
  /** Subscriber queues are named `{serviceName}.{topic}` */
  serviceName: string;
  /** Redis set prefix holding topic -> queue bindings */
  bindingPrefix: string;
  concurrency: number;
  jobAttempts: number;
  backoffDelayMs: number;
  backoffMaxMs: number;
  completedCount: number;
  failedCount: number;
}

/**
 * Topic bus on BullMQ.
 *
 * Each subscription owns a durable queue bound to its topic through a Redis
 * set, the way a topic exchange binds queues. Publishing adds the message to
 * every bound queue. BullMQ retries retryable failures with capped
 * exponential backoff; exhausted and non-retryable messages are moved to
 * `{queue}.dlq`.
 */
export class BullTopicBus implements EventBus {
  private connection: Redis | null = null;
  private queues = new Map<string, Queue<BusMessage>>();
  private deadLetterQueues = new Map<string, Queue<DeadLetter>>();
  private workers: Worker<BusMessage>[] = [];
  /** Publishing connection plus one blocking connection per worker */
  private ownedConnections: Redis[] = [];

  constructor(private readonly options: BullTopicBusOptions) {}

  /**
   * Open the publishing connection
   */
  async connect(): Promise<void> {
    if (this.connection) {
      return;
    }
    this.connection = this.openConnection(`${this.options.serviceName}:bus`);
    await this.connection.ping();
    logger.info({ serviceName: this.options.serviceName }, 'Connected to topic bus');
  }

  async publish(topic: string, payload: Record<string, unknown>, correlationId?: string): Promise<void> {
    const connection = this.requireConnection();

    const message: BusMessage = {
      ...payload,
      _metadata: {
        timestamp: new Date().toISOString(),
        correlation_id: correlationId ?? randomUUID(),
        topic,
      },
    };

    const boundQueues = await connection.smembers(this.bindingKey(topic));
    for (const queueName of boundQueues) {
      await this.getQueue(queueName).add(topic, message, {
        attempts: this.options.jobAttempts,
        backoff: { type: 'custom' },
        removeOnComplete: { count: this.options.completedCount },
        removeOnFail: { count: this.options.failedCount },
      });
    }

    logger.info(
      { topic, correlationId: message._metadata.correlation_id, queues: boundQueues.length },
      'Published event'
    );
  }

  async subscribe(topic: string, handler: EventHandler): Promise<void> {
    const connection = this.requireConnection();
    const queueName = `${this.options.serviceName}.${topic}`;
    const dlqName = `${queueName}.dlq`;

    await connection.sadd(this.bindingKey(topic), queueName);

    const worker = new Worker<BusMessage>(
      queueName,
      async (job) => this.processMessage(job, topic, dlqName, handler),
      {
        connection: this.openConnection(`${queueName}:worker`),
        concurrency: this.options.concurrency,
        settings: {
          backoffStrategy: (attemptsMade: number) =>
            computeBackoffDelay(attemptsMade, this.options.backoffDelayMs, this.options.backoffMaxMs),
        },
      }
    );

    worker.on('failed', (job, error) => {
      if (!job || error instanceof UnrecoverableError) {
        return;
      }
      const attempts = job.opts.attempts ?? 1;
      if (job.attemptsMade < attempts) {
        logger.info(
          { topic, correlationId: job.data._metadata?.correlation_id, retryCount: job.attemptsMade },
          'Retrying event'
        );
        return;
      }
      this.deadLetter(dlqName, job.data, {
        topic,
        retryCount: job.attemptsMade - 1,
        error,
        isRetryable: true,
      }).catch((dlqError: unknown) => {
        logger.error({ topic, dlq: dlqName, error: getErrorMessage(dlqError) }, 'Failed to dead-letter event');
      });
    });

    worker.on('error', (error) => {
      logger.error({ topic, error }, 'Subscriber worker error');
    });

    this.workers.push(worker);
    logger.info({ topic, queue: queueName }, 'Subscribed to topic');
  }

  async close(): Promise<void> {
    await Promise.all(this.workers.map((worker) => worker.close()));
    await Promise.all([...this.queues.values()].map((queue) => queue.close()));
    await Promise.all([...this.deadLetterQueues.values()].map((queue) => queue.close()));
    const owned = this.ownedConnections;
    this.workers = [];
    this.queues.clear();
    this.deadLetterQueues.clear();
    this.ownedConnections = [];
    this.connection = null;
    await Promise.all(owned.map((redis) => closeRedisConnection(redis)));
    logger.info({ connections: owned.length }, 'Topic bus closed');
  }

  private async processMessage(
    job: Job<BusMessage>,
    topic: string,
    dlqName: string,
    handler: EventHandler
  ): Promise<void> {
    const { _metadata: metadata, ...payload } = job.data;
    const correlationId = metadata?.correlation_id ?? String(job.id);

    logger.info({ topic, correlationId, attempt: job.attemptsMade }, 'Received event');

    try {
      await handler(payload, { topic, correlationId, attempt: job.attemptsMade });
    } catch (error) {
      logger.error({ topic, correlationId, error: getErrorMessage(error) }, 'Failed to process event');

      if (isRetryableError(error)) {
        throw error;
      }

      await this.deadLetter(dlqName, job.data, {
        topic,
        retryCount: job.attemptsMade,
        error,
        isRetryable: false,
      });
      throw new UnrecoverableError(getErrorMessage(error));
    }

    logger.info({ topic, correlationId }, 'Processed event successfully');
  }

  private async deadLetter(
    dlqName: string,
    message: BusMessage,
    failure: { topic: string; retryCount: number; error: unknown; isRetryable: boolean }
  ): Promise<void> {
    const deadLetter: DeadLetter = {
      payload: message,
      originalTopic: failure.topic,
      retryCount: failure.retryCount,
      failureReason: getErrorMessage(failure.error).slice(0, MAX_FAILURE_REASON_LENGTH),
      errorType: failure.error instanceof Error ? failure.error.name : typeof failure.error,
      isRetryable: failure.isRetryable,
    };

    await this.getDeadLetterQueue(dlqName).add('dead-letter', deadLetter);

    logger.error(
      {
        topic: failure.topic,
        correlationId: message._metadata?.correlation_id,
        dlq: dlqName,
        retryCount: failure.retryCount,
        isRetryable: failure.isRetryable,
        reason: failure.isRetryable ? 'max_retries' : 'fatal_error',
      },
      'Event sent to DLQ'
    );
  }

  private getQueue(queueName: string): Queue<BusMessage> {
    const existing = this.queues.get(queueName);
    if (existing) {
      return existing;
    }
    const queue = new Queue<BusMessage>(queueName, { connection: this.requireConnection() });
    this.queues.set(queueName, queue);
    return queue;
  }

  private getDeadLetterQueue(dlqName: string): Queue<DeadLetter> {
    const existing = this.deadLetterQueues.get(dlqName);
    if (existing) {
      return existing;
    }
    const queue = new Queue<DeadLetter>(dlqName, { connection: this.requireConnection() });
    this.deadLetterQueues.set(dlqName, queue);
    return queue;
  }

  private openConnection(connectionName: string): Redis {
    const redis = createRedisConnection(this.options.redisUrl, connectionName);
    this.ownedConnections.push(redis);
    return redis;
  }

  private bindingKey(topic: string): string {
    return `${this.options.bindingPrefix}${topic}`;
  }

  private requireConnection(): Redis {
    if (!this.connection) {
      throw new NotConnectedError();
    }
    return this.connection;
  }
}
