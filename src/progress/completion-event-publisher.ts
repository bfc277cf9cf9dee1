import { randomUUID } from 'crypto';
import { createChildLogger } from '../utils/logger.js';
import type { EventBus } from '../queues/event-bus.js';
import type { JobProgressTracker } from './job-progress-tracker.js';
import { CompletionEmissionLedger } from './ledgers.js';
import { trackingKeyId, type PipelineStage, type TrackingKey } from '../types/asset.types.js';
import {
  BATCH_TRANSITION_COUNT_FIELD,
  completedEventSchema,
  completedTopic,
  MASKED_BATCH_TOPIC,
  type BatchTransitionPayload,
  type BatchTransitionTopic,
  type CompletedEventPayload,
} from '../types/events.types.js';

const logger = createChildLogger({ service: 'completion-event-publisher' });

/**
 * Result of a completion attempt.
 *
 * - published: the event went to the bus
 * - duplicate: an event for the same key was already emitted
 * - untracked: no counters exist for the key
 */
export type PublishOutcome = 'published' | 'duplicate' | 'untracked';

export interface PublishOptions {
  /** Forced by the watermark timer; marks the event as partial */
  isTimeout?: boolean;
}

export interface CompletionEventPublisherOptions {
  /** Echoed in `watermark_ttl` of completed events */
  watermarkTtlSeconds: Record<PipelineStage, number>;
}

interface PendingTransition {
  jobId: string;
  topic: BatchTransitionTopic;
  total: number;
}

interface CompletionCounts {
  total: number;
  done: number;
  hasPartial: boolean;
}

/**
 * Emits at most one "{assetType}.{stage}.completed" event per tracked stream.
 *
 * The emission ledger is claimed synchronously before the bus call is
 * awaited, so re-entrant completion checks see the claim. Cleanup of the
 * stream is left to the caller.
 *
 * A segmentation completion owes the next stage a masked-batch event. It
 * stays pending until that publish succeeds; `flushPendingTransition` sends
 * it again.
 */
export class CompletionEventPublisher {
  private readonly emitted = new CompletionEmissionLedger();
  private readonly pendingTransitions = new Map<string, PendingTransition>();

  constructor(
    private readonly bus: EventBus,
    private readonly tracker: JobProgressTracker,
    private readonly options: CompletionEventPublisherOptions
  ) {}

  /**
   * Publish from the tracker's current counters
   */
  async publish(key: TrackingKey, options: PublishOptions = {}): Promise<PublishOutcome> {
    const isTimeout = options.isTimeout ?? false;
    const state = this.tracker.get(key);
    if (!state) {
      logger.warn({ ...key, isTimeout }, 'Job not found in tracking');
      return 'untracked';
    }

    const counts = this.countsFor(key, state.expected.kind === 'known' ? state.expected.value : null, state.done);
    return this.emit(key, { ...counts, hasPartial: counts.hasPartial || isTimeout }, isTimeout);
  }

  /**
   * Publish with counts the caller already knows (zero-asset batches,
   * batch-level transitions)
   */
  async publishWithExplicitCount(key: TrackingKey, expected: number, done: number): Promise<PublishOutcome> {
    const hasPartial = expected === 0 ? false : done < expected;
    return this.emit(key, { total: expected, done, hasPartial }, false);
  }

  /**
   * Announce that a stage's output batch is ready for the next stage
   */
  async publishBatchTransition(jobId: string, topic: BatchTransitionTopic, total: number): Promise<PublishOutcome> {
    const eventId = randomUUID();
    const payload: BatchTransitionPayload =
      BATCH_TRANSITION_COUNT_FIELD[topic] === 'total_images'
        ? { event_id: eventId, job_id: jobId, total_images: total }
        : { event_id: eventId, job_id: jobId, total_keyframes: total };

    if (!this.emitted.claim(jobId, topic)) {
      logger.info({ jobId, topic, total }, 'Batch transition event already sent, skipping duplicate');
      return 'duplicate';
    }

    try {
      await this.bus.publish(topic, payload);
    } catch (error) {
      this.emitted.release(jobId, topic);
      throw error;
    }

    logger.info({ jobId, topic, eventId, total }, 'Emitted batch transition event');
    return 'published';
  }

  hasEmitted(key: TrackingKey): boolean {
    return this.emitted.has(key.jobId, key.assetType, key.stage);
  }

  hasPendingTransition(key: TrackingKey): boolean {
    return this.pendingTransitions.has(trackingKeyId(key));
  }

  /**
   * Send the hand-off of an emitted completion whose transition publish
   * failed. No-op when nothing is pending for the key.
   */
  async flushPendingTransition(key: TrackingKey): Promise<void> {
    const id = trackingKeyId(key);
    const pending = this.pendingTransitions.get(id);
    if (!pending) {
      return;
    }
    const outcome = await this.publishBatchTransition(pending.jobId, pending.topic, pending.total);
    // 'duplicate' means another publish of it is in flight; that one settles it
    if (outcome === 'published') {
      this.pendingTransitions.delete(id);
    }
  }

  /**
   * Forget every emission (service shutdown only)
   */
  clear(): void {
    this.emitted.clear();
    this.pendingTransitions.clear();
  }

  private countsFor(key: TrackingKey, expected: number | null, done: number): CompletionCounts {
    if (expected === 0 && this.tracker.isZeroAssetBatch(key)) {
      logger.info({ ...key }, 'Immediate completion for zero-asset job');
      return { total: 0, done: 0, hasPartial: false };
    }
    if (expected === null) {
      // Batch never announced: the processed items are all we know of
      return { total: done, done, hasPartial: false };
    }
    return { total: expected, done, hasPartial: done < expected };
  }

  private async emit(key: TrackingKey, counts: CompletionCounts, isTimeout: boolean): Promise<PublishOutcome> {
    const eventId = randomUUID();
    const payload: CompletedEventPayload = {
      job_id: key.jobId,
      event_id: eventId,
      total_assets: counts.total,
      processed_assets: counts.done,
      failed_assets: 0, // per-item failures are not tracked here
      has_partial_completion: counts.hasPartial,
      watermark_ttl: this.options.watermarkTtlSeconds[key.stage],
      idempotent: true,
    };
    completedEventSchema.parse(payload);
    const topic = completedTopic(key.assetType, key.stage);

    if (!this.emitted.claim(key.jobId, key.assetType, key.stage)) {
      logger.warn({ ...key, isTimeout }, 'Duplicate completion event detected, skipping');
      return 'duplicate';
    }

    try {
      await this.bus.publish(topic, payload);
    } catch (error) {
      this.emitted.release(key.jobId, key.assetType, key.stage);
      throw error;
    }

    logger.info(
      { ...key, eventId, total: counts.total, done: counts.done, isTimeout },
      `Emitted ${key.assetType} ${key.stage} completed event`
    );

    if (key.stage === 'segmentation') {
      this.pendingTransitions.set(trackingKeyId(key), {
        jobId: key.jobId,
        topic: MASKED_BATCH_TOPIC[key.assetType],
        total: counts.done,
      });
      await this.flushPendingTransition(key);
    }

    return 'published';
  }
}
