import { createChildLogger } from '../utils/logger.js';
import type { EventBus } from '../queues/event-bus.js';
import {
  describeExpected,
  type AssetType,
  type JobProgressState,
  type PipelineStage,
  type TrackingKey,
} from '../types/asset.types.js';
import type { BatchTransitionTopic } from '../types/events.types.js';
import { JobProgressTracker } from './job-progress-tracker.js';
import { CompletionEventPublisher, type PublishOutcome } from './completion-event-publisher.js';
import { WatermarkTimerManager } from './watermark-timer-manager.js';
import { ProcessedAssetLedger, ProcessedBatchEventLedger } from './ledgers.js';

const logger = createChildLogger({ service: 'job-progress-manager' });

export interface BatchAnnouncement {
  jobId: string;
  assetType: AssetType;
  /** Id of the batch event itself, used to drop redeliveries */
  eventId: string;
  total: number;
  stage: PipelineStage;
}

export interface ItemReady {
  jobId: string;
  assetType: AssetType;
  assetId: string;
  stage: PipelineStage;
}

/**
 * What the item's processing collaborator reports.
 * `skipped` means the item could not be processed (e.g. its record is
 * missing) and must not be counted.
 */
export type ItemProcessResult = 'processed' | 'skipped';

export type ItemProcessor = () => Promise<ItemProcessResult>;

/**
 * - duplicate: asset already accepted for the job
 * - skipped: processing reported the item as skipped
 * - counted: item counted, stream still open
 * - completed: this item completed the stream
 * - late: processed after the stream had already completed; not counted
 */
export type ItemOutcome = 'duplicate' | 'skipped' | 'counted' | 'completed' | 'late';

export type BatchOutcome = 'duplicate' | 'tracking' | 'completed';

export interface JobProgressManagerOptions {
  watermarkTtlSeconds: Record<PipelineStage, number>;
  completionThresholdPercentage?: number;
}

export interface ProgressSnapshot {
  state?: Readonly<JobProgressState>;
  batchInitialized: boolean;
  expectedTotal?: number;
  timerRunning: boolean;
  completionEmitted: boolean;
}

/**
 * Per-service registry of job progress.
 *
 * Construct one per service instance and hand it to the event handlers.
 * Every check-and-update runs between two awaits, so handlers interleaving
 * on the event loop cannot double-count or double-publish.
 *
 * @example
 * ```typescript
 * const progress = new JobProgressManager(bus, {
 *   watermarkTtlSeconds: { embeddings: 900, keypoints: 300, segmentation: 300 },
 * });
 *
 * await progress.onBatchAnnounced({ jobId, assetType: 'image', eventId, total: 2, stage: 'embeddings' });
 * await progress.onItemReady({ jobId, assetType: 'image', assetId: 'img_1', stage: 'embeddings' }, async () => {
 *   await extractFeatures();
 *   return 'processed';
 * });
 * ```
 */
export class JobProgressManager {
  readonly tracker: JobProgressTracker;
  readonly publisher: CompletionEventPublisher;
  readonly timers: WatermarkTimerManager;
  private readonly processedAssets = new ProcessedAssetLedger();
  private readonly processedBatchEvents = new ProcessedBatchEventLedger();

  constructor(
    bus: EventBus,
    private readonly options: JobProgressManagerOptions
  ) {
    this.tracker = new JobProgressTracker({
      completionThresholdPercentage: options.completionThresholdPercentage,
    });
    this.publisher = new CompletionEventPublisher(bus, this.tracker, {
      watermarkTtlSeconds: options.watermarkTtlSeconds,
    });
    this.timers = new WatermarkTimerManager(this.tracker, this.publisher, (key, outcome) => {
      if (outcome !== 'untracked') {
        this.finishStream(key);
      }
    });
  }

  /**
   * Handle a batch-announced event carrying the expected item count
   */
  async onBatchAnnounced(batch: BatchAnnouncement): Promise<BatchOutcome> {
    const key: TrackingKey = { jobId: batch.jobId, assetType: batch.assetType, stage: batch.stage };

    if (!this.processedBatchEvents.markAndCheck(batch.jobId, batch.eventId)) {
      logger.info({ ...key, eventId: batch.eventId }, 'Ignoring duplicate batch event');
      return 'duplicate';
    }

    try {
      return await this.acceptBatch(key, batch);
    } catch (error) {
      // A redelivery of this event must run again
      this.processedBatchEvents.forget(batch.jobId, batch.eventId);
      throw error;
    }
  }

  /**
   * Handle one item-ready event. `process` does the item's actual work and
   * runs at most once per (job, asset) unless it throws.
   */
  async onItemReady(item: ItemReady, process: ItemProcessor): Promise<ItemOutcome> {
    const key: TrackingKey = { jobId: item.jobId, assetType: item.assetType, stage: item.stage };

    if (!this.processedAssets.markAndCheck(item.jobId, item.assetId)) {
      const resumed = await this.resumeCompletion(key);
      if (resumed === 'published') {
        return 'completed';
      }
      logger.info({ ...key, assetId: item.assetId }, 'Skipping duplicate asset');
      return 'duplicate';
    }

    if (!this.publisher.hasEmitted(key)) {
      if (!this.tracker.isBatchInitialized(key) && !this.tracker.get(key)) {
        this.tracker.initializeWithPlaceholder(key);
      }
      this.timers.ensure(key, this.options.watermarkTtlSeconds[item.stage]);
    }

    let result: ItemProcessResult;
    try {
      result = await process();
    } catch (error) {
      // Let the bus retry this item without it being seen as a duplicate
      this.processedAssets.forget(item.jobId, item.assetId);
      throw error;
    }

    if (result === 'skipped') {
      return 'skipped';
    }

    if (this.publisher.hasEmitted(key)) {
      logger.info({ ...key, assetId: item.assetId }, 'Item processed after job completion, not counted');
      return 'late';
    }

    const state = this.tracker.recordItemDone(key);

    if (!this.tracker.isBatchInitialized(key)) {
      logger.debug(
        { ...key, done: state.done, expected: describeExpected(state.expected) },
        'Skipping completion check - batch not initialized'
      );
      return 'counted';
    }

    if (!this.tracker.isComplete(key)) {
      return 'counted';
    }

    logger.info(
      { ...key, done: state.done, expected: describeExpected(state.expected), completionTrigger: 'item_ready' },
      'Automatic completion triggered by progress update'
    );
    const outcome = await this.complete(key);
    return outcome === 'published' ? 'completed' : 'counted';
  }

  /**
   * Reconcile counted items with an authoritative expected count.
   * @returns true if this call published the completion event
   */
  async onExpectedCountUpdated(key: TrackingKey, realExpected: number): Promise<boolean> {
    if (this.publisher.hasEmitted(key)) {
      return false;
    }

    const reached = this.tracker.setRealExpectedAndRecheck(key, realExpected);
    if (!reached) {
      return false;
    }

    logger.info({ ...key, expected: realExpected, completionTrigger: 'expected_updated' }, 'Completion detected');
    const outcome = await this.complete(key);
    return outcome === 'published';
  }

  /**
   * Hand a stage's output batch to the next stage
   */
  async announceBatch(jobId: string, topic: BatchTransitionTopic, total: number): Promise<PublishOutcome> {
    return this.publisher.publishBatchTransition(jobId, topic, total);
  }

  snapshot(key: TrackingKey): ProgressSnapshot {
    return {
      state: this.tracker.get(key),
      batchInitialized: this.tracker.isBatchInitialized(key),
      expectedTotal: this.tracker.getExpectedTotal(key),
      timerRunning: this.timers.isRunning(key),
      completionEmitted: this.publisher.hasEmitted(key),
    };
  }

  /**
   * Drop all progress of a job across asset types and stages.
   * Emitted completions stay recorded.
   */
  cleanupJob(jobId: string): void {
    this.tracker.cleanup(jobId);
    this.timers.cancelJob(jobId);
    this.processedAssets.clearJob(jobId);
    this.processedBatchEvents.clearJob(jobId);
    logger.debug({ jobId }, 'Cleaned up job tracking');
  }

  /**
   * Release everything (service shutdown)
   */
  cleanupAll(): void {
    this.timers.cancelAll();
    this.tracker.clear();
    this.processedAssets.clear();
    this.processedBatchEvents.clear();
    this.publisher.clear();
  }

  private async acceptBatch(key: TrackingKey, batch: BatchAnnouncement): Promise<BatchOutcome> {
    if (this.publisher.hasEmitted(key)) {
      await this.settleEmitted(key);
      logger.info({ ...key, eventId: batch.eventId }, 'Batch event for already completed job, ignoring');
      return 'duplicate';
    }

    logger.info(
      { ...key, eventId: batch.eventId, totalItems: batch.total, currentDone: this.tracker.get(key)?.done ?? 0 },
      'Batch event received'
    );

    this.tracker.recordExpectedTotal(key, batch.total);
    this.tracker.markBatchInitialized(key);
    this.timers.start(key, this.options.watermarkTtlSeconds[batch.stage]);

    if (batch.total === 0) {
      const outcome = await this.publisher.publishWithExplicitCount(key, 0, 0);
      this.finishStream(key);
      return outcome === 'published' ? 'completed' : 'duplicate';
    }

    const completed = await this.onExpectedCountUpdated(key, batch.total);
    return completed ? 'completed' : 'tracking';
  }

  /**
   * Finish what a failed publish left undone for a redelivered item:
   * the completion event of a complete stream, or a pending hand-off
   */
  private async resumeCompletion(key: TrackingKey): Promise<PublishOutcome | undefined> {
    if (this.publisher.hasEmitted(key)) {
      await this.settleEmitted(key);
      return undefined;
    }
    if (!this.tracker.isBatchInitialized(key) || !this.tracker.isComplete(key)) {
      return undefined;
    }
    logger.info({ ...key, completionTrigger: 'redelivery' }, 'Retrying completion of a complete job');
    return this.complete(key);
  }

  private async settleEmitted(key: TrackingKey): Promise<void> {
    if (!this.publisher.hasPendingTransition(key)) {
      return;
    }
    await this.publisher.flushPendingTransition(key);
    if (!this.publisher.hasPendingTransition(key)) {
      this.finishStream(key);
    }
  }

  private async complete(key: TrackingKey): Promise<PublishOutcome> {
    const outcome = await this.publisher.publish(key);
    if (outcome !== 'untracked') {
      this.finishStream(key);
    }
    return outcome;
  }

  private finishStream(key: TrackingKey): void {
    this.tracker.release(key);
    this.timers.cancel(key);
  }
}
