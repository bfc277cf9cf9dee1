import { createChildLogger } from '../utils/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { describeExpected, trackingKeyId, type TrackingKey } from '../types/asset.types.js';
import type { JobProgressTracker } from './job-progress-tracker.js';
import type { CompletionEventPublisher, PublishOutcome } from './completion-event-publisher.js';

const logger = createChildLogger({ service: 'watermark-timer' });

/**
 * Called after a timer forced a completion attempt
 */
export type ForceCompletionHandler = (key: TrackingKey, outcome: PublishOutcome) => void;

interface RunningTimer {
  key: TrackingKey;
  handle: NodeJS.Timeout;
  ttlSeconds: number;
}

/**
 * One cancellable deadline per tracked stream.
 *
 * On expiry an open stream is force-completed as partial. Cancellation must
 * happen synchronously during cleanup; the emission ledger makes a stale
 * fire a no-op regardless.
 */
export class WatermarkTimerManager {
  private timers = new Map<string, RunningTimer>();

  constructor(
    private readonly tracker: JobProgressTracker,
    private readonly publisher: CompletionEventPublisher,
    private readonly onForceCompleted?: ForceCompletionHandler
  ) {}

  /**
   * (Re)start the deadline for a stream
   */
  start(key: TrackingKey, ttlSeconds: number): void {
    const id = trackingKeyId(key);
    this.clearTimer(id);

    const handle = setTimeout(() => {
      void this.fire(id, key);
    }, ttlSeconds * 1000);
    handle.unref();

    this.timers.set(id, { key: { ...key }, handle, ttlSeconds });
    logger.debug({ ...key, ttlSeconds }, 'Started watermark timer');
  }

  /**
   * Start a deadline only if none is running
   * @returns true if a timer was started
   */
  ensure(key: TrackingKey, ttlSeconds: number): boolean {
    if (this.isRunning(key)) {
      return false;
    }
    this.start(key, ttlSeconds);
    return true;
  }

  cancel(key: TrackingKey): boolean {
    const cancelled = this.clearTimer(trackingKeyId(key));
    if (cancelled) {
      logger.debug({ ...key }, 'Cancelled watermark timer');
    }
    return cancelled;
  }

  cancelJob(jobId: string): void {
    for (const [id, timer] of this.timers) {
      if (timer.key.jobId === jobId) {
        this.clearTimer(id);
      }
    }
  }

  cancelAll(): void {
    for (const id of [...this.timers.keys()]) {
      this.clearTimer(id);
    }
  }

  isRunning(key: TrackingKey): boolean {
    return this.timers.has(trackingKeyId(key));
  }

  get size(): number {
    return this.timers.size;
  }

  private clearTimer(id: string): boolean {
    const timer = this.timers.get(id);
    if (!timer) {
      return false;
    }
    clearTimeout(timer.handle);
    this.timers.delete(id);
    return true;
  }

  private async fire(id: string, key: TrackingKey): Promise<void> {
    const ttlSeconds = this.timers.get(id)?.ttlSeconds;
    this.timers.delete(id);

    try {
      const outcome = await this.settle(key, ttlSeconds);
      if (outcome) {
        this.onForceCompleted?.(key, outcome);
      }
    } catch (error) {
      logger.error({ ...key, error: getErrorMessage(error) }, 'Forced completion failed, rearming timer');
      if (ttlSeconds !== undefined) {
        this.start(key, ttlSeconds);
      }
    }
  }

  /**
   * Publish whatever the stream still owes downstream
   */
  private async settle(key: TrackingKey, ttlSeconds: number | undefined): Promise<PublishOutcome | undefined> {
    if (this.publisher.hasEmitted(key)) {
      if (!this.publisher.hasPendingTransition(key)) {
        logger.debug({ ...key }, 'Watermark timer expired after completion was emitted');
        return undefined;
      }
      logger.info({ ...key }, 'Watermark timer expired with a pending batch hand-off, resending');
      await this.publisher.flushPendingTransition(key);
      return this.publisher.hasPendingTransition(key) ? undefined : 'duplicate';
    }

    const state = this.tracker.get(key);
    if (!state) {
      if (this.tracker.isZeroAssetBatch(key)) {
        logger.info({ ...key }, 'Watermark timer expired on an unpublished zero-asset batch');
        return this.publisher.publishWithExplicitCount(key, 0, 0);
      }
      logger.debug({ ...key }, 'Watermark timer expired for untracked job');
      return undefined;
    }

    if (this.tracker.isComplete(key)) {
      // Completion was detected but its publish failed
      logger.info(
        { ...key, done: state.done, expected: describeExpected(state.expected) },
        'Watermark timer expired on a complete job with no completion event, publishing'
      );
      return this.publisher.publish(key);
    }

    logger.info(
      { ...key, ttlSeconds, done: state.done, expected: describeExpected(state.expected) },
      'Watermark timer expired, forcing completion'
    );
    return this.publisher.publish(key, { isTimeout: true });
  }
}
