import { createChildLogger } from '../utils/logger.js';
import {
  describeExpected,
  knownExpected,
  PLACEHOLDER_EXPECTED,
  trackingKeyId,
  UNKNOWN_EXPECTED,
  type JobProgressState,
  type TrackingKey,
} from '../types/asset.types.js';

const logger = createChildLogger({ service: 'job-progress-tracker' });

interface TrackedStream {
  key: TrackingKey;
  state?: JobProgressState;
  /** Total announced by the batch event, kept apart from counters */
  expectedTotal?: number;
  batchInitialized: boolean;
}

export interface JobProgressTrackerOptions {
  /** Share of expected items that completes a stream, 0-100 (default: 100) */
  completionThresholdPercentage?: number;
}

/**
 * Expected/done counters per tracked stream.
 *
 * Holds no timers and publishes nothing; the facade decides what to do with
 * the answers.
 */
export class JobProgressTracker {
  private streams = new Map<string, TrackedStream>();
  private readonly completionRatio: number;

  constructor(options: JobProgressTrackerOptions = {}) {
    const percentage = Math.max(0, Math.min(options.completionThresholdPercentage ?? 100, 100));
    this.completionRatio = percentage / 100;
  }

  /**
   * Track items that arrive before their batch announcement
   */
  initializeWithPlaceholder(key: TrackingKey): void {
    const stream = this.ensureStream(key);
    if (!stream.state) {
      stream.state = { expected: PLACEHOLDER_EXPECTED, done: 0, assetType: key.assetType };
      logger.info({ ...key }, 'Job tracking initialized with placeholder expected count');
      return;
    }
    stream.state.expected = PLACEHOLDER_EXPECTED;
    stream.state.assetType = key.assetType;
    logger.info({ ...key, done: stream.state.done }, 'Job tracking reset to placeholder expected count');
  }

  /**
   * Replace the expected count with the authoritative one.
   * @returns true when the items already counted satisfy it
   */
  setRealExpectedAndRecheck(key: TrackingKey, realExpected: number): boolean {
    const stream = this.ensureStream(key);
    if (!stream.state) {
      stream.state = { expected: knownExpected(realExpected), done: 0, assetType: key.assetType };
    } else {
      stream.state.expected = knownExpected(realExpected);
    }

    const { done } = stream.state;
    const reached = this.meetsThreshold(done, realExpected);
    logger.debug({ ...key, done, expected: realExpected, reached }, 'Updated expected count');
    return reached;
  }

  /**
   * Count a processed item, creating the stream if needed.
   *
   * A total recorded from a batch event takes precedence over `expectedHint`.
   */
  recordItemDone(key: TrackingKey, expectedHint?: number, increment = 1): Readonly<JobProgressState> {
    const stream = this.ensureStream(key);
    if (!stream.state) {
      stream.state = {
        expected: expectedHint !== undefined && expectedHint > 0 ? knownExpected(expectedHint) : UNKNOWN_EXPECTED,
        done: 0,
        assetType: key.assetType,
      };
    }

    const state = stream.state;
    state.done += increment;

    if (stream.expectedTotal !== undefined) {
      state.expected = knownExpected(stream.expectedTotal);
    } else if (expectedHint !== undefined && expectedHint > 0) {
      state.expected = knownExpected(expectedHint);
    }

    logger.debug(
      { ...key, done: state.done, expected: describeExpected(state.expected) },
      'Updated job progress'
    );
    return state;
  }

  /**
   * A stream is complete once a known, positive count is met, or when the
   * batch was announced with zero items
   */
  isComplete(key: TrackingKey): boolean {
    const stream = this.streams.get(trackingKeyId(key));
    if (!stream?.state) {
      return false;
    }

    const { expected, done } = stream.state;
    if (expected.kind !== 'known') {
      return false;
    }
    if (expected.value > 0) {
      return this.meetsThreshold(done, expected.value);
    }
    return this.isZeroAssetBatch(key);
  }

  /**
   * True when the batch event itself announced zero items
   */
  isZeroAssetBatch(key: TrackingKey): boolean {
    const stream = this.streams.get(trackingKeyId(key));
    return stream !== undefined && stream.batchInitialized && stream.expectedTotal === 0;
  }

  meetsThreshold(done: number, expected: number): boolean {
    if (expected <= 0) {
      return done >= expected;
    }
    return done >= expected * this.completionRatio;
  }

  recordExpectedTotal(key: TrackingKey, total: number): void {
    this.ensureStream(key).expectedTotal = total;
  }

  getExpectedTotal(key: TrackingKey): number | undefined {
    return this.streams.get(trackingKeyId(key))?.expectedTotal;
  }

  markBatchInitialized(key: TrackingKey): void {
    this.ensureStream(key).batchInitialized = true;
    logger.debug({ ...key }, 'Marked batch as initialized');
  }

  isBatchInitialized(key: TrackingKey): boolean {
    return this.streams.get(trackingKeyId(key))?.batchInitialized ?? false;
  }

  get(key: TrackingKey): Readonly<JobProgressState> | undefined {
    return this.streams.get(trackingKeyId(key))?.state;
  }

  /**
   * Drop one stream's counters and markers
   */
  release(key: TrackingKey): void {
    this.streams.delete(trackingKeyId(key));
  }

  /**
   * Drop every stream of a job
   */
  cleanup(jobId: string): void {
    for (const [id, stream] of this.streams) {
      if (stream.key.jobId === jobId) {
        this.streams.delete(id);
      }
    }
  }

  clear(): void {
    this.streams.clear();
  }

  get size(): number {
    return this.streams.size;
  }

  private ensureStream(key: TrackingKey): TrackedStream {
    const id = trackingKeyId(key);
    let stream = this.streams.get(id);
    if (!stream) {
      stream = { key: { ...key }, batchInitialized: false };
      this.streams.set(id, stream);
    }
    return stream;
  }
}
