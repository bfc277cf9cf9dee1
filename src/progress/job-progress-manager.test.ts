import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { JobProgressManager, type ItemProcessor } from './job-progress-manager.js';
import { InMemoryEventBus } from '../queues/memory.bus.js';
import type { TrackingKey } from '../types/asset.types.js';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const TTL = { embeddings: 900, keypoints: 300, segmentation: 300 };
const key: TrackingKey = { jobId: 'J1', assetType: 'image', stage: 'embeddings' };
const COMPLETED = 'image.embeddings.completed';

const processed: ItemProcessor = async () => 'processed';

describe('JobProgressManager', () => {
  let bus: InMemoryEventBus;
  let manager: JobProgressManager;

  const announce = (eventId: string, total: number) =>
    manager.onBatchAnnounced({ jobId: 'J1', assetType: 'image', eventId, total, stage: 'embeddings' });

  const itemReady = (assetId: string, process: ItemProcessor = processed) =>
    manager.onItemReady({ jobId: 'J1', assetType: 'image', assetId, stage: 'embeddings' }, process);

  beforeEach(() => {
    vi.useFakeTimers();
    bus = new InMemoryEventBus();
    manager = new JobProgressManager(bus, { watermarkTtlSeconds: TTL });
  });

  afterEach(() => {
    manager.cleanupAll();
    vi.useRealTimers();
  });

  it('should complete a batch of two images once both are processed', async () => {
    await expect(announce('E1', 2)).resolves.toBe('tracking');
    await expect(itemReady('img_1')).resolves.toBe('counted');
    await expect(itemReady('img_2')).resolves.toBe('completed');

    expect(bus.eventsFor(COMPLETED)).toEqual([
      {
        job_id: 'J1',
        event_id: expect.any(String),
        total_assets: 2,
        processed_assets: 2,
        failed_assets: 0,
        has_partial_completion: false,
        watermark_ttl: 900,
        idempotent: true,
      },
    ]);
  });

  it('should release stream state and the timer after completion', async () => {
    await announce('E1', 1);
    await itemReady('img_1');

    expect(manager.snapshot(key)).toEqual({
      state: undefined,
      batchInitialized: false,
      expectedTotal: undefined,
      timerRunning: false,
      completionEmitted: true,
    });
  });

  describe('at-most-once completion', () => {
    it('should publish once however often completion is attempted', async () => {
      await announce('E1', 1);
      await itemReady('img_1');

      await manager.onExpectedCountUpdated(key, 1);
      await manager.publisher.publish(key, { isTimeout: true });
      await vi.advanceTimersByTimeAsync(TTL.embeddings * 1000);

      expect(bus.eventsFor(COMPLETED)).toHaveLength(1);
    });

    it('should publish once when the count update and the last item overlap', async () => {
      await itemReady('img_1');
      await announce('E1', 2);

      const [itemOutcome, countOutcome] = await Promise.all([
        itemReady('img_2'),
        manager.onExpectedCountUpdated(key, 2),
      ]);

      expect([itemOutcome, countOutcome]).toContain('completed');
      expect(bus.eventsFor(COMPLETED)).toHaveLength(1);
    });
  });

  it('should complete a zero-item batch in the same call', async () => {
    await expect(announce('E1', 0)).resolves.toBe('completed');

    expect(bus.eventsFor(COMPLETED)).toEqual([
      expect.objectContaining({ total_assets: 0, processed_assets: 0, has_partial_completion: false }),
    ]);
    expect(manager.snapshot(key).timerRunning).toBe(false);
  });

  it('should complete when items arrive before the batch announcement', async () => {
    await expect(itemReady('img_1')).resolves.toBe('counted');
    await expect(itemReady('img_2')).resolves.toBe('counted');
    await expect(itemReady('img_3')).resolves.toBe('counted');
    expect(bus.published).toHaveLength(0);
    expect(manager.snapshot(key).state?.expected).toEqual({ kind: 'placeholder' });

    await expect(announce('E1', 3)).resolves.toBe('completed');

    expect(bus.eventsFor(COMPLETED)).toEqual([
      expect.objectContaining({ total_assets: 3, processed_assets: 3, has_partial_completion: false }),
    ]);
  });

  it('should count a redelivered item once', async () => {
    await announce('E1', 1);

    await expect(itemReady('img_1')).resolves.toBe('completed');
    await expect(itemReady('img_1')).resolves.toBe('duplicate');

    expect(bus.eventsFor(COMPLETED)).toEqual([expect.objectContaining({ processed_assets: 1 })]);
  });

  it('should not process a redelivered item twice', async () => {
    const process = vi.fn(processed);
    await announce('E1', 2);

    await itemReady('img_1', process);
    await itemReady('img_1', process);

    expect(process).toHaveBeenCalledTimes(1);
    expect(manager.snapshot(key).state?.done).toBe(1);
  });

  it('should ignore a redelivered batch event', async () => {
    await announce('E1', 3);
    await itemReady('img_1');
    await itemReady('img_2');

    await expect(announce('E1', 3)).resolves.toBe('duplicate');

    expect(manager.snapshot(key).state).toEqual({
      expected: { kind: 'known', value: 3 },
      done: 2,
      assetType: 'image',
    });
  });

  it('should keep counted items when a second batch event restates the count', async () => {
    await announce('E1', 3);
    await itemReady('img_1');

    await expect(announce('E2', 3)).resolves.toBe('tracking');

    expect(manager.snapshot(key).state?.done).toBe(1);
  });

  it('should force a partial completion when items go missing', async () => {
    await announce('E1', 3);
    await itemReady('img_1');
    await itemReady('img_2');

    await vi.advanceTimersByTimeAsync(TTL.embeddings * 1000);

    expect(bus.eventsFor(COMPLETED)).toEqual([
      expect.objectContaining({ total_assets: 3, processed_assets: 2, has_partial_completion: true }),
    ]);
    expect(manager.snapshot(key).state).toBeUndefined();
  });

  it('should not fire a timeout after normal completion', async () => {
    await announce('E1', 2);
    await itemReady('img_1');
    await itemReady('img_2');

    await vi.advanceTimersByTimeAsync(TTL.embeddings * 2000);

    expect(bus.eventsFor(COMPLETED)).toEqual([expect.objectContaining({ has_partial_completion: false })]);
  });

  it('should start the deadline from the first item when no batch was announced', async () => {
    await itemReady('img_1');
    expect(manager.snapshot(key).timerRunning).toBe(true);

    await vi.advanceTimersByTimeAsync(TTL.embeddings * 1000);

    expect(bus.eventsFor(COMPLETED)).toEqual([
      expect.objectContaining({ total_assets: 1, processed_assets: 1, has_partial_completion: true }),
    ]);
  });

  describe('item processing', () => {
    it('should leave counters untouched when processing fails and count the retry', async () => {
      await announce('E1', 1);
      const failing: ItemProcessor = async () => {
        throw new Error('extraction failed');
      };

      await expect(itemReady('img_1', failing)).rejects.toThrow('extraction failed');
      expect(manager.snapshot(key).state?.done).toBe(0);

      await expect(itemReady('img_1')).resolves.toBe('completed');
      expect(bus.eventsFor(COMPLETED)).toEqual([expect.objectContaining({ processed_assets: 1 })]);
    });

    it('should not count a skipped item', async () => {
      await announce('E1', 2);

      await expect(itemReady('img_1', async () => 'skipped')).resolves.toBe('skipped');
      await expect(itemReady('img_1')).resolves.toBe('duplicate');

      expect(manager.snapshot(key).state?.done).toBe(0);
    });

    it('should not count an item processed after completion', async () => {
      await announce('E1', 1);
      await itemReady('img_1');

      await expect(itemReady('img_2')).resolves.toBe('late');

      expect(bus.eventsFor(COMPLETED)).toHaveLength(1);
      expect(manager.snapshot(key).state).toBeUndefined();
      expect(manager.snapshot(key).timerRunning).toBe(false);
    });
  });

  describe('failed completion publish', () => {
    it('should complete when the last item is redelivered', async () => {
      await announce('E1', 1);
      vi.spyOn(bus, 'publish').mockRejectedValueOnce(new Error('redis down'));
      await expect(itemReady('img_1')).rejects.toThrow('redis down');
      expect(manager.snapshot(key).completionEmitted).toBe(false);

      const process = vi.fn(processed);
      await expect(itemReady('img_1', process)).resolves.toBe('completed');

      expect(process).not.toHaveBeenCalled();
      expect(bus.eventsFor(COMPLETED)).toEqual([
        expect.objectContaining({ total_assets: 1, processed_assets: 1, has_partial_completion: false }),
      ]);
      expect(manager.snapshot(key).timerRunning).toBe(false);
    });

    it('should complete from the watermark timer when no redelivery comes', async () => {
      await announce('E1', 1);
      vi.spyOn(bus, 'publish').mockRejectedValueOnce(new Error('redis down'));
      await expect(itemReady('img_1')).rejects.toThrow('redis down');

      await vi.advanceTimersByTimeAsync(900_000);

      expect(bus.eventsFor(COMPLETED)).toEqual([
        expect.objectContaining({ total_assets: 1, processed_assets: 1, has_partial_completion: false }),
      ]);
      expect(manager.snapshot(key)).toEqual({
        state: undefined,
        batchInitialized: false,
        expectedTotal: undefined,
        timerRunning: false,
        completionEmitted: true,
      });
    });

    it('should complete a zero-item batch when its event is redelivered', async () => {
      vi.spyOn(bus, 'publish').mockRejectedValueOnce(new Error('redis down'));
      await expect(announce('E1', 0)).rejects.toThrow('redis down');

      await expect(announce('E1', 0)).resolves.toBe('completed');

      expect(bus.eventsFor(COMPLETED)).toEqual([
        expect.objectContaining({ total_assets: 0, processed_assets: 0, has_partial_completion: false }),
      ]);
    });

    it('should complete items that ran ahead when the batch event is redelivered', async () => {
      await expect(itemReady('img_1')).resolves.toBe('counted');
      vi.spyOn(bus, 'publish').mockRejectedValueOnce(new Error('redis down'));
      await expect(announce('E1', 1)).rejects.toThrow('redis down');

      await expect(announce('E1', 1)).resolves.toBe('completed');

      expect(bus.eventsFor(COMPLETED)).toEqual([
        expect.objectContaining({ total_assets: 1, processed_assets: 1, has_partial_completion: false }),
      ]);
    });

    it('should resend a lost segmentation hand-off when an item is redelivered', async () => {
      const segmentation: TrackingKey = { jobId: 'J1', assetType: 'video', stage: 'segmentation' };
      const original = bus.publish.bind(bus);
      let failHandOff = true;
      vi.spyOn(bus, 'publish').mockImplementation(async (topic, payload, correlationId) => {
        if (topic === 'video.keyframes.masked.batch' && failHandOff) {
          failHandOff = false;
          throw new Error('redis down');
        }
        return original(topic, payload, correlationId);
      });
      const frame = () =>
        manager.onItemReady({ jobId: 'J1', assetType: 'video', assetId: 'frame_1', stage: 'segmentation' }, processed);

      await manager.onBatchAnnounced({ ...segmentation, eventId: 'E1', total: 1 });
      await expect(frame()).rejects.toThrow('redis down');
      expect(manager.snapshot(segmentation).timerRunning).toBe(true);

      await expect(frame()).resolves.toBe('duplicate');

      expect(bus.eventsFor('video.segmentation.completed')).toHaveLength(1);
      expect(bus.eventsFor('video.keyframes.masked.batch')).toEqual([
        { event_id: expect.any(String), job_id: 'J1', total_keyframes: 1 },
      ]);
      expect(manager.snapshot(segmentation)).toMatchObject({
        state: undefined,
        timerRunning: false,
        completionEmitted: true,
      });
    });
  });

  it('should track asset types of one job independently', async () => {
    const videoKey: TrackingKey = { jobId: 'J1', assetType: 'video', stage: 'embeddings' };
    await announce('E1', 1);
    await manager.onBatchAnnounced({ jobId: 'J1', assetType: 'video', eventId: 'E2', total: 2, stage: 'embeddings' });

    await itemReady('img_1');
    await manager.onItemReady({ jobId: 'J1', assetType: 'video', assetId: 'frame_1', stage: 'embeddings' }, processed);

    expect(bus.eventsFor(COMPLETED)).toHaveLength(1);
    expect(bus.eventsFor('video.embeddings.completed')).toHaveLength(0);
    expect(manager.snapshot(videoKey).state?.done).toBe(1);
  });

  it('should apply the completion threshold', async () => {
    const lenient = new JobProgressManager(bus, { watermarkTtlSeconds: TTL, completionThresholdPercentage: 50 });
    await lenient.onBatchAnnounced({ jobId: 'J2', assetType: 'image', eventId: 'E1', total: 4, stage: 'embeddings' });

    const item = (assetId: string) =>
      lenient.onItemReady({ jobId: 'J2', assetType: 'image', assetId, stage: 'embeddings' }, processed);

    await expect(item('a')).resolves.toBe('counted');
    await expect(item('b')).resolves.toBe('completed');

    expect(bus.eventsFor(COMPLETED)).toEqual([
      expect.objectContaining({ total_assets: 4, processed_assets: 2, has_partial_completion: true }),
    ]);
    lenient.cleanupAll();
  });

  it('should hand segmentation output to the next stage', async () => {
    await manager.onBatchAnnounced({ jobId: 'J1', assetType: 'video', eventId: 'E1', total: 1, stage: 'segmentation' });
    await manager.onItemReady({ jobId: 'J1', assetType: 'video', assetId: 'frame_1', stage: 'segmentation' }, processed);

    expect(bus.published.map((e) => e.topic)).toEqual(['video.segmentation.completed', 'video.keyframes.masked.batch']);
    expect(bus.eventsFor('video.keyframes.masked.batch')[0]).toMatchObject({ job_id: 'J1', total_keyframes: 1 });
  });

  it('should announce a batch transition once', async () => {
    await expect(manager.announceBatch('J1', 'videos.keyframes.ready.batch', 4)).resolves.toBe('published');
    await expect(manager.announceBatch('J1', 'videos.keyframes.ready.batch', 4)).resolves.toBe('duplicate');

    expect(bus.eventsFor('videos.keyframes.ready.batch')).toHaveLength(1);
  });

  describe('cleanupJob', () => {
    it('should drop counters, timers and ledgers of the job', async () => {
      await announce('E1', 3);
      await itemReady('img_1');

      manager.cleanupJob('J1');

      expect(manager.snapshot(key)).toEqual({
        state: undefined,
        batchInitialized: false,
        expectedTotal: undefined,
        timerRunning: false,
        completionEmitted: false,
      });
      await vi.advanceTimersByTimeAsync(TTL.embeddings * 1000);
      expect(bus.published).toHaveLength(0);
    });

    it('should keep suppressing completions emitted before cleanup', async () => {
      await announce('E1', 1);
      await itemReady('img_1');

      manager.cleanupJob('J1');

      await expect(announce('E2', 1)).resolves.toBe('duplicate');
      expect(bus.eventsFor(COMPLETED)).toHaveLength(1);
    });
  });

  it('should keep registries of separate instances apart', async () => {
    const other = new JobProgressManager(bus, { watermarkTtlSeconds: TTL });

    await announce('E1', 2);
    await other.onBatchAnnounced({ jobId: 'J1', assetType: 'image', eventId: 'E1', total: 2, stage: 'embeddings' });

    expect(other.snapshot(key).batchInitialized).toBe(true);
    expect(manager.snapshot(key).batchInitialized).toBe(true);
    other.cleanupAll();
  });
});
