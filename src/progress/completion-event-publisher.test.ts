import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import { CompletionEventPublisher } from './completion-event-publisher.js';
import { JobProgressTracker } from './job-progress-tracker.js';
import { InMemoryEventBus } from '../queues/memory.bus.js';
import type { TrackingKey } from '../types/asset.types.js';
import { completedEventSchema } from '../types/events.types.js';

vi.mock('../utils/logger.js', () => ({
  createChildLogger: vi.fn(() => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
}));

const TTL = { embeddings: 900, keypoints: 300, segmentation: 300 };
const imageKey: TrackingKey = { jobId: 'job-1', assetType: 'image', stage: 'embeddings' };

describe('CompletionEventPublisher', () => {
  let bus: InMemoryEventBus;
  let tracker: JobProgressTracker;
  let publisher: CompletionEventPublisher;

  beforeEach(() => {
    bus = new InMemoryEventBus();
    tracker = new JobProgressTracker();
    publisher = new CompletionEventPublisher(bus, tracker, { watermarkTtlSeconds: TTL });
  });

  describe('publish', () => {
    it('should return untracked when no counters exist', async () => {
      await expect(publisher.publish(imageKey)).resolves.toBe('untracked');
      expect(bus.published).toHaveLength(0);
    });

    it('should publish a full completion', async () => {
      tracker.setRealExpectedAndRecheck(imageKey, 2);
      tracker.recordItemDone(imageKey);
      tracker.recordItemDone(imageKey);

      await expect(publisher.publish(imageKey)).resolves.toBe('published');

      const [event] = bus.eventsFor('image.embeddings.completed');
      expect(event).toEqual({
        job_id: 'job-1',
        event_id: expect.any(String),
        total_assets: 2,
        processed_assets: 2,
        failed_assets: 0,
        has_partial_completion: false,
        watermark_ttl: 900,
        idempotent: true,
      });
      expect(completedEventSchema.safeParse(event).success).toBe(true);
    });

    it('should mark a timeout as partial', async () => {
      tracker.setRealExpectedAndRecheck(imageKey, 3);
      tracker.recordItemDone(imageKey);

      await publisher.publish(imageKey, { isTimeout: true });

      const [event] = bus.eventsFor('image.embeddings.completed');
      expect(event).toMatchObject({ total_assets: 3, processed_assets: 1, has_partial_completion: true });
    });

    it('should report processed items as the total when the count was never announced', async () => {
      tracker.initializeWithPlaceholder(imageKey);
      tracker.recordItemDone(imageKey);
      tracker.recordItemDone(imageKey);

      await publisher.publish(imageKey, { isTimeout: true });

      const [event] = bus.eventsFor('image.embeddings.completed');
      expect(event).toMatchObject({ total_assets: 2, processed_assets: 2, has_partial_completion: true });
    });

    it('should publish only once per key', async () => {
      tracker.setRealExpectedAndRecheck(imageKey, 1);
      tracker.recordItemDone(imageKey);

      await expect(publisher.publish(imageKey)).resolves.toBe('published');
      await expect(publisher.publish(imageKey, { isTimeout: true })).resolves.toBe('duplicate');

      expect(bus.published).toHaveLength(1);
      expect(publisher.hasEmitted(imageKey)).toBe(true);
    });

    it('should publish once when two completions race', async () => {
      tracker.setRealExpectedAndRecheck(imageKey, 1);
      tracker.recordItemDone(imageKey);

      const outcomes = await Promise.all([publisher.publish(imageKey), publisher.publish(imageKey)]);

      expect(outcomes.sort()).toEqual(['duplicate', 'published']);
      expect(bus.published).toHaveLength(1);
    });

    it('should release the claim when the bus fails', async () => {
      tracker.setRealExpectedAndRecheck(imageKey, 1);
      tracker.recordItemDone(imageKey);
      const spy = vi.spyOn(bus, 'publish').mockRejectedValueOnce(new Error('redis down'));

      await expect(publisher.publish(imageKey)).rejects.toThrow('redis down');
      expect(publisher.hasEmitted(imageKey)).toBe(false);

      spy.mockRestore();
      await expect(publisher.publish(imageKey)).resolves.toBe('published');
    });

    it('should use the stage TTL and topic', async () => {
      const key: TrackingKey = { jobId: 'job-1', assetType: 'video', stage: 'keypoints' };
      tracker.setRealExpectedAndRecheck(key, 1);
      tracker.recordItemDone(key);

      await publisher.publish(key);

      const [event] = bus.eventsFor('video.keypoints.completed');
      expect(event).toMatchObject({ watermark_ttl: 300 });
    });
  });

  describe('publishWithExplicitCount', () => {
    it('should publish a zero-asset completion as not partial', async () => {
      await expect(publisher.publishWithExplicitCount(imageKey, 0, 0)).resolves.toBe('published');

      const [event] = bus.eventsFor('image.embeddings.completed');
      expect(event).toMatchObject({ total_assets: 0, processed_assets: 0, has_partial_completion: false });
    });

    it('should reject an invalid payload without claiming the completion', async () => {
      await expect(publisher.publishWithExplicitCount(imageKey, -1, 0)).rejects.toThrow(ZodError);

      expect(publisher.hasEmitted(imageKey)).toBe(false);
      expect(bus.published).toHaveLength(0);
    });
  });

  describe('segmentation hand-off', () => {
    it('should announce the masked image batch after segmentation completes', async () => {
      const key: TrackingKey = { jobId: 'job-1', assetType: 'image', stage: 'segmentation' };
      tracker.setRealExpectedAndRecheck(key, 2);
      tracker.recordItemDone(key);
      tracker.recordItemDone(key);

      await publisher.publish(key);

      expect(bus.published.map((e) => e.topic)).toEqual([
        'image.segmentation.completed',
        'products.images.masked.batch',
      ]);
      expect(bus.eventsFor('products.images.masked.batch')[0]).toEqual({
        event_id: expect.any(String),
        job_id: 'job-1',
        total_images: 2,
      });
    });

    it('should announce the masked keyframe batch for videos', async () => {
      const key: TrackingKey = { jobId: 'job-1', assetType: 'video', stage: 'segmentation' };

      await publisher.publishWithExplicitCount(key, 0, 0);

      expect(bus.eventsFor('video.keyframes.masked.batch')[0]).toEqual({
        event_id: expect.any(String),
        job_id: 'job-1',
        total_keyframes: 0,
      });
    });
  });

  describe('pending hand-off', () => {
    const key: TrackingKey = { jobId: 'job-1', assetType: 'image', stage: 'segmentation' };

    it('should keep a failed hand-off pending until it is flushed', async () => {
      tracker.setRealExpectedAndRecheck(key, 1);
      tracker.recordItemDone(key);
      const original = bus.publish.bind(bus);
      let failHandOff = true;
      vi.spyOn(bus, 'publish').mockImplementation(async (topic, payload, correlationId) => {
        if (topic === 'products.images.masked.batch' && failHandOff) {
          failHandOff = false;
          throw new Error('redis down');
        }
        return original(topic, payload, correlationId);
      });

      await expect(publisher.publish(key)).rejects.toThrow('redis down');
      expect(publisher.hasEmitted(key)).toBe(true);
      expect(publisher.hasPendingTransition(key)).toBe(true);

      await publisher.flushPendingTransition(key);

      expect(publisher.hasPendingTransition(key)).toBe(false);
      expect(bus.eventsFor('products.images.masked.batch')).toEqual([
        { event_id: expect.any(String), job_id: 'job-1', total_images: 1 },
      ]);
    });

    it('should do nothing when no hand-off is pending', async () => {
      await publisher.flushPendingTransition(key);

      expect(bus.published).toHaveLength(0);
    });
  });

  describe('publishBatchTransition', () => {
    it('should send a batch transition once per job and topic', async () => {
      await expect(publisher.publishBatchTransition('job-1', 'videos.keyframes.ready.batch', 5)).resolves.toBe(
        'published'
      );
      await expect(publisher.publishBatchTransition('job-1', 'videos.keyframes.ready.batch', 5)).resolves.toBe(
        'duplicate'
      );

      expect(bus.eventsFor('videos.keyframes.ready.batch')).toEqual([
        { event_id: expect.any(String), job_id: 'job-1', total_keyframes: 5 },
      ]);
    });
  });
});
