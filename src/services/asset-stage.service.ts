import { randomUUID } from 'crypto';
import { createChildLogger } from '../utils/logger.js';
import type { EventBus } from '../queues/event-bus.js';
import type { AssetStore } from './asset-store.service.js';
import type { JobProgressManager, BatchOutcome, ItemOutcome, ItemReady } from '../progress/job-progress-manager.js';
import type { AssetType, PipelineStage } from '../types/asset.types.js';
import {
  featureReadyTopic,
  imagesBatchEventSchema,
  InboundTopic,
  keyframesBatchEventSchema,
  keyframesMaskedEventSchema,
  keyframesReadyEventSchema,
  parseEvent,
  productImageMaskedEventSchema,
  productImageReadyEventSchema,
  type AssetFeature,
  type AssetFeatureReadyPayload,
} from '../types/events.types.js';
import { ResourceNotFoundError } from '../utils/errors.js';

const logger = createChildLogger({ service: 'asset-stage' });

/**
 * An asset to run a stage's feature extraction on
 */
export interface AssetSource {
  jobId: string;
  assetType: AssetType;
  assetId: string;
  /** Original (unmasked) image or frame */
  imagePath: string;
  maskPath?: string;
}

/**
 * Batch topic a stage takes its expected counts from
 */
export interface BatchSubscription {
  topic: InboundTopic;
  assetType: AssetType;
}

export interface AssetStageServiceDeps {
  bus: EventBus;
  progress: JobProgressManager;
  store: AssetStore;
}

/**
 * Base for the vision stage workers.
 *
 * Routes inbound events through the job progress manager; subclasses only
 * extract and store features for one asset.
 */
export abstract class AssetStageService {
  abstract readonly stage: PipelineStage;
  protected abstract readonly feature: AssetFeature;
  protected abstract readonly batchTopics: readonly BatchSubscription[];

  constructor(protected readonly deps: AssetStageServiceDeps) {}

  /**
   * Extract and persist the stage's features for one asset
   */
  protected abstract processAsset(source: AssetSource): Promise<void>;

  /**
   * Subscribe every inbound topic of the stage on the bus
   */
  async subscribe(): Promise<void> {
    const { bus } = this.deps;

    for (const { topic, assetType } of this.batchTopics) {
      await bus.subscribe(topic, async (payload) => {
        await this.handleBatch(topic, assetType, payload);
      });
    }

    await bus.subscribe(InboundTopic.PRODUCTS_IMAGE_READY, async (payload) => {
      await this.handleImageReady(payload);
    });
    await bus.subscribe(InboundTopic.PRODUCTS_IMAGE_MASKED, async (payload) => {
      await this.handleImageMasked(payload);
    });
    await bus.subscribe(InboundTopic.VIDEOS_KEYFRAMES_READY, async (payload) => {
      await this.handleKeyframesReady(payload);
    });
    await bus.subscribe(InboundTopic.VIDEO_KEYFRAMES_MASKED, async (payload) => {
      await this.handleKeyframesMasked(payload);
    });

    logger.info({ stage: this.stage, batchTopics: this.batchTopics.map((b) => b.topic) }, 'Stage subscribed');
  }

  async handleBatch(topic: InboundTopic, assetType: AssetType, payload: unknown): Promise<BatchOutcome> {
    const batch = this.parseBatch(topic, assetType, payload);
    return this.deps.progress.onBatchAnnounced({ ...batch, assetType, stage: this.stage });
  }

  async handleImageReady(payload: unknown): Promise<ItemOutcome> {
    const event = parseEvent(productImageReadyEventSchema, InboundTopic.PRODUCTS_IMAGE_READY, payload);
    return this.processItem({
      jobId: event.job_id,
      assetType: 'image',
      assetId: event.image_id,
      imagePath: event.local_path,
    });
  }

  async handleImageMasked(payload: unknown): Promise<ItemOutcome> {
    const event = parseEvent(productImageMaskedEventSchema, InboundTopic.PRODUCTS_IMAGE_MASKED, payload);
    return this.processMaskedItem(event.job_id, 'image', event.image_id, event.mask_path);
  }

  /**
   * Frames of one video are processed in order; a failing frame fails the
   * message and the frames before it are skipped as duplicates on retry
   */
  async handleKeyframesReady(payload: unknown): Promise<ItemOutcome[]> {
    const event = parseEvent(keyframesReadyEventSchema, InboundTopic.VIDEOS_KEYFRAMES_READY, payload);
    const outcomes: ItemOutcome[] = [];
    for (const frame of event.frames) {
      outcomes.push(
        await this.processItem({
          jobId: event.job_id,
          assetType: 'video',
          assetId: frame.frame_id,
          imagePath: frame.local_path,
        })
      );
    }
    return outcomes;
  }

  async handleKeyframesMasked(payload: unknown): Promise<ItemOutcome[]> {
    const event = parseEvent(keyframesMaskedEventSchema, InboundTopic.VIDEO_KEYFRAMES_MASKED, payload);
    const outcomes: ItemOutcome[] = [];
    for (const frame of event.frames) {
      outcomes.push(await this.processMaskedItem(event.job_id, 'video', frame.frame_id, frame.mask_path));
    }
    return outcomes;
  }

  private async processItem(source: AssetSource): Promise<ItemOutcome> {
    return this.deps.progress.onItemReady(this.itemKey(source), async () => {
      await this.runAsset(source);
      return 'processed';
    });
  }

  private async processMaskedItem(
    jobId: string,
    assetType: AssetType,
    assetId: string,
    maskPath: string
  ): Promise<ItemOutcome> {
    return this.deps.progress.onItemReady(this.itemKey({ jobId, assetType, assetId }), async () => {
      const imagePath = await this.deps.store.getLocalPath(assetType, assetId);
      if (!imagePath) {
        logger.error(
          { jobId, assetType, error: new ResourceNotFoundError('original_asset_record', assetId) },
          'Resource not found'
        );
        return 'skipped';
      }
      await this.runAsset({ jobId, assetType, assetId, imagePath, maskPath });
      return 'processed';
    });
  }

  private async runAsset(source: AssetSource): Promise<void> {
    const { jobId, assetType, assetId } = source;
    logger.info(
      { jobId, assetId, assetType, stage: this.stage, itemPath: source.imagePath, masked: source.maskPath !== undefined },
      'Processing item'
    );

    await this.processAsset(source);

    const readyEvent: AssetFeatureReadyPayload = {
      job_id: jobId,
      asset_id: assetId,
      event_id: randomUUID(),
    };
    await this.deps.bus.publish(featureReadyTopic(assetType, this.feature), readyEvent);

    logger.info({ jobId, assetId, assetType, stage: this.stage }, 'Item processed successfully');
  }

  private parseBatch(
    topic: InboundTopic,
    assetType: AssetType,
    payload: unknown
  ): { jobId: string; eventId: string; total: number } {
    if (assetType === 'image') {
      const event = parseEvent(imagesBatchEventSchema, topic, payload);
      return { jobId: event.job_id, eventId: event.event_id, total: event.total_images };
    }
    const event = parseEvent(keyframesBatchEventSchema, topic, payload);
    return { jobId: event.job_id, eventId: event.event_id, total: event.total_keyframes };
  }

  private itemKey(source: Pick<AssetSource, 'jobId' | 'assetType' | 'assetId'>): ItemReady {
    return { jobId: source.jobId, assetType: source.assetType, assetId: source.assetId, stage: this.stage };
  }
}
