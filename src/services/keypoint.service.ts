import type { KeypointExtractor } from '../providers/interfaces/keypoint-extractor.provider.js';
import { InboundTopic } from '../types/events.types.js';
import {
  AssetStageService,
  type AssetSource,
  type AssetStageServiceDeps,
  type BatchSubscription,
} from './asset-stage.service.js';

/**
 * Keypoints stage: keypoint blob per product image and keyframe.
 * Expected counts come from the ready batches of collection and extraction.
 */
export class KeypointService extends AssetStageService {
  readonly stage = 'keypoints';
  protected readonly feature = 'keypoint';
  protected readonly batchTopics: readonly BatchSubscription[] = [
    { topic: InboundTopic.PRODUCTS_IMAGES_READY_BATCH, assetType: 'image' },
    { topic: InboundTopic.VIDEOS_KEYFRAMES_READY_BATCH, assetType: 'video' },
  ];

  constructor(
    deps: AssetStageServiceDeps,
    private readonly extractor: KeypointExtractor
  ) {
    super(deps);
  }

  protected async processAsset(source: AssetSource): Promise<void> {
    const blobPath = await this.extractor.extract(source.imagePath, source.assetId, source.maskPath);
    await this.deps.store.updateKeypointBlobPath(source.assetType, source.assetId, blobPath);
  }
}
