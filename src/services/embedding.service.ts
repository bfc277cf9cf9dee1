import type { EmbeddingExtractor } from '../providers/interfaces/embedding-extractor.provider.js';
import { InboundTopic } from '../types/events.types.js';
import {
  AssetStageService,
  type AssetSource,
  type AssetStageServiceDeps,
  type BatchSubscription,
} from './asset-stage.service.js';

/**
 * Embeddings stage: RGB and gray vectors per product image and keyframe.
 * Expected counts come from the masked batches announced by segmentation.
 */
export class EmbeddingService extends AssetStageService {
  readonly stage = 'embeddings';
  protected readonly feature = 'embedding';
  protected readonly batchTopics: readonly BatchSubscription[] = [
    { topic: InboundTopic.PRODUCTS_IMAGES_MASKED_BATCH, assetType: 'image' },
    { topic: InboundTopic.VIDEO_KEYFRAMES_MASKED_BATCH, assetType: 'video' },
  ];

  constructor(
    deps: AssetStageServiceDeps,
    private readonly extractor: EmbeddingExtractor
  ) {
    super(deps);
  }

  protected async processAsset(source: AssetSource): Promise<void> {
    const embeddings = await this.extractor.extract(source.imagePath, source.maskPath);
    await this.deps.store.updateEmbeddings(source.assetType, source.assetId, embeddings);
  }
}
