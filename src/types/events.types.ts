import { z } from 'zod';
import type { AssetType, PipelineStage } from './asset.types.js';
import { EventValidationError } from '../utils/errors.js';

/**
 * Inbound and outbound event contracts.
 *
 * Unknown fields are stripped by zod; payloads missing a required field
 * fail validation and are dead-lettered by the bus.
 */

const jobId = z.string().min(1);
const eventId = z.string().min(1);
const count = z.number().int().min(0);

export const imagesBatchEventSchema = z.object({
  job_id: jobId,
  event_id: eventId,
  total_images: count,
});

export const keyframesBatchEventSchema = z.object({
  job_id: jobId,
  event_id: eventId,
  total_keyframes: count,
});

export const productImageReadyEventSchema = z.object({
  job_id: jobId,
  product_id: z.string().optional(),
  image_id: z.string().min(1),
  local_path: z.string().min(1),
});

export const productImageMaskedEventSchema = z.object({
  job_id: jobId,
  image_id: z.string().min(1),
  mask_path: z.string().min(1),
});

const readyFrameSchema = z.object({
  frame_id: z.string().min(1),
  ts: z.number(),
  local_path: z.string().min(1),
});

const maskedFrameSchema = z.object({
  frame_id: z.string().min(1),
  ts: z.number(),
  mask_path: z.string().min(1),
});

export const keyframesReadyEventSchema = z.object({
  job_id: jobId,
  video_id: z.string().min(1),
  frames: z.array(readyFrameSchema),
});

export const keyframesMaskedEventSchema = z.object({
  job_id: jobId,
  video_id: z.string().min(1),
  frames: z.array(maskedFrameSchema),
});

/**
 * Validate an inbound payload against its topic's schema
 * @throws EventValidationError (not retried by the bus)
 */
export function parseEvent<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, topic: string, payload: unknown): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new EventValidationError(topic, result.error.flatten().fieldErrors);
  }
  return result.data;
}

export type ImagesBatchEvent = z.infer<typeof imagesBatchEventSchema>;
export type KeyframesBatchEvent = z.infer<typeof keyframesBatchEventSchema>;
export type ProductImageReadyEvent = z.infer<typeof productImageReadyEventSchema>;
export type ProductImageMaskedEvent = z.infer<typeof productImageMaskedEventSchema>;
export type KeyframesReadyEvent = z.infer<typeof keyframesReadyEventSchema>;
export type KeyframesMaskedEvent = z.infer<typeof keyframesMaskedEventSchema>;

/**
 * Inbound topics consumed by the vision stages
 */
export const InboundTopic = {
  PRODUCTS_IMAGES_READY_BATCH: 'products.images.ready.batch',
  PRODUCTS_IMAGES_MASKED_BATCH: 'products.images.masked.batch',
  VIDEOS_KEYFRAMES_READY_BATCH: 'videos.keyframes.ready.batch',
  VIDEO_KEYFRAMES_MASKED_BATCH: 'video.keyframes.masked.batch',
  PRODUCTS_IMAGE_READY: 'products.image.ready',
  PRODUCTS_IMAGE_MASKED: 'products.image.masked',
  VIDEOS_KEYFRAMES_READY: 'videos.keyframes.ready',
  VIDEO_KEYFRAMES_MASKED: 'video.keyframes.masked',
} as const;

export type InboundTopic = (typeof InboundTopic)[keyof typeof InboundTopic];

/**
 * Batch-transition topics that hand one stage's output to the next
 */
export const BatchTransitionTopic = {
  PRODUCTS_IMAGES_MASKED_BATCH: 'products.images.masked.batch',
  VIDEO_KEYFRAMES_MASKED_BATCH: 'video.keyframes.masked.batch',
  VIDEOS_KEYFRAMES_READY_BATCH: 'videos.keyframes.ready.batch',
} as const;

export type BatchTransitionTopic = (typeof BatchTransitionTopic)[keyof typeof BatchTransitionTopic];

/** Count field carried by each batch-transition topic */
export const BATCH_TRANSITION_COUNT_FIELD: Record<BatchTransitionTopic, 'total_images' | 'total_keyframes'> = {
  'products.images.masked.batch': 'total_images',
  'video.keyframes.masked.batch': 'total_keyframes',
  'videos.keyframes.ready.batch': 'total_keyframes',
};

/** Masked-batch topic announced when segmentation of an asset type completes */
export const MASKED_BATCH_TOPIC: Record<AssetType, BatchTransitionTopic> = {
  image: BatchTransitionTopic.PRODUCTS_IMAGES_MASKED_BATCH,
  video: BatchTransitionTopic.VIDEO_KEYFRAMES_MASKED_BATCH,
};

export function completedTopic(assetType: AssetType, stage: PipelineStage): string {
  return `${assetType}.${stage}.completed`;
}

/**
 * Outbound "{assetType}.{stage}.completed" payload.
 *
 * Count fields are optional for consumers: some producers only send
 * job_id and event_id, meaning counts are unavailable.
 */
export const completedEventSchema = z.object({
  job_id: jobId,
  event_id: eventId,
  total_assets: count.optional(),
  processed_assets: count.optional(),
  failed_assets: count.optional(),
  has_partial_completion: z.boolean().optional(),
  watermark_ttl: z.number().optional(),
  idempotent: z.boolean().optional(),
});

export type CompletedEvent = z.infer<typeof completedEventSchema>;

/**
 * Payload emitted by this service (all count fields present)
 */
export type CompletedEventPayload = {
  job_id: string;
  event_id: string;
  total_assets: number;
  processed_assets: number;
  failed_assets: number;
  has_partial_completion: boolean;
  watermark_ttl: number;
  idempotent: true;
};

export type BatchTransitionPayload =
  | { event_id: string; job_id: string; total_images: number }
  | { event_id: string; job_id: string; total_keyframes: number };

/** Feature named in per-asset ready topics */
export type AssetFeature = 'embedding' | 'keypoint';

export function featureReadyTopic(assetType: AssetType, feature: AssetFeature): string {
  return `${assetType}.${feature}.ready`;
}

/**
 * Per-asset "{assetType}.{feature}.ready" payload
 */
export type AssetFeatureReadyPayload = {
  job_id: string;
  asset_id: string;
  event_id: string;
};
