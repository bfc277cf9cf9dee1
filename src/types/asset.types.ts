/**
 * Pipeline stream an asset belongs to
 */
export type AssetType = 'image' | 'video';

/**
 * Pipeline stage whose per-job completion is tracked
 */
export type PipelineStage = 'embeddings' | 'keypoints' | 'segmentation';

/**
 * Identifies one tracked stream: a job's assets of one type, in one stage
 */
export interface TrackingKey {
  jobId: string;
  assetType: AssetType;
  stage: PipelineStage;
}

/**
 * Expected item count for a tracked stream
 *
 * - unknown: nothing announced yet
 * - placeholder: items arrived before the batch announcement
 * - known: authoritative count from the batch announcement
 */
export type ExpectedCount =
  | { kind: 'unknown' }
  | { kind: 'placeholder' }
  | { kind: 'known'; value: number };

export const UNKNOWN_EXPECTED: ExpectedCount = { kind: 'unknown' };
export const PLACEHOLDER_EXPECTED: ExpectedCount = { kind: 'placeholder' };

export function knownExpected(value: number): ExpectedCount {
  return { kind: 'known', value };
}

/**
 * Counters for one tracked stream
 */
export interface JobProgressState {
  expected: ExpectedCount;
  done: number;
  assetType: AssetType;
}

/**
 * Build a collision-free map key from its parts
 */
export function compositeKey(...parts: string[]): string {
  return JSON.stringify(parts);
}

export function trackingKeyId(key: TrackingKey): string {
  return compositeKey(key.jobId, key.assetType, key.stage);
}

export function describeExpected(expected: ExpectedCount): number | string {
  return expected.kind === 'known' ? expected.value : expected.kind;
}
