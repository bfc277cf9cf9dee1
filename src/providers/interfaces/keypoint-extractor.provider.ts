/**
 * One detected keypoint in resized-image coordinates
 */
export interface Keypoint {
  x: number;
  y: number;
  response: number;
}

/**
 * Stored keypoint blob
 */
export interface KeypointBlob {
  assetId: string;
  width: number;
  height: number;
  keypoints: Keypoint[];
}

/**
 * KeypointExtractor Interface
 *
 * Implementations: SharpGradientKeypointProvider
 *
 * Detects keypoints and persists them, returning where the blob was written.
 */
export interface KeypointExtractor {
  /** Provider identifier for logging */
  readonly providerId: string;

  /**
   * Detect keypoints and write them to storage
   * @param imagePath - Path to the image
   * @param assetId - Image or frame id, names the blob
   * @param maskPath - Optional foreground mask restricting detection
   * @returns Path of the written blob
   */
  extract(imagePath: string, assetId: string, maskPath?: string): Promise<string>;
}
