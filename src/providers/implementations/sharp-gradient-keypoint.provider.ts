import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { Keypoint, KeypointBlob, KeypointExtractor } from '../interfaces/keypoint-extractor.provider.js';
import { loadGrayRaster, loadMask, type GrayRaster } from '../utils/sharp-raster.js';
import { createChildLogger } from '../../utils/logger.js';

const logger = createChildLogger({ service: 'sharp-gradient-keypoint' });

export interface SharpGradientKeypointOptions {
  /** Root under which the `keypoints/` directory is written */
  dataRoot: string;
  /** Side of the square the image is resized to (default: 256) */
  imageSize?: number;
  /** Keypoints kept, strongest first (default: 500) */
  maxKeypoints?: number;
  /** Minimum Sobel magnitude of a keypoint (default: 64) */
  minResponse?: number;
}

/**
 * Sharp Gradient Keypoint Provider
 *
 * Detects corners-and-edges style keypoints as local maxima of the Sobel
 * gradient magnitude (3x3 non-maximum suppression) and writes them as JSON to
 * `{dataRoot}/keypoints/{assetId}.json`.
 */
export class SharpGradientKeypointProvider implements KeypointExtractor {
  readonly providerId = 'sharp-gradient';
  private readonly keypointDir: string;
  private readonly imageSize: number;
  private readonly maxKeypoints: number;
  private readonly minResponse: number;

  constructor(options: SharpGradientKeypointOptions) {
    this.keypointDir = path.join(options.dataRoot, 'keypoints');
    this.imageSize = options.imageSize ?? 256;
    this.maxKeypoints = options.maxKeypoints ?? 500;
    this.minResponse = options.minResponse ?? 64;
  }

  async extract(imagePath: string, assetId: string, maskPath?: string): Promise<string> {
    const [raster, mask] = await Promise.all([
      loadGrayRaster(imagePath, this.imageSize, this.imageSize),
      maskPath ? loadMask(maskPath, this.imageSize, this.imageSize) : Promise.resolve(undefined),
    ]);

    const keypoints = this.detect(raster, mask);
    const blob: KeypointBlob = {
      assetId,
      width: raster.width,
      height: raster.height,
      keypoints,
    };

    await mkdir(this.keypointDir, { recursive: true });
    const blobPath = path.join(this.keypointDir, `${assetId}.json`);
    await writeFile(blobPath, JSON.stringify(blob));

    logger.info({ assetId, count: keypoints.length, masked: maskPath !== undefined }, 'Extracted keypoints');
    return blobPath;
  }

  /**
   * Sobel magnitude peaks, strongest first
   */
  detect(raster: GrayRaster, mask?: boolean[]): Keypoint[] {
    const { data, width, height } = raster;
    const magnitude = new Float32Array(width * height);

    for (let y = 1; y < height - 1; y++) {
      for (let x = 1; x < width - 1; x++) {
        const i = y * width + x;
        const gx =
          data[i - width + 1] + 2 * data[i + 1] + data[i + width + 1] -
          data[i - width - 1] - 2 * data[i - 1] - data[i + width - 1];
        const gy =
          data[i + width - 1] + 2 * data[i + width] + data[i + width + 1] -
          data[i - width - 1] - 2 * data[i - width] - data[i - width + 1];
        magnitude[i] = Math.sqrt(gx * gx + gy * gy);
      }
    }

    const keypoints: Keypoint[] = [];
    for (let y = 1; y < height - 1; y++) {
      for (let x = 1; x < width - 1; x++) {
        const i = y * width + x;
        const response = magnitude[i];
        if (response < this.minResponse) continue;
        if (mask && !mask[i]) continue;
        if (!this.isLocalMaximum(magnitude, width, i)) continue;
        keypoints.push({ x, y, response });
      }
    }

    keypoints.sort((a, b) => b.response - a.response);
    return keypoints.slice(0, this.maxKeypoints);
  }

  /**
   * Strictly greater than earlier neighbours, at least equal to later ones,
   * so a plateau yields a single keypoint
   */
  private isLocalMaximum(magnitude: Float32Array, width: number, i: number): boolean {
    const value = magnitude[i];
    for (let dy = -1; dy <= 1; dy++) {
      for (let dx = -1; dx <= 1; dx++) {
        if (dx === 0 && dy === 0) continue;
        const neighbour = magnitude[i + dy * width + dx];
        const before = dy < 0 || (dy === 0 && dx < 0);
        if (before ? neighbour >= value : neighbour > value) {
          return false;
        }
      }
    }
    return true;
  }
}
