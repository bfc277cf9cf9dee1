import { eq } from 'drizzle-orm';
import { getDatabase, type Database } from '../db/index.js';
import { productImages, videoFrames } from '../db/schema.js';
import type { AssetType } from '../types/asset.types.js';
import { ExternalServiceError } from '../utils/errors.js';

/**
 * RGB and gray feature vectors of one asset
 */
export interface AssetEmbeddings {
  rgb: number[];
  gray: number[];
}

/**
 * Persistence the vision stages need for product images and video frames
 */
export interface AssetStore {
  /**
   * Path of the original (unmasked) asset, or undefined when no record exists
   */
  getLocalPath(assetType: AssetType, assetId: string): Promise<string | undefined>;
  updateEmbeddings(assetType: AssetType, assetId: string, embeddings: AssetEmbeddings): Promise<void>;
  updateKeypointBlobPath(assetType: AssetType, assetId: string, blobPath: string): Promise<void>;
}

/**
 * AssetStore over the product_images and video_frames tables
 */
export class DrizzleAssetStore implements AssetStore {
  constructor(private readonly db: Database = getDatabase()) {}

  async getLocalPath(assetType: AssetType, assetId: string): Promise<string | undefined> {
    return this.run('getLocalPath', async () => {
      if (assetType === 'image') {
        const [row] = await this.db
          .select({ localPath: productImages.localPath })
          .from(productImages)
          .where(eq(productImages.imgId, assetId))
          .limit(1);
        return row?.localPath;
      }

      const [row] = await this.db
        .select({ localPath: videoFrames.localPath })
        .from(videoFrames)
        .where(eq(videoFrames.frameId, assetId))
        .limit(1);
      return row?.localPath;
    });
  }

  async updateEmbeddings(assetType: AssetType, assetId: string, embeddings: AssetEmbeddings): Promise<void> {
    await this.run('updateEmbeddings', async () => {
      const values = { embRgb: embeddings.rgb, embGray: embeddings.gray };
      if (assetType === 'image') {
        await this.db.update(productImages).set(values).where(eq(productImages.imgId, assetId));
      } else {
        await this.db.update(videoFrames).set(values).where(eq(videoFrames.frameId, assetId));
      }
    });
  }

  async updateKeypointBlobPath(assetType: AssetType, assetId: string, blobPath: string): Promise<void> {
    await this.run('updateKeypointBlobPath', async () => {
      if (assetType === 'image') {
        await this.db.update(productImages).set({ kpBlobPath: blobPath }).where(eq(productImages.imgId, assetId));
      } else {
        await this.db.update(videoFrames).set({ kpBlobPath: blobPath }).where(eq(videoFrames.frameId, assetId));
      }
    });
  }

  /**
   * Database failures are transient from the bus's point of view
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new ExternalServiceError(
        'Database',
        `${operation} failed`,
        error instanceof Error ? error : undefined
      );
    }
  }
}
