import sharp from 'sharp';
import type { EmbeddingExtractor, ImageEmbeddings } from '../interfaces/embedding-extractor.provider.js';
import { l2Normalize, loadGrayRaster, loadMask } from '../utils/sharp-raster.js';
import { AppError } from '../../utils/errors.js';

/** Bins per colour channel; 8 x 8 x 8 = 512 */
const BINS_PER_CHANNEL = 8;
/** Side of the square the colour histogram is sampled from */
const HISTOGRAM_SAMPLE_SIZE = 128;
/** Gray thumbnail; 32 x 16 = 512 */
const THUMBNAIL_WIDTH = 32;
const THUMBNAIL_HEIGHT = 16;

/**
 * Sharp Histogram Embedding Provider
 *
 * rgb: joint RGB colour histogram. gray: downscaled luminance thumbnail.
 * Both are 512-d and L2-normalised so cosine similarity reduces to a dot
 * product in pgvector.
 */
export class SharpHistogramEmbeddingProvider implements EmbeddingExtractor {
  readonly providerId = 'sharp-histogram';
  readonly dimensions = BINS_PER_CHANNEL ** 3;

  async extract(imagePath: string, maskPath?: string): Promise<ImageEmbeddings> {
    const [rgb, gray] = await Promise.all([
      this.colourHistogram(imagePath, maskPath),
      this.grayThumbnail(imagePath, maskPath),
    ]);
    return { rgb, gray };
  }

  private async colourHistogram(imagePath: string, maskPath?: string): Promise<number[]> {
    const size = HISTOGRAM_SAMPLE_SIZE;
    const [{ data, info }, mask] = await Promise.all([
      sharp(imagePath)
        .removeAlpha()
        .toColourspace('srgb')
        .resize(size, size, { fit: 'fill' })
        .raw()
        .toBuffer({ resolveWithObject: true }),
      maskPath ? loadMask(maskPath, size, size) : Promise.resolve(undefined),
    ]);

    const shift = 8 - Math.log2(BINS_PER_CHANNEL);
    const histogram = new Array<number>(this.dimensions).fill(0);
    let counted = 0;

    for (let i = 0; i < size * size; i++) {
      if (mask && !mask[i]) continue;
      const offset = i * info.channels;
      const r = data[offset] >> shift;
      const g = data[offset + 1] >> shift;
      const b = data[offset + 2] >> shift;
      histogram[(r * BINS_PER_CHANNEL + g) * BINS_PER_CHANNEL + b] += 1;
      counted++;
    }

    if (counted === 0) {
      throw new AppError(`Mask ${maskPath} selects no pixels`, 'EMPTY_MASK');
    }

    return l2Normalize(histogram);
  }

  private async grayThumbnail(imagePath: string, maskPath?: string): Promise<number[]> {
    const [raster, mask] = await Promise.all([
      loadGrayRaster(imagePath, THUMBNAIL_WIDTH, THUMBNAIL_HEIGHT),
      maskPath ? loadMask(maskPath, THUMBNAIL_WIDTH, THUMBNAIL_HEIGHT) : Promise.resolve(undefined),
    ]);

    const values = Array.from(raster.data, (value, i) => (mask && !mask[i] ? 0 : value / 255));
    return l2Normalize(values);
  }
}
