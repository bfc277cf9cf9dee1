/**
 * Feature vectors of one image
 */
export interface ImageEmbeddings {
  /** Colour descriptor, L2-normalised */
  rgb: number[];
  /** Luminance descriptor, L2-normalised */
  gray: number[];
}

/**
 * EmbeddingExtractor Interface
 *
 * Implementations: SharpHistogramEmbeddingProvider
 */
export interface EmbeddingExtractor {
  /** Provider identifier for logging */
  readonly providerId: string;

  /** Length of each returned vector */
  readonly dimensions: number;

  /**
   * Compute embeddings of an image
   * @param imagePath - Path to the image
   * @param maskPath - Optional foreground mask; only pixels it marks are described
   */
  extract(imagePath: string, maskPath?: string): Promise<ImageEmbeddings>;
}
