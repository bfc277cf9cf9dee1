export type { EmbeddingExtractor, ImageEmbeddings } from './embedding-extractor.provider.js';
export type { KeypointExtractor, Keypoint, KeypointBlob } from './keypoint-extractor.provider.js';
