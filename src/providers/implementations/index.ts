/**
 * Provider Implementations
 */

export { SharpHistogramEmbeddingProvider } from './sharp-histogram-embedding.provider.js';
export { SharpGradientKeypointProvider, type SharpGradientKeypointOptions } from './sharp-gradient-keypoint.provider.js';
