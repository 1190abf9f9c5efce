// Media feature: public API
// Image cache and throughput estimation shared by every playlist

export { ImageCache } from './image-cache';
export type { ImageCacheConfig, ImageCacheStats, ImageFetchResult, ImageLoader } from './image-cache';
export { BandwidthEstimator } from './bandwidth-estimator';
export type { BandwidthEstimatorConfig, BandwidthListener } from './bandwidth-estimator';
