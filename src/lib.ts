export { ImageCache, type ImageCacheOptions } from './cache/imageCache.js';
export type { ImageCacheClient } from './cache/cache.js';
export { cachePathFor, extensionFor, DEFAULT_EXTENSION } from './cache/paths.js';
export { evictOldest, listCachedFiles } from './cache/eviction.js';
export { loadConfig, ConfigValidationError, type Config } from './config/index.js';
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
export type { AttemptOutcome, CachedFile, DownloadTimeouts, ImageCacheSettings } from './types/index.js';
