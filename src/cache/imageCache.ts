import { ImageDownloader } from '../clients/imageDownloader.js';
import type { ImageCacheSettings } from '../types/index.js';
import { describeError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Sleep } from '../utils/sleep.js';
import type { ImageCacheClient } from './cache.js';
import { evictOldest } from './eviction.js';
import { pathExists, resolveCachePath } from './paths.js';

export interface ImageCacheOptions {
  fetchImpl?: typeof fetch | undefined;
  sleep?: Sleep | undefined;
  logger?: Logger | undefined;
}

/**
 * Disk cache for remote images keyed by URL. Holds no state beyond its
 * settings; the cache directory listing is the only index.
 */
export class ImageCache implements ImageCacheClient {
  private readonly downloader: ImageDownloader;
  private readonly logger: Logger;

  constructor(
    private readonly settings: ImageCacheSettings,
    options: ImageCacheOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.downloader = new ImageDownloader({
      maxRetries: settings.maxRetries,
      retryDelaysMs: settings.retryDelaysMs,
      timeouts: settings.timeouts,
      fetchImpl: options.fetchImpl,
      sleep: options.sleep,
      logger: this.logger,
    });
  }

  resolvePath(url: string): Promise<string> {
    return resolveCachePath(this.settings.cacheDir, url);
  }

  async fetch(url: string | null | undefined, forceDownload: boolean = false): Promise<string | null> {
    if (typeof url !== 'string' || url.length === 0) {
      this.logger.error(`Invalid image URL: ${String(url)}`);
      return null;
    }

    let cachedPath: string;
    try {
      cachedPath = await this.resolvePath(url);
      if (!forceDownload && (await pathExists(cachedPath))) {
        return cachedPath;
      }
    } catch (error) {
      this.logger.error(`Unable to prepare cache directory for ${url}: ${describeError(error)}`);
      return this.fallback(url);
    }

    const downloaded = await this.downloader.download(url, cachedPath);
    return downloaded ?? this.fallback(url);
  }

  evict(maxSizeMb?: number | null): Promise<void> {
    const budget = typeof maxSizeMb === 'number' && Number.isFinite(maxSizeMb) ? maxSizeMb : this.settings.maxSizeMb;
    return evictOldest(this.settings.cacheDir, budget, this.logger);
  }

  private async fallback(url: string): Promise<string | null> {
    if (await pathExists(this.settings.defaultImagePath)) {
      this.logger.warn(`Using default image for ${url}`);
      return this.settings.defaultImagePath;
    }

    this.logger.warn(`No image available for ${url}`);
    return null;
  }
}
