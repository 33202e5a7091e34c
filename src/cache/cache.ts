export interface ImageCacheClient {
  resolvePath(url: string): Promise<string>;
  fetch(url: string | null | undefined, forceDownload?: boolean): Promise<string | null>;
  /**
   * Deletes the oldest entries until the cache fits `maxSizeMb`. A missing or
   * non-finite budget selects the configured one; `0` is a real budget and
   * empties the cache.
   */
  evict(maxSizeMb?: number | null): Promise<void>;
}
