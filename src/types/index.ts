export interface DownloadTimeouts {
  /** Time allowed until response headers arrive. */
  connectMs: number;
  /** Longest allowed pause between two body chunks. */
  readMs: number;
}

export interface ImageCacheSettings {
  cacheDir: string;
  maxRetries: number;
  retryDelaysMs: number[];
  timeouts: DownloadTimeouts;
  defaultImagePath: string;
  maxSizeMb: number;
}

export type AttemptOutcome =
  | { kind: 'success'; path: string }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; reason: string };

export interface CachedFile {
  path: string;
  size: number;
  mtimeMs: number;
}
