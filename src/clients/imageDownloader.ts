import { randomUUID } from 'node:crypto';
import { createWriteStream, promises as fs } from 'node:fs';
import { Readable, Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { AttemptOutcome, DownloadTimeouts } from '../types/index.js';
import { classifyDownloadError, describeError, DownloadTimeoutError, isErrnoException } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

export interface ImageDownloaderOptions {
  maxRetries: number;
  retryDelaysMs: readonly number[];
  timeouts: DownloadTimeouts;
  fetchImpl?: typeof fetch | undefined;
  sleep?: Sleep | undefined;
  logger?: Logger | undefined;
}

export const REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'image/webp,*/*',
  'Accept-Language': 'en-US,en;q=0.5',
};

export const CHUNK_SIZE = 8192;

export class ImageDownloader {
  private readonly maxRetries: number;
  private readonly retryDelaysMs: readonly number[];
  private readonly timeouts: DownloadTimeouts;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(options: ImageDownloaderOptions) {
    this.maxRetries = options.maxRetries;
    this.retryDelaysMs = options.retryDelaysMs;
    this.timeouts = options.timeouts;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Downloads `url` into `destination`, retrying transient failures.
   * Resolves to the destination on success and to `null` once attempts are
   * exhausted or a local error aborts the loop.
   */
  async download(url: string, destination: string): Promise<string | null> {
    for (let attempt = 0; attempt < this.maxRetries; attempt += 1) {
      const outcome = await this.attempt(url, destination, attempt + 1);

      switch (outcome.kind) {
        case 'success':
          this.logger.info(`Cached image from ${url} to ${outcome.path}`);
          return outcome.path;
        case 'fatal':
          this.logger.error(outcome.reason);
          return null;
        case 'retryable':
          this.logger.warn(outcome.reason);
          break;
      }

      if (attempt < this.maxRetries - 1) {
        await this.sleep(this.delayFor(attempt));
      }
    }

    return null;
  }

  private async attempt(url: string, destination: string, attemptNumber: number): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const { connectMs, readMs } = this.timeouts;
    const connectTimer = setTimeout(() => controller.abort(new DownloadTimeoutError('connect', connectMs)), connectMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: REQUEST_HEADERS,
        redirect: 'follow',
        signal: controller.signal,
      });
      clearTimeout(connectTimer);

      if (!response.ok) {
        await response.body?.cancel();
        return {
          kind: 'retryable',
          reason: `Request error (Attempt ${attemptNumber}) for ${url}: HTTP ${response.status} ${response.statusText}`.trimEnd(),
        };
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.startsWith('image/')) {
        await response.body?.cancel();
        return { kind: 'retryable', reason: `Invalid content type for ${url}: ${contentType}` };
      }

      const source = response.body ? Readable.fromWeb(response.body) : Readable.from([]);
      if (!(await saveBody(source, destination, readMs, controller))) {
        return { kind: 'retryable', reason: `Failed to save image from ${url}` };
      }

      return { kind: 'success', path: destination };
    } catch (error) {
      const { signal } = controller;
      const timeout = signal.aborted && signal.reason instanceof DownloadTimeoutError ? signal.reason : undefined;
      return this.outcomeFor(timeout ?? error, url, attemptNumber);
    } finally {
      clearTimeout(connectTimer);
    }
  }

  private outcomeFor(error: unknown, url: string, attemptNumber: number): AttemptOutcome {
    const detail = describeError(error);
    switch (classifyDownloadError(error)) {
      case 'timeout':
        return { kind: 'retryable', reason: `Timeout error (Attempt ${attemptNumber}) for ${url}: ${detail}` };
      case 'connection':
        return { kind: 'retryable', reason: `Connection error (Attempt ${attemptNumber}) for ${url}: ${detail}` };
      case 'request':
        return { kind: 'retryable', reason: `Request error (Attempt ${attemptNumber}) for ${url}: ${detail}` };
      case 'permission':
        return { kind: 'fatal', reason: `Permission error saving image: ${detail}` };
      case 'unexpected':
        return { kind: 'fatal', reason: `Unexpected error downloading image ${url}: ${detail}` };
    }
  }

  private delayFor(attempt: number): number {
    return this.retryDelaysMs[attempt] ?? this.retryDelaysMs[this.retryDelaysMs.length - 1] ?? 0;
  }
}

/**
 * Streams the body into a sibling `.part` file and renames it over
 * `destination` once it holds at least one byte. Returns false when the body
 * was empty.
 */
async function saveBody(
  source: Readable,
  destination: string,
  readMs: number,
  controller: AbortController,
): Promise<boolean> {
  const partial = `${destination}.${randomUUID()}.part`;
  try {
    const sink = createWriteStream(partial);
    await pipeline(source, chunkedBody(readMs, controller), sink);
    if (!(await hasContent(partial))) {
      return false;
    }

    await fs.rename(partial, destination);
    return true;
  } finally {
    await fs.rm(partial, { force: true });
  }
}

/**
 * Re-slices body chunks to at most CHUNK_SIZE bytes and fails the stream
 * when no chunk arrives within `readMs`.
 */
export function chunkedBody(readMs: number, controller: AbortController): Transform {
  let timer: NodeJS.Timeout | undefined;

  const stream = new Transform({
    transform(chunk: Uint8Array, _encoding, callback) {
      arm();
      for (let offset = 0; offset < chunk.length; offset += CHUNK_SIZE) {
        this.push(chunk.subarray(offset, offset + CHUNK_SIZE));
      }
      callback();
    },
    flush(callback) {
      clearTimeout(timer);
      callback();
    },
    destroy(error, callback) {
      clearTimeout(timer);
      callback(error);
    },
  });

  function arm() {
    clearTimeout(timer);
    timer = setTimeout(() => {
      const error = new DownloadTimeoutError('read', readMs);
      controller.abort(error);
      stream.destroy(error);
    }, readMs);
  }

  arm();
  return stream;
}

async function hasContent(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }

    throw error;
  }
}
