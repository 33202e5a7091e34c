import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CachedFile } from '../types/index.js';
import { describeError, isErrnoException } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

const BYTES_PER_MB = 1024 * 1024;

/** Regular files directly inside `cacheDir`, oldest modification first. */
export async function listCachedFiles(cacheDir: string): Promise<CachedFile[]> {
  const names = await fs.readdir(cacheDir);
  const files: CachedFile[] = [];

  for (const name of names) {
    const filePath = path.join(cacheDir, name);
    const stats = await statIfPresent(filePath);
    if (stats?.isFile()) {
      files.push({ path: filePath, size: stats.size, mtimeMs: stats.mtimeMs });
    }
  }

  return files.sort((a, b) => a.mtimeMs - b.mtimeMs);
}

// dangling symlinks and entries removed since the listing count as non-files
async function statIfPresent(filePath: string) {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }

    throw error;
  }
}

/**
 * Deletes the oldest cached files until the directory holds at most
 * `maxSizeMb` megabytes. The first failure ends the pass; it is logged and
 * never rethrown.
 */
export async function evictOldest(cacheDir: string, maxSizeMb: number, logger: Logger): Promise<void> {
  try {
    const files = await listCachedFiles(cacheDir);
    const budgetBytes = maxSizeMb * BYTES_PER_MB;
    let totalBytes = files.reduce((sum, file) => sum + file.size, 0);
    let removedCount = 0;
    let removedBytes = 0;

    for (const file of files) {
      if (totalBytes <= budgetBytes) {
        break;
      }

      await fs.unlink(file.path);
      totalBytes -= file.size;
      removedCount += 1;
      removedBytes += file.size;
    }

    if (removedCount > 0) {
      logger.info(
        `Evicted ${removedCount} cached images (${toMb(removedBytes)} MB); ${toMb(totalBytes)} MB remain in ${cacheDir}`,
      );
    }
  } catch (error) {
    logger.error(`Error clearing image cache: ${describeError(error)}`);
  }
}

function toMb(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(2);
}
