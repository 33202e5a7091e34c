import { promises as fs } from 'node:fs';
import path from 'node:path';
import { checksumFrom } from '../utils/hash.js';

export const DEFAULT_EXTENSION = '.jpg';

/**
 * Extension of the URL's path portion (everything before the first `?`),
 * or `.jpg` when the last path segment has none.
 */
export function extensionFor(url: string): string {
  const pathPortion = url.split('?')[0] ?? url;
  return path.posix.extname(pathPortion) || DEFAULT_EXTENSION;
}

export function cachePathFor(cacheDir: string, url: string): string {
  return path.join(cacheDir, `${checksumFrom(url)}${extensionFor(url)}`);
}

export async function resolveCachePath(cacheDir: string, url: string): Promise<string> {
  await fs.mkdir(cacheDir, { recursive: true });
  return cachePathFor(cacheDir, url);
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
