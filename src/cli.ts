import { Command } from 'commander';
import type { ImageCacheClient } from './cache/cache.js';

export interface CliIo {
  out: (line: string) => void;
  setExitCode: (code: number) => void;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function createProgram(createCache: () => ImageCacheClient, io: CliIo = defaultIo): Command {
  const program = new Command();
  program.name('image-cache').description('Cache remote images on disk, keyed by URL.');

  program
    .command('path')
    .description('Print the cache path a URL resolves to.')
    .argument('<url>', 'Image URL.')
    .action(async (url: string) => {
      io.out(await createCache().resolvePath(url));
    });

  program
    .command('fetch')
    .description('Download an image into the cache (or reuse the cached copy) and print its path.')
    .argument('<url>', 'Image URL.')
    .option('-f, --force', 'Download again even when a cached copy exists.', false)
    .action(async (url: string, options: { force: boolean }) => {
      const imagePath = await createCache().fetch(url, options.force);
      if (!imagePath) {
        io.out(`No image available for ${url}`);
        io.setExitCode(1);
        return;
      }
      io.out(imagePath);
    });

  program
    .command('evict')
    .description('Delete the oldest cached images until the cache fits its size budget.')
    .option('--max-size-mb <number>', 'Size budget in megabytes (default: IMAGE_CACHE_MAX_SIZE_MB).')
    .action(async (options: { maxSizeMb?: string }) => {
      const maxSizeMb = parsePositiveNumber(options.maxSizeMb, 'max-size-mb');
      await createCache().evict(maxSizeMb);
    });

  return program;
}

function parsePositiveNumber(value: string | undefined, flagName: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return parsed;
}
