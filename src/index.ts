#!/usr/bin/env node
import dotenv from 'dotenv';
import { ImageCache } from './cache/imageCache.js';
import { createProgram } from './cli.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';

dotenv.config();

const program = createProgram(() => new ImageCache(loadConfig(), { logger: createLogger('image-cache') }));

try {
  await program.parseAsync();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
