import { ZodError } from 'zod';
import { ConfigValidationError } from './errors.js';
import { configSchema, envSchema, type Config } from './schema.js';

/**
 * Reads and validates the image cache settings from environment variables.
 * @throws {ConfigValidationError} If any value is malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    const validatedEnv = envSchema.parse({
      IMAGES_CACHE_DIR: env.IMAGES_CACHE_DIR,
      IMAGE_DOWNLOAD_MAX_RETRIES: env.IMAGE_DOWNLOAD_MAX_RETRIES,
      IMAGE_DOWNLOAD_TIMEOUT: env.IMAGE_DOWNLOAD_TIMEOUT,
      IMAGE_DOWNLOAD_RETRY_DELAYS: env.IMAGE_DOWNLOAD_RETRY_DELAYS,
      DEFAULT_IMAGE_PATH: env.DEFAULT_IMAGE_PATH,
      IMAGE_CACHE_MAX_SIZE_MB: env.IMAGE_CACHE_MAX_SIZE_MB,
    });

    return configSchema.parse({
      cacheDir: validatedEnv.IMAGES_CACHE_DIR,
      maxRetries: validatedEnv.IMAGE_DOWNLOAD_MAX_RETRIES,
      timeouts: validatedEnv.IMAGE_DOWNLOAD_TIMEOUT,
      retryDelaysMs: validatedEnv.IMAGE_DOWNLOAD_RETRY_DELAYS,
      defaultImagePath: validatedEnv.DEFAULT_IMAGE_PATH,
      maxSizeMb: validatedEnv.IMAGE_CACHE_MAX_SIZE_MB,
    });
  } catch (error) {
    if (error instanceof ZodError) {
      throw ConfigValidationError.fromZodError(error);
    }
    throw error;
  }
}

export { ConfigValidationError } from './errors.js';

export type { Config } from './schema.js';
