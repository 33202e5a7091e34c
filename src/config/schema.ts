import { z } from 'zod';

function parseSeconds(value: string): number[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
}

/**
 * Comma-separated seconds (`"1,2.5,4"`) parsed into whole milliseconds.
 */
const secondsList = (defaultValue: string) =>
  z
    .string()
    .optional()
    .default(defaultValue)
    .superRefine((value, ctx) => {
      if (parseSeconds(value).some((entry) => !Number.isFinite(entry) || entry < 0)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Expected comma-separated non-negative seconds, received "${value}"`,
          fatal: true,
        });
      }
    })
    .transform((value) => parseSeconds(value).map((entry) => Math.round(entry * 1000)));

const numericString = (defaultValue: number) =>
  z.string().optional().default(String(defaultValue)).pipe(z.coerce.number());

const pathString = (defaultValue: string) => z.string().trim().min(1).optional().default(defaultValue);

/**
 * Image cache settings
 */
export const configSchema = z
  .object({
    cacheDir: pathString('.cache/images').describe('Directory holding cached images'),
    maxRetries: numericString(3)
      .pipe(z.number().int().min(1, 'Must be an integer of at least 1'))
      .describe('Download attempts per fetch (default: 3)'),
    timeouts: secondsList('10,30')
      .superRefine((list, ctx) => {
        if (list.length < 1 || list.length > 2 || list.some((entry) => entry <= 0)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Expected one positive timeout or "connect,read" seconds',
            fatal: true,
          });
        }
      })
      .transform(([connectMs = 0, readMs = connectMs]) => ({ connectMs, readMs }))
      .describe('Connect and read timeouts in seconds (default: 10,30)'),
    retryDelaysMs: secondsList('1,2,4').describe('Backoff delay before each retry, in seconds (default: 1,2,4)'),
    defaultImagePath: pathString('assets/default-image.jpg').describe('Fallback image returned when downloads fail'),
    maxSizeMb: numericString(500)
      .pipe(z.number().positive('Must be greater than 0'))
      .describe('Eviction budget in megabytes (default: 500)'),
  })
  .superRefine((config, ctx) => {
    if (config.retryDelaysMs.length < config.maxRetries - 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retryDelaysMs'],
        message: `Expected at least ${config.maxRetries - 1} delays for ${config.maxRetries} attempts, received ${config.retryDelaysMs.length}`,
      });
    }
  });

/**
 * Environment variables recognised by the cache
 */
export const envSchema = z.object({
  IMAGES_CACHE_DIR: z.string().optional(),
  IMAGE_DOWNLOAD_MAX_RETRIES: z.string().optional(),
  IMAGE_DOWNLOAD_TIMEOUT: z.string().optional(),
  IMAGE_DOWNLOAD_RETRY_DELAYS: z.string().optional(),
  DEFAULT_IMAGE_PATH: z.string().optional(),
  IMAGE_CACHE_MAX_SIZE_MB: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

export type EnvVars = z.infer<typeof envSchema>;
