import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

const ScraperConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('production'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),

  http: z.object({
    timeoutMs: z.number().int().min(1).default(10000),
    userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  }),

  batch: z.object({
    // Politeness pause between consecutive page fetches
    delaySeconds: z.number().min(0).default(1.0),
    urlColumn: z.string().min(1).default('url'),
  }),
});

export type ScraperConfig = z.infer<typeof ScraperConfigSchema>;

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

export function parseConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ScraperConfig {
  const rawConfig = {
    env: env.NODE_ENV || undefined,
    logLevel: env.LOG_LEVEL || undefined,

    http: {
      timeoutMs: optionalNumber(env.SCRAPER_TIMEOUT_MS),
      userAgent: env.SCRAPER_USER_AGENT || undefined,
    },

    batch: {
      delaySeconds: optionalNumber(env.SCRAPER_DELAY_SECONDS),
      urlColumn: env.SCRAPER_URL_COLUMN || undefined,
    },
  };

  return ScraperConfigSchema.parse(rawConfig);
}

export const config = parseConfigFromEnv();

export const isDevelopment = config.env === 'development';
