import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const configSchema = z
  .object({
    MAX_PAGES: z.coerce.number().int().min(1).max(20).default(3),
    CACHE_TTL_HOURS: z.coerce.number().int().min(1).default(24),
    PORT: z.coerce.number().int().min(1).max(65535).default(8787),
    CACHE_DB_PATH: z.string().min(1).default(path.join(process.cwd(), 'data', 'cache.db')),
    CACHE_CLEAR_ON_BOOT: booleanFlag,
    SOURCE_BASE_URL: z.string().url().default('https://www.amazon.in'),
    SOURCE_PLATFORM: z.string().min(1).default('Amazon'),
    FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120000),
    PAGE_DELAY_MIN_MS: z.coerce.number().int().min(0).default(2000),
    PAGE_DELAY_MAX_MS: z.coerce.number().int().min(0).default(4000),
    USER_AGENT: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
  })
  .refine(env => env.PAGE_DELAY_MAX_MS >= env.PAGE_DELAY_MIN_MS, {
    message: 'PAGE_DELAY_MAX_MS must be >= PAGE_DELAY_MIN_MS',
    path: ['PAGE_DELAY_MAX_MS']
  });

export interface AppConfig {
  maxPages: number;
  cacheTtlHours: number;
  port: number;
  cacheDbPath: string;
  clearCacheOnBoot: boolean;
  sourceBaseUrl: string;
  platform: string;
  fetchTimeoutMs: number;
  requestTimeoutMs: number;
  pageDelayMinMs: number;
  pageDelayMaxMs: number;
  userAgent?: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

function emptyToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === undefined || value.trim() === '' ? undefined : value.trim();
  }
  return cleaned;
}

/**
 * Read configuration from the environment. Called once at startup; the
 * returned object is frozen for the lifetime of the process.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = configSchema.safeParse(emptyToUndefined(env));
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(issue => issue.path.join('.')))];
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(keys, `Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return Object.freeze({
    maxPages: values.MAX_PAGES,
    cacheTtlHours: values.CACHE_TTL_HOURS,
    port: values.PORT,
    cacheDbPath: values.CACHE_DB_PATH,
    clearCacheOnBoot: values.CACHE_CLEAR_ON_BOOT,
    sourceBaseUrl: values.SOURCE_BASE_URL.replace(/\/+$/, ''),
    platform: values.SOURCE_PLATFORM,
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    pageDelayMinMs: values.PAGE_DELAY_MIN_MS,
    pageDelayMaxMs: values.PAGE_DELAY_MAX_MS,
    userAgent: values.USER_AGENT,
    logLevel: values.LOG_LEVEL
  });
}
