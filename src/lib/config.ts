/**
 * Feedcast — Configuration
 *
 * Environment variables are validated once at startup into a typed AppConfig.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform(v => v === 'true' || v === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  SOURCES_FILE: z.string().min(1).default('config/sources.json'),

  DAILY_SEND_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  DAILY_SEND_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  TIMEZONE: z.preprocess(emptyAsUndefined, z.string().optional()),
  ENABLE_SCHEDULED_NEWS: booleanFlag(true),

  MAX_CONCURRENT_FETCHES: positiveInt(5),
  RSS_TIMEOUT_MS: positiveInt(10_000),
  RSS_USER_AGENT: z.string().min(1).default('Feedcast/1.0 (News Digest)'),
  RSS_MAX_ITEMS_PER_SOURCE: positiveInt(10),
  MAX_NEWS_ITEMS: positiveInt(10),
  SUMMARY_MAX_LENGTH: positiveInt(300),

  ENABLE_CACHE: booleanFlag(true),
  CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(300),
  CACHE_BACKEND: z.enum(['memory', 'supabase']).default('memory'),
  CACHE_PURGE_CRON: z.string().min(1).default('*/15 * * * *'),

  DIGEST_SIZE: positiveInt(5),
  DIGEST_SUMMARY_LENGTH: positiveInt(80),
  ACTIVITY_WINDOW_DAYS: positiveInt(30),
  DELIVERY_TIMEOUT_MS: positiveInt(15_000),
  DELIVERY_CONCURRENCY: positiveInt(5),
  DELIVERY_MIN_INTERVAL_MS: z.coerce.number().int().nonnegative().default(40),

  TELEGRAM_BOT_TOKEN: z.preprocess(emptyAsUndefined, z.string().optional()),
  SUPABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: z.preprocess(emptyAsUndefined, z.string().optional()),
});

type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  sourcesFile: string;
  schedule: {
    enabled: boolean;
    dailySendHour: number;
    dailySendMinute: number;
    timezone?: string;
    cachePurgeCron: string;
  };
  fetch: {
    concurrencyLimit: number;
    timeoutMs: number;
    userAgent: string;
    perSourceItemCap: number;
  };
  cache: {
    ttlMs: number;
    backend: Env['CACHE_BACKEND'];
  };
  ranking: {
    aggregateLimit: number;
    summaryMaxLength: number;
  };
  delivery: {
    digestSize: number;
    digestSummaryLength: number;
    activityWindowDays: number;
    timeoutMs: number;
    concurrency: number;
    minIntervalMs: number;
    telegramBotToken?: string;
  };
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
}

/**
 * Parse and validate configuration from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }

  const env = parsed.data;

  if (env.CACHE_BACKEND === 'supabase' && !(env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new ConfigError('Invalid configuration', [
      'CACHE_BACKEND: supabase backend requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY',
    ]);
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    sourcesFile: env.SOURCES_FILE,
    schedule: {
      enabled: env.ENABLE_SCHEDULED_NEWS,
      dailySendHour: env.DAILY_SEND_HOUR,
      dailySendMinute: env.DAILY_SEND_MINUTE,
      timezone: env.TIMEZONE,
      cachePurgeCron: env.CACHE_PURGE_CRON,
    },
    fetch: {
      concurrencyLimit: env.MAX_CONCURRENT_FETCHES,
      timeoutMs: env.RSS_TIMEOUT_MS,
      userAgent: env.RSS_USER_AGENT,
      perSourceItemCap: env.RSS_MAX_ITEMS_PER_SOURCE,
    },
    cache: {
      // Disabling the cache means every entry expires as soon as it is written
      ttlMs: env.ENABLE_CACHE ? env.CACHE_TTL_SECONDS * 1000 : 0,
      backend: env.CACHE_BACKEND,
    },
    ranking: {
      aggregateLimit: env.MAX_NEWS_ITEMS,
      summaryMaxLength: env.SUMMARY_MAX_LENGTH,
    },
    delivery: {
      digestSize: env.DIGEST_SIZE,
      digestSummaryLength: env.DIGEST_SUMMARY_LENGTH,
      activityWindowDays: env.ACTIVITY_WINDOW_DAYS,
      timeoutMs: env.DELIVERY_TIMEOUT_MS,
      concurrency: env.DELIVERY_CONCURRENCY,
      minIntervalMs: env.DELIVERY_MIN_INTERVAL_MS,
      telegramBotToken: env.TELEGRAM_BOT_TOKEN,
    },
    supabase:
      env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY
        ? { url: env.SUPABASE_URL, serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
  };
}
