/**
 * Feedcast — Service wiring
 *
 * Builds every component once from the validated config. The Supabase
 * client, when configured, is created here and passed to each store.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './lib/config';
import { createDatabaseClient, checkDatabaseHealth } from './db/client';
import { MemorySubscriberStore, SupabaseSubscriberStore, type SubscriberStore } from './db/subscribers';
import { SupabaseNewsCache } from './db/news-cache';
import { MemoryNewsCache, type NewsCache } from './feeds/cache';
import { loadSourceRegistry, type SourceRegistry } from './feeds/registry';
import { RssFeedReader } from './feeds/reader';
import { NewsService } from './feeds/service';
import { createTransport, type MessageTransport } from './delivery/telegram';
import { BroadcastDispatcher } from './delivery/broadcast';
import { BroadcastScheduler } from './scheduler';
import type { DatabaseHealth } from './server/api';
import { logger } from './lib/logger';

export interface Services {
  config: AppConfig;
  registry: SourceRegistry;
  news: NewsService;
  subscribers: SubscriberStore;
  transport: MessageTransport;
  dispatcher: BroadcastDispatcher;
  scheduler: BroadcastScheduler;
  databaseHealth?: () => Promise<DatabaseHealth>;
}

export interface BuildOptions {
  /** Overrides the transport chosen from TELEGRAM_BOT_TOKEN */
  transport?: MessageTransport;
}

function createCache(config: AppConfig, client: SupabaseClient | undefined): NewsCache {
  if (config.cache.backend === 'supabase' && client) {
    return new SupabaseNewsCache(client);
  }
  return new MemoryNewsCache();
}

function createSubscriberStore(client: SupabaseClient | undefined): SubscriberStore {
  if (client) {
    return new SupabaseSubscriberStore(client);
  }
  logger.warn('Supabase not configured, no subscribers will receive digests');
  return new MemorySubscriberStore();
}

export function buildServices(config: AppConfig, options: BuildOptions = {}): Services {
  const client = config.supabase
    ? createDatabaseClient({
        url: config.supabase.url,
        serviceRoleKey: config.supabase.serviceRoleKey,
      })
    : undefined;

  const registry = loadSourceRegistry(config.sourcesFile);
  const news = new NewsService(
    registry,
    createCache(config, client),
    new RssFeedReader({ userAgent: config.fetch.userAgent }),
    {
      fetch: {
        perSourceCap: config.fetch.perSourceItemCap,
        concurrencyLimit: config.fetch.concurrencyLimit,
        timeoutMs: config.fetch.timeoutMs,
      },
      cacheTtlMs: config.cache.ttlMs,
      summaryMaxLength: config.ranking.summaryMaxLength,
    }
  );

  const subscribers = createSubscriberStore(client);
  const transport = options.transport ?? createTransport(config.delivery.telegramBotToken);

  const dispatcher = new BroadcastDispatcher(news, subscribers, transport, {
    aggregateLimit: config.ranking.aggregateLimit,
    activityWindowDays: config.delivery.activityWindowDays,
    deliveryTimeoutMs: config.delivery.timeoutMs,
    digestSize: config.delivery.digestSize,
    digestSummaryLength: config.delivery.digestSummaryLength,
    concurrency: config.delivery.concurrency,
    minIntervalMs: config.delivery.minIntervalMs,
  });

  const scheduler = new BroadcastScheduler(
    {
      broadcast: () => dispatcher.broadcast(),
      purgeCache: () => news.purgeCache(),
    },
    config.schedule
  );

  return {
    config,
    registry,
    news,
    subscribers,
    transport,
    dispatcher,
    scheduler,
    databaseHealth: client ? () => checkDatabaseHealth(client) : undefined,
  };
}
