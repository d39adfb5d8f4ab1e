/**
 * Feedcast — News Service
 *
 * Runs the pipeline registry → fetch → normalize → cache → rank
 * and exposes the on-demand queries.
 *
 * A source fetched within the cache TTL is served from the cache as long as
 * every link it returned is still cached; any miss falls back to a fresh fetch.
 */

import type { NewsItem, SourceDescriptor } from '../types';
import type { SourceRegistry } from './registry';
import type { FeedReader } from './reader';
import type { Clock, NewsCache } from './cache';
import { fetchAll, type FetchOptions } from './orchestrator';
import { normalizeAll } from './normalizer';
import { aggregate } from './aggregator';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'news-service' });

export interface NewsServiceOptions {
  fetch: FetchOptions;
  cacheTtlMs: number;
  summaryMaxLength: number;
  clock?: Clock;
}

export interface CollectFilter {
  country?: string;
  category?: string;
}

export interface CollectStats {
  sources: number;
  fromCache: number;
  fetched: number;
  failed: number;
  items: number;
}

interface SourceManifest {
  links: string[];
  fetchedAt: number;
}

export class NewsService {
  private readonly manifests = new Map<string, SourceManifest>();
  private readonly clock: Clock;
  private lastStats: CollectStats | null = null;

  constructor(
    readonly registry: SourceRegistry,
    private readonly cache: NewsCache,
    private readonly reader: FeedReader,
    private readonly options: NewsServiceOptions
  ) {
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Items from every matching source, cached where possible.
   * Unordered and may contain duplicates; rank with aggregate().
   */
  async collect(filter: CollectFilter = {}): Promise<NewsItem[]> {
    const sources = this.registry.sourcesFor(filter.country, filter.category);
    const items: NewsItem[] = [];
    const toFetch: SourceDescriptor[] = [];

    for (const source of sources) {
      const cached = await this.fromCache(source);
      if (cached) {
        items.push(...cached);
      } else {
        toFetch.push(source);
      }
    }

    const fromCache = sources.length - toFetch.length;
    const outcomes = await fetchAll(toFetch, this.options.fetch, this.reader);
    const now = this.clock();
    let failed = 0;

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        failed++;
        continue;
      }

      const normalized = normalizeAll([outcome], {
        maxSummaryLength: this.options.summaryMaxLength,
        now,
      });

      for (const item of normalized) {
        await this.cache.put(item, this.options.cacheTtlMs);
      }

      this.manifests.set(outcome.source.endpointUrl, {
        links: normalized.map(i => i.canonicalLink),
        fetchedAt: now,
      });
      items.push(...normalized);
    }

    this.lastStats = {
      sources: sources.length,
      fromCache,
      fetched: toFetch.length - failed,
      failed,
      items: items.length,
    };
    log.info('Collected news items', { ...this.lastStats, ...filter });

    return items;
  }

  /**
   * Newest items across all sources.
   */
  async latest(limit: number): Promise<NewsItem[]> {
    const items = await this.collect();
    return aggregate(items, { limit, perSourceCap: this.options.fetch.perSourceCap });
  }

  /**
   * Newest items of one category.
   */
  async byCategory(category: string, limit: number): Promise<NewsItem[]> {
    const items = await this.collect({ category });
    return aggregate(items, {
      category,
      limit,
      perSourceCap: this.options.fetch.perSourceCap,
    });
  }

  async purgeCache(): Promise<number> {
    const removed = await this.cache.purgeExpired();
    log.info('Cache maintenance completed', { removed });
    return removed;
  }

  get stats(): CollectStats | null {
    return this.lastStats;
  }

  private async fromCache(source: SourceDescriptor): Promise<NewsItem[] | undefined> {
    const manifest = this.manifests.get(source.endpointUrl);
    if (!manifest) return undefined;

    if (manifest.fetchedAt + this.options.cacheTtlMs <= this.clock()) {
      this.manifests.delete(source.endpointUrl);
      return undefined;
    }

    const items: NewsItem[] = [];
    for (const link of manifest.links) {
      const item = await this.cache.get(link);
      if (!item) {
        log.debug('Cache miss, refetching source', { source: source.name, link });
        return undefined;
      }
      items.push(item);
    }

    return items;
  }
}
