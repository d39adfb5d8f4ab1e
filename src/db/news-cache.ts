/**
 * Feedcast — Persistent News Cache
 *
 * Same contract as the in-process cache, backed by the news_cache table.
 * Storage errors degrade to a cache miss or a no-op; they are logged, not thrown.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { NewsItem } from '../types';
import type { Clock, NewsCache } from '../feeds/cache';
import { deserializeNewsItem, serializeNewsItem } from '../feeds/serialize';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'news-cache' });

const TABLE = 'news_cache';

export class SupabaseNewsCache implements NewsCache {
  constructor(
    private readonly client: SupabaseClient,
    private readonly clock: Clock = Date.now
  ) {}

  async get(canonicalLink: string): Promise<NewsItem | undefined> {
    const { data, error } = await this.client
      .from(TABLE)
      .select('item')
      .eq('canonical_link', canonicalLink)
      .gt('expires_at', this.nowIso())
      .limit(1);

    if (error) {
      log.warn('Cache lookup failed, treating as miss', { canonicalLink, error: error.message });
      return undefined;
    }

    const row: unknown = data?.[0];
    if (!row || typeof row !== 'object' || !('item' in row)) return undefined;

    const item = deserializeNewsItem(row.item);
    if (!item) {
      log.warn('Discarding malformed cache entry', { canonicalLink });
      return undefined;
    }
    return item;
  }

  async put(item: NewsItem, ttlMs: number): Promise<void> {
    const cachedAt = this.clock();
    const { error } = await this.client.from(TABLE).upsert(
      {
        canonical_link: item.canonicalLink,
        item: serializeNewsItem(item),
        cached_at: new Date(cachedAt).toISOString(),
        expires_at: new Date(cachedAt + Math.max(0, ttlMs)).toISOString(),
      },
      { onConflict: 'canonical_link' }
    );

    if (error) {
      log.warn('Cache write failed', { canonicalLink: item.canonicalLink, error: error.message });
    }
  }

  async purgeExpired(): Promise<number> {
    const { error, count } = await this.client
      .from(TABLE)
      .delete({ count: 'exact' })
      .lte('expires_at', this.nowIso());

    if (error) {
      log.warn('Cache purge failed', { error: error.message });
      return 0;
    }
    return count ?? 0;
  }

  async size(): Promise<number> {
    const { error, count } = await this.client
      .from(TABLE)
      .select('canonical_link', { count: 'exact', head: true });

    if (error) {
      log.warn('Cache size query failed', { error: error.message });
      return 0;
    }
    return count ?? 0;
  }

  private nowIso(): string {
    return new Date(this.clock()).toISOString();
  }
}
