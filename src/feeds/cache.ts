/**
 * Feedcast — News Cache
 *
 * Keyed store of normalized items with per-entry expiry.
 * A lookup never returns an entry whose expiresAt has passed.
 */

import type { NewsItem } from '../types';

export interface NewsCache {
  /** Cached item, or undefined when never cached or expired */
  get(canonicalLink: string): Promise<NewsItem | undefined>;
  /** Upsert; resets cachedAt/expiresAt for the link */
  put(item: NewsItem, ttlMs: number): Promise<void>;
  /** Remove expired entries; returns how many were removed */
  purgeExpired(): Promise<number>;
  /** Number of stored entries, expired or not */
  size(): Promise<number>;
}

interface CacheEntry {
  item: NewsItem;
  cachedAt: number;
  expiresAt: number;
}

export type Clock = () => number;

/**
 * In-process cache. Each operation completes synchronously on the Map,
 * so a get never observes a half-written entry.
 */
export class MemoryNewsCache implements NewsCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly clock: Clock = Date.now) {}

  async get(canonicalLink: string): Promise<NewsItem | undefined> {
    const entry = this.entries.get(canonicalLink);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(canonicalLink);
      return undefined;
    }

    return entry.item;
  }

  async put(item: NewsItem, ttlMs: number): Promise<void> {
    const cachedAt = this.clock();
    this.entries.set(item.canonicalLink, {
      item,
      cachedAt,
      expiresAt: cachedAt + Math.max(0, ttlMs),
    });
  }

  async purgeExpired(): Promise<number> {
    const now = this.clock();
    let removed = 0;

    for (const [link, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(link);
        removed++;
      }
    }

    return removed;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }
}
