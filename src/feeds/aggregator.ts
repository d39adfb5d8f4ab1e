/**
 * Feedcast — Aggregator / Ranker
 *
 * Merges items across sources into a bounded, deterministic result set:
 * 1. Filter by category (exact match)
 * 2. Deduplicate by canonical link, newest normalization wins
 * 3. Sort newest first; undated last; ties by source name, then link
 * 4. Select in order, skipping sources whose quota is used, up to the limit
 */

import type { NewsItem } from '../types';

export interface AggregateOptions {
  category?: string;
  limit: number;
  /** Max items any one source may contribute to the result */
  perSourceCap: number;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over items: publishedAt descending with unknown dates last,
 * then sourceName ascending, then canonicalLink ascending.
 */
export function compareNewsItems(a: NewsItem, b: NewsItem): number {
  const aTime = a.publishedAt?.getTime() ?? null;
  const bTime = b.publishedAt?.getTime() ?? null;

  if (aTime !== bTime) {
    if (aTime === null) return 1;
    if (bTime === null) return -1;
    return bTime - aTime;
  }

  return (
    compareStrings(a.sourceName, b.sourceName) ||
    compareStrings(a.canonicalLink, b.canonicalLink)
  );
}

/**
 * Keep one item per canonical link: the most recently normalized copy,
 * or the later one in the input when both were normalized at the same time.
 */
export function dedupeByLink(items: readonly NewsItem[]): NewsItem[] {
  const byLink = new Map<string, NewsItem>();

  for (const item of items) {
    const existing = byLink.get(item.canonicalLink);
    if (!existing || item.normalizedAt >= existing.normalizedAt) {
      byLink.set(item.canonicalLink, item);
    }
  }

  return [...byLink.values()];
}

export function aggregate(items: readonly NewsItem[], options: AggregateOptions): NewsItem[] {
  const { category, limit, perSourceCap } = options;
  if (limit <= 0 || perSourceCap <= 0) return [];

  const filtered = category === undefined ? items : items.filter(i => i.category === category);
  const sorted = dedupeByLink(filtered).sort(compareNewsItems);

  const selected: NewsItem[] = [];
  const perSource = new Map<string, number>();

  for (const item of sorted) {
    if (selected.length >= limit) break;

    const used = perSource.get(item.sourceName) ?? 0;
    if (used >= perSourceCap) continue;

    perSource.set(item.sourceName, used + 1);
    selected.push(item);
  }

  return selected;
}
