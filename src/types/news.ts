/**
 * Feedcast — News Types
 *
 * Sources, raw feed entries and the canonical NewsItem every stage works on.
 */

import type { SourceFetchError } from '../lib/errors';

// ============================================================
// SOURCES
// ============================================================

/**
 * One fetchable feed endpoint. Identity is endpointUrl.
 */
export interface SourceDescriptor {
  readonly name: string;
  readonly endpointUrl: string;
  readonly country: string;
  readonly category: string;
}

// ============================================================
// FEED ENTRIES
// ============================================================

/**
 * A feed entry as extracted by a FeedReader, before normalization.
 */
export interface RawEntry {
  title?: string;
  link?: string;
  summary?: string;
  content?: string;
  published?: string;
}

export type FetchOutcome =
  | {
      source: SourceDescriptor;
      ok: true;
      entries: RawEntry[];
      durationMs: number;
    }
  | {
      source: SourceDescriptor;
      ok: false;
      error: SourceFetchError;
      durationMs: number;
    };

// ============================================================
// NEWS ITEMS
// ============================================================

/**
 * Canonical article record. Two items with the same canonicalLink
 * are the same article, whichever fetch produced them.
 */
export interface NewsItem {
  canonicalLink: string;
  title: string;
  summary: string;
  /** null when the feed date could not be parsed; sorts after every dated item */
  publishedAt: Date | null;
  sourceName: string;
  country: string;
  category: string;
  /** Epoch ms of normalization; the newest copy wins deduplication */
  normalizedAt: number;
}

/**
 * NewsItem as it crosses a JSON boundary (API responses, persistent cache).
 */
export interface SerializedNewsItem extends Omit<NewsItem, 'publishedAt'> {
  publishedAt: string | null;
}
