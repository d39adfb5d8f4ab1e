/**
 * Feedcast — NewsItem serialization
 *
 * Dates travel as ISO strings (or null for unknown) across JSON boundaries.
 */

import { z } from 'zod';
import type { NewsItem, SerializedNewsItem } from '../types';

const SerializedNewsItemSchema = z.object({
  canonicalLink: z.string().min(1),
  title: z.string(),
  summary: z.string(),
  publishedAt: z.string().datetime({ offset: true }).nullable(),
  sourceName: z.string(),
  country: z.string(),
  category: z.string(),
  normalizedAt: z.number(),
});

export function serializeNewsItem(item: NewsItem): SerializedNewsItem {
  return {
    ...item,
    publishedAt: item.publishedAt ? item.publishedAt.toISOString() : null,
  };
}

/**
 * Parse a stored item; returns null when the value is not a valid item.
 */
export function deserializeNewsItem(value: unknown): NewsItem | null {
  const parsed = SerializedNewsItemSchema.safeParse(value);
  if (!parsed.success) return null;

  return {
    ...parsed.data,
    publishedAt: parsed.data.publishedAt ? new Date(parsed.data.publishedAt) : null,
  };
}
