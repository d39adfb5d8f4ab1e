/**
 * Shared test builders
 */

import type { NewsItem, SourceDescriptor } from '../src/types';

export function makeSource(overrides: Partial<SourceDescriptor> = {}): SourceDescriptor {
  return {
    name: 'Test Source',
    endpointUrl: 'https://feeds.test/rss',
    country: 'UK',
    category: 'Technology',
    ...overrides,
  };
}

export function makeItem(overrides: Partial<NewsItem> = {}): NewsItem {
  return {
    canonicalLink: 'https://news.test/a',
    title: 'Test headline',
    summary: 'Test summary',
    publishedAt: new Date('2025-06-10T08:00:00Z'),
    sourceName: 'Test Source',
    country: 'UK',
    category: 'Technology',
    normalizedAt: 1_000,
    ...overrides,
  };
}

export function rssDocument(items: Array<{ title?: string; link?: string; description?: string; pubDate?: string }>): string {
  const entries = items
    .map(
      item => `
    <item>
      ${item.title !== undefined ? `<title>${item.title}</title>` : ''}
      ${item.link !== undefined ? `<link>${item.link}</link>` : ''}
      ${item.description !== undefined ? `<description>${item.description}</description>` : ''}
      ${item.pubDate !== undefined ? `<pubDate>${item.pubDate}</pubDate>` : ''}
    </item>`
    )
    .join('');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Feed</title>
    <link>https://news.test</link>
    <description>Test feed</description>${entries}
  </channel>
</rss>`;
}
