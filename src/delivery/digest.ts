/**
 * Feedcast — Digest Rendering
 *
 * Renders the shared aggregated set into one subscriber's daily message
 * (Telegram Markdown).
 */

import { format } from 'date-fns';
import type { EligibleSubscriber, NewsItem } from '../types';

/** Telegram's hard limit for a single message */
export const MAX_MESSAGE_LENGTH = 4096;

export interface DigestOptions {
  /** Max items per digest */
  digestSize: number;
  /** Per-item summary length inside the digest */
  summaryLength: number;
  maxLength?: number;
}

export interface RenderedDigest {
  text: string;
  itemCount: number;
}

/**
 * Escape characters that legacy Telegram Markdown treats as markup.
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function shorten(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length).trimEnd()}...` : text;
}

function formatPublished(date: Date | null): string {
  return date ? format(date, 'd MMM yyyy, HH:mm') : 'date unknown';
}

/**
 * Items for this subscriber: those in preferred categories when any match,
 * otherwise the whole shared set.
 */
export function selectForSubscriber(
  items: readonly NewsItem[],
  subscriber: EligibleSubscriber,
  digestSize: number
): NewsItem[] {
  const preferred = subscriber.preferences.categories;

  if (preferred.length > 0) {
    const matching = items.filter(i => preferred.includes(i.category));
    if (matching.length > 0) {
      return matching.slice(0, digestSize);
    }
  }

  return items.slice(0, digestSize);
}

function renderItem(item: NewsItem, index: number, summaryLength: number): string {
  const lines = [
    `*${index}. ${escapeMarkdown(item.title)}*`,
    `${escapeMarkdown(item.sourceName)} · ${formatPublished(item.publishedAt)}`,
  ];

  if (item.summary) {
    lines.push(escapeMarkdown(shorten(item.summary, summaryLength)));
  }

  lines.push(`[Read more](${item.canonicalLink})`);
  return lines.join('\n');
}

export function renderDigest(
  items: readonly NewsItem[],
  subscriber: EligibleSubscriber,
  options: DigestOptions
): RenderedDigest {
  const maxLength = options.maxLength ?? MAX_MESSAGE_LENGTH;
  const firstName = subscriber.preferences.firstName;

  const header = [
    firstName ? `Good morning, ${escapeMarkdown(firstName)}!` : 'Good morning!',
    '*Your daily news digest*',
  ].join('\n');

  let text = header;
  let itemCount = 0;

  for (const item of selectForSubscriber(items, subscriber, options.digestSize)) {
    const block = `\n\n${renderItem(item, itemCount + 1, options.summaryLength)}`;
    // Drop trailing items rather than cut a message mid-item
    if (text.length + block.length > maxLength) break;

    text += block;
    itemCount++;
  }

  return { text, itemCount };
}
