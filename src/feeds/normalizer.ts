/**
 * Feedcast — Feed Normalizer
 *
 * Converts raw feed entries into canonical NewsItem records:
 * cleaned and length-capped text, parsed publication dates.
 */

import { isValid, parse, parseISO } from 'date-fns';
import type { FetchOutcome, NewsItem, RawEntry, SourceDescriptor } from '../types';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'normalizer' });

const DEFAULT_SUMMARY_LENGTH = 300;
const TRUNCATION_MARKER = '...';
const UNTITLED = '(untitled)';

// ============================================================
// TEXT CLEANING
// ============================================================

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body[0] === '#') {
      const code =
        body[1] === 'x' || body[1] === 'X'
          ? parseInt(body.slice(2), 16)
          : parseInt(body.slice(1), 10);
      return Number.isFinite(code) && code > 0 && code <= 0x10ffff
        ? String.fromCodePoint(code)
        : match;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

/**
 * Strip markup, collapse whitespace, and cap the length.
 * Text longer than maxLength is cut and ends with "...".
 */
export function cleanText(text: string | undefined, maxLength: number = DEFAULT_SUMMARY_LENGTH): string {
  if (!text) return '';

  const stripped = decodeEntities(text.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();

  if (stripped.length <= maxLength) {
    return stripped;
  }

  // No room for the marker
  if (maxLength < TRUNCATION_MARKER.length) {
    return stripped.slice(0, Math.max(0, maxLength)).trimEnd();
  }

  const cut = maxLength - TRUNCATION_MARKER.length;
  return stripped.slice(0, cut).trimEnd() + TRUNCATION_MARKER;
}

// ============================================================
// DATES
// ============================================================

// RFC 822 zone names, rewritten to numeric offsets before parsing
const ZONE_OFFSETS: Record<string, string> = {
  GMT: '+0000',
  UTC: '+0000',
  UT: '+0000',
  Z: '+0000',
  EST: '-0500',
  EDT: '-0400',
  CST: '-0600',
  CDT: '-0500',
  MST: '-0700',
  MDT: '-0600',
  PST: '-0800',
  PDT: '-0700',
};

const RFC_822_FORMATS = [
  'd MMM yyyy HH:mm:ss xx',
  'd MMM yyyy HH:mm xx',
  'd MMM yyyy HH:mm:ss xxx',
  'd MMM yyyy HH:mm xxx',
];

/**
 * Parse "[EEE, ]d MMM yyyy HH:mm[:ss] zone". The weekday is dropped
 * rather than checked against the date.
 */
function parseRfc822(value: string): Date | null {
  const body = value
    .replace(/\s+/g, ' ')
    .replace(/^[a-z]{3},\s*/i, '')
    .replace(/ ([a-z]{1,3})$/i, (match, zone: string) => {
      const offset = ZONE_OFFSETS[zone.toUpperCase()];
      return offset ? ` ${offset}` : match;
    });

  for (const format of RFC_822_FORMATS) {
    const date = parse(body, format, new Date(0));
    if (isValid(date)) return date;
  }
  return null;
}

/**
 * Parse a feed date (ISO 8601 or RFC 822/2822).
 * Returns null when the value cannot be parsed; null sorts after every dated item.
 */
export function parsePublishedDate(raw: string | undefined): Date | null {
  const value = raw?.trim();
  if (!value) return null;

  const iso = parseISO(value);
  if (isValid(iso)) return iso;

  return parseRfc822(value);
}

// ============================================================
// MAIN NORMALIZER
// ============================================================

export interface NormalizeOptions {
  maxSummaryLength?: number;
  /** Epoch ms stamped as normalizedAt */
  now?: number;
}

/**
 * Normalize one entry. The link is kept verbatim as the item's identity;
 * entries without one are skipped.
 */
export function normalize(
  entry: RawEntry,
  source: SourceDescriptor,
  options: NormalizeOptions = {}
): NewsItem | null {
  const link = entry.link;
  if (!link?.trim()) {
    log.debug('Skipping entry without link', { source: source.name, title: entry.title });
    return null;
  }

  const maxLength = options.maxSummaryLength ?? DEFAULT_SUMMARY_LENGTH;

  return {
    canonicalLink: link,
    title: cleanText(entry.title, Number.MAX_SAFE_INTEGER) || UNTITLED,
    summary: cleanText(entry.summary || entry.content, maxLength),
    publishedAt: parsePublishedDate(entry.published),
    sourceName: source.name,
    country: source.country,
    category: source.category,
    normalizedAt: options.now ?? Date.now(),
  };
}

/**
 * Normalize the entries of every successful fetch outcome.
 */
export function normalizeAll(outcomes: FetchOutcome[], options: NormalizeOptions = {}): NewsItem[] {
  const now = options.now ?? Date.now();
  const items: NewsItem[] = [];

  for (const outcome of outcomes) {
    if (!outcome.ok) continue;

    for (const entry of outcome.entries) {
      const item = normalize(entry, outcome.source, { ...options, now });
      if (item) {
        items.push(item);
      }
    }
  }

  return items;
}
