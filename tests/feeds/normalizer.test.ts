/**
 * Tests for the Feed Normalizer
 */

import { describe, it, expect } from 'vitest';
import { cleanText, parsePublishedDate, normalize, normalizeAll } from '../../src/feeds/normalizer';
import { SourceFetchError } from '../../src/lib/errors';
import { makeSource } from '../fixtures';

describe('cleanText', () => {
  it('should strip tags and collapse whitespace', () => {
    expect(cleanText('<p>Hello   <b>world</b></p>\n\n<br/>again')).toBe('Hello world again');
  });

  it('should decode common entities', () => {
    expect(cleanText('Fish &amp; chips &lt;3 &quot;quoted&quot; it&#39;s&nbsp;here')).toBe(
      'Fish & chips <3 "quoted" it\'s here'
    );
  });

  it('should decode hex entities', () => {
    expect(cleanText('caf&#xe9;')).toBe('café');
  });

  it('should leave unknown entities untouched', () => {
    expect(cleanText('a &bogus; b')).toBe('a &bogus; b');
  });

  it('should truncate long text with a marker', () => {
    expect(cleanText('abcdefghij', 8)).toBe('abcde...');
  });

  it('should trim trailing space before the marker', () => {
    expect(cleanText('abcd efghij', 8)).toBe('abcd...');
  });

  it('should keep text at exactly the limit', () => {
    expect(cleanText('abcdefgh', 8)).toBe('abcdefgh');
  });

  it('should not exceed a limit shorter than the marker', () => {
    expect(cleanText('abcdef', 2)).toBe('ab');
    expect(cleanText('abcdef', 0)).toBe('');
  });

  it('should return an empty string for missing text', () => {
    expect(cleanText(undefined)).toBe('');
    expect(cleanText('   ')).toBe('');
  });
});

describe('parsePublishedDate', () => {
  it('should parse ISO 8601', () => {
    expect(parsePublishedDate('2025-06-10T08:00:00Z')?.toISOString()).toBe('2025-06-10T08:00:00.000Z');
  });

  it('should parse RFC 822 dates', () => {
    expect(parsePublishedDate('Tue, 10 Jun 2025 08:00:00 GMT')?.toISOString()).toBe(
      '2025-06-10T08:00:00.000Z'
    );
  });

  it('should parse RFC 822 dates with a numeric offset', () => {
    expect(parsePublishedDate('Tue, 10 Jun 2025 10:00:00 +0200')?.toISOString()).toBe(
      '2025-06-10T08:00:00.000Z'
    );
  });

  it('should parse RFC 822 dates with a zone name', () => {
    expect(parsePublishedDate('Tue, 10 Jun 2025 04:00:00 EDT')?.toISOString()).toBe(
      '2025-06-10T08:00:00.000Z'
    );
    expect(parsePublishedDate('Tue, 10 Jun 2025 08:00:00 UT')?.toISOString()).toBe(
      '2025-06-10T08:00:00.000Z'
    );
  });

  it('should parse RFC 822 dates without a weekday or seconds', () => {
    expect(parsePublishedDate('10 Jun 2025 08:00:00 +0000')?.toISOString()).toBe(
      '2025-06-10T08:00:00.000Z'
    );
    expect(parsePublishedDate('Tue, 1 Jul 2025 08:30 GMT')?.toISOString()).toBe(
      '2025-07-01T08:30:00.000Z'
    );
  });

  it('should return null for text that only contains a year', () => {
    expect(parsePublishedDate('Updated 2024')).toBeNull();
    expect(parsePublishedDate('Issue 1234')).toBeNull();
    expect(parsePublishedDate('10 Jun 2025 08:00:00 CEST')).toBeNull();
  });

  it('should return null for unparseable values', () => {
    expect(parsePublishedDate('yesterday')).toBeNull();
    expect(parsePublishedDate('')).toBeNull();
    expect(parsePublishedDate(undefined)).toBeNull();
  });
});

describe('normalize', () => {
  const source = makeSource({ name: 'Alpha', country: 'UK', category: 'World' });

  it('should build a NewsItem from a raw entry', () => {
    const item = normalize(
      {
        title: '<b>Big</b> news',
        link: 'https://news.test/big?ref=rss',
        summary: '<p>Something happened.</p>',
        published: '2025-06-10T08:00:00Z',
      },
      source,
      { now: 5_000 }
    );

    expect(item).toEqual({
      canonicalLink: 'https://news.test/big?ref=rss',
      title: 'Big news',
      summary: 'Something happened.',
      publishedAt: new Date('2025-06-10T08:00:00Z'),
      sourceName: 'Alpha',
      country: 'UK',
      category: 'World',
      normalizedAt: 5_000,
    });
  });

  it('should skip entries without a link', () => {
    expect(normalize({ title: 'No link' }, source)).toBeNull();
    expect(normalize({ title: 'Blank link', link: '  ' }, source)).toBeNull();
  });

  it('should fall back to content when there is no summary', () => {
    const item = normalize({ link: 'https://news.test/c', content: '<div>From content</div>' }, source);
    expect(item?.summary).toBe('From content');
  });

  it('should use a placeholder title', () => {
    const item = normalize({ link: 'https://news.test/d', title: '<br/>' }, source);
    expect(item?.title).toBe('(untitled)');
  });

  it('should mark unparseable dates as unknown', () => {
    const item = normalize({ link: 'https://news.test/e', published: 'sometime' }, source);
    expect(item?.publishedAt).toBeNull();
  });

  it('should cap the summary length', () => {
    const item = normalize(
      { link: 'https://news.test/f', summary: 'x'.repeat(50) },
      source,
      { maxSummaryLength: 10 }
    );
    expect(item?.summary).toBe('xxxxxxx...');
  });
});

describe('normalizeAll', () => {
  it('should flatten successful outcomes and skip failures', () => {
    const ok = makeSource({ name: 'Ok', endpointUrl: 'https://ok.test/rss' });
    const bad = makeSource({ name: 'Bad', endpointUrl: 'https://bad.test/rss' });

    const items = normalizeAll(
      [
        {
          source: ok,
          ok: true,
          entries: [{ link: 'https://news.test/1' }, { title: 'no link' }, { link: 'https://news.test/2' }],
          durationMs: 1,
        },
        {
          source: bad,
          ok: false,
          error: new SourceFetchError('timeout', bad.endpointUrl, 'Timeout after 10ms'),
          durationMs: 10,
        },
      ],
      { now: 7 }
    );

    expect(items.map(i => i.canonicalLink)).toEqual(['https://news.test/1', 'https://news.test/2']);
    expect(items.every(i => i.normalizedAt === 7 && i.sourceName === 'Ok')).toBe(true);
  });
});
