/**
 * Feedcast — Feed Reader
 *
 * Fetches one RSS/Atom document and extracts its entries.
 * Failures are reported as SourceFetchError so the orchestrator
 * can skip the source for the cycle.
 */

import Parser from 'rss-parser';
import type { RawEntry, SourceDescriptor } from '../types';
import { SourceFetchError } from '../lib/errors';
import { errorMessage } from '../lib/logger';

export interface FeedReader {
  /**
   * Implementations must stop work when `signal` aborts. The orchestrator frees
   * the concurrency slot at the deadline, so a read that keeps going runs
   * outside the limit.
   */
  read(source: SourceDescriptor, signal: AbortSignal): Promise<RawEntry[]>;
}

export interface RssFeedReaderOptions {
  userAgent?: string;
}

const DEFAULT_USER_AGENT = 'Feedcast/1.0 (News Digest)';

export class RssFeedReader implements FeedReader {
  private readonly parser = new Parser();
  private readonly userAgent: string;

  constructor(options: RssFeedReaderOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async read(source: SourceDescriptor, signal: AbortSignal): Promise<RawEntry[]> {
    const body = await this.download(source, signal);

    const feed = await this.parser.parseString(body).catch((error: unknown) => {
      throw new SourceFetchError(
        'malformed',
        source.endpointUrl,
        `Malformed feed document: ${errorMessage(error)}`
      );
    });

    return feed.items.map(item => ({
      title: item.title,
      link: item.link,
      summary: item.summary ?? item.contentSnippet,
      content: item.content,
      published: item.isoDate ?? item.pubDate,
    }));
  }

  private async download(source: SourceDescriptor, signal: AbortSignal): Promise<string> {
    let res: Response;
    try {
      res = await fetch(source.endpointUrl, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8',
        },
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new SourceFetchError('timeout', source.endpointUrl, 'Request aborted');
      }
      throw new SourceFetchError(
        'network',
        source.endpointUrl,
        `Network error: ${errorMessage(error)}`
      );
    }

    if (!res.ok) {
      throw new SourceFetchError('http', source.endpointUrl, `HTTP ${res.status}`);
    }

    return res.text();
  }
}
