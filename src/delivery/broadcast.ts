/**
 * Feedcast — Broadcast Dispatcher
 *
 * One shared aggregated set and one subscriber snapshot per cycle, then an
 * independent delivery task per subscriber, paced through a limiter to stay
 * under the Bot API rate limit. A failed delivery is recorded and the rest
 * of the batch continues.
 */

import Bottleneck from 'bottleneck';
import { nanoid } from 'nanoid';
import type { DeliveryRecord, EligibleSubscriber, NewsItem } from '../types';
import type { NewsService } from '../feeds/service';
import type { SubscriberStore } from '../db/subscribers';
import type { MessageTransport } from './telegram';
import { renderDigest } from './digest';
import { DeliveryError } from '../lib/errors';
import { withTimeout } from '../lib/timeout';
import { logger, errorMessage, type Logger } from '../lib/logger';

const log = logger.child({ component: 'broadcast' });

export interface BroadcastOptions {
  aggregateLimit: number;
  activityWindowDays: number;
  deliveryTimeoutMs: number;
  digestSize: number;
  digestSummaryLength: number;
  /** Sends in flight at once */
  concurrency: number;
  /** Minimum gap between the start of two sends */
  minIntervalMs: number;
}

export class BroadcastDispatcher {
  constructor(
    private readonly news: Pick<NewsService, 'latest'>,
    private readonly store: SubscriberStore,
    private readonly transport: MessageTransport,
    private readonly options: BroadcastOptions
  ) {}

  /**
   * Run one broadcast cycle. Never rejects.
   * Records are returned in snapshot order.
   */
  async broadcast(): Promise<DeliveryRecord[]> {
    const runId = nanoid(10);
    const runLog = log.child({ runId });
    const startTime = Date.now();

    const items = await this.sharedItems(runLog);

    let subscribers: EligibleSubscriber[];
    try {
      subscribers = await this.store.listEligible(this.options.activityWindowDays);
    } catch (error) {
      runLog.error('Failed to load eligible subscribers', { error: errorMessage(error) });
      return [];
    }

    // An empty digest is never sent; every subscriber is recorded as skipped
    if (items.length === 0) {
      runLog.warn('No news to broadcast, skipping cycle', { subscribers: subscribers.length });
      const timestamp = new Date();
      return subscribers.map((subscriber): DeliveryRecord => ({
        subscriberId: subscriber.id,
        timestamp,
        outcome: 'skipped',
      }));
    }

    runLog.info('Broadcast started', {
      subscribers: subscribers.length,
      items: items.length,
      transport: this.transport.name,
    });

    const limiter = new Bottleneck({
      maxConcurrent: this.options.concurrency,
      minTime: this.options.minIntervalMs,
    });

    const settled = await Promise.allSettled(
      subscribers.map(subscriber => limiter.schedule(() => this.deliver(subscriber, items, runLog)))
    );

    const records = settled.map((result, i): DeliveryRecord => {
      if (result.status === 'fulfilled') return result.value;
      // deliver() catches its own errors; kept so a record exists for every subscriber
      return {
        subscriberId: subscribers[i]?.id ?? 'unknown',
        timestamp: new Date(),
        outcome: 'failure',
        error: errorMessage(result.reason),
      };
    });

    const sent = records.filter(r => r.outcome === 'success').length;
    runLog.info('Broadcast completed', {
      sent,
      failed: records.filter(r => r.outcome === 'failure').length,
      durationMs: Date.now() - startTime,
    });

    return records;
  }

  private async sharedItems(runLog: Logger): Promise<NewsItem[]> {
    try {
      return await this.news.latest(this.options.aggregateLimit);
    } catch (error) {
      runLog.error('Failed to collect news for broadcast', { error: errorMessage(error) });
      return [];
    }
  }

  private async deliver(
    subscriber: EligibleSubscriber,
    items: readonly NewsItem[],
    runLog: Logger
  ): Promise<DeliveryRecord> {
    const { text } = renderDigest(items, subscriber, {
      digestSize: this.options.digestSize,
      summaryLength: this.options.digestSummaryLength,
    });

    try {
      await withTimeout(
        signal => this.transport.send(subscriber.id, text, signal),
        this.options.deliveryTimeoutMs,
        () => new DeliveryError(subscriber.id, `Delivery timed out after ${this.options.deliveryTimeoutMs}ms`)
      );
    } catch (error) {
      runLog.warn('Delivery failed', {
        subscriberId: subscriber.id,
        error: errorMessage(error),
      });
      return {
        subscriberId: subscriber.id,
        timestamp: new Date(),
        outcome: 'failure',
        error: errorMessage(error),
      };
    }

    try {
      await this.store.incrementDeliveryCount(subscriber.id);
    } catch (error) {
      // Message already went out; the outcome stays a success
      runLog.error('Failed to increment delivery count', {
        subscriberId: subscriber.id,
        error: errorMessage(error),
      });
    }

    return { subscriberId: subscriber.id, timestamp: new Date(), outcome: 'success' };
  }
}
