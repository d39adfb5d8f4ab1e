/**
 * Tests for the Broadcast Dispatcher
 */

import { describe, it, expect, vi } from 'vitest';
import { BroadcastDispatcher, type BroadcastOptions } from '../../src/delivery/broadcast';
import { MemorySubscriberStore, type SubscriberStore } from '../../src/db/subscribers';
import type { MessageTransport } from '../../src/delivery/telegram';
import type { NewsItem } from '../../src/types';
import { DeliveryError } from '../../src/lib/errors';
import { makeItem } from '../fixtures';

const NOW = new Date('2025-06-10T09:00:00Z');
const recently = new Date('2025-06-09T09:00:00Z');

const options: BroadcastOptions = {
  aggregateLimit: 10,
  activityWindowDays: 30,
  deliveryTimeoutMs: 50,
  digestSize: 5,
  digestSummaryLength: 80,
  concurrency: 5,
  minIntervalMs: 0,
};

function newsOf(items: NewsItem[]) {
  return { latest: vi.fn(async (_limit: number) => items) };
}

function storeWith(ids: string[]): MemorySubscriberStore {
  return new MemorySubscriberStore(
    ids.map(id => ({ id, notificationsEnabled: true, lastActivityAt: recently })),
    () => NOW
  );
}

class RecordingTransport implements MessageTransport {
  readonly name = 'recording';
  readonly attempts: string[] = [];
  readonly messages = new Map<string, string>();

  constructor(private readonly failFor: Set<string> = new Set()) {}

  async send(subscriberId: string, message: string): Promise<void> {
    this.attempts.push(subscriberId);
    if (this.failFor.has(subscriberId)) {
      throw new DeliveryError(subscriberId, 'Forbidden: bot was blocked by the user', 403);
    }
    this.messages.set(subscriberId, message);
  }
}

describe('BroadcastDispatcher', () => {
  it('should keep delivering after one subscriber fails', async () => {
    const store = storeWith(['A', 'B', 'C']);
    const transport = new RecordingTransport(new Set(['A']));
    const dispatcher = new BroadcastDispatcher(newsOf([makeItem()]), store, transport, options);

    const records = await dispatcher.broadcast();

    expect(transport.attempts.sort()).toEqual(['A', 'B', 'C']);
    expect(records.map(r => [r.subscriberId, r.outcome])).toEqual([
      ['A', 'failure'],
      ['B', 'success'],
      ['C', 'success'],
    ]);
    expect(records[0]?.error).toBe('Forbidden: bot was blocked by the user');
  });

  it('should count successful deliveries only', async () => {
    const store = storeWith(['A', 'B']);
    const transport = new RecordingTransport(new Set(['B']));
    const dispatcher = new BroadcastDispatcher(newsOf([makeItem()]), store, transport, options);

    await dispatcher.broadcast();

    expect(store.deliveryCount('A')).toBe(1);
    expect(store.deliveryCount('B')).toBe(0);
  });

  it('should collect news once for all subscribers', async () => {
    const news = newsOf([makeItem()]);
    const dispatcher = new BroadcastDispatcher(news, storeWith(['A', 'B', 'C']), new RecordingTransport(), options);

    await dispatcher.broadcast();

    expect(news.latest).toHaveBeenCalledTimes(1);
    expect(news.latest).toHaveBeenCalledWith(10);
  });

  it('should render a personalized digest per subscriber', async () => {
    const store = new MemorySubscriberStore(
      [
        {
          id: 'A',
          notificationsEnabled: true,
          lastActivityAt: recently,
          preferences: { firstName: 'Ana', categories: ['World'] },
        },
      ],
      () => NOW
    );
    const transport = new RecordingTransport();
    const items = [
      makeItem({ canonicalLink: 'https://news.test/t', title: 'Tech story', category: 'Technology' }),
      makeItem({ canonicalLink: 'https://news.test/w', title: 'World story', category: 'World' }),
    ];

    await new BroadcastDispatcher(newsOf(items), store, transport, options).broadcast();

    const message = transport.messages.get('A') ?? '';
    expect(message.startsWith('Good morning, Ana!')).toBe(true);
    expect(message).toContain('*1. World story*');
    expect(message).not.toContain('Tech story');
  });

  it('should time out an unresponsive delivery and continue', async () => {
    const transport: MessageTransport = {
      name: 'stalling',
      send: (subscriberId: string) =>
        subscriberId === 'A' ? new Promise<void>(() => undefined) : Promise.resolve(),
    };
    const store = storeWith(['A', 'B']);

    const records = await new BroadcastDispatcher(newsOf([makeItem()]), store, transport, options).broadcast();

    expect(records.map(r => r.outcome)).toEqual(['failure', 'success']);
    expect(records[0]?.error).toBe('Delivery timed out after 50ms');
    expect(store.deliveryCount('A')).toBe(0);
  });

  it('should bound the number of sends in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const transport: MessageTransport = {
      name: 'slow',
      send: async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise(resolve => setTimeout(resolve, 5));
        inFlight--;
      },
    };
    const store = storeWith(['A', 'B', 'C', 'D', 'E', 'F']);

    const records = await new BroadcastDispatcher(newsOf([makeItem()]), store, transport, {
      ...options,
      concurrency: 2,
    }).broadcast();

    expect(records.map(r => r.outcome)).toEqual(Array(6).fill('success'));
    expect(maxInFlight).toBeLessThanOrEqual(2);
  });

  it('should record every subscriber as skipped when there is no news', async () => {
    const transport = new RecordingTransport();
    const store = storeWith(['A', 'B']);

    const records = await new BroadcastDispatcher(newsOf([]), store, transport, options).broadcast();

    expect(records.map(r => [r.subscriberId, r.outcome])).toEqual([
      ['A', 'skipped'],
      ['B', 'skipped'],
    ]);
    expect(transport.attempts).toEqual([]);
    expect(store.deliveryCount('A')).toBe(0);
  });

  it('should treat a news failure as no news', async () => {
    const news = { latest: vi.fn(async () => Promise.reject(new Error('all sources down'))) };
    const transport = new RecordingTransport();

    const records = await new BroadcastDispatcher(news, storeWith(['A']), transport, options).broadcast();

    expect(records.map(r => r.outcome)).toEqual(['skipped']);
    expect(transport.attempts).toEqual([]);
  });

  it('should end the cycle when subscribers cannot be loaded', async () => {
    const store: SubscriberStore = {
      listEligible: vi.fn(async () => Promise.reject(new Error('database unavailable'))),
      incrementDeliveryCount: vi.fn(async () => undefined),
    };
    const transport = new RecordingTransport();

    const records = await new BroadcastDispatcher(newsOf([makeItem()]), store, transport, options).broadcast();

    expect(records).toEqual([]);
    expect(transport.attempts).toEqual([]);
  });

  it('should keep a success when the counter update fails', async () => {
    const store: SubscriberStore = {
      listEligible: vi.fn(async () => [{ id: 'A', preferences: { categories: [] } }]),
      incrementDeliveryCount: vi.fn(async () => Promise.reject(new Error('rpc failed'))),
    };

    const records = await new BroadcastDispatcher(
      newsOf([makeItem()]),
      store,
      new RecordingTransport(),
      options
    ).broadcast();

    expect(records.map(r => r.outcome)).toEqual(['success']);
    expect(store.incrementDeliveryCount).toHaveBeenCalledWith('A');
  });

  it('should skip subscribers outside the activity window', async () => {
    const store = new MemorySubscriberStore(
      [
        { id: 'active', notificationsEnabled: true, lastActivityAt: recently },
        { id: 'muted', notificationsEnabled: false, lastActivityAt: recently },
        { id: 'stale', notificationsEnabled: true, lastActivityAt: new Date('2025-04-01T00:00:00Z') },
      ],
      () => NOW
    );
    const transport = new RecordingTransport();

    const records = await new BroadcastDispatcher(newsOf([makeItem()]), store, transport, options).broadcast();

    expect(records.map(r => r.subscriberId)).toEqual(['active']);
  });
});
