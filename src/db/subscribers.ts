/**
 * Feedcast — Subscriber Store
 *
 * The broadcast reads one snapshot of eligible subscribers per cycle
 * and increments a delivery counter for each successful send.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { subDays } from 'date-fns';
import { z } from 'zod';
import type { EligibleSubscriber, Subscriber, SubscriberPreferences } from '../types';
import { handleSupabaseError } from './client';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'subscriber-store' });

export interface SubscriberStore {
  /** Subscribers with notifications on and activity within the window */
  listEligible(activityWindowDays: number): Promise<EligibleSubscriber[]>;
  incrementDeliveryCount(subscriberId: string): Promise<void>;
}

/**
 * Eligibility rule shared by every store implementation.
 */
export function isEligible(subscriber: Subscriber, activityWindowDays: number, now: Date): boolean {
  return (
    subscriber.notificationsEnabled &&
    subscriber.lastActivityAt.getTime() > subDays(now, activityWindowDays).getTime()
  );
}

// ============================================================
// SUPABASE
// ============================================================

const SubscriberRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  first_name: z.string().nullable().optional(),
  preferred_categories: z.array(z.string()).nullable().optional(),
});

export class SupabaseSubscriberStore implements SubscriberStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async listEligible(activityWindowDays: number): Promise<EligibleSubscriber[]> {
    const cutoff = subDays(this.clock(), activityWindowDays).toISOString();

    const { data, error } = await this.client
      .from('subscribers')
      .select('id, first_name, preferred_categories')
      .eq('notifications_enabled', true)
      .gt('last_activity_at', cutoff)
      .order('id', { ascending: true });

    if (error) throw handleSupabaseError(error);

    const subscribers: EligibleSubscriber[] = [];
    for (const row of data ?? []) {
      const parsed = SubscriberRowSchema.safeParse(row);
      if (!parsed.success) {
        log.warn('Skipping malformed subscriber row', {
          issues: parsed.error.issues.map(i => i.message),
        });
        continue;
      }

      subscribers.push({
        id: parsed.data.id,
        preferences: {
          firstName: parsed.data.first_name ?? undefined,
          categories: parsed.data.preferred_categories ?? [],
        },
      });
    }

    return subscribers;
  }

  async incrementDeliveryCount(subscriberId: string): Promise<void> {
    const { error } = await this.client.rpc('increment_delivery_count', {
      p_subscriber_id: subscriberId,
    });

    if (error) throw handleSupabaseError(error);
  }
}

// ============================================================
// IN-MEMORY (development without a database)
// ============================================================

export interface MemorySubscriber extends Subscriber {
  preferences?: SubscriberPreferences;
}

export class MemorySubscriberStore implements SubscriberStore {
  private readonly subscribers: MemorySubscriber[];
  private readonly counts = new Map<string, number>();

  constructor(subscribers: MemorySubscriber[] = [], private readonly clock: () => Date = () => new Date()) {
    this.subscribers = [...subscribers];
  }

  async listEligible(activityWindowDays: number): Promise<EligibleSubscriber[]> {
    const now = this.clock();
    return this.subscribers
      .filter(s => isEligible(s, activityWindowDays, now))
      .map(s => ({
        id: s.id,
        preferences: s.preferences ?? { categories: [] },
      }));
  }

  async incrementDeliveryCount(subscriberId: string): Promise<void> {
    this.counts.set(subscriberId, (this.counts.get(subscriberId) ?? 0) + 1);
  }

  deliveryCount(subscriberId: string): number {
    return this.counts.get(subscriberId) ?? 0;
  }
}
