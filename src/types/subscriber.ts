/**
 * Feedcast — Subscriber & Delivery Types
 */

export interface Subscriber {
  id: string;
  notificationsEnabled: boolean;
  lastActivityAt: Date;
}

export interface SubscriberPreferences {
  firstName?: string;
  /** Preferred categories; empty means everything */
  categories: string[];
}

/**
 * Read-only view of a subscriber eligible for the current broadcast cycle.
 */
export interface EligibleSubscriber {
  readonly id: string;
  readonly preferences: SubscriberPreferences;
}

/** `skipped` means nothing was sent because the cycle had no news */
export type DeliveryOutcome = 'success' | 'failure' | 'skipped';

export interface DeliveryRecord {
  subscriberId: string;
  timestamp: Date;
  outcome: DeliveryOutcome;
  error?: string;
}
