/**
 * Feedcast — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  SourceDescriptor,
  RawEntry,
  FetchOutcome,
  NewsItem,
  SerializedNewsItem,
} from './news';

export type {
  Subscriber,
  SubscriberPreferences,
  EligibleSubscriber,
  DeliveryOutcome,
  DeliveryRecord,
} from './subscriber';
