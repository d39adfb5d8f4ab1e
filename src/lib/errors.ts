/**
 * Feedcast — Error Types
 *
 * Recoverable failures carry enough context to be logged and skipped.
 * Only ConfigError is allowed to stop the process, and only at startup.
 */

export class FeedcastError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'FeedcastError';
    this.details = details;
  }
}

export type SourceFetchErrorKind = 'network' | 'timeout' | 'http' | 'malformed';

/**
 * A single source failed for this cycle. The source contributes no entries.
 */
export class SourceFetchError extends FeedcastError {
  readonly kind: SourceFetchErrorKind;
  readonly endpointUrl: string;

  constructor(kind: SourceFetchErrorKind, endpointUrl: string, message: string) {
    super(message, { kind, endpointUrl });
    this.name = 'SourceFetchError';
    this.kind = kind;
    this.endpointUrl = endpointUrl;
  }
}

/**
 * Delivery to one subscriber failed. The batch continues.
 */
export class DeliveryError extends FeedcastError {
  readonly subscriberId: string;
  readonly status?: number;

  constructor(subscriberId: string, message: string, status?: number) {
    super(message, { subscriberId, status });
    this.name = 'DeliveryError';
    this.subscriberId = subscriberId;
    this.status = status;
  }
}

export class ConfigError extends FeedcastError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, { issues });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
