/**
 * Feedcast — Fetch Orchestrator
 *
 * Runs one fetch per source per cycle through a bounded limiter.
 * Every fetch has its own timeout; a failing source yields a failed
 * outcome for that source only and is not retried within the cycle.
 */

import Bottleneck from 'bottleneck';
import type { FetchOutcome, SourceDescriptor } from '../types';
import type { FeedReader } from './reader';
import { ConfigError, SourceFetchError } from '../lib/errors';
import { withTimeout } from '../lib/timeout';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'orchestrator' });

export interface FetchOptions {
  /** Max entries kept per source, applied before normalization */
  perSourceCap: number;
  /** Max fetches in flight at once */
  concurrencyLimit: number;
  /** Per-source timeout in ms */
  timeoutMs: number;
}

function validateOptions(options: FetchOptions): void {
  const issues: string[] = [];
  if (!Number.isInteger(options.perSourceCap) || options.perSourceCap <= 0) {
    issues.push('perSourceCap must be a positive integer');
  }
  if (!Number.isInteger(options.concurrencyLimit) || options.concurrencyLimit <= 0) {
    issues.push('concurrencyLimit must be a positive integer');
  }
  if (!(options.timeoutMs > 0)) {
    issues.push('timeoutMs must be positive');
  }
  if (issues.length > 0) {
    throw new ConfigError('Invalid fetch options', issues);
  }
}

async function fetchSource(
  reader: FeedReader,
  source: SourceDescriptor,
  options: FetchOptions
): Promise<FetchOutcome> {
  const startTime = Date.now();

  try {
    const entries = await withTimeout(
      signal => reader.read(source, signal),
      options.timeoutMs,
      () => new SourceFetchError('timeout', source.endpointUrl, `Timeout after ${options.timeoutMs}ms`)
    );
    const limited = entries.slice(0, options.perSourceCap);
    const durationMs = Date.now() - startTime;

    log.debug('Source fetch completed', {
      source: source.name,
      entries: limited.length,
      durationMs,
    });

    return { source, ok: true, entries: limited, durationMs };
  } catch (error) {
    const durationMs = Date.now() - startTime;
    const fetchError =
      error instanceof SourceFetchError
        ? error
        : new SourceFetchError('network', source.endpointUrl, errorMessage(error));

    log.warn('Source fetch failed', {
      source: source.name,
      url: source.endpointUrl,
      kind: fetchError.kind,
      error: fetchError.message,
      durationMs,
    });

    return { source, ok: false, error: fetchError, durationMs };
  }
}

/**
 * Fetch every source with at most `concurrencyLimit` reads in flight.
 * Never rejects; one outcome per source, in input order.
 */
export async function fetchAll(
  sources: readonly SourceDescriptor[],
  options: FetchOptions,
  reader: FeedReader
): Promise<FetchOutcome[]> {
  validateOptions(options);

  if (sources.length === 0) {
    return [];
  }

  const limiter = new Bottleneck({ maxConcurrent: options.concurrencyLimit });
  const startTime = Date.now();

  const outcomes = await Promise.all(
    sources.map(source => limiter.schedule(() => fetchSource(reader, source, options)))
  );

  const failed = outcomes.filter(o => !o.ok).length;
  log.info('Fetch cycle completed', {
    sources: sources.length,
    succeeded: outcomes.length - failed,
    failed,
    durationMs: Date.now() - startTime,
  });

  return outcomes;
}
