/**
 * Feedcast — Source Registry
 *
 * Static catalog of feed endpoints grouped by country and category.
 * Loaded once at startup; invalid entries are dropped with a warning
 * so that a broken catalog degrades to fewer sources, never a crash.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { SourceDescriptor } from '../types';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'registry' });

const SourceRecordSchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().url(),
});

export interface RegistryListing {
  country: string;
  categories: Array<{
    category: string;
    sources: Array<{ name: string; url: string }>;
  }>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SourceRegistry {
  private readonly sources: readonly SourceDescriptor[];

  constructor(sources: SourceDescriptor[]) {
    this.sources = Object.freeze(sources.map(s => Object.freeze({ ...s })));
  }

  static empty(): SourceRegistry {
    return new SourceRegistry([]);
  }

  /**
   * Build a registry from the catalog shape
   * `{ [country]: { [category]: [{ name, url }] } }`.
   */
  static fromCatalog(input: unknown): SourceRegistry {
    if (!isPlainObject(input)) {
      log.error('Source catalog is not an object, registry is empty');
      return SourceRegistry.empty();
    }

    const sources: SourceDescriptor[] = [];
    const seenUrls = new Set<string>();

    for (const [country, categories] of Object.entries(input)) {
      if (!isPlainObject(categories)) {
        log.warn('Dropping country with invalid category map', { country });
        continue;
      }

      for (const [category, records] of Object.entries(categories)) {
        if (!Array.isArray(records)) {
          log.warn('Dropping category that is not a list', { country, category });
          continue;
        }

        records.forEach((record: unknown, index) => {
          const parsed = SourceRecordSchema.safeParse(record);
          if (!parsed.success) {
            log.warn('Dropping invalid source record', {
              country,
              category,
              index,
              issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
            });
            return;
          }

          if (seenUrls.has(parsed.data.url)) {
            log.warn('Dropping duplicate source endpoint', {
              country,
              category,
              url: parsed.data.url,
            });
            return;
          }

          seenUrls.add(parsed.data.url);
          sources.push({
            name: parsed.data.name,
            endpointUrl: parsed.data.url,
            country,
            category,
          });
        });
      }
    }

    log.info('Source registry loaded', { sources: sources.length });
    return new SourceRegistry(sources);
  }

  /**
   * Sources matching the optional filters, in catalog order.
   */
  sourcesFor(country?: string, category?: string): SourceDescriptor[] {
    return this.sources.filter(
      s =>
        (country === undefined || s.country === country) &&
        (category === undefined || s.category === category)
    );
  }

  get size(): number {
    return this.sources.length;
  }

  countries(): string[] {
    return [...new Set(this.sources.map(s => s.country))];
  }

  categories(): string[] {
    return [...new Set(this.sources.map(s => s.category))];
  }

  /**
   * Grouped listing for display.
   */
  describe(): RegistryListing[] {
    return this.countries().map(country => {
      const inCountry = this.sourcesFor(country);
      const categories = [...new Set(inCountry.map(s => s.category))];

      return {
        country,
        categories: categories.map(category => ({
          category,
          sources: inCountry
            .filter(s => s.category === category)
            .map(s => ({ name: s.name, url: s.endpointUrl })),
        })),
      };
    });
  }
}

/**
 * Load the registry from a JSON catalog file.
 * A missing or unparsable file yields an empty registry.
 */
export function loadSourceRegistry(path: string): SourceRegistry {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (error) {
    log.error('Source catalog not readable, registry is empty', {
      path,
      error: errorMessage(error),
    });
    return SourceRegistry.empty();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    log.error('Source catalog is not valid JSON, registry is empty', {
      path,
      error: errorMessage(error),
    });
    return SourceRegistry.empty();
  }

  return SourceRegistry.fromCatalog(parsed);
}
