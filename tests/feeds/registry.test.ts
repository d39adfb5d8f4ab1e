/**
 * Tests for the Source Registry
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SourceRegistry, loadSourceRegistry } from '../../src/feeds/registry';

const catalog = {
  UK: {
    Technology: [
      { name: 'Alpha Tech', url: 'https://alpha.test/tech.xml' },
      { name: 'Beta Tech', url: 'https://beta.test/tech.xml' },
    ],
    World: [{ name: 'Alpha World', url: 'https://alpha.test/world.xml' }],
  },
  USA: {
    Technology: [{ name: 'Gamma Tech', url: 'https://gamma.test/tech.xml' }],
  },
};

describe('SourceRegistry.fromCatalog', () => {
  it('should load every valid source in catalog order', () => {
    const registry = SourceRegistry.fromCatalog(catalog);

    expect(registry.size).toBe(4);
    expect(registry.sourcesFor().map(s => s.name)).toEqual([
      'Alpha Tech',
      'Beta Tech',
      'Alpha World',
      'Gamma Tech',
    ]);
    expect(registry.sourcesFor()[0]).toEqual({
      name: 'Alpha Tech',
      endpointUrl: 'https://alpha.test/tech.xml',
      country: 'UK',
      category: 'Technology',
    });
  });

  it('should drop invalid records and keep the rest', () => {
    const registry = SourceRegistry.fromCatalog({
      UK: {
        Technology: [
          { name: 'Valid', url: 'https://valid.test/rss' },
          { name: '', url: 'https://noname.test/rss' },
          { name: 'Bad URL', url: 'not a url' },
          { url: 'https://missing-name.test/rss' },
          'just a string',
        ],
        Sport: 'not a list',
      },
      USA: ['not', 'a', 'map'],
    });

    expect(registry.sourcesFor().map(s => s.name)).toEqual(['Valid']);
  });

  it('should drop sources with a duplicate endpoint URL', () => {
    const registry = SourceRegistry.fromCatalog({
      UK: {
        Technology: [{ name: 'First', url: 'https://dup.test/rss' }],
        World: [{ name: 'Second', url: 'https://dup.test/rss' }],
      },
    });

    expect(registry.sourcesFor()).toHaveLength(1);
    expect(registry.sourcesFor()[0]?.name).toBe('First');
  });

  it('should yield an empty registry for non-object input', () => {
    expect(SourceRegistry.fromCatalog(null).size).toBe(0);
    expect(SourceRegistry.fromCatalog([1, 2, 3]).size).toBe(0);
    expect(SourceRegistry.fromCatalog('catalog').size).toBe(0);
  });

  it('should freeze descriptors', () => {
    const registry = SourceRegistry.fromCatalog(catalog);
    expect(Object.isFrozen(registry.sourcesFor()[0])).toBe(true);
  });
});

describe('SourceRegistry.sourcesFor', () => {
  const registry = SourceRegistry.fromCatalog(catalog);

  it('should filter by country', () => {
    expect(registry.sourcesFor('UK').map(s => s.name)).toEqual([
      'Alpha Tech',
      'Beta Tech',
      'Alpha World',
    ]);
  });

  it('should filter by category across countries', () => {
    expect(registry.sourcesFor(undefined, 'Technology').map(s => s.name)).toEqual([
      'Alpha Tech',
      'Beta Tech',
      'Gamma Tech',
    ]);
  });

  it('should filter by country and category', () => {
    expect(registry.sourcesFor('USA', 'Technology').map(s => s.name)).toEqual(['Gamma Tech']);
  });

  it('should return nothing for unknown filters', () => {
    expect(registry.sourcesFor('France')).toEqual([]);
  });
});

describe('SourceRegistry listing', () => {
  const registry = SourceRegistry.fromCatalog(catalog);

  it('should list countries and categories once each', () => {
    expect(registry.countries()).toEqual(['UK', 'USA']);
    expect(registry.categories()).toEqual(['Technology', 'World']);
  });

  it('should describe the catalog grouped by country and category', () => {
    expect(registry.describe()).toEqual([
      {
        country: 'UK',
        categories: [
          {
            category: 'Technology',
            sources: [
              { name: 'Alpha Tech', url: 'https://alpha.test/tech.xml' },
              { name: 'Beta Tech', url: 'https://beta.test/tech.xml' },
            ],
          },
          {
            category: 'World',
            sources: [{ name: 'Alpha World', url: 'https://alpha.test/world.xml' }],
          },
        ],
      },
      {
        country: 'USA',
        categories: [
          {
            category: 'Technology',
            sources: [{ name: 'Gamma Tech', url: 'https://gamma.test/tech.xml' }],
          },
        ],
      },
    ]);
  });
});

describe('loadSourceRegistry', () => {
  const dir = mkdtempSync(join(tmpdir(), 'feedcast-registry-'));

  it('should load a catalog file', () => {
    const path = join(dir, 'sources.json');
    writeFileSync(path, JSON.stringify(catalog));

    expect(loadSourceRegistry(path).size).toBe(4);
  });

  it('should yield an empty registry for a missing file', () => {
    expect(loadSourceRegistry(join(dir, 'missing.json')).size).toBe(0);
  });

  it('should yield an empty registry for invalid JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "UK": ');

    expect(loadSourceRegistry(path).size).toBe(0);
  });

  it('should load the bundled catalog', () => {
    const registry = loadSourceRegistry('config/sources.json');
    expect(registry.size).toBeGreaterThan(0);
  });
});
