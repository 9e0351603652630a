import { describe, it, expect } from 'vitest';
import { SourceRegistry, sourceOptions } from '../../src/sources/registry.js';
import type { SourceAdapter } from '../../src/sources/types.js';
import type { AdapterSourceId } from '../../src/types/organization.js';
import { ContactFinderError } from '../../src/utils/errors.js';
import { loadConfig } from '../../src/utils/config.js';
import { sourceDependencies } from '../fixtures/http.js';

function fakeAdapter(id: AdapterSourceId): SourceAdapter {
  return {
    id,
    label: id,
    supports: () => true,
    async *search() {},
  };
}

function idsOf(adapters: SourceAdapter[]): AdapterSourceId[] {
  return adapters.map((adapter) => adapter.id);
}

describe('SourceRegistry', () => {
  const registry = new SourceRegistry(
    (
      ['yellowpages', 'google_maps', 'brela', 'education_portal', 'facebook', 'seed_database'] as const
    ).map(fakeAdapter),
    ['yellowpages', 'google_maps', 'brela', 'seed_database']
  );

  it('should resolve "all" and an empty selector to the enabled sources', () => {
    expect(idsOf(registry.resolve(undefined))).toEqual(['yellowpages', 'google_maps', 'brela']);
    expect(idsOf(registry.resolve('all'))).toEqual(['yellowpages', 'google_maps', 'brela']);
  });

  it('should add the seed database only when asked', () => {
    expect(idsOf(registry.resolve('all', { includeSeed: true }))).toEqual([
      'yellowpages',
      'google_maps',
      'brela',
      'seed_database',
    ]);
  });

  it('should resolve tanzania_only to the local sources', () => {
    expect(idsOf(registry.resolve('tanzania_only'))).toEqual(['yellowpages', 'brela', 'education_portal']);
  });

  it('should resolve a comma-separated list, including sources outside "all"', () => {
    expect(idsOf(registry.resolve(' brela, facebook ,brela'))).toEqual(['brela', 'facebook']);
    expect(idsOf(registry.resolve('seed_database'))).toEqual(['seed_database']);
  });

  it('should reject unknown service names', () => {
    expect(() => registry.resolve('myspace')).toThrow(
      'Unknown service "myspace". Use a source id (yellowpages, google_maps, brela, education_portal, facebook, seed_database), a comma-separated list, "all" or "tanzania_only".'
    );
    expect(() => registry.resolve('dataset')).toThrow(ContactFinderError);
    expect(() => registry.resolve('web_search')).toThrow(ContactFinderError);
  });

  it('should fail when a selected source is not registered', () => {
    const partial = new SourceRegistry([fakeAdapter('yellowpages')], ['yellowpages']);

    expect(() => partial.resolve('tanzania_only')).toThrow('Source "brela" is not available');
  });

  it('should derive request options from configuration', () => {
    const { config } = loadConfig({ RATE_LIMIT_MIN_MS: '100', RATE_LIMIT_MAX_MS: '200', HTTP_RETRIES: '2' });

    expect(sourceOptions(config)).toEqual({
      rateLimit: { minDelayMs: 100, maxDelayMs: 200 },
      timeout: 15000,
      retries: 2,
      cacheTtlHours: 1,
    });
  });

  it('should build every source from configuration', () => {
    const { cache, logger, rateLimiter } = sourceDependencies();
    const { config } = loadConfig({ ENABLED_SOURCES: 'brela' });

    const built = SourceRegistry.fromConfig(config, cache, logger, rateLimiter);

    expect(built.ids()).toEqual([
      'yellowpages',
      'google_maps',
      'facebook',
      'brela',
      'education_portal',
      'tanzapages',
      'shulezetu',
      'schoolcotz',
      'seed_database',
    ]);
    expect(idsOf(built.resolve('all'))).toEqual(['brela']);
    cache.close();
  });
});
