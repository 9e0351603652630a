import { describe, it, expect } from 'vitest';
import { loadConfig, getSourceStatusMessage, LIVE_SOURCES } from '../../src/utils/config.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const { config } = loadConfig({});

    expect(config.rateLimitMinMs).toBe(300);
    expect(config.rateLimitMaxMs).toBe(800);
    expect(config.httpRetries).toBe(3);
    expect(config.cacheEnabled).toBe(true);
    expect(config.defaultLocation).toBe('Dar es Salaam, Tanzania');
    expect(config.useSeedDatabase).toBe(false);
    expect(config.enabledSources).toEqual(LIVE_SOURCES);
    expect(config.tanzapagesPages).toEqual([1, 2, 4]);
    expect(config.researchMatchThreshold).toBe(0.6);
    expect(config.verifyWebsites).toBe(false);
  });

  it('should read values from the environment', () => {
    const { config } = loadConfig({
      RATE_LIMIT_MIN_MS: '100',
      RATE_LIMIT_MAX_MS: '200',
      CACHE_ENABLED: 'false',
      DEFAULT_LOCATION: 'Arusha',
      USE_SEED_DATABASE: 'true',
      ENABLED_SOURCES: 'yellowpages, brela',
      TANZAPAGES_PAGES: '1,3',
      VERIFY_WEBSITES: 'true',
    });

    expect(config.rateLimitMinMs).toBe(100);
    expect(config.rateLimitMaxMs).toBe(200);
    expect(config.cacheEnabled).toBe(false);
    expect(config.defaultLocation).toBe('Arusha');
    expect(config.useSeedDatabase).toBe(true);
    expect(config.enabledSources).toEqual(['yellowpages', 'brela']);
    expect(config.tanzapagesPages).toEqual([1, 3]);
    expect(config.verifyWebsites).toBe(true);
  });

  it('should reject an inverted rate limit interval', () => {
    expect(() => loadConfig({ RATE_LIMIT_MIN_MS: '900', RATE_LIMIT_MAX_MS: '100' })).toThrow(
      'RATE_LIMIT_MIN_MS must not exceed RATE_LIMIT_MAX_MS'
    );
  });

  it('should reject unknown sources', () => {
    expect(() => loadConfig({ ENABLED_SOURCES: 'yellowpages,myspace' })).toThrow();
    expect(() => loadConfig({ ENABLED_SOURCES: 'web_search' })).toThrow();
  });

  it('should report source availability', () => {
    const { sources } = loadConfig({ ENABLED_SOURCES: 'brela' });

    expect(sources.find((s) => s.name === 'brela')).toEqual({
      name: 'brela',
      available: true,
      reason: undefined,
    });
    expect(sources.find((s) => s.name === 'facebook')?.available).toBe(false);
    expect(sources.find((s) => s.name === 'seed_database')?.available).toBe(false);
  });
});

describe('getSourceStatusMessage', () => {
  it('should list available and unavailable sources', () => {
    const message = getSourceStatusMessage([
      { name: 'brela', available: true },
      { name: 'facebook', available: false, reason: 'not listed in ENABLED_SOURCES' },
    ]);

    expect(message).toBe(
      'Available sources: brela\nUnavailable sources: facebook (not listed in ENABLED_SOURCES)'
    );
  });
});
