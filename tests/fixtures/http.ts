import { vi } from 'vitest';
import type { SourceOptions } from '../../src/sources/directory-source.js';
import { SQLiteCache } from '../../src/cache/sqlite-cache.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { Logger } from '../../src/utils/logger.js';

// No delays and a single attempt per request
export const TEST_SOURCE_OPTIONS: SourceOptions = {
  rateLimit: { minDelayMs: 0, maxDelayMs: 0 },
  timeout: 1000,
  retries: 1,
};

/**
 * Shape of an undici response as the HTTP client reads it
 */
export function htmlResponse(statusCode: number, html: string) {
  return {
    statusCode,
    headers: {},
    body: {
      text: vi.fn().mockResolvedValue(html),
    },
  } as any;
}

export const EMPTY_PAGE = '<html><body><p>No results</p></body></html>';

/**
 * Cache, logger and rate limiter for a source under test
 */
export function sourceDependencies(): {
  cache: SQLiteCache;
  logger: Logger;
  rateLimiter: RateLimiter;
} {
  const logger = new Logger('test');
  logger.setEmitter(vi.fn());
  return {
    cache: new SQLiteCache({ path: ':memory:', defaultTTLHours: 1, enabled: true }, logger),
    logger,
    rateLimiter: new RateLimiter(logger),
  };
}
