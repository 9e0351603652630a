import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WebsiteFinder, firstResultUrl } from '../../src/sources/website-finder.js';
import type { SQLiteCache } from '../../src/cache/sqlite-cache.js';
import { TEST_SOURCE_OPTIONS, htmlResponse, sourceDependencies } from '../fixtures/http.js';

vi.mock('undici', () => ({
  request: vi.fn(),
}));

import { request } from 'undici';

const mockRequest = vi.mocked(request);

const RESULTS_PAGE = [
  '<html><body>',
  '<div class="result"><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fwww.facebook.com%2Fmwenge&rut=a1">Mwenge on Facebook</a></div>',
  '<div class="result"><a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fmwenge.ac.tz%2Fcontact%3Fref%3Dddg&rut=b2">Mwenge Secondary School</a></div>',
  '<div class="result"><a class="result__a" href="https://schools.example.org/mwenge">Directory entry</a></div>',
  '</body></html>',
].join('');

describe('firstResultUrl', () => {
  it('should unwrap the redirect and skip social networks', () => {
    expect(firstResultUrl(RESULTS_PAGE)).toBe('https://mwenge.ac.tz/contact');
  });

  it('should take direct result links as they are', () => {
    const html =
      '<div class="result"><a class="result__a" href="https://twitter.com/azania">Azania</a></div>' +
      '<div class="result"><a class="result__a" href="https://azania.sc.tz/#about">Azania</a></div>';

    expect(firstResultUrl(html)).toBe('https://azania.sc.tz/');
  });

  it('should return null when no result is usable', () => {
    const html =
      '<div class="result"><a class="result__a" href="//duckduckgo.com/l/?rut=c3">No target</a></div>' +
      '<div class="result"><a class="result__a" href="mailto:info@example.org">Mail</a></div>' +
      '<a href="https://elsewhere.example.org/">Not a result</a>';

    expect(firstResultUrl(html)).toBeNull();
  });
});

describe('WebsiteFinder', () => {
  let deps: ReturnType<typeof sourceDependencies>;
  let cache: SQLiteCache;
  let finder: WebsiteFinder;

  beforeEach(() => {
    mockRequest.mockReset();
    deps = sourceDependencies();
    cache = deps.cache;
    finder = new WebsiteFinder(TEST_SOURCE_OPTIONS, deps.cache, deps.logger, deps.rateLimiter);
  });

  afterEach(() => {
    cache.close();
  });

  it('should search for the name, location and the word website', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(200, RESULTS_PAGE));

    const website = await finder.findWebsite('Mwenge Secondary School', 'Dar es Salaam');

    expect(website).toBe('https://mwenge.ac.tz/contact');
    expect(mockRequest.mock.calls[0][0]).toBe(
      'https://duckduckgo.com/html/?q=Mwenge+Secondary+School+Dar+es+Salaam+website'
    );
  });

  it('should answer a repeated lookup from the cache', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(200, RESULTS_PAGE));

    await finder.findWebsite('Mwenge Secondary School', 'Dar es Salaam');
    const again = await finder.findWebsite('Mwenge Secondary School', 'Dar es Salaam');

    expect(again).toBe('https://mwenge.ac.tz/contact');
    expect(mockRequest).toHaveBeenCalledTimes(1);
  });

  it('should resolve to undefined when the search engine refuses the request', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(403, 'Forbidden'));

    await expect(finder.findWebsite('Azania Secondary School', 'Dar es Salaam')).resolves.toBeUndefined();
  });

  it('should resolve to undefined when the request fails', async () => {
    mockRequest.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND duckduckgo.com'));

    await expect(finder.findWebsite('Azania Secondary School', 'Dar es Salaam')).resolves.toBeUndefined();
  });
});
