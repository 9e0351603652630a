import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BrelaSource } from '../../src/sources/brela.js';
import { collect } from '../../src/sources/types.js';
import type { SQLiteCache } from '../../src/cache/sqlite-cache.js';
import { TEST_SOURCE_OPTIONS, htmlResponse, sourceDependencies } from '../fixtures/http.js';

vi.mock('undici', () => ({
  request: vi.fn(),
}));

import { request } from 'undici';

const mockRequest = vi.mocked(request);

const REGISTRY_PAGE = [
  '<html><body><table>',
  '<tr><td>Mwenge Traders Limited</td><td>0712 345 678</td></tr>',
  '<tr><td>Kariakoo Company</td><td>0754 111 222</td></tr>',
  '<tr><td>Registered 2019</td></tr>',
  '</table></body></html>',
].join('');

describe('BrelaSource', () => {
  let source: BrelaSource;
  let cache: SQLiteCache;

  beforeEach(() => {
    mockRequest.mockReset();
    const deps = sourceDependencies();
    cache = deps.cache;
    source = new BrelaSource(TEST_SOURCE_OPTIONS, deps.cache, deps.logger, deps.rateLimiter);
  });

  afterEach(() => {
    cache.close();
  });

  it('should read registered names from table cells', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(200, REGISTRY_PAGE));

    const { records, report } = await collect(source, {
      type: 'business',
      location: 'Dar es Salaam',
      keywords: [],
      limit: 10,
    });

    expect(mockRequest.mock.calls[0][0]).toBe(
      'https://www.brela.go.tz/search?query=business+Dar+es+Salaam'
    );
    expect(records).toEqual([
      { name: 'Mwenge Traders Limited', phone: '0712 345 678', source: 'brela' },
      { name: 'Kariakoo Company', phone: '0754 111 222', source: 'brela' },
    ]);
    expect(report).toEqual({ source: 'brela', records: 2, skipped: 0, failed: false });
  });

  it('should report a failed source when the registry is unreachable', async () => {
    mockRequest.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const { records, report } = await collect(source, {
      type: 'business',
      location: 'Dar es Salaam',
      keywords: [],
      limit: 10,
    });

    expect(records).toEqual([]);
    expect(report.failed).toBe(true);
    expect(report.error).toBe('connect ECONNREFUSED');
  });
});
