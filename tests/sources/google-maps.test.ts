import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GoogleMapsSource } from '../../src/sources/google-maps.js';
import { collect } from '../../src/sources/types.js';
import type { SQLiteCache } from '../../src/cache/sqlite-cache.js';
import { TEST_SOURCE_OPTIONS, htmlResponse, sourceDependencies } from '../fixtures/http.js';

vi.mock('undici', () => ({
  request: vi.fn(),
}));

import { request } from 'undici';

const mockRequest = vi.mocked(request);

const MAPS_PAGE = [
  '<html><body><div role="feed">',
  '<div role="article" aria-label="Sinza Health Centre"><span>0712 345 678</span></div>',
  '<div role="article" aria-label="Mikocheni Clinic"><span>0754 111 222</span></div>',
  '<div role="article" aria-label="Quiet Dispensary"></div>',
  '</div></body></html>',
].join('');

describe('GoogleMapsSource', () => {
  let source: GoogleMapsSource;
  let cache: SQLiteCache;

  beforeEach(() => {
    mockRequest.mockReset();
    const deps = sourceDependencies();
    cache = deps.cache;
    source = new GoogleMapsSource(TEST_SOURCE_OPTIONS, deps.cache, deps.logger, deps.rateLimiter);
  });

  afterEach(() => {
    cache.close();
  });

  it('should search the maps page for the type and location', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(200, MAPS_PAGE));

    await collect(source, { type: 'medical', location: 'Dar es Salaam', keywords: [], limit: 10 });

    expect(mockRequest).toHaveBeenCalledTimes(1);
    expect(mockRequest.mock.calls[0][0]).toBe(
      'https://www.google.com/maps/search/medical%20Dar%20es%20Salaam'
    );
  });

  it('should pair place names with phones by position and use the location as address', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(200, MAPS_PAGE));

    const { records, report } = await collect(source, {
      type: 'medical',
      location: 'Dar es Salaam',
      keywords: [],
      limit: 10,
    });

    expect(records).toEqual([
      { name: 'Sinza Health Centre', phone: '0712 345 678', address: 'Dar es Salaam', source: 'google_maps' },
      { name: 'Mikocheni Clinic', phone: '0754 111 222', address: 'Dar es Salaam', source: 'google_maps' },
      { name: 'Quiet Dispensary', address: 'Dar es Salaam', source: 'google_maps' },
    ]);
    expect(report.records).toBe(3);
  });

  it('should search by name and location when researching one organization', async () => {
    mockRequest.mockResolvedValueOnce(htmlResponse(200, MAPS_PAGE));

    await collect(source, {
      type: 'medical',
      location: 'Sinza',
      keywords: [],
      limit: 5,
      name: 'Sinza Health Centre',
    });

    expect(mockRequest.mock.calls[0][0]).toBe(
      'https://www.google.com/maps/search/Sinza%20Health%20Centre%20Sinza'
    );
  });
});
