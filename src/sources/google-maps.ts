import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { contactsAt, extractContacts } from './html-contacts.js';
import { searchTerms } from './types.js';

const SOURCE: AdapterSourceId = 'google_maps';
const BASE_URL = 'https://www.google.com';

/**
 * Public Google Maps search page. Result cards are `role="article"`
 * elements labelled with the place name; the query location stands in for
 * the address.
 */
export class GoogleMapsSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'Google Maps', baseUrl: BASE_URL, requireContact: true },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(query: SearchQuery): PageRequest[] {
    const terms = query.name ? `${query.name} ${query.location}` : searchTerms(query);
    return [{ path: `/maps/search/${encodeURIComponent(terms)}` }];
  }

  protected parsePage($: CheerioAPI, query: SearchQuery): Listing[] {
    const contacts = extractContacts($, this.host);

    return $('[role="article"][aria-label]')
      .map((index, el) => ({
        name: ($(el).attr('aria-label') ?? '').trim(),
        ...contactsAt(contacts, index),
        address: query.location,
      }))
      .get();
  }
}
