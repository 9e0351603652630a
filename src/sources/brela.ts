import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { contactsAt, extractContacts } from './html-contacts.js';
import { searchTerms } from './types.js';

const SOURCE: AdapterSourceId = 'brela';
const BASE_URL = 'https://www.brela.go.tz';

const REGISTERED_NAME = /Limited|Ltd|Company|Co\.|School|Academy/i;

/**
 * BRELA business registry search. Registered names sit in table cells.
 */
export class BrelaSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'BRELA Business Registry', baseUrl: BASE_URL, requireContact: true },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(query: SearchQuery): PageRequest[] {
    return [{ path: '/search', params: { query: searchTerms(query) } }];
  }

  protected parsePage($: CheerioAPI): Listing[] {
    const contacts = extractContacts($, this.host);

    return $('td')
      .map((_, el) => $(el).text().trim())
      .get()
      .filter((text) => REGISTERED_NAME.test(text))
      .map((name, index) => ({ name, ...contactsAt(contacts, index) }));
  }
}
