import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { contactsAt, extractContacts } from './html-contacts.js';
import { searchTerms } from './types.js';

const SOURCE: AdapterSourceId = 'shulezetu';
const BASE_URL = 'https://www.shulezetu.com';

export class ShulezetuSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'Shulezetu Directory', baseUrl: BASE_URL, types: ['school'] },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(query: SearchQuery): PageRequest[] {
    return [{ path: '/', params: { s: searchTerms(query) } }];
  }

  protected parsePage($: CheerioAPI): Listing[] {
    const contacts = extractContacts($, this.host);

    return $('h2 > a, h3 > a')
      .map((_, el) => $(el).text().trim())
      .get()
      .map((name, index) => ({ name, ...contactsAt(contacts, index) }));
  }
}
