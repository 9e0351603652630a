import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { contactsAt, extractContacts } from './html-contacts.js';

const SOURCE: AdapterSourceId = 'tanzapages';
const BASE_URL = 'https://www.tanzapages.com';

const CATEGORY_PAGES = [
  '/category/General_business',
  '/category/Education',
  '/category/Schools',
  '/browse-business-directory',
  '/companies/List_of_Private_Primary_Schools_in_Dar_Es_Salaam',
];

export interface TanzapagesOptions extends SourceOptions {
  /** City page numbers to walk for the query location */
  cityPages: number[];
}

/**
 * Tanzapages school directory: numbered city pages for the query location,
 * then the fixed category pages
 */
export class TanzapagesSource extends DirectorySource {
  private cityPages: number[];

  constructor(options: TanzapagesOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'Tanzapages Directory', baseUrl: BASE_URL, types: ['school'] },
      options,
      cache,
      logger,
      rateLimiter
    );
    this.cityPages = options.cityPages;
  }

  protected pageRequests(query: SearchQuery): PageRequest[] {
    const city = encodeURIComponent(query.location.split(',')[0].trim().replace(/\s+/g, '_'));

    const cityPages = this.cityPages.map((page) => ({
      path:
        page === 1
          ? `/category/Schools/city%3A${city}`
          : `/category/Schools/${page}/city%3A${city}`,
    }));

    return [...cityPages, ...CATEGORY_PAGES.map((path) => ({ path }))];
  }

  protected parsePage($: CheerioAPI): Listing[] {
    const contacts = extractContacts($, this.host);
    const seen = new Set<string>();
    const listings: Listing[] = [];

    $('a[href^="/company/"]').each((_, el) => {
      const name = $(el).text().trim();
      const key = name.toLowerCase();
      if (name.length < 3 || key === 'view profile' || seen.has(key)) return;
      seen.add(key);

      listings.push({ name, ...contactsAt(contacts, listings.length) });
    });

    return listings;
  }
}
