import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { extractContacts, labelledValue } from './html-contacts.js';
import { searchTerms } from './types.js';

const SOURCE: AdapterSourceId = 'yellowpages';
const BASE_URL = 'https://www.yellowpages.co.tz';
const MAX_PAGES = 5;

/**
 * Tanzania Yellow Pages search results. Each listing card carries its own
 * contacts, so phones and emails are read per card.
 */
export class YellowPagesSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'TZ Yellow Pages', baseUrl: BASE_URL, requireContact: true, paginated: true },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(query: SearchQuery): PageRequest[] {
    const pages: PageRequest[] = [];
    for (let page = 1; page <= MAX_PAGES; page++) {
      pages.push({
        path: '/search',
        params: { query: searchTerms(query), location: query.location, page },
      });
    }
    return pages;
  }

  protected parsePage($: CheerioAPI): Listing[] {
    const listings: Listing[] = [];

    // Innermost listing containers only; result wrappers also carry "listing" in their class
    $('div[class*="listing"]')
      .filter((_, el) => $(el).find('div[class*="listing"]').length === 0)
      .each((_, el) => {
        const card = cheerio.load($(el).html() ?? '');
        const contacts = extractContacts(card, this.host);

        listings.push({
          name: card('h1, h2, h3, h4, h5, h6').first().text().trim(),
          phone: contacts.phones[0],
          email: contacts.emails[0],
          address: labelledValue(card, /Address|Location/),
          website: contacts.websites[0],
          social_media: contacts.social_media,
        });
      });

    return listings;
  }
}
