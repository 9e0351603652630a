import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { absoluteUrl, contactsAt, extractContacts } from './html-contacts.js';
import { searchTerms } from './types.js';

const SOURCE: AdapterSourceId = 'facebook';
const BASE_URL = 'https://www.facebook.com';

// Page titles worth keeping from the search results
const PAGE_KEYWORDS = ['school', 'academy', 'business', 'company'];

/**
 * Facebook public page search. The page link itself becomes the
 * organization's Facebook profile.
 */
export class FacebookSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'Facebook Business Pages', baseUrl: BASE_URL, requireContact: true },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(query: SearchQuery): PageRequest[] {
    return [{ path: '/search/pages/', params: { q: searchTerms(query) } }];
  }

  protected parsePage($: CheerioAPI): Listing[] {
    const contacts = extractContacts($, this.host);
    const listings: Listing[] = [];

    $('a[aria-label]').each((index, el) => {
      const title = ($(el).attr('aria-label') ?? '').trim();
      const lowered = title.toLowerCase();
      if (!PAGE_KEYWORDS.some((keyword) => lowered.includes(keyword))) return;

      const href = $(el).attr('href');
      const profile = href ? absoluteUrl(href, BASE_URL) : undefined;
      listings.push({
        name: title,
        ...contactsAt(contacts, index),
        social_media: profile ? { facebook: profile } : undefined,
      });
    });

    return listings;
  }
}
