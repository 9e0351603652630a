import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId, SearchQuery } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { extractContacts, visibleText } from './html-contacts.js';

const SOURCE: AdapterSourceId = 'education_portal';

const PORTALS = ['https://www.moe.go.tz/', 'https://www.necta.go.tz/'];

const SCHOOL_KEYWORDS = ['school', 'academy', 'shule', 'primary', 'secondary'];
const MATCHES_PER_KEYWORD = 20;
const MIN_NAME_LENGTH = 6;
const MAX_NAME_LENGTH = 80;

/**
 * Ministry of Education and NECTA portal pages. School names are picked
 * out of running text; the portal's general contacts and the query
 * location are attached to each.
 */
export class EducationPortalSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      {
        id: SOURCE,
        label: 'Education Portals (Schools)',
        baseUrl: PORTALS[0],
        types: ['school'],
        requireContact: true,
      },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(): PageRequest[] {
    return PORTALS.map((path) => ({ path }));
  }

  protected parsePage($: CheerioAPI, query: SearchQuery): Listing[] {
    const text = visibleText($);
    const contacts = extractContacts($);
    const listings: Listing[] = [];

    for (const keyword of SCHOOL_KEYWORDS) {
      const pattern = new RegExp(`[A-Z][A-Za-z ]*${keyword}[A-Za-z ]*`, 'gi');
      const matches = (text.match(pattern) ?? []).slice(0, MATCHES_PER_KEYWORD);

      for (const match of matches) {
        const name = match.replace(/\s+/g, ' ').trim();
        if (name.length < MIN_NAME_LENGTH || name.length > MAX_NAME_LENGTH) continue;

        listings.push({
          name,
          phone: contacts.phones[0],
          email: contacts.emails[0],
          address: query.location,
        });
      }
    }

    return listings;
  }
}
