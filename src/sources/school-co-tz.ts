import type { CheerioAPI } from 'cheerio';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import type { AdapterSourceId } from '../types/organization.js';
import { DirectorySource, type Listing, type PageRequest, type SourceOptions } from './directory-source.js';
import { contactsAt, extractContacts, visibleText } from './html-contacts.js';

const SOURCE: AdapterSourceId = 'schoolcotz';
const BASE_URL = 'https://www.school.co.tz';

const REGIONAL_PAGES = [
  '/O-level-boarding-schools-in-Dar',
  '/O-level-Schools-in-Mwanza',
  '/O-level-boarding-schools',
];

// Two to seven capitalised words ending in an institution word
const SCHOOL_NAME = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+){1,6}\s+(?:Secondary|School|Academy|College)\b/g;

const MIN_NAME_LENGTH = 8;
const MAX_NAME_LENGTH = 100;
const MAX_NAME_WORDS = 8;

/**
 * School.co.tz regional O-level listings
 */
export class SchoolCoTzSource extends DirectorySource {
  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    super(
      { id: SOURCE, label: 'School.co.tz', baseUrl: BASE_URL, types: ['school'] },
      options,
      cache,
      logger,
      rateLimiter
    );
  }

  protected pageRequests(): PageRequest[] {
    return REGIONAL_PAGES.map((path) => ({ path }));
  }

  protected parsePage($: CheerioAPI): Listing[] {
    const contacts = extractContacts($, this.host);
    const seen = new Set<string>();
    const listings: Listing[] = [];

    for (const match of visibleText($).match(SCHOOL_NAME) ?? []) {
      const name = match.replace(/\s+/g, ' ').trim();
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      if (name.length < MIN_NAME_LENGTH || name.length > MAX_NAME_LENGTH) continue;
      if (name.split(' ').length > MAX_NAME_WORDS) continue;
      seen.add(key);

      listings.push({ name, ...contactsAt(contacts, listings.length) });
    }

    return listings;
  }
}
