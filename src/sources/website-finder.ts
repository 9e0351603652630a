import * as cheerio from 'cheerio';
import { HttpClient } from '../utils/http-client.js';
import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache, CacheTTL } from '../cache/sqlite-cache.js';
import { ContactFinderError, errorMessage } from '../utils/errors.js';
import type { SourceOptions } from './directory-source.js';

const SOURCE = 'web_search';
const BASE_URL = 'https://duckduckgo.com';

// Results on these hosts are never an organization's own site
const EXCLUDED_HOSTS = ['duckduckgo.com', 'facebook.com', 'instagram.com', 'x.com', 'twitter.com'];

export interface WebsiteLookup {
  findWebsite(name: string, location: string): Promise<string | undefined>;
}

/**
 * Looks up an organization's website as the first usable result of a
 * DuckDuckGo HTML search for `<name> <location> website`
 */
export class WebsiteFinder implements WebsiteLookup {
  private client: HttpClient;
  private cache: SQLiteCache;
  private logger: Logger;

  constructor(options: SourceOptions, cache: SQLiteCache, logger: Logger, rateLimiter: RateLimiter) {
    this.cache = cache;
    this.logger = logger;

    rateLimiter.configure(SOURCE, options.rateLimit);

    this.client = new HttpClient(
      SOURCE,
      {
        baseUrl: BASE_URL,
        timeout: options.timeout,
        retries: options.retries,
      },
      logger,
      rateLimiter
    );
  }

  /**
   * Resolves to undefined when the search has no usable result or fails
   */
  async findWebsite(name: string, location: string): Promise<string | undefined> {
    const terms = `${name} ${location} website`;

    try {
      const website = await this.cache.remember<string>(
        SQLiteCache.makeKey(SOURCE, terms),
        SOURCE,
        async () => {
          const response = await this.client.get('/html/', { params: { q: terms } });
          if (response.status >= 400) {
            throw new ContactFinderError('SOURCE_UNAVAILABLE', `DuckDuckGo returned HTTP ${response.status}`, {
              retryable: response.status === 429 || response.status >= 500,
              source: SOURCE,
            });
          }
          return firstResultUrl(response.body);
        },
        CacheTTL.WEBSITE_LOOKUP
      );

      this.logger.debug(SOURCE, { action: 'website_lookup', name, website });
      return website ?? undefined;
    } catch (error) {
      this.logger.warning(SOURCE, {
        action: 'website_lookup_failed',
        name,
        error: errorMessage(error),
      });
      return undefined;
    }
  }
}

/**
 * First result link of a DuckDuckGo HTML page that points off the
 * search engine and off social networks, without query or fragment
 */
export function firstResultUrl(html: string): string | null {
  const $ = cheerio.load(html);

  for (const el of $('.result a.result__a').toArray()) {
    const href = $(el).attr('href');
    const url = href ? resolveResultLink(href) : null;
    if (url) return url;
  }

  return null;
}

function resolveResultLink(href: string): string | null {
  try {
    const link = new URL(href, BASE_URL);
    // Result links go through a redirect carrying the target in `uddg`
    const target = isHost(link.hostname, 'duckduckgo.com') ? link.searchParams.get('uddg') : link.toString();
    if (!target) return null;

    const url = new URL(target);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;
    if (EXCLUDED_HOSTS.some((host) => isHost(url.hostname, host))) return null;

    url.search = '';
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

function isHost(hostname: string, host: string): boolean {
  return hostname === host || hostname.endsWith(`.${host}`);
}
