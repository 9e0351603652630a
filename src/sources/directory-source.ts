import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { HttpClient } from '../utils/http-client.js';
import { Logger } from '../utils/logger.js';
import { RateLimiter, type RateLimitConfig } from '../utils/rate-limiter.js';
import { SQLiteCache, CacheTTL } from '../cache/sqlite-cache.js';
import { ContactFinderError, errorMessage } from '../utils/errors.js';
import { cleanName, nameIdentity } from '../utils/normalize.js';
import { isValidOrgName } from '../utils/name-match.js';
import type {
  AdapterSourceId,
  OrganizationType,
  RawRecord,
  SearchQuery,
  SocialMedia,
  SourceRunReport,
} from '../types/organization.js';
import { emptyReport, parseSearchQuery, type SourceAdapter } from './types.js';

export interface SourceOptions {
  rateLimit: RateLimitConfig;
  timeout: number;
  retries: number;
  cacheTtlHours?: number;
}

export interface SourceDefinition {
  id: AdapterSourceId;
  label: string;
  baseUrl: string;
  /** Organization types this source lists; omitted means every type */
  types?: OrganizationType[];
  /** Listings without any phone, email, address or website are skipped */
  requireContact?: boolean;
  /** Stop at the first page that yields no listings */
  paginated?: boolean;
}

export interface PageRequest {
  path: string;
  params?: Record<string, string | number>;
}

/**
 * A listing as scraped, before the name quality filter
 */
export interface Listing {
  name?: string;
  phone?: string;
  email?: string;
  address?: string;
  website?: string;
  social_media?: SocialMedia;
}

/**
 * Base for HTML directory sources: walks a bounded list of pages, parses
 * each with cheerio and yields listings that pass the name filter. Parsed
 * pages are cached per source, URL, type and location.
 */
export abstract class DirectorySource implements SourceAdapter {
  readonly id: AdapterSourceId;
  readonly label: string;
  protected client: HttpClient;
  protected cache: SQLiteCache;
  protected logger: Logger;
  protected baseUrl: string;
  private types: OrganizationType[] | null;
  private requireContact: boolean;
  private paginated: boolean;
  private cacheTtlHours: number;

  constructor(
    definition: SourceDefinition,
    options: SourceOptions,
    cache: SQLiteCache,
    logger: Logger,
    rateLimiter: RateLimiter
  ) {
    this.id = definition.id;
    this.label = definition.label;
    this.baseUrl = definition.baseUrl;
    this.types = definition.types ?? null;
    this.requireContact = definition.requireContact ?? false;
    this.paginated = definition.paginated ?? false;
    this.cacheTtlHours = options.cacheTtlHours ?? CacheTTL.SEARCH_RESULTS;
    this.cache = cache;
    this.logger = logger;

    rateLimiter.configure(this.id, options.rateLimit);

    this.client = new HttpClient(
      this.id,
      {
        baseUrl: this.baseUrl,
        timeout: options.timeout,
        retries: options.retries,
      },
      logger,
      rateLimiter
    );
  }

  supports(type: OrganizationType): boolean {
    return this.types === null || this.types.includes(type);
  }

  /**
   * Pages to fetch for a query, in order. The list bounds pagination.
   * Pages of a non-paginated source are fetched independently: a failed
   * page is logged and the rest are still read.
   */
  protected abstract pageRequests(query: SearchQuery): PageRequest[];

  /**
   * Extract listings from one parsed page
   */
  protected abstract parsePage($: CheerioAPI, query: SearchQuery): Listing[];

  async *search(
    input: SearchQuery,
    report: SourceRunReport = emptyReport(this.id)
  ): AsyncGenerator<RawRecord> {
    const query = parseSearchQuery(input);
    if (!this.supports(query.type)) return;

    const seen = new Set<string>();
    const pages = this.pageRequests(query);
    let failedPages = 0;

    for (let index = 0; index < pages.length; index++) {
      let listings: Listing[];
      try {
        listings = await this.fetchListings(pages[index], query, index);
      } catch (error) {
        const message = errorMessage(error);
        failedPages++;
        this.logger.error(this.id, {
          action: 'source_unavailable',
          path: pages[index].path,
          page: index + 1,
          error: message,
        });

        // Later pages of a paginated listing depend on this one; a list of
        // independent pages only fails once every page has failed
        if (this.paginated || failedPages === pages.length) {
          report.failed = true;
          report.error = message;
          return;
        }
        continue;
      }

      if (listings.length === 0 && this.paginated) break;

      for (const listing of listings) {
        const checked = this.toRecord(listing, query);
        if ('reason' in checked) {
          report.skipped++;
          this.logger.warning(this.id, {
            action: 'malformed_record',
            name: listing.name ?? null,
            reason: checked.reason,
          });
          continue;
        }
        const record = checked.record;

        const identity = nameIdentity(record.name);
        if (seen.has(identity)) continue;
        seen.add(identity);

        report.records++;
        yield record;

        if (report.records >= query.limit) return;
      }
    }
  }

  private async fetchListings(page: PageRequest, query: SearchQuery, index: number): Promise<Listing[]> {
    const cacheKey = SQLiteCache.makeKey(
      this.id,
      page.path,
      page.params ? JSON.stringify(page.params) : undefined,
      query.type,
      query.location
    );

    const listings = await this.cache.remember<Listing[]>(
      cacheKey,
      this.id,
      async () => {
        const response = await this.client.get(page.path, { params: page.params });

        // A missing later page ends pagination
        if (response.status === 404 && index > 0) return [];

        if (response.status >= 400) {
          throw new ContactFinderError(
            'SOURCE_UNAVAILABLE',
            `${this.label} returned HTTP ${response.status}`,
            { retryable: response.status === 429 || response.status >= 500, source: this.id }
          );
        }

        const $ = cheerio.load(response.body);
        const parsed = this.parsePage($, query);

        this.logger.debug(this.id, {
          action: 'page_parsed',
          url: response.url,
          listings: parsed.length,
        });

        return parsed;
      },
      this.cacheTtlHours
    );

    return listings ?? [];
  }

  private toRecord(
    listing: Listing,
    query: SearchQuery
  ): { record: RawRecord } | { reason: string } {
    const name = cleanName(listing.name ?? '');
    if (!name) return { reason: 'missing_name' };
    if (!isValidOrgName(name, query.type === 'school')) return { reason: 'rejected_name' };

    const hasContact = Boolean(listing.phone || listing.email || listing.address || listing.website);
    if (this.requireContact && !hasContact) return { reason: 'no_contact_fields' };

    return {
      record: {
        name,
        phone: listing.phone || undefined,
        email: listing.email || undefined,
        address: listing.address || undefined,
        website: listing.website || undefined,
        social_media: listing.social_media,
        source: this.id,
      },
    };
  }

  /**
   * Host name of the directory, used to tell its own links from websites
   */
  protected get host(): string {
    return new URL(this.baseUrl).hostname;
  }
}
