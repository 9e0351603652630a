import { Logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import { ContactFinderError } from '../utils/errors.js';
import type { Config } from '../utils/config.js';
import { AdapterSourceIdSchema, type AdapterSourceId } from '../types/organization.js';
import type { SourceOptions } from './directory-source.js';
import type { SourceAdapter } from './types.js';
import { YellowPagesSource } from './yellow-pages.js';
import { GoogleMapsSource } from './google-maps.js';
import { FacebookSource } from './facebook.js';
import { BrelaSource } from './brela.js';
import { EducationPortalSource } from './education-portal.js';
import { TanzapagesSource } from './tanzapages.js';
import { ShulezetuSource } from './shulezetu.js';
import { SchoolCoTzSource } from './school-co-tz.js';
import { SeedDatabaseSource } from './seed-database.js';

export const TANZANIA_ONLY: AdapterSourceId[] = ['yellowpages', 'brela', 'education_portal'];

const SELECTOR_ALL = 'all';
const SELECTOR_TANZANIA_ONLY = 'tanzania_only';

export interface ResolveOptions {
  /** Append the seed database to `all` and `tanzania_only` selections */
  includeSeed?: boolean;
}

/**
 * Request pacing, timeouts and cache lifetime shared by every HTTP source
 */
export function sourceOptions(config: Config): SourceOptions {
  return {
    rateLimit: { minDelayMs: config.rateLimitMinMs, maxDelayMs: config.rateLimitMaxMs },
    timeout: config.httpTimeoutMs,
    retries: config.httpRetries,
    cacheTtlHours: config.cacheTtlHours,
  };
}

/**
 * Adapters by id, and the service selector that picks among them
 */
export class SourceRegistry {
  private adapters: Map<AdapterSourceId, SourceAdapter>;
  private enabled: AdapterSourceId[];

  constructor(adapters: SourceAdapter[], enabled: AdapterSourceId[]) {
    this.adapters = new Map(adapters.map((adapter) => [adapter.id, adapter]));
    this.enabled = enabled.filter((id) => id !== 'seed_database' && this.adapters.has(id));
  }

  /**
   * Build every known adapter from configuration
   */
  static fromConfig(
    config: Config,
    cache: SQLiteCache,
    logger: Logger,
    rateLimiter: RateLimiter
  ): SourceRegistry {
    const options = sourceOptions(config);

    const adapters: SourceAdapter[] = [
      new YellowPagesSource(options, cache, logger, rateLimiter),
      new GoogleMapsSource(options, cache, logger, rateLimiter),
      new FacebookSource(options, cache, logger, rateLimiter),
      new BrelaSource(options, cache, logger, rateLimiter),
      new EducationPortalSource(options, cache, logger, rateLimiter),
      new TanzapagesSource({ ...options, cityPages: config.tanzapagesPages }, cache, logger, rateLimiter),
      new ShulezetuSource(options, cache, logger, rateLimiter),
      new SchoolCoTzSource(options, cache, logger, rateLimiter),
      new SeedDatabaseSource(logger),
    ];

    return new SourceRegistry(adapters, config.enabledSources);
  }

  get(id: AdapterSourceId): SourceAdapter | undefined {
    return this.adapters.get(id);
  }

  ids(): AdapterSourceId[] {
    return [...this.adapters.keys()];
  }

  /**
   * Resolve a service selector: a source id, `all`, a comma-separated list
   * of ids, or `tanzania_only`. Named sources run even when they are not
   * part of `all`; the seed database joins `all` and `tanzania_only` only
   * when `includeSeed` is set.
   */
  resolve(selector: string | undefined, options: ResolveOptions = {}): SourceAdapter[] {
    const trimmed = selector?.trim() ?? '';
    let ids: AdapterSourceId[];

    if (!trimmed || trimmed === SELECTOR_ALL) {
      ids = [...this.enabled];
    } else if (trimmed === SELECTOR_TANZANIA_ONLY) {
      ids = [...TANZANIA_ONLY];
    } else {
      ids = this.parseList(trimmed);
      return ids.map((id) => this.require(id));
    }

    if (options.includeSeed) ids.push('seed_database');
    return [...new Set(ids)].map((id) => this.require(id));
  }

  private parseList(selector: string): AdapterSourceId[] {
    const ids: AdapterSourceId[] = [];
    const unknown: string[] = [];

    for (const part of selector.split(',')) {
      const name = part.trim();
      if (!name) continue;
      const parsed = AdapterSourceIdSchema.safeParse(name);
      if (parsed.success && this.adapters.has(parsed.data)) {
        if (!ids.includes(parsed.data)) ids.push(parsed.data);
      } else {
        unknown.push(name);
      }
    }

    if (unknown.length > 0 || ids.length === 0) {
      throw new ContactFinderError(
        'VALIDATION_ERROR',
        `Unknown service "${unknown.join(', ') || selector}". Use a source id (${this.ids().join(', ')}), a comma-separated list, "${SELECTOR_ALL}" or "${SELECTOR_TANZANIA_ONLY}".`
      );
    }

    return ids;
  }

  private require(id: AdapterSourceId): SourceAdapter {
    const adapter = this.adapters.get(id);
    if (!adapter) {
      throw new ContactFinderError('VALIDATION_ERROR', `Source "${id}" is not available`);
    }
    return adapter;
  }
}
