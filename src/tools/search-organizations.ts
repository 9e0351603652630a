import { z } from 'zod';
import {
  OrganizationTypeSchema,
  type AdapterSourceId,
  type RawRecord,
  type SearchQuery,
  type SourceRunReport,
  type TierStats,
} from '../types/organization.js';
import { SourceRegistry } from '../sources/registry.js';
import { accumulate, emptyReport, parseSearchQuery, reportFor, type SourceAdapter } from '../sources/types.js';
import type { WebsiteLookup } from '../sources/website-finder.js';
import { OrganizationStore } from '../store/organization-store.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { withSpan } from '../utils/telemetry.js';

export const SearchOrganizationsInputSchema = z.object({
  type: OrganizationTypeSchema.default('school').describe('Organization type to search for'),
  location: z.string().min(1).optional().describe('City or region (defaults to DEFAULT_LOCATION)'),
  locations: z
    .array(z.string().min(1))
    .min(1)
    .optional()
    .describe('Search each of these locations in turn; takes precedence over location'),
  keywords: z.array(z.string()).default([]).describe('Extra search keywords'),
  limit: z.number().int().positive().max(500).default(50).describe('Maximum results per source'),
  per_location_limit: z
    .number()
    .int()
    .positive()
    .max(500)
    .optional()
    .describe('Maximum results per source and location when searching locations (default: limit / locations, at least 5)'),
  service: z
    .string()
    .optional()
    .describe('Source id, comma-separated ids, "all" (default) or "tanzania_only"'),
  use_seed_database: z
    .boolean()
    .optional()
    .describe('Include the built-in school database (defaults to USE_SEED_DATABASE)'),
  parallel: z.boolean().default(false).describe('Query sources concurrently'),
  verify_websites: z
    .boolean()
    .optional()
    .describe('Look up a website for found organizations that have none (defaults to VERIFY_WEBSITES)'),
});

export type SearchOrganizationsInput = z.input<typeof SearchOrganizationsInputSchema>;

export interface SearchDefaults {
  location: string;
  useSeedDatabase: boolean;
  verifyWebsites: boolean;
}

// Floor for the per-location share of the limit
const MIN_PER_LOCATION_LIMIT = 5;

export interface SearchOrganizationsOutput {
  queries: SearchQuery[];
  sources: SourceRunReport[];
  created: number;
  merged: number;
  dropped: number;
  websites_found: number;
  organizations: number;
  stats: TierStats;
}

interface MergeCounts {
  created: number;
  merged: number;
  dropped: number;
}

/**
 * Search the selected sources for each location and fold every listing
 * into the store. Organizations found without a website can then be looked
 * up through the website lookup.
 */
export class SearchOrganizationsTool {
  private registry: SourceRegistry;
  private store: OrganizationStore;
  private defaults: SearchDefaults;
  private logger: Logger;
  private websiteLookup: WebsiteLookup | null;

  constructor(
    registry: SourceRegistry,
    store: OrganizationStore,
    defaults: SearchDefaults,
    logger: Logger,
    websiteLookup: WebsiteLookup | null = null
  ) {
    this.registry = registry;
    this.store = store;
    this.defaults = defaults;
    this.logger = logger;
    this.websiteLookup = websiteLookup;
  }

  async execute(input: SearchOrganizationsInput): Promise<SearchOrganizationsOutput> {
    const options = SearchOrganizationsInputSchema.parse(input);
    const locations = options.locations ?? [options.location ?? this.defaults.location];
    const limit = options.locations
      ? options.per_location_limit ??
        Math.max(MIN_PER_LOCATION_LIMIT, Math.floor(options.limit / options.locations.length))
      : options.limit;

    const queries = locations.map((location) =>
      parseSearchQuery({ type: options.type, location, keywords: options.keywords, limit })
    );
    const adapters = this.registry.resolve(options.service, {
      includeSeed: options.use_seed_database ?? this.defaults.useSeedDatabase,
    });

    const startTime = Date.now();
    const counts: MergeCounts = { created: 0, merged: 0, dropped: 0 };
    const reports = new Map<AdapterSourceId, SourceRunReport>();
    // Organization name to the location it was found in
    const found = new Map<string, string>();

    this.logger.info('search', {
      action: 'start',
      type: options.type,
      locations,
      limit,
      sources: adapters.map((adapter) => adapter.id),
      parallel: options.parallel,
    });

    for (const query of queries) {
      let runs: SourceRunReport[];
      if (options.parallel) {
        runs = await Promise.all(adapters.map((adapter) => this.runSource(adapter, query, counts, found)));
      } else {
        runs = [];
        for (const adapter of adapters) {
          runs.push(await this.runSource(adapter, query, counts, found));
        }
      }
      for (const run of runs) {
        accumulate(reportFor(reports, run.source), run);
      }
    }

    const verify = options.verify_websites ?? this.defaults.verifyWebsites;
    const websitesFound = verify ? await this.findWebsites(found) : 0;
    const sources = [...reports.values()];

    this.logger.info('search', {
      action: 'complete',
      ...counts,
      websites_found: websitesFound,
      sources_failed: sources.filter((report) => report.failed).map((report) => report.source),
      duration_ms: Date.now() - startTime,
    });

    return {
      queries,
      sources,
      ...counts,
      websites_found: websitesFound,
      organizations: this.store.size,
      stats: this.store.stats(),
    };
  }

  private runSource(
    adapter: SourceAdapter,
    query: SearchQuery,
    counts: MergeCounts,
    found: Map<string, string>
  ): Promise<SourceRunReport> {
    return withSpan('search.source', { source: adapter.id, type: query.type }, async () => {
      const report = emptyReport(adapter.id);
      try {
        for await (const record of adapter.search(query, report)) {
          this.mergeRecord(record, query, counts, found);
        }
      } catch (error) {
        report.failed = true;
        report.error = errorMessage(error);
        this.logger.error('search', {
          action: 'source_error',
          source: adapter.id,
          error: report.error,
        });
      }
      return report;
    });
  }

  private mergeRecord(
    record: RawRecord,
    query: SearchQuery,
    counts: MergeCounts,
    found: Map<string, string>
  ): void {
    const result = this.store.merge(record, query.type);
    if (result.status === 'created') counts.created++;
    else if (result.status === 'dropped') counts.dropped++;
    else counts.merged++;

    if (result.organization && !found.has(result.organization.name)) {
      found.set(result.organization.name, query.location);
    }
  }

  /**
   * Look up a website for each found organization that still has none,
   * returning how many were filled in
   */
  private async findWebsites(found: Map<string, string>): Promise<number> {
    const lookup = this.websiteLookup;
    if (!lookup) {
      this.logger.warning('search', { action: 'website_lookup_unavailable' });
      return 0;
    }

    let filled = 0;
    for (const [name, location] of found) {
      const organization = this.store.get(name);
      if (!organization || organization.website_url) continue;

      const website = await lookup.findWebsite(organization.name, location);
      if (!website) continue;

      const result = this.store.merge({ name: organization.name, website, source: 'web_search' }, organization.type);
      if (result.status === 'merged') filled++;
    }
    return filled;
  }
}
