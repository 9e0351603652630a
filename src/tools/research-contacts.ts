import { z } from 'zod';
import type {
  AdapterSourceId,
  Organization,
  SourceRunReport,
  Tier,
  TierStats,
} from '../types/organization.js';
import { SourceRegistry } from '../sources/registry.js';
import { accumulate, collect, parseSearchQuery, reportFor, type SourceAdapter } from '../sources/types.js';
import { OrganizationStore } from '../store/organization-store.js';
import { Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { selectBestMatch, DEFAULT_MATCH_THRESHOLD } from '../utils/name-match.js';
import { withSpan } from '../utils/telemetry.js';
import { loadIntoStore } from './load-dataset.js';

export const ResearchContactsInputSchema = z.object({
  file: z.string().min(1).optional().describe('Dataset to load before researching (replaces the current one)'),
  service: z
    .string()
    .optional()
    .describe('Source id, comma-separated ids, "all" (default) or "tanzania_only"'),
  use_seed_database: z
    .boolean()
    .optional()
    .describe('Also consult the built-in school database (defaults to USE_SEED_DATABASE)'),
  limit_per_source: z
    .number()
    .int()
    .positive()
    .max(20)
    .default(5)
    .describe('Candidates requested from each source per organization'),
});

export type ResearchContactsInput = z.input<typeof ResearchContactsInputSchema>;

export interface ResearchDefaults {
  location: string;
  useSeedDatabase: boolean;
  matchThreshold?: number;
}

export interface FieldGains {
  phones: number;
  emails: number;
  addresses: number;
  websites: number;
}

export interface TierChange {
  name: string;
  from: Tier;
  to: Tier;
}

export interface ResearchContactsOutput {
  researched: number;
  matched: number;
  sources: SourceRunReport[];
  gains: FieldGains;
  tier_changes: TierChange[];
  stats: TierStats;
}

/**
 * Look every organization below Tier A up by name in the selected sources
 * and merge the closest candidate into it. Running it again with the same
 * source data changes nothing.
 */
export class ResearchContactsTool {
  private registry: SourceRegistry;
  private store: OrganizationStore;
  private defaults: ResearchDefaults;
  private logger: Logger;

  constructor(
    registry: SourceRegistry,
    store: OrganizationStore,
    defaults: ResearchDefaults,
    logger: Logger
  ) {
    this.registry = registry;
    this.store = store;
    this.defaults = defaults;
    this.logger = logger;
  }

  async execute(input: ResearchContactsInput): Promise<ResearchContactsOutput> {
    const options = ResearchContactsInputSchema.parse(input);

    if (options.file) {
      await loadIntoStore(this.store, options.file, this.logger);
    }

    // The seed table is consulted by direct lookup, not by similarity
    const adapters = this.registry.resolve(options.service).filter((a) => a.id !== 'seed_database');
    const seed =
      (options.use_seed_database ?? this.defaults.useSeedDatabase)
        ? this.registry.get('seed_database')
        : undefined;

    const before = this.store.list();
    const targets = before.filter((org) => org.tier !== 'A');
    const reports = new Map<AdapterSourceId, SourceRunReport>();
    let matched = 0;

    this.logger.info('research', {
      action: 'start',
      organizations: before.length,
      targets: targets.length,
      sources: adapters.map((adapter) => adapter.id),
      seed_database: Boolean(seed),
    });

    for (const org of targets) {
      const found = await withSpan('research.organization', { type: org.type }, () =>
        this.researchOne(org, adapters, options.limit_per_source, reports)
      );
      if (seed && org.type === 'school' && (await this.consultSeed(org, seed, reports))) {
        matched++;
      } else if (found) {
        matched++;
      }
    }

    const after = this.store.list();
    const gains = fieldGains(before, after);
    const tierChanges = tierChangesBetween(before, after);

    this.logger.info('research', {
      action: 'complete',
      researched: targets.length,
      matched,
      ...gains,
      tier_changes: tierChanges.length,
    });

    return {
      researched: targets.length,
      matched,
      sources: [...reports.values()],
      gains,
      tier_changes: tierChanges,
      stats: this.store.stats(),
    };
  }

  /**
   * Query each adapter by name and merge the best candidate; true when any
   * source produced a match
   */
  private async researchOne(
    org: Organization,
    adapters: SourceAdapter[],
    limit: number,
    reports: Map<AdapterSourceId, SourceRunReport>
  ): Promise<boolean> {
    const query = parseSearchQuery({
      type: org.type,
      location: org.address ?? this.defaults.location,
      keywords: [],
      limit,
      name: org.name,
    });
    const threshold = this.defaults.matchThreshold ?? DEFAULT_MATCH_THRESHOLD;
    let found = false;

    for (const adapter of adapters) {
      if (!adapter.supports(org.type)) continue;
      const report = reportFor(reports, adapter.id);

      try {
        const run = await collect(adapter, query);
        accumulate(report, run.report);

        const best = selectBestMatch(org.name, run.records, threshold);
        if (!best) continue;

        this.logger.debug('research', {
          action: 'match',
          name: org.name,
          candidate: best.candidate.name,
          score: Number(best.score.toFixed(3)),
          source: adapter.id,
        });
        this.store.merge({ ...best.candidate, name: org.name, type: undefined }, org.type);
        found = true;
      } catch (error) {
        report.failed = true;
        report.error = errorMessage(error);
        this.logger.error('research', {
          action: 'source_error',
          source: adapter.id,
          name: org.name,
          error: report.error,
        });
      }
    }

    return found;
  }

  private async consultSeed(
    org: Organization,
    seed: SourceAdapter,
    reports: Map<AdapterSourceId, SourceRunReport>
  ): Promise<boolean> {
    const query = parseSearchQuery({
      type: org.type,
      location: org.address ?? this.defaults.location,
      keywords: [],
      limit: 1,
      name: org.name,
    });
    const run = await collect(seed, query);
    accumulate(reportFor(reports, seed.id), run.report);

    const [entry] = run.records;
    if (!entry) return false;
    this.store.merge({ ...entry, name: org.name }, org.type);
    return true;
  }
}
