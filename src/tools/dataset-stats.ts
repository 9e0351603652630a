import { z } from 'zod';
import type { TierStats } from '../types/organization.js';
import { OrganizationStore } from '../store/organization-store.js';
import { SQLiteCache } from '../cache/sqlite-cache.js';
import { Logger } from '../utils/logger.js';
import { loadIntoStore } from './load-dataset.js';

export const DatasetStatsInputSchema = z.object({
  file: z.string().min(1).optional().describe('Dataset to load first (replaces the current one)'),
  include_cache: z.boolean().default(false).describe('Include search cache entry counts'),
});

export type DatasetStatsInput = z.input<typeof DatasetStatsInputSchema>;

export interface DatasetStatsOutput {
  stats: TierStats;
  cache?: { enabled: boolean; total: number; bySource: Record<string, number> };
}

export class DatasetStatsTool {
  private store: OrganizationStore;
  private cache: SQLiteCache;
  private logger: Logger;

  constructor(store: OrganizationStore, cache: SQLiteCache, logger: Logger) {
    this.store = store;
    this.cache = cache;
    this.logger = logger;
  }

  async execute(input: DatasetStatsInput): Promise<DatasetStatsOutput> {
    const options = DatasetStatsInputSchema.parse(input);
    if (options.file) {
      await loadIntoStore(this.store, options.file, this.logger);
    }

    const output: DatasetStatsOutput = { stats: this.store.stats() };
    if (options.include_cache) {
      output.cache = { enabled: this.cache.isEnabled(), ...this.cache.stats() };
    }
    return output;
  }
}
