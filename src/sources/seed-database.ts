import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Logger } from '../utils/logger.js';
import type {
  AdapterSourceId,
  OrganizationType,
  RawRecord,
  SearchQuery,
  SourceRunReport,
} from '../types/organization.js';
import { emptyReport, parseSearchQuery, type SourceAdapter } from './types.js';

const SOURCE: AdapterSourceId = 'seed_database';

const SEED_FILE = new URL('../../data/seed-schools.json', import.meta.url);

const SeedEntrySchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  phone: z.string().optional(),
  email: z.string().optional(),
  address: z.string().optional(),
  notes: z.string().optional(),
});
export type SeedEntry = z.infer<typeof SeedEntrySchema>;

const SeedFileSchema = z.object({ schools: z.array(SeedEntrySchema) });

/**
 * Built-in table of Dar es Salaam schools with known contacts. Opt-in only;
 * every record it yields is tagged `seed_database`.
 */
export class SeedDatabaseSource implements SourceAdapter {
  readonly id = SOURCE;
  readonly label = 'Built-in school database';
  private entries: SeedEntry[];
  private logger: Logger;

  constructor(logger: Logger, entries?: SeedEntry[]) {
    this.logger = logger;
    this.entries = entries ?? SeedDatabaseSource.loadEntries();
  }

  static loadEntries(file: URL | string = SEED_FILE): SeedEntry[] {
    return SeedFileSchema.parse(JSON.parse(readFileSync(file, 'utf-8'))).schools;
  }

  supports(type: OrganizationType): boolean {
    return type === 'school';
  }

  async *search(
    input: SearchQuery,
    report: SourceRunReport = emptyReport(this.id)
  ): AsyncGenerator<RawRecord> {
    const query = parseSearchQuery(input);
    if (!this.supports(query.type)) return;

    if (query.name) {
      const entry = this.lookup(query.name);
      if (entry) {
        report.records++;
        yield this.toRecord(entry);
      }
      return;
    }

    for (const entry of this.entries) {
      if (report.records >= query.limit) return;
      report.records++;
      yield this.toRecord(entry);
    }
  }

  /**
   * Find the entry for an organization name: exact key, then containment
   * either way, then at least two shared words
   */
  lookup(name: string): SeedEntry | null {
    const target = name.toLowerCase().trim();
    if (!target) return null;

    const exact = this.entries.find((entry) => entry.key === target);
    if (exact) return exact;

    const partial = this.entries.find(
      (entry) => target.includes(entry.key) || entry.key.includes(target)
    );
    if (partial) return partial;

    const targetWords = new Set(target.split(/\s+/));
    const shared = this.entries.find((entry) => {
      const common = entry.key.split(/\s+/).filter((word) => targetWords.has(word));
      return new Set(common).size >= 2;
    });

    if (shared) {
      this.logger.debug(SOURCE, { action: 'word_match', name, key: shared.key });
    }
    return shared ?? null;
  }

  private toRecord(entry: SeedEntry): RawRecord {
    return {
      name: entry.name,
      phone: entry.phone,
      email: entry.email,
      address: entry.address,
      website_status: 'no_website',
      notes: entry.notes,
      type: 'school',
      source: SOURCE,
    };
  }
}
