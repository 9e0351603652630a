import { ZodError } from 'zod';
import {
  SearchQuerySchema,
  type AdapterSourceId,
  type OrganizationType,
  type RawRecord,
  type SearchQuery,
  type SourceRunReport,
} from '../types/organization.js';
import { ContactFinderError } from '../utils/errors.js';

/**
 * A named data source that turns a search query into raw listings.
 * Sequences are lazy and finite; a source that cannot be reached ends its
 * sequence early and records the failure in the report instead of throwing.
 */
export interface SourceAdapter {
  readonly id: AdapterSourceId;
  readonly label: string;
  supports(type: OrganizationType): boolean;
  search(query: SearchQuery, report?: SourceRunReport): AsyncIterable<RawRecord>;
}

export function emptyReport(source: AdapterSourceId): SourceRunReport {
  return { source, records: 0, skipped: 0, failed: false };
}

/**
 * Running report for a source across several runs, created on first use
 */
export function reportFor(
  reports: Map<AdapterSourceId, SourceRunReport>,
  source: AdapterSourceId
): SourceRunReport {
  let report = reports.get(source);
  if (!report) {
    report = emptyReport(source);
    reports.set(source, report);
  }
  return report;
}

export function accumulate(total: SourceRunReport, run: SourceRunReport): void {
  total.records += run.records;
  total.skipped += run.skipped;
  if (run.failed) {
    total.failed = true;
    total.error = run.error;
  }
}

/**
 * Validate a search query, raising VALIDATION_ERROR for a bad limit,
 * location or type
 */
export function parseSearchQuery(input: unknown): SearchQuery {
  try {
    return SearchQuerySchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const detail = error.issues
        .map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`)
        .join('; ');
      throw new ContactFinderError('VALIDATION_ERROR', `Invalid search query (${detail})`, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Free-text terms sent to sources with a single search box
 */
export function searchTerms(query: SearchQuery): string {
  if (query.name) return query.name;
  return [query.type, ...query.keywords, query.location].join(' ');
}

/**
 * Drain an adapter into an array, collecting its run report
 */
export async function collect(
  adapter: SourceAdapter,
  query: SearchQuery,
  report: SourceRunReport = emptyReport(adapter.id)
): Promise<{ records: RawRecord[]; report: SourceRunReport }> {
  const records: RawRecord[] = [];
  for await (const record of adapter.search(query, report)) {
    records.push(record);
  }
  return { records, report };
}
