import { z } from 'zod';
import { OrganizationTypeSchema, TierSchema } from '../types/organization.js';
import { OrganizationStore } from '../store/organization-store.js';
import { toCsv } from '../export/csv.js';
import { toJson } from '../export/json.js';
import { generateReport } from '../export/report.js';
import { writeExport } from '../export/write-file.js';
import { Logger } from '../utils/logger.js';
import { loadIntoStore } from './load-dataset.js';

export const ExportDatasetInputSchema = z.object({
  file: z.string().min(1).optional().describe('Dataset to load first (replaces the current one)'),
  output: z.string().min(1).describe('Destination path'),
  format: z.enum(['csv', 'json', 'report']).default('csv').describe('Output format'),
  no_website_only: z
    .boolean()
    .default(false)
    .describe('Only organizations not known to have a website'),
  tier: TierSchema.optional().describe('Only organizations in this tier'),
  type: OrganizationTypeSchema.optional().describe('Only organizations of this type'),
});

export type ExportDatasetInput = z.input<typeof ExportDatasetInputSchema>;

export interface ExportDatasetOutput {
  path: string;
  format: 'csv' | 'json' | 'report';
  exported: number;
  total: number;
}

/**
 * Write the store, or a filtered view of it, as CSV, JSON or a text report.
 * Filtering works on copies; the store is never modified.
 */
export class ExportDatasetTool {
  private store: OrganizationStore;
  private logger: Logger;
  private now: () => Date;

  constructor(store: OrganizationStore, logger: Logger, now: () => Date = () => new Date()) {
    this.store = store;
    this.logger = logger;
    this.now = now;
  }

  async execute(input: ExportDatasetInput): Promise<ExportDatasetOutput> {
    const options = ExportDatasetInputSchema.parse(input);
    if (options.file) {
      await loadIntoStore(this.store, options.file, this.logger);
    }

    const organizations = this.store.list({
      no_website_only: options.no_website_only,
      tier: options.tier,
      type: options.type,
    });

    let content: string;
    switch (options.format) {
      case 'json':
        content = toJson(organizations, this.now());
        break;
      case 'report':
        content = generateReport(organizations, 'general', this.now());
        break;
      default:
        content = toCsv(organizations);
    }

    const path = await writeExport(options.output, content);

    this.logger.info('export', {
      action: 'written',
      path,
      format: options.format,
      exported: organizations.length,
    });

    return { path, format: options.format, exported: organizations.length, total: this.store.size };
  }
}
