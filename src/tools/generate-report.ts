import { z } from 'zod';
import { OrganizationStore } from '../store/organization-store.js';
import { generateReport } from '../export/report.js';
import { writeExport } from '../export/write-file.js';
import { Logger } from '../utils/logger.js';
import { loadIntoStore } from './load-dataset.js';

export const GenerateReportInputSchema = z.object({
  file: z.string().min(1).optional().describe('Dataset to load first (replaces the current one)'),
  output: z.string().min(1).optional().describe('Write the report to this path as well'),
  variant: z
    .enum(['general', 'school'])
    .default('general')
    .describe('"school" adds outreach and follow-up lists for schools'),
});

export type GenerateReportInput = z.input<typeof GenerateReportInputSchema>;

export interface GenerateReportOutput {
  report: string;
  path?: string;
  organizations: number;
}

export class GenerateReportTool {
  private store: OrganizationStore;
  private logger: Logger;
  private now: () => Date;

  constructor(store: OrganizationStore, logger: Logger, now: () => Date = () => new Date()) {
    this.store = store;
    this.logger = logger;
    this.now = now;
  }

  async execute(input: GenerateReportInput): Promise<GenerateReportOutput> {
    const options = GenerateReportInputSchema.parse(input);
    if (options.file) {
      await loadIntoStore(this.store, options.file, this.logger);
    }

    const organizations = this.store.list();
    const report = generateReport(organizations, options.variant, this.now());

    let path: string | undefined;
    if (options.output) {
      path = await writeExport(options.output, report);
      this.logger.info('report', { action: 'written', path, variant: options.variant });
    }

    return { report, path, organizations: organizations.length };
  }
}
