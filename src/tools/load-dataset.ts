import { z } from 'zod';
import { OrganizationTypeSchema, type OrganizationType, type TierStats } from '../types/organization.js';
import { loadDatasetFile } from '../dataset/dataset-file.js';
import { OrganizationStore } from '../store/organization-store.js';
import { Logger } from '../utils/logger.js';

export const LoadDatasetInputSchema = z.object({
  file: z.string().min(1).describe('Path to a CSV or JSON dataset (export format)'),
  default_type: OrganizationTypeSchema.default('school').describe(
    'Organization type for rows without a Type column. CSV exports carry no Type column, so this applies to every row of a reloaded CSV export'
  ),
});

export type LoadDatasetInput = z.input<typeof LoadDatasetInputSchema>;

export interface LoadDatasetOutput {
  file: string;
  format: 'csv' | 'json';
  rows: number;
  skipped: number;
  organizations: number;
  stats: TierStats;
}

/**
 * Replace the store's contents with a dataset file. Rows are merged one by
 * one, so duplicate names in the file collapse into one organization.
 */
export async function loadIntoStore(
  store: OrganizationStore,
  file: string,
  logger: Logger,
  defaultType: OrganizationType = 'school'
): Promise<LoadDatasetOutput> {
  const dataset = await loadDatasetFile(file, defaultType);

  store.clear();
  for (const { raw, type, extraSources } of dataset.records) {
    store.merge(raw, type);
    for (const source of extraSources) {
      store.merge({ name: raw.name, source }, type);
    }
  }

  if (dataset.skipped > 0) {
    logger.warning('load-dataset', {
      action: 'malformed_record',
      reason: 'empty_name',
      file: dataset.path,
      count: dataset.skipped,
    });
  }

  logger.info('load-dataset', {
    action: 'loaded',
    file: dataset.path,
    format: dataset.format,
    rows: dataset.records.length,
    organizations: store.size,
  });

  return {
    file: dataset.path,
    format: dataset.format,
    rows: dataset.records.length,
    skipped: dataset.skipped,
    organizations: store.size,
    stats: store.stats(),
  };
}

export class LoadDatasetTool {
  private store: OrganizationStore;
  private logger: Logger;

  constructor(store: OrganizationStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  async execute(input: LoadDatasetInput): Promise<LoadDatasetOutput> {
    const { file, default_type } = LoadDatasetInputSchema.parse(input);
    return loadIntoStore(this.store, file, this.logger, default_type);
  }
}
