export {
  SearchOrganizationsTool,
  SearchOrganizationsInputSchema,
  type SearchOrganizationsOutput,
  type SearchDefaults,
} from './search-organizations.js';
export { LoadDatasetTool, LoadDatasetInputSchema, loadIntoStore, type LoadDatasetOutput } from './load-dataset.js';
export {
  ResearchContactsTool,
  ResearchContactsInputSchema,
  type ResearchContactsOutput,
  type ResearchDefaults,
} from './research-contacts.js';
export { GenerateReportTool, GenerateReportInputSchema, type GenerateReportOutput } from './generate-report.js';
export { ExportDatasetTool, ExportDatasetInputSchema, type ExportDatasetOutput } from './export-dataset.js';
export { DatasetStatsTool, DatasetStatsInputSchema, type DatasetStatsOutput } from './dataset-stats.js';
