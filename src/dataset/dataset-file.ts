import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { z } from 'zod';
import {
  OrganizationTypeSchema,
  SocialMediaSchema,
  SourceIdSchema,
  WebsiteStatusSchema,
  type OrganizationType,
  type RawRecord,
  type SocialMedia,
  type SourceId,
} from '../types/organization.js';
import { ContactFinderError, errorMessage } from '../utils/errors.js';
import { parseCsvRecords, parseWebsiteStatus, MULTI_VALUE_SEPARATOR } from '../export/csv.js';

export interface DatasetRecord {
  raw: RawRecord;
  type: OrganizationType;
  /** Provenance beyond `raw.source`, merged in as name-only records */
  extraSources: SourceId[];
}

export interface LoadedDataset {
  path: string;
  format: 'csv' | 'json';
  records: DatasetRecord[];
  /** Rows without a name */
  skipped: number;
}

// Organizations as written by the JSON export
const ExportedOrganizationSchema = z.object({
  name: z.string(),
  type: OrganizationTypeSchema.optional(),
  phones: z.array(z.string()).default([]),
  emails: z.array(z.string()).default([]),
  address: z.string().optional(),
  website_status: WebsiteStatusSchema.optional(),
  website_url: z.string().optional(),
  social_media: SocialMediaSchema.default({}),
  sources: z.array(z.string()).default([]),
  notes: z.array(z.string()).default([]),
});

const JsonDatasetSchema = z.object({
  organizations: z.array(z.union([ExportedOrganizationSchema, z.record(z.string(), z.unknown())])),
});

/**
 * Read a CSV or JSON dataset. CSV uses the export columns and also accepts
 * `School Name`, `Type`, `Source` and social-media columns; JSON accepts the
 * JSON export document or rows keyed by the CSV column names.
 */
export async function loadDatasetFile(
  path: string,
  defaultType: OrganizationType = 'school'
): Promise<LoadedDataset> {
  const target = resolve(path);
  let text: string;
  try {
    text = await readFile(target, 'utf-8');
  } catch (error) {
    throw new ContactFinderError('INPUT_FILE_ERROR', `Cannot read ${target}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const format = extname(target).toLowerCase() === '.json' ? 'json' : 'csv';
  try {
    const rows = format === 'json' ? parseJsonDataset(text, defaultType) : parseCsvDataset(text, defaultType);
    const records = rows.filter((row): row is DatasetRecord => row !== null);
    return { path: target, format, records, skipped: rows.length - records.length };
  } catch (error) {
    throw new ContactFinderError(
      'INPUT_FILE_ERROR',
      `Cannot parse ${target} as ${format.toUpperCase()}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export function parseCsvDataset(text: string, defaultType: OrganizationType): (DatasetRecord | null)[] {
  const rows = parseCsvRecords(text);
  if (rows.length > 0 && !('Name' in rows[0]) && !('School Name' in rows[0])) {
    throw new Error('missing Name column');
  }
  return rows.map((row) => rowToRecord(row, defaultType));
}

export function parseJsonDataset(text: string, defaultType: OrganizationType): (DatasetRecord | null)[] {
  const document = JsonDatasetSchema.parse(JSON.parse(text));

  return document.organizations.map((entry) => {
    const exported = ExportedOrganizationSchema.safeParse(entry);
    if (exported.success) {
      return exportedToRecord(exported.data, defaultType);
    }
    return rowToRecord(stringCells(entry), defaultType);
  });
}

/**
 * Map a row keyed by the CSV export columns to a raw record
 */
export function rowToRecord(row: Record<string, string>, defaultType: OrganizationType): DatasetRecord | null {
  const name = (row['Name'] || row['School Name'] || '').trim();
  if (!name) return null;

  const type = OrganizationTypeSchema.safeParse((row['Type'] ?? '').trim().toLowerCase());
  const sources = parseSources(row['Source']);
  const socialMedia: SocialMedia = {
    facebook: row['Facebook'] || undefined,
    instagram: row['Instagram'] || undefined,
    linkedin: row['LinkedIn'] || undefined,
    twitter: row['Twitter'] || undefined,
  };

  return {
    type: type.success ? type.data : defaultType,
    extraSources: sources.slice(1),
    raw: {
      name,
      phone: row['Phone/Mobile'] || row['Phone'] || undefined,
      email: row['Email'] || undefined,
      address: row['Address/Location'] || row['Address'] || undefined,
      website: row['Website URL'] || undefined,
      website_status: parseWebsiteStatus(row['Website Status']),
      social_media: socialMedia,
      notes: row['Notes'] || undefined,
      type: type.success ? type.data : undefined,
      source: sources[0],
    },
  };
}

function exportedToRecord(
  org: z.infer<typeof ExportedOrganizationSchema>,
  defaultType: OrganizationType
): DatasetRecord | null {
  const name = org.name.trim();
  if (!name) return null;

  const sources = parseSources(org.sources.join(';'));

  return {
    type: org.type ?? defaultType,
    extraSources: sources.slice(1),
    raw: {
      name,
      phone: org.phones.join(MULTI_VALUE_SEPARATOR) || undefined,
      email: org.emails.join(MULTI_VALUE_SEPARATOR) || undefined,
      address: org.address,
      website: org.website_url,
      website_status: org.website_status,
      social_media: org.social_media,
      notes: org.notes.join(MULTI_VALUE_SEPARATOR) || undefined,
      type: org.type,
      source: sources[0],
    },
  };
}

/**
 * Provenance ids named in a Source cell; `dataset` when none are recognised
 */
export function parseSources(value: string | undefined): SourceId[] {
  const sources: SourceId[] = [];
  for (const part of (value ?? '').split(/[;,]/)) {
    const parsed = SourceIdSchema.safeParse(part.trim().toLowerCase());
    if (parsed.success && !sources.includes(parsed.data)) sources.push(parsed.data);
  }
  return sources.length > 0 ? sources : ['dataset'];
}

function stringCells(entry: Record<string, unknown>): Record<string, string> {
  const cells: Record<string, string> = {};
  for (const [key, value] of Object.entries(entry)) {
    if (typeof value === 'string') cells[key] = value;
    else if (typeof value === 'number') cells[key] = String(value);
  }
  return cells;
}
