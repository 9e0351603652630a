import type { Organization, WebsiteStatus } from '../types/organization.js';
import { tierLabel } from '../utils/tier.js';

export const CSV_HEADER = [
  'Name',
  'Phone/Mobile',
  'Email',
  'Website Status',
  'Website URL',
  'Address/Location',
  'Priority Tier',
  'Contact Status',
  'Notes',
] as const;

export const MULTI_VALUE_SEPARATOR = '; ';

const CRLF = '\r\n';

const WEBSITE_STATUS_LABELS: Record<WebsiteStatus, string> = {
  has_website: 'Has Website',
  no_website: 'No Website',
  unknown: 'Unknown',
};

export function websiteStatusLabel(status: WebsiteStatus): string {
  return WEBSITE_STATUS_LABELS[status];
}

/**
 * Read a website status cell; accepts the export labels and the raw values
 */
export function parseWebsiteStatus(value: string | undefined): WebsiteStatus {
  const normalized = (value ?? '').trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (normalized === 'has_website') return 'has_website';
  if (normalized === 'no_website') return 'no_website';
  return 'unknown';
}

export function organizationRow(org: Organization): string[] {
  return [
    org.name,
    org.phones.join(MULTI_VALUE_SEPARATOR),
    org.emails.join(MULTI_VALUE_SEPARATOR),
    websiteStatusLabel(org.website_status),
    org.website_url ?? '',
    org.address ?? '',
    tierLabel(org.tier),
    org.contact_status,
    org.notes.join(MULTI_VALUE_SEPARATOR),
  ];
}

/**
 * Serialize organizations as RFC 4180 CSV with the fixed export header
 */
export function toCsv(organizations: Organization[]): string {
  const lines = [CSV_HEADER.map(escapeCsvField).join(',')];
  for (const org of organizations) {
    lines.push(organizationRow(org).map(escapeCsvField).join(','));
  }
  return lines.join(CRLF) + CRLF;
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value) || value !== value.trim()) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Parse RFC 4180 CSV into rows of cells. Accepts CRLF or LF line breaks,
 * quoted fields spanning lines and a leading byte-order mark. Blank lines
 * are skipped.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let fieldStarted = false;

  const endRow = (): void => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
    field = '';
    fieldStarted = false;
  };

  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (inQuotes) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && !fieldStarted) {
      inQuotes = true;
      fieldStarted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
      fieldStarted = false;
    } else if (char === '\r' && input[i + 1] === '\n') {
      endRow();
      i++;
    } else if (char === '\n' || char === '\r') {
      endRow();
    } else {
      field += char;
      fieldStarted = true;
    }
  }

  if (inQuotes) {
    throw new Error('Unterminated quoted field');
  }
  if (field !== '' || row.length > 0) endRow();

  return rows;
}

/**
 * Parse CSV into records keyed by the header row
 */
export function parseCsvRecords(text: string): Record<string, string>[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];

  const columns = header.map((name) => name.trim());
  return rows.map((cells) => {
    const record: Record<string, string> = {};
    columns.forEach((column, index) => {
      record[column] = cells[index] ?? '';
    });
    return record;
  });
}
