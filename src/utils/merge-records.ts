import type {
  Organization,
  OrganizationType,
  RawRecord,
  SocialMedia,
  SocialPlatform,
  SourceId,
  WebsiteStatus,
} from '../types/organization.js';
import {
  cleanName,
  nameIdentity,
  normalizeAddress,
  normalizeEmail,
  normalizePhone,
  normalizeWebsite,
  splitMultiValue,
} from './normalize.js';
import { withTier } from './tier.js';

/**
 * Raw record after field canonicalization
 */
export interface NormalizedRecord {
  name: string;
  identity: string;
  type?: OrganizationType;
  phones: string[];
  emails: string[];
  address?: string;
  website?: string;
  website_status?: WebsiteStatus;
  social_media: SocialMedia;
  notes: string[];
  source: SourceId;
}

export interface NormalizationResult {
  record: NormalizedRecord | null;
  droppedPhones: string[];
  droppedEmails: string[];
}

export interface MergeOutcome {
  organization: Organization;
  created: boolean;
  changed: boolean;
}

const SOCIAL_PLATFORMS: SocialPlatform[] = ['facebook', 'instagram', 'linkedin', 'twitter'];

/**
 * Canonicalize a raw record. Invalid phones and emails are dropped
 * individually; a record without a usable name yields `record: null`.
 */
export function normalizeRecord(raw: RawRecord): NormalizationResult {
  const droppedPhones: string[] = [];
  const droppedEmails: string[] = [];

  const phones: string[] = [];
  for (const candidate of splitMultiValue(raw.phone)) {
    const phone = normalizePhone(candidate);
    if (phone) {
      addUnique(phones, phone);
    } else {
      droppedPhones.push(candidate);
    }
  }

  const emails: string[] = [];
  for (const candidate of splitMultiValue(raw.email)) {
    const email = normalizeEmail(candidate);
    if (email) {
      addUnique(emails, email);
    } else {
      droppedEmails.push(candidate);
    }
  }

  const name = cleanName(raw.name);
  const identity = nameIdentity(name);
  if (!identity) {
    return { record: null, droppedPhones, droppedEmails };
  }

  const website = normalizeWebsite(raw.website);
  const socialMedia: SocialMedia = {};
  for (const platform of SOCIAL_PLATFORMS) {
    const url = normalizeWebsite(raw.social_media?.[platform]);
    if (url) socialMedia[platform] = url;
  }

  return {
    record: {
      name,
      identity,
      type: raw.type,
      phones,
      emails,
      address: normalizeAddress(raw.address),
      website,
      website_status: website ? 'has_website' : raw.website_status,
      social_media: socialMedia,
      notes: raw.notes ? splitNotes(raw.notes) : [],
      source: raw.source,
    },
    droppedPhones,
    droppedEmails,
  };
}

/**
 * Build a new organization from a normalized record
 */
export function createOrganization(
  record: NormalizedRecord,
  fallbackType: OrganizationType
): Organization {
  let websiteStatus: WebsiteStatus = 'unknown';
  if (record.website) {
    websiteStatus = 'has_website';
  } else if (record.website_status === 'no_website') {
    websiteStatus = 'no_website';
  }

  return withTier({
    name: record.name,
    type: record.type ?? fallbackType,
    phones: [...record.phones],
    emails: [...record.emails],
    address: record.address,
    website_status: websiteStatus,
    website_url: record.website,
    social_media: { ...record.social_media },
    sources: [record.source],
    notes: [...record.notes],
  });
}

/**
 * Merge a normalized record into an existing organization with the same
 * identity. Set-valued fields are unioned; singular fields are filled only
 * when unset, and a differing value is kept as a note instead of
 * overwriting. Returns a new object; the input is not mutated.
 */
export function mergeIntoOrganization(
  existing: Organization,
  record: NormalizedRecord
): MergeOutcome {
  const org: Organization = {
    ...existing,
    phones: [...existing.phones],
    emails: [...existing.emails],
    social_media: { ...existing.social_media },
    sources: [...existing.sources],
    notes: [...existing.notes],
  };
  let changed = false;

  for (const phone of record.phones) {
    changed = addUnique(org.phones, phone) || changed;
  }
  for (const email of record.emails) {
    changed = addUnique(org.emails, email) || changed;
  }

  if (record.address) {
    if (!org.address) {
      org.address = record.address;
      changed = true;
    } else if (!sameText(org.address, record.address)) {
      changed = addUnique(org.notes, `Alternate address (${record.source}): ${record.address}`) || changed;
    }
  }

  if (record.website) {
    if (!org.website_url) {
      org.website_url = record.website;
      org.website_status = 'has_website';
      changed = true;
    } else if (!sameText(org.website_url, record.website)) {
      changed = addUnique(org.notes, `Alternate website (${record.source}): ${record.website}`) || changed;
    }
  } else if (
    org.website_status === 'unknown' &&
    record.website_status === 'no_website' &&
    !org.website_url
  ) {
    org.website_status = 'no_website';
    changed = true;
  }

  // First-source-wins for type; the disagreement is recorded
  if (record.type && record.type !== org.type) {
    changed = addUnique(org.notes, `Also listed as ${record.type} by ${record.source}`) || changed;
  }

  for (const platform of SOCIAL_PLATFORMS) {
    const url = record.social_media[platform];
    if (url && !org.social_media[platform]) {
      org.social_media[platform] = url;
      changed = true;
    }
  }

  for (const note of record.notes) {
    changed = addUnique(org.notes, note) || changed;
  }

  changed = addUnique(org.sources, record.source) || changed;

  return { organization: withTier(org), created: false, changed };
}

/**
 * Split a notes cell into individual annotations
 */
export function splitNotes(notes: string): string[] {
  return notes
    .split(/\s*;\s*/)
    .map((note) => note.trim())
    .filter((note) => note.length > 0);
}

function addUnique(values: string[], value: string): boolean {
  if (values.includes(value)) return false;
  values.push(value);
  return true;
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
