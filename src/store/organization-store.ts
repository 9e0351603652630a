import { Logger } from '../utils/logger.js';
import { recordMerge } from '../utils/telemetry.js';
import {
  createOrganization,
  mergeIntoOrganization,
  normalizeRecord,
} from '../utils/merge-records.js';
import { nameIdentity } from '../utils/normalize.js';
import type {
  Organization,
  OrganizationType,
  RawRecord,
  SourceId,
  Tier,
  TierStats,
} from '../types/organization.js';

export type MergeStatus = 'created' | 'merged' | 'unchanged' | 'dropped';

export interface StoreMergeResult {
  status: MergeStatus;
  organization: Organization | null;
  droppedPhones: string[];
  droppedEmails: string[];
}

export interface OrganizationFilter {
  /** Keep organizations not known to have a website */
  no_website_only?: boolean;
  tier?: Tier;
  type?: OrganizationType;
}

/**
 * The single owner of the organization set for a run. Organizations are
 * keyed by name identity; every mutation goes through `merge`, which is
 * synchronous so concurrent source tasks cannot interleave inside it.
 * Reads return copies.
 */
export class OrganizationStore {
  private organizations: Map<string, Organization> = new Map();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get size(): number {
    return this.organizations.size;
  }

  /**
   * Normalize a raw record and fold it into the set. Invalid phones and
   * emails are dropped and logged; a record with no usable name is dropped.
   */
  merge(raw: RawRecord, fallbackType: OrganizationType): StoreMergeResult {
    const { record, droppedPhones, droppedEmails } = normalizeRecord(raw);

    for (const value of droppedPhones) {
      this.logger.warning('store', {
        action: 'validation_failure',
        field: 'phone',
        value,
        name: raw.name,
        source: raw.source,
      });
    }
    for (const value of droppedEmails) {
      this.logger.warning('store', {
        action: 'validation_failure',
        field: 'email',
        value,
        name: raw.name,
        source: raw.source,
      });
    }

    if (!record) {
      this.logger.warning('store', { action: 'malformed_record', reason: 'empty_name', source: raw.source });
      return { status: 'dropped', organization: null, droppedPhones, droppedEmails };
    }

    const existing = this.organizations.get(record.identity);
    if (!existing) {
      const organization = createOrganization(record, fallbackType);
      this.organizations.set(record.identity, organization);
      recordMerge(record.source, true);
      return { status: 'created', organization: copy(organization), droppedPhones, droppedEmails };
    }

    const outcome = mergeIntoOrganization(existing, record);
    this.organizations.set(record.identity, outcome.organization);
    recordMerge(record.source, false);

    return {
      status: outcome.changed ? 'merged' : 'unchanged',
      organization: copy(outcome.organization),
      droppedPhones,
      droppedEmails,
    };
  }

  get(name: string): Organization | undefined {
    const organization = this.organizations.get(nameIdentity(name));
    return organization ? copy(organization) : undefined;
  }

  /**
   * Organizations in insertion order, optionally filtered
   */
  list(filter: OrganizationFilter = {}): Organization[] {
    return [...this.organizations.values()].filter((org) => matchesFilter(org, filter)).map(copy);
  }

  clear(): void {
    this.organizations.clear();
  }

  stats(): TierStats {
    return computeStats([...this.organizations.values()]);
  }
}

export function matchesFilter(org: Organization, filter: OrganizationFilter): boolean {
  if (filter.no_website_only && org.website_status === 'has_website') return false;
  if (filter.tier && org.tier !== filter.tier) return false;
  if (filter.type && org.type !== filter.type) return false;
  return true;
}

/**
 * Tier and field coverage counts for a set of organizations
 */
export function computeStats(organizations: Organization[]): TierStats {
  const stats: TierStats = {
    total: organizations.length,
    tier_a: 0,
    tier_b: 0,
    tier_c: 0,
    by_type: {},
    phones_found: 0,
    emails_found: 0,
    addresses_found: 0,
    websites_found: 0,
    sources_used: [],
  };
  const sources = new Set<SourceId>();

  for (const org of organizations) {
    if (org.tier === 'A') stats.tier_a++;
    else if (org.tier === 'B') stats.tier_b++;
    else stats.tier_c++;

    stats.by_type[org.type] = (stats.by_type[org.type] ?? 0) + 1;

    if (org.phones.length > 0) stats.phones_found++;
    if (org.emails.length > 0) stats.emails_found++;
    if (org.address) stats.addresses_found++;
    if (org.website_status === 'has_website') stats.websites_found++;

    for (const source of org.sources) sources.add(source);
  }

  stats.sources_used = [...sources];
  return stats;
}

function copy(org: Organization): Organization {
  return {
    ...org,
    phones: [...org.phones],
    emails: [...org.emails],
    social_media: { ...org.social_media },
    sources: [...org.sources],
    notes: [...org.notes],
  };
}
