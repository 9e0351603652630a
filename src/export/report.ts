import type { Organization, Tier } from '../types/organization.js';
import { computeStats } from '../store/organization-store.js';
import { tierLabel } from '../utils/tier.js';
import { websiteStatusLabel, MULTI_VALUE_SEPARATOR } from './csv.js';

export type ReportVariant = 'general' | 'school';

const RULE = '='.repeat(80);
const SECTION_RULE = '-'.repeat(40);
const TIER_SAMPLE = 10;
const NO_WEBSITE_SAMPLE = 10;
const FOLLOW_UP_SAMPLE = 15;

const TIER_DESCRIPTIONS: Record<Tier, string> = {
  A: 'Complete',
  B: 'Partial',
  C: 'No Contact',
};

/**
 * Plain-text report over a set of organizations. The `school` variant
 * covers schools only and adds outreach and follow-up lists.
 */
export function generateReport(
  organizations: Organization[],
  variant: ReportVariant = 'general',
  generatedAt: Date = new Date()
): string {
  const lines =
    variant === 'school'
      ? schoolReport(organizations.filter((org) => org.type === 'school'))
      : generalReport(organizations);

  const title = variant === 'school' ? 'SCHOOL CONTACT RESEARCH REPORT' : 'CONTACT RESEARCH REPORT';
  return [
    RULE,
    title,
    `Generated: ${formatTimestamp(generatedAt)}`,
    RULE,
    '',
    ...lines,
    RULE,
    'END OF REPORT',
    RULE,
    '',
  ].join('\n');
}

function generalReport(organizations: Organization[]): string[] {
  const stats = computeStats(organizations);
  const lines: string[] = [];

  lines.push('EXECUTIVE SUMMARY', SECTION_RULE, `Total Organizations: ${stats.total}`, '');

  lines.push('Organizations by Type:');
  for (const [type, count] of Object.entries(stats.by_type)) {
    lines.push(`  • ${type}: ${count}`);
  }
  lines.push('');

  lines.push('Organizations by Priority Tier:');
  lines.push(`  • ${tierLabel('A')} (${TIER_DESCRIPTIONS.A}): ${stats.tier_a}`);
  lines.push(`  • ${tierLabel('B')} (${TIER_DESCRIPTIONS.B}): ${stats.tier_b}`);
  lines.push(`  • ${tierLabel('C')} (${TIER_DESCRIPTIONS.C}): ${stats.tier_c}`);
  lines.push('');

  lines.push('FIELD COVERAGE', SECTION_RULE);
  lines.push(`Phones: ${stats.phones_found}/${stats.total}`);
  lines.push(`Emails: ${stats.emails_found}/${stats.total}`);
  lines.push(`Addresses: ${stats.addresses_found}/${stats.total}`);
  lines.push(`Websites: ${stats.websites_found}/${stats.total}`);
  lines.push('');

  lines.push('CONTACT COMPLETENESS', SECTION_RULE);
  lines.push(`Complete Records: ${stats.tier_a}/${stats.total} (${percent(stats.tier_a, stats.total)})`);
  lines.push('');

  if (stats.sources_used.length > 0) {
    lines.push('DATA SOURCES USED', SECTION_RULE);
    for (const source of stats.sources_used) {
      lines.push(`  • ${source}`);
    }
    lines.push('');
  }

  lines.push('ORGANIZATIONS BY TIER', SECTION_RULE);
  for (const tier of ['A', 'B'] as const) {
    const inTier = organizations.filter((org) => org.tier === tier);
    lines.push(`${tierLabel(tier)}:`);
    for (const org of inTier.slice(0, TIER_SAMPLE)) {
      lines.push(`  • ${org.name}`);
      if (org.phones.length > 0) lines.push(`    Phone: ${org.phones.join(MULTI_VALUE_SEPARATOR)}`);
      if (org.emails.length > 0) lines.push(`    Email: ${org.emails.join(MULTI_VALUE_SEPARATOR)}`);
      if (org.address) lines.push(`    Address: ${org.address}`);
    }
    if (inTier.length > TIER_SAMPLE) {
      lines.push(`  ... and ${inTier.length - TIER_SAMPLE} more`);
    }
    lines.push('');
  }

  // Tier C is listed in full: these are the organizations still to be found
  const tierC = organizations.filter((org) => org.tier === 'C');
  lines.push(`STILL IN ${tierLabel('C').toUpperCase()} (no phone): ${tierC.length}`, SECTION_RULE);
  for (const org of tierC) {
    lines.push(`  • ${org.name}${org.address ? ` - ${org.address}` : ''}`);
  }
  lines.push('');

  return lines;
}

function schoolReport(schools: Organization[]): string[] {
  const stats = computeStats(schools);
  const lines: string[] = [];

  lines.push('EXECUTIVE SUMMARY', SECTION_RULE, `Total Schools Researched: ${stats.total}`, '');

  lines.push('Schools by Priority Tier:');
  lines.push(`  • ${tierLabel('A')}: ${stats.tier_a}`);
  lines.push(`  • ${tierLabel('B')}: ${stats.tier_b}`);
  lines.push(`  • ${tierLabel('C')}: ${stats.tier_c}`);
  lines.push('');

  lines.push('CONTACTS FOUND', SECTION_RULE);
  lines.push(`Phone Numbers: ${stats.phones_found}/${stats.total}`);
  lines.push(`Email Addresses: ${stats.emails_found}/${stats.total}`);
  lines.push(`Addresses: ${stats.addresses_found}/${stats.total}`);
  lines.push(`Websites: ${stats.websites_found}/${stats.total}`);
  lines.push('');

  lines.push('CONTACT COMPLETENESS', SECTION_RULE);
  lines.push(`Complete Records (phone + email + address): ${stats.tier_a}/${stats.total}`);
  lines.push(`Completeness Rate: ${percent(stats.tier_a, stats.total)}`);
  lines.push('');

  const noWebsite = schools.filter((school) => school.website_status === 'no_website');
  lines.push('SCHOOLS WITHOUT WEBSITES (Priority Outreach)', SECTION_RULE);
  lines.push(`Total: ${noWebsite.length}`);
  for (const school of noWebsite.slice(0, NO_WEBSITE_SAMPLE)) {
    lines.push(`  • ${school.name} - ${school.address ?? 'Address unknown'}`);
  }
  if (noWebsite.length > NO_WEBSITE_SAMPLE) {
    lines.push(`  ... and ${noWebsite.length - NO_WEBSITE_SAMPLE} more`);
  }
  lines.push('');

  const followUp = schools.filter((school) => school.tier !== 'A');
  lines.push(`SCHOOLS NEEDING FOLLOW-UP: ${followUp.length}`, SECTION_RULE);
  for (const school of followUp.slice(0, FOLLOW_UP_SAMPLE)) {
    lines.push(`  • ${school.name} - Missing: ${missingFields(school).join(', ')}`);
  }
  if (followUp.length > FOLLOW_UP_SAMPLE) {
    lines.push(`  ... and ${followUp.length - FOLLOW_UP_SAMPLE} more`);
  }
  lines.push('');

  lines.push('DETAILED SCHOOLS LIST', SECTION_RULE);
  const sorted = [...schools].sort((a, b) => a.name.localeCompare(b.name));
  for (const school of sorted) {
    lines.push('');
    lines.push(school.name);
    lines.push(`  Tier: ${tierLabel(school.tier)}`);
    lines.push(`  Status: ${school.contact_status}`);
    lines.push(`  Phone: ${school.phones.join(MULTI_VALUE_SEPARATOR) || 'Not found'}`);
    lines.push(`  Email: ${school.emails.join(MULTI_VALUE_SEPARATOR) || 'Not found'}`);
    lines.push(`  Address: ${school.address ?? 'Not found'}`);
    lines.push(`  Website: ${websiteStatusLabel(school.website_status)}`);
    if (school.notes.length > 0) {
      lines.push(`  Notes: ${school.notes.join(MULTI_VALUE_SEPARATOR)}`);
    }
  }
  lines.push('');

  return lines;
}

export function missingFields(org: Organization): string[] {
  const missing: string[] = [];
  if (org.phones.length === 0) missing.push('phone');
  if (org.emails.length === 0) missing.push('email');
  if (!org.address) missing.push('address');
  return missing;
}

function percent(part: number, total: number): string {
  return `${(total > 0 ? (part / total) * 100 : 0).toFixed(1)}%`;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}
