import type { ContactStatus, Organization, Tier } from '../types/organization.js';

type ContactFields = Pick<Organization, 'phones' | 'emails' | 'address'>;

/**
 * Priority tier from contact completeness:
 * A = phone, email and address; B = phone without email or address; C = no phone
 */
export function classifyTier(org: ContactFields): Tier {
  const hasPhone = org.phones.length > 0;
  if (!hasPhone) return 'C';

  const hasEmail = org.emails.length > 0;
  const hasAddress = Boolean(org.address && org.address.trim());
  return hasEmail && hasAddress ? 'A' : 'B';
}

export function contactStatus(org: ContactFields): ContactStatus {
  const hasPhone = org.phones.length > 0;
  const hasEmail = org.emails.length > 0;
  const hasAddress = Boolean(org.address && org.address.trim());

  if (hasPhone && hasEmail && hasAddress) return 'Complete';
  if (hasPhone && !hasEmail) return 'Phone Only';
  if (hasPhone || hasEmail) return 'Partial';
  return 'No Contact';
}

/**
 * Return the organization with tier and contact status derived from its
 * current fields
 */
export function withTier<T extends ContactFields>(
  org: T
): T & { tier: Tier; contact_status: ContactStatus } {
  return { ...org, tier: classifyTier(org), contact_status: contactStatus(org) };
}

export function tierLabel(tier: Tier): string {
  return `Tier ${tier}`;
}

