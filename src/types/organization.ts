import { z } from 'zod';

export const OrganizationTypeSchema = z.enum([
  'school',
  'business',
  'medical',
  'restaurant',
  'retail',
  'service',
  'nonprofit',
]);
export type OrganizationType = z.infer<typeof OrganizationTypeSchema>;

export const WebsiteStatusSchema = z.enum(['has_website', 'no_website', 'unknown']);
export type WebsiteStatus = z.infer<typeof WebsiteStatusSchema>;

export const TierSchema = z.enum(['A', 'B', 'C']);
export type Tier = z.infer<typeof TierSchema>;

export const ContactStatusSchema = z.enum(['Complete', 'Partial', 'Phone Only', 'No Contact']);
export type ContactStatus = z.infer<typeof ContactStatusSchema>;

export const SocialPlatformSchema = z.enum(['facebook', 'instagram', 'linkedin', 'twitter']);
export type SocialPlatform = z.infer<typeof SocialPlatformSchema>;

export const SocialMediaSchema = z.object({
  facebook: z.string().optional(),
  instagram: z.string().optional(),
  linkedin: z.string().optional(),
  twitter: z.string().optional(),
});
export type SocialMedia = z.infer<typeof SocialMediaSchema>;

/**
 * Source identifiers. `dataset` tags rows that came from a loaded file
 * with no provenance column; `web_search` tags websites found by the
 * website lookup after a search.
 */
export const SourceIdSchema = z.enum([
  'yellowpages',
  'google_maps',
  'facebook',
  'brela',
  'education_portal',
  'tanzapages',
  'shulezetu',
  'schoolcotz',
  'seed_database',
  'dataset',
  'web_search',
]);
export type SourceId = z.infer<typeof SourceIdSchema>;

export const AdapterSourceIdSchema = SourceIdSchema.exclude(['dataset', 'web_search']);
export type AdapterSourceId = z.infer<typeof AdapterSourceIdSchema>;

/**
 * Unvalidated listing as returned by a single source
 */
export interface RawRecord {
  name: string;
  phone?: string;
  email?: string;
  address?: string;
  website?: string;
  website_status?: WebsiteStatus;
  social_media?: SocialMedia;
  notes?: string;
  /** Organization type, when the source knows it better than the query */
  type?: OrganizationType;
  source: SourceId;
}

export const OrganizationSchema = z.object({
  name: z.string().min(1),
  type: OrganizationTypeSchema,
  phones: z.array(z.string()),
  emails: z.array(z.string()),
  address: z.string().optional(),
  website_status: WebsiteStatusSchema,
  website_url: z.string().optional(),
  social_media: SocialMediaSchema,
  sources: z.array(SourceIdSchema),
  tier: TierSchema,
  contact_status: ContactStatusSchema,
  notes: z.array(z.string()),
});

/**
 * Deduplicated, normalized organization. Set-valued fields are kept as
 * insertion-ordered arrays without duplicates.
 */
export type Organization = z.infer<typeof OrganizationSchema>;

export const SearchQuerySchema = z.object({
  type: OrganizationTypeSchema,
  location: z.string().min(1),
  keywords: z.array(z.string()).default([]),
  limit: z.number().int().positive(),
  // Set when looking up one known organization rather than browsing
  name: z.string().min(1).optional(),
});
export type SearchQuery = z.infer<typeof SearchQuerySchema>;

/**
 * Per-source outcome of one search or research pass
 */
export interface SourceRunReport {
  source: AdapterSourceId;
  records: number;
  skipped: number;
  failed: boolean;
  error?: string;
}

export interface TierStats {
  total: number;
  tier_a: number;
  tier_b: number;
  tier_c: number;
  by_type: Partial<Record<OrganizationType, number>>;
  phones_found: number;
  emails_found: number;
  addresses_found: number;
  websites_found: number;
  sources_used: SourceId[];
}
