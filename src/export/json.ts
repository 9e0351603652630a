import type { Organization, TierStats } from '../types/organization.js';
import { computeStats } from '../store/organization-store.js';

export interface JsonExport {
  metadata: {
    generated: string;
    total: number;
    stats: TierStats;
  };
  organizations: Organization[];
}

/**
 * JSON export document: generation time, totals and tier statistics,
 * followed by the organizations themselves
 */
export function buildJsonExport(organizations: Organization[], generatedAt: Date = new Date()): JsonExport {
  return {
    metadata: {
      generated: generatedAt.toISOString(),
      total: organizations.length,
      stats: computeStats(organizations),
    },
    organizations,
  };
}

export function toJson(organizations: Organization[], generatedAt: Date = new Date()): string {
  return JSON.stringify(buildJsonExport(organizations, generatedAt), null, 2) + '\n';
}
