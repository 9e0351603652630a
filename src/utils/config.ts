import { z } from 'zod';
import { AdapterSourceIdSchema, type AdapterSourceId } from '../types/organization.js';

export const LIVE_SOURCES: AdapterSourceId[] = [
  'yellowpages',
  'google_maps',
  'facebook',
  'brela',
  'education_portal',
  'tanzapages',
  'shulezetu',
  'schoolcotz',
];

/**
 * Environment configuration schema with validation
 */
export const ConfigSchema = z
  .object({
    // Rate limiting: delay drawn uniformly from [min, max] per request
    rateLimitMinMs: z.number().int().nonnegative().default(300),
    rateLimitMaxMs: z.number().int().nonnegative().default(800),

    // HTTP
    httpTimeoutMs: z.number().int().positive().default(15000),
    httpRetries: z.number().int().min(1).max(5).default(3),

    // Cache settings
    cacheEnabled: z.boolean().default(true),
    cachePath: z.string().default('./cache.db'),
    cacheTtlHours: z.number().positive().default(1),

    // Search behaviour
    defaultLocation: z.string().min(1).default('Dar es Salaam, Tanzania'),
    useSeedDatabase: z.boolean().default(false),
    enabledSources: z.array(AdapterSourceIdSchema).default(LIVE_SOURCES),
    tanzapagesPages: z.array(z.number().int().positive()).default([1, 2, 4]),
    researchMatchThreshold: z.number().min(0).max(1).default(0.6),
    verifyWebsites: z.boolean().default(false),

    // Logging
    logLevel: z.string().default('info'),

    // OpenTelemetry
    otelEnabled: z.boolean().default(false),
    otelEndpoint: z.string().optional(),
    otelServiceName: z.string().default('tz-contact-finder'),
  })
  .refine((c) => c.rateLimitMinMs <= c.rateLimitMaxMs, {
    message: 'RATE_LIMIT_MIN_MS must not exceed RATE_LIMIT_MAX_MS',
    path: ['rateLimitMinMs'],
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Source availability status
 */
export interface SourceStatus {
  name: AdapterSourceId;
  available: boolean;
  reason?: string;
}

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Validates environment and returns configuration with source availability
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): {
  config: Config;
  sources: SourceStatus[];
} {
  const rawConfig = {
    rateLimitMinMs: parseInteger(env.RATE_LIMIT_MIN_MS),
    rateLimitMaxMs: parseInteger(env.RATE_LIMIT_MAX_MS),
    httpTimeoutMs: parseInteger(env.HTTP_TIMEOUT_MS),
    httpRetries: parseInteger(env.HTTP_RETRIES),
    cacheEnabled: env.CACHE_ENABLED !== 'false',
    cachePath: env.CACHE_PATH,
    cacheTtlHours: env.CACHE_TTL_HOURS ? parseFloat(env.CACHE_TTL_HOURS) : undefined,
    defaultLocation: env.DEFAULT_LOCATION,
    useSeedDatabase: env.USE_SEED_DATABASE === 'true',
    enabledSources: parseList(env.ENABLED_SOURCES),
    tanzapagesPages: parseList(env.TANZAPAGES_PAGES)?.map((page) => parseInt(page, 10)),
    researchMatchThreshold: env.RESEARCH_MATCH_THRESHOLD
      ? parseFloat(env.RESEARCH_MATCH_THRESHOLD)
      : undefined,
    verifyWebsites: env.VERIFY_WEBSITES === 'true',
    logLevel: env.LOG_LEVEL,
    otelEnabled: env.OTEL_ENABLED === 'true',
    otelEndpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT,
    otelServiceName: env.OTEL_SERVICE_NAME,
  };

  // Filter out undefined values so defaults apply
  const filteredConfig = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined)
  );

  const config = ConfigSchema.parse(filteredConfig);

  const sources: SourceStatus[] = LIVE_SOURCES.map((name) => {
    const available = config.enabledSources.includes(name);
    return {
      name,
      available,
      reason: available ? undefined : 'not listed in ENABLED_SOURCES',
    };
  });

  sources.push({
    name: 'seed_database',
    available: config.useSeedDatabase,
    reason: config.useSeedDatabase ? undefined : 'opt-in only (USE_SEED_DATABASE=true or use_seed_database)',
  });

  return { config, sources };
}

/**
 * Get a human-readable status message for available sources
 */
export function getSourceStatusMessage(sources: SourceStatus[]): string {
  const available = sources.filter((s) => s.available);
  const unavailable = sources.filter((s) => !s.available);

  let message = `Available sources: ${available.map((s) => s.name).join(', ') || 'none'}`;

  if (unavailable.length > 0) {
    message += `\nUnavailable sources: ${unavailable.map((s) => `${s.name} (${s.reason})`).join(', ')}`;
  }

  return message;
}
