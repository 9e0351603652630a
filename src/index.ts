#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  SetLevelRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z, ZodError } from 'zod';

import { Logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';
import { ContactFinderError, errorMessage } from './utils/errors.js';
import { SQLiteCache } from './cache/sqlite-cache.js';
import { SourceRegistry, sourceOptions } from './sources/registry.js';
import { WebsiteFinder } from './sources/website-finder.js';
import { OrganizationStore } from './store/organization-store.js';
import {
  SearchOrganizationsTool,
  SearchOrganizationsInputSchema,
  LoadDatasetTool,
  LoadDatasetInputSchema,
  ResearchContactsTool,
  ResearchContactsInputSchema,
  GenerateReportTool,
  GenerateReportInputSchema,
  ExportDatasetTool,
  ExportDatasetInputSchema,
  DatasetStatsTool,
  DatasetStatsInputSchema,
} from './tools/index.js';
import { loadConfig, getSourceStatusMessage } from './utils/config.js';
import { initTelemetry, shutdownTelemetry, recordToolCall } from './utils/telemetry.js';
import { LogLevel, type ErrorCode } from './types/common.js';

const SERVER_NAME = 'tz-contact-finder';
const SERVER_VERSION = '1.0.0';

const args = process.argv.slice(2);
if (args.includes('--help') || args.includes('-h')) {
  process.stdout.write(`
Organization Contact Finder MCP Server

Finds and enriches contact details for organizations in Tanzania from
business directories, maps, social pages and registries.

Usage: tz-contact-finder [options]

Options:
  --help, -h           Show this help message

Environment Variables:
  RATE_LIMIT_MIN_MS       Minimum delay between requests to one source (default: 300)
  RATE_LIMIT_MAX_MS       Maximum delay between requests to one source (default: 800)
  HTTP_TIMEOUT_MS         Per-request timeout (default: 15000)
  HTTP_RETRIES            Attempts per request (default: 3)
  CACHE_ENABLED           Cache source results (default: true)
  CACHE_PATH              SQLite cache database path (default: ./cache.db)
  CACHE_TTL_HOURS         Cache lifetime of search results (default: 1)
  DEFAULT_LOCATION        Location used when none is given (default: Dar es Salaam, Tanzania)
  USE_SEED_DATABASE       Include the built-in school database (default: false)
  ENABLED_SOURCES         Comma-separated sources used by "all" (default: every live source)
  TANZAPAGES_PAGES        Comma-separated city listing pages to read (default: 1,2,4)
  RESEARCH_MATCH_THRESHOLD  Minimum name similarity for research matches (default: 0.6)
  VERIFY_WEBSITES         Look up websites for found organizations without one (default: false)
  LOG_LEVEL               Log level: debug, info, notice, warning, error (default: info)
  OTEL_ENABLED            Enable OpenTelemetry (default: false)
  OTEL_EXPORTER_OTLP_ENDPOINT  OpenTelemetry endpoint URL
`);
  process.exit(0);
}

// Load and validate configuration
const { config, sources: sourceStatus } = loadConfig();

initTelemetry(config, SERVER_VERSION);

const logger = new Logger(SERVER_NAME);
logger.setLevel(Logger.parseLevel(config.logLevel));

logger.info('main', {
  action: 'source_status',
  message: getSourceStatusMessage(sourceStatus),
});

const rateLimiter = new RateLimiter(logger, {
  defaults: { minDelayMs: config.rateLimitMinMs, maxDelayMs: config.rateLimitMaxMs },
});
const cache = new SQLiteCache(
  { enabled: config.cacheEnabled, path: config.cachePath, defaultTTLHours: config.cacheTtlHours },
  logger
);
const registry = SourceRegistry.fromConfig(config, cache, logger, rateLimiter);
const websiteFinder = new WebsiteFinder(sourceOptions(config), cache, logger, rateLimiter);
const store = new OrganizationStore(logger);

const defaults = {
  location: config.defaultLocation,
  useSeedDatabase: config.useSeedDatabase,
  matchThreshold: config.researchMatchThreshold,
  verifyWebsites: config.verifyWebsites,
};

const searchTool = new SearchOrganizationsTool(registry, store, defaults, logger, websiteFinder);
const loadDatasetTool = new LoadDatasetTool(store, logger);
const researchTool = new ResearchContactsTool(registry, store, defaults, logger);
const reportTool = new GenerateReportTool(store, logger);
const exportTool = new ExportDatasetTool(store, logger);
const statsTool = new DatasetStatsTool(store, cache, logger);

interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
}

const tools: ToolDefinition[] = [
  {
    name: 'search_organizations',
    description:
      'Search directories, maps, social pages and registries for organizations of a type in one location or several. Results are normalized, deduplicated by name and added to the current dataset with a priority tier. Optionally looks up a website for organizations found without one.',
    inputSchema: SearchOrganizationsInputSchema,
  },
  {
    name: 'load_dataset',
    description:
      'Load a CSV or JSON dataset (export format) as the current dataset, replacing whatever was loaded or searched before.',
    inputSchema: LoadDatasetInputSchema,
  },
  {
    name: 'research_contacts',
    description:
      'Look up every organization below Tier A by name in the selected sources and fill in missing phones, emails, addresses and websites. Reports per-field gains and tier changes.',
    inputSchema: ResearchContactsInputSchema,
  },
  {
    name: 'generate_report',
    description:
      'Produce a plain-text summary of the current dataset: totals by type and tier, field coverage, sources used and organizations still missing a phone.',
    inputSchema: GenerateReportInputSchema,
  },
  {
    name: 'export_dataset',
    description:
      'Write the current dataset as CSV, JSON or a text report, optionally filtered by tier, type or website status.',
    inputSchema: ExportDatasetInputSchema,
  },
  {
    name: 'dataset_stats',
    description: 'Tier counts and field coverage of the current dataset.',
    inputSchema: DatasetStatsInputSchema,
  },
];

const server = new Server(
  {
    name: SERVER_NAME,
    version: SERVER_VERSION,
  },
  {
    capabilities: {
      tools: {},
      logging: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToJsonSchema(tool.inputSchema),
    })),
  };
});

server.setRequestHandler(SetLevelRequestSchema, async (request) => {
  const level = LogLevel.parse(request.params.level);
  logger.setLevel(level);
  logger.info('main', { action: 'log_level_changed', level });
  return {};
});

/**
 * Execute a tool call and record telemetry
 */
async function executeToolCall(
  name: string,
  args: unknown
): Promise<{ content: { type: 'text'; text: string }[]; isError?: boolean }> {
  const startTime = Date.now();
  let success = true;

  try {
    let result: unknown;
    switch (name) {
      case 'search_organizations':
        result = await searchTool.execute(SearchOrganizationsInputSchema.parse(args ?? {}));
        break;
      case 'load_dataset':
        result = await loadDatasetTool.execute(LoadDatasetInputSchema.parse(args ?? {}));
        break;
      case 'research_contacts':
        result = await researchTool.execute(ResearchContactsInputSchema.parse(args ?? {}));
        break;
      case 'generate_report': {
        const output = await reportTool.execute(GenerateReportInputSchema.parse(args ?? {}));
        // The report itself is returned as plain text
        const text = output.path ? `${output.report}\nWritten to ${output.path}\n` : output.report;
        return { content: [{ type: 'text', text }] };
      }
      case 'export_dataset':
        result = await exportTool.execute(ExportDatasetInputSchema.parse(args ?? {}));
        break;
      case 'dataset_stats':
        result = await statsTool.execute(DatasetStatsInputSchema.parse(args ?? {}));
        break;
      default:
        throw new ContactFinderError('VALIDATION_ERROR', `Unknown tool: ${name}`);
    }

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    };
  } catch (error) {
    success = false;
    const code = errorCode(error);

    logger.error('main', {
      action: 'tool_error',
      tool: name,
      code,
      error: errorMessage(error),
    });

    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify({
            error: {
              code,
              message: errorMessage(error),
              retryable: error instanceof ContactFinderError ? error.retryable : false,
            },
          }),
        },
      ],
      isError: true,
    };
  } finally {
    const duration = Date.now() - startTime;
    recordToolCall(name, duration, success);
  }
}

function errorCode(error: unknown): ErrorCode | 'UNKNOWN_ERROR' {
  if (error instanceof ContactFinderError) return error.code;
  if (error instanceof ZodError) return 'VALIDATION_ERROR';
  return 'UNKNOWN_ERROR';
}

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: toolArgs } = request.params;
  return executeToolCall(name, toolArgs);
});

/**
 * Convert a tool input schema to JSON Schema for MCP
 */
function zodToJsonSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  let json: Record<string, unknown>;

  if (schema instanceof z.ZodOptional) {
    json = zodToJsonSchema(schema.unwrap());
  } else if (schema instanceof z.ZodDefault) {
    json = { ...zodToJsonSchema(schema.removeDefault()), default: schema._def.defaultValue() };
  } else if (schema instanceof z.ZodString) {
    json = { type: 'string' };
  } else if (schema instanceof z.ZodNumber) {
    json = { type: schema.isInt ? 'integer' : 'number' };
  } else if (schema instanceof z.ZodBoolean) {
    json = { type: 'boolean' };
  } else if (schema instanceof z.ZodEnum) {
    json = { type: 'string', enum: schema.options };
  } else if (schema instanceof z.ZodArray) {
    json = { type: 'array', items: zodToJsonSchema(schema.element) };
  } else if (schema instanceof z.ZodObject) {
    const properties: Record<string, unknown> = {};
    const required: string[] = [];

    for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
      properties[key] = zodToJsonSchema(value);
      if (!value.isOptional()) required.push(key);
    }

    json = {
      type: 'object',
      properties,
      required: required.length > 0 ? required : undefined,
    };
  } else {
    json = {};
  }

  if (schema.description) {
    json.description = schema.description;
  }
  return json;
}

async function main() {
  logger.info('main', {
    action: 'starting',
    transport: 'stdio',
    cache_enabled: config.cacheEnabled,
    sources: sourceStatus.filter((s) => s.available).map((s) => s.name),
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Route logs to the client once connected
  logger.setEmitter((entry) => {
    server
      .notification({
        method: 'notifications/message',
        params: {
          level: entry.level,
          logger: entry.logger,
          data: entry.data,
        },
      })
      .catch((error: unknown) => {
        process.stderr.write(`Failed to send log notification: ${errorMessage(error)}\n`);
      });
  });

  logger.info('main', {
    action: 'started',
    transport: 'stdio',
  });
}

async function shutdown() {
  logger.info('main', { action: 'shutting_down' });
  cache.close();
  await shutdownTelemetry();
  process.exit(0);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
