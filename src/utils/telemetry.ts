import { trace, metrics, type Span, SpanStatusCode, type Counter, type Histogram } from '@opentelemetry/api';
import { Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { BasicTracerProvider, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { MeterProvider, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import type { Config } from './config.js';

let tracerProvider: BasicTracerProvider | null = null;
let meterProvider: MeterProvider | null = null;
let initialized = false;
let serviceName = 'tz-contact-finder';

let toolCallCounter: Counter | null = null;
let toolCallDurationHistogram: Histogram | null = null;
let cacheHitCounter: Counter | null = null;
let cacheMissCounter: Counter | null = null;
let sourceRequestCounter: Counter | null = null;
let sourceErrorCounter: Counter | null = null;
let recordsMergedCounter: Counter | null = null;

/**
 * Initialize OpenTelemetry tracing and metrics
 */
export function initTelemetry(config: Config, version: string): void {
  if (!config.otelEnabled || initialized) {
    return;
  }

  serviceName = config.otelServiceName;
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.otelServiceName,
    [ATTR_SERVICE_VERSION]: version,
  });

  if (config.otelEndpoint) {
    const traceExporter = new OTLPTraceExporter({
      url: `${config.otelEndpoint}/v1/traces`,
    });

    tracerProvider = new BasicTracerProvider({ resource });
    tracerProvider.addSpanProcessor(new SimpleSpanProcessor(traceExporter));
    tracerProvider.register();

    const metricExporter = new OTLPMetricExporter({
      url: `${config.otelEndpoint}/v1/metrics`,
    });

    meterProvider = new MeterProvider({
      resource,
      readers: [
        new PeriodicExportingMetricReader({
          exporter: metricExporter,
          exportIntervalMillis: 60000,
        }),
      ],
    });

    metrics.setGlobalMeterProvider(meterProvider);
  }

  const meter = metrics.getMeter(config.otelServiceName);

  toolCallCounter = meter.createCounter('mcp.tool.calls', {
    description: 'Number of MCP tool calls',
  });
  toolCallDurationHistogram = meter.createHistogram('mcp.tool.duration', {
    description: 'Duration of MCP tool calls in milliseconds',
    unit: 'ms',
  });
  cacheHitCounter = meter.createCounter('cache.hits', {
    description: 'Number of cached source searches served',
  });
  cacheMissCounter = meter.createCounter('cache.misses', {
    description: 'Number of source searches that went to the network',
  });
  sourceRequestCounter = meter.createCounter('source.requests', {
    description: 'Number of requests to directory sources',
  });
  sourceErrorCounter = meter.createCounter('source.errors', {
    description: 'Number of failed requests to directory sources',
  });
  recordsMergedCounter = meter.createCounter('store.records_merged', {
    description: 'Raw records merged into the organization store',
  });

  initialized = true;
}

export async function shutdownTelemetry(): Promise<void> {
  if (tracerProvider) {
    await tracerProvider.shutdown();
    tracerProvider = null;
  }
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
  initialized = false;
}

/**
 * Run an operation inside an active span
 */
export function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const tracer = trace.getTracer(serviceName);
  return tracer.startActiveSpan(name, async (span) => {
    try {
      for (const [key, value] of Object.entries(attributes)) {
        span.setAttribute(key, value);
      }
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

export function recordToolCall(toolName: string, durationMs: number, success: boolean): void {
  toolCallCounter?.add(1, { tool: toolName, success: success.toString() });
  toolCallDurationHistogram?.record(durationMs, { tool: toolName, success: success.toString() });
}

export function recordCacheHit(source: string): void {
  cacheHitCounter?.add(1, { source });
}

export function recordCacheMiss(source: string): void {
  cacheMissCounter?.add(1, { source });
}

export function recordSourceRequest(source: string, success: boolean): void {
  sourceRequestCounter?.add(1, { source, success: success.toString() });
  if (!success) {
    sourceErrorCounter?.add(1, { source });
  }
}

export function recordMerge(source: string, created: boolean): void {
  recordsMergedCounter?.add(1, { source, created: created.toString() });
}
