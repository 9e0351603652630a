import { request, type Dispatcher } from 'undici';
import { Logger } from './logger.js';
import { RateLimiter, sleep } from './rate-limiter.js';
import { recordSourceRequest } from './telemetry.js';

export interface HttpResponse {
  status: number;
  url: string;
  body: string;
  headers: Record<string, string>;
}

export interface HttpClientOptions {
  baseUrl?: string;
  headers?: Record<string, string>;
  timeout?: number;
  retries?: number;
}

const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
];

const DEFAULT_HEADERS: Record<string, string> = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

/**
 * HTML client for one source. Every attempt passes through the source's
 * rate-limit gate before it goes out.
 */
export class HttpClient {
  private baseUrl: string;
  private headers: Record<string, string>;
  private timeout: number;
  private retries: number;
  private logger: Logger;
  private rateLimiter: RateLimiter;
  private source: string;

  constructor(
    source: string,
    options: HttpClientOptions,
    logger: Logger,
    rateLimiter: RateLimiter
  ) {
    this.source = source;
    this.baseUrl = options.baseUrl ?? '';
    this.headers = { ...DEFAULT_HEADERS, ...options.headers };
    this.timeout = options.timeout ?? 15000;
    this.retries = Math.max(1, options.retries ?? 3);
    this.logger = logger;
    this.rateLimiter = rateLimiter;
  }

  /**
   * Get a random user agent for scraping
   */
  static getRandomUserAgent(): string {
    return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
  }

  async get(
    path: string,
    options?: {
      params?: Record<string, string | number | undefined>;
      headers?: Record<string, string>;
    }
  ): Promise<HttpResponse> {
    const url = this.buildUrl(path, options?.params);
    return this.request('GET', url, options?.headers);
  }

  private buildUrl(path: string, params?: Record<string, string | number | undefined>): string {
    const url = this.baseUrl ? new URL(path, this.baseUrl) : new URL(path);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  private async request(
    method: Dispatcher.HttpMethod,
    url: string,
    extraHeaders?: Record<string, string>
  ): Promise<HttpResponse> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.retries; attempt++) {
      try {
        await this.rateLimiter.waitForSlot(this.source);

        const startTime = Date.now();

        const response = await request(url, {
          method,
          headers: {
            'User-Agent': HttpClient.getRandomUserAgent(),
            ...this.headers,
            ...extraHeaders,
          },
          bodyTimeout: this.timeout,
          headersTimeout: this.timeout,
        });

        this.rateLimiter.recordRequest(this.source);

        const body = await response.body.text();

        this.logger.debug('http', {
          method,
          url,
          status: response.statusCode,
          duration_ms: Date.now() - startTime,
          source: this.source,
        });

        if (response.statusCode === 429 && attempt < this.retries) {
          const backoffMs = this.rateLimiter.triggerBackoff(this.source, attempt);
          this.logger.warning('http', {
            action: 'rate_limited',
            url,
            retry_after: response.headers['retry-after'],
            attempt,
            backoff_ms: backoffMs,
          });
          continue;
        }

        const headers: Record<string, string> = {};
        for (const [key, value] of Object.entries(response.headers)) {
          if (typeof value === 'string') {
            headers[key] = value;
          } else if (Array.isArray(value)) {
            headers[key] = value.join(', ');
          }
        }

        recordSourceRequest(this.source, response.statusCode < 400);

        return {
          status: response.statusCode,
          url,
          body,
          headers,
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        recordSourceRequest(this.source, false);

        this.logger.error('http', {
          action: 'request_failed',
          method,
          url,
          error: lastError.message,
          attempt,
          source: this.source,
        });

        if (attempt < this.retries) {
          await sleep(Math.pow(2, attempt) * 1000);
        }
      }
    }

    throw lastError ?? new Error(`Request to ${url} failed after ${this.retries} attempts`);
  }
}
