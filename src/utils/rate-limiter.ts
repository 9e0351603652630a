import { Logger } from './logger.js';

export interface RateLimitConfig {
  minDelayMs: number;
  maxDelayMs: number;
}

interface RateLimitState {
  config: RateLimitConfig;
  // Tail of the wait queue; waits for one source run one after another
  queue: Promise<void>;
  backoffUntil: number;
  requests: number;
}

export interface RateLimiterOptions {
  defaults?: RateLimitConfig;
  random?: () => number;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = { minDelayMs: 300, maxDelayMs: 800 };

/**
 * Per-source randomized delay gate with exponential backoff.
 * Requests to the same source are spaced by a delay drawn uniformly from
 * the source's interval; different sources never wait on each other.
 */
export class RateLimiter {
  private states: Map<string, RateLimitState> = new Map();
  private logger: Logger;
  private defaults: RateLimitConfig;
  private random: () => number;

  constructor(logger: Logger, options: RateLimiterOptions = {}) {
    this.logger = logger;
    this.defaults = options.defaults ?? DEFAULT_RATE_LIMIT;
    this.random = options.random ?? Math.random;
  }

  /**
   * Configure the delay interval for a source
   */
  configure(source: string, config: RateLimitConfig): void {
    const state = this.getState(source);
    state.config = {
      minDelayMs: Math.max(0, Math.min(config.minDelayMs, config.maxDelayMs)),
      maxDelayMs: Math.max(0, config.minDelayMs, config.maxDelayMs),
    };
  }

  getConfig(source: string): RateLimitConfig {
    return { ...this.getState(source).config };
  }

  /**
   * Draw the next delay for a source from its configured interval
   */
  nextDelay(source: string): number {
    const { minDelayMs, maxDelayMs } = this.getState(source).config;
    return minDelayMs + this.random() * (maxDelayMs - minDelayMs);
  }

  /**
   * Block until the source may be called again. Never rejects; an aborted
   * signal ends the wait early and the caller proceeds.
   */
  waitForSlot(source: string, signal?: AbortSignal): Promise<void> {
    const state = this.getState(source);
    const turn = state.queue.then(() => this.pause(source, state, signal));
    state.queue = turn;
    return turn;
  }

  /**
   * Record a request
   */
  recordRequest(source: string): void {
    this.getState(source).requests++;
  }

  requestCount(source: string): number {
    return this.states.get(source)?.requests ?? 0;
  }

  /**
   * Trigger exponential backoff after a rate limit hit
   */
  triggerBackoff(source: string, attempt: number = 1): number {
    const state = this.getState(source);

    // 2^attempt seconds, capped at 60s
    const backoffMs = Math.min(Math.pow(2, attempt) * 1000, 60000);
    state.backoffUntil = Date.now() + backoffMs;

    this.logger.warning('rate-limiter', {
      action: 'backoff_triggered',
      source,
      attempt,
      backoff_ms: backoffMs,
    });

    return backoffMs;
  }

  /**
   * Remaining backoff for a source, 0 when none is active
   */
  getWaitTime(source: string): number {
    const state = this.states.get(source);
    if (!state) return 0;
    return Math.max(0, state.backoffUntil - Date.now());
  }

  private async pause(source: string, state: RateLimitState, signal?: AbortSignal): Promise<void> {
    const waitMs = this.getWaitTime(source) + this.nextDelay(source);

    this.logger.debug('rate-limiter', {
      action: 'waiting',
      source,
      wait_ms: Math.round(waitMs),
    });

    try {
      await sleep(waitMs, signal);
    } catch (error) {
      this.logger.warning('rate-limiter', {
        action: 'wait_interrupted',
        source,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    state.backoffUntil = Math.min(state.backoffUntil, Date.now());
  }

  private getState(source: string): RateLimitState {
    let state = this.states.get(source);
    if (!state) {
      state = {
        config: { ...this.defaults },
        queue: Promise.resolve(),
        backoffUntil: 0,
        requests: 0,
      };
      this.states.set(source, state);
    }
    return state;
  }
}

/**
 * Timer-based wait that resolves early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
