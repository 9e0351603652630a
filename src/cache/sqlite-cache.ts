import Database from 'better-sqlite3';
import { Logger } from '../utils/logger.js';
import { recordCacheHit, recordCacheMiss } from '../utils/telemetry.js';

export interface CacheEntry<T = unknown> {
  key: string;
  value: T;
  source: string;
  created_at: number;
  expires_at: number;
  hit_count: number;
}

export interface CacheOptions {
  path: string;
  defaultTTLHours: number;
  enabled: boolean;
}

interface CacheRow {
  key: string;
  value: string;
  source: string;
  created_at: number;
  expires_at: number;
  hit_count: number;
}

// TTL presets in hours
export const CacheTTL = {
  SEARCH_RESULTS: 1,
  WEBSITE_LOOKUP: 24,
} as const;

/**
 * SQLite-backed cache of source search results, keyed by source and query
 */
export class SQLiteCache {
  private db: Database.Database;
  private enabled: boolean;
  private defaultTTLHours: number;
  private logger: Logger;

  constructor(options: CacheOptions, logger: Logger) {
    this.enabled = options.enabled;
    this.defaultTTLHours = options.defaultTTLHours;
    this.logger = logger;

    if (!this.enabled) {
      // Keep a handle even when disabled so close() stays uniform
      this.db = new Database(':memory:');
      return;
    }

    this.db = new Database(options.path);
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS search_cache (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        source TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        expires_at INTEGER NOT NULL,
        hit_count INTEGER DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_search_cache_expires ON search_cache(expires_at);
      CREATE INDEX IF NOT EXISTS idx_search_cache_source ON search_cache(source);
    `);

    this.cleanup();

    this.logger.info('cache', { action: 'initialized', path: this.db.name });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Build a cache key from a source id and query parts
   */
  static makeKey(source: string, ...parts: (string | number | undefined)[]): string {
    const validParts = parts.filter((p): p is string | number => p !== undefined);
    return `${source.toLowerCase()}:${validParts.map((p) => String(p).toLowerCase().trim()).join(':')}`;
  }

  get<T>(key: string): CacheEntry<T> | null {
    if (!this.enabled) return null;

    const row = this.db
      .prepare(`SELECT * FROM search_cache WHERE key = ? AND expires_at > ?`)
      .get(key, Date.now()) as CacheRow | undefined;

    if (!row) return null;

    this.db.prepare(`UPDATE search_cache SET hit_count = hit_count + 1 WHERE key = ?`).run(key);

    try {
      const value: T = JSON.parse(row.value);
      this.logger.debug('cache', { action: 'hit', key, source: row.source });

      return {
        key: row.key,
        value,
        source: row.source,
        created_at: row.created_at,
        expires_at: row.expires_at,
        hit_count: row.hit_count + 1,
      };
    } catch (error) {
      this.logger.warning('cache', {
        action: 'parse_error',
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      this.delete(key);
      return null;
    }
  }

  set<T>(key: string, value: T, source: string, ttlHours?: number): void {
    if (!this.enabled) return;

    const now = Date.now();
    const ttl = ttlHours ?? this.defaultTTLHours;

    this.db
      .prepare(
        `INSERT OR REPLACE INTO search_cache (key, value, source, created_at, expires_at, hit_count)
         VALUES (?, ?, ?, ?, ?, 0)`
      )
      .run(key, JSON.stringify(value), source, now, now + ttl * 60 * 60 * 1000);
    this.logger.debug('cache', { action: 'set', key, source, ttl_hours: ttl });
  }

  /**
   * Return the cached value for `key`, or run `load` and cache its result.
   * A null result from `load` is not cached.
   */
  async remember<T>(
    key: string,
    source: string,
    load: () => Promise<T | null>,
    ttlHours?: number
  ): Promise<T | null> {
    const cached = this.get<T>(key);
    if (cached) {
      recordCacheHit(source);
      return cached.value;
    }

    recordCacheMiss(source);
    const value = await load();
    if (value !== null) {
      this.set(key, value, source, ttlHours);
    }
    return value;
  }

  delete(key: string): void {
    if (!this.enabled) return;
    this.db.prepare(`DELETE FROM search_cache WHERE key = ?`).run(key);
  }

  /**
   * Remove expired entries, returning how many were deleted
   */
  cleanup(): number {
    if (!this.enabled) return 0;
    const result = this.db.prepare(`DELETE FROM search_cache WHERE expires_at < ?`).run(Date.now());
    if (result.changes > 0) {
      this.logger.info('cache', { action: 'cleanup', deleted: result.changes });
    }
    return result.changes;
  }

  stats(): { total: number; bySource: Record<string, number> } {
    if (!this.enabled) {
      return { total: 0, bySource: {} };
    }

    const now = Date.now();
    const rows = this.db
      .prepare(`SELECT source, COUNT(*) as count FROM search_cache WHERE expires_at > ? GROUP BY source`)
      .all(now) as { source: string; count: number }[];

    const bySource: Record<string, number> = {};
    let total = 0;
    for (const row of rows) {
      bySource[row.source] = row.count;
      total += row.count;
    }

    return { total, bySource };
  }

  close(): void {
    this.db.close();
    this.logger.info('cache', { action: 'closed' });
  }
}
