import Database from 'better-sqlite3';
import type { Database as DatabaseType, Statement } from 'better-sqlite3';
import type { CacheClient, CacheEntry } from '../cache/cache.js';
import type { CredentialRow, PoolStats } from '../types/index.js';
import { StoreError } from '../errors.js';
import { epochSecondsNow } from '../utils/time.js';
import type { CredentialStore, PoolInspector } from './store.js';

export const DEFAULT_DB_FILE = 'camp_api_cache.db';
export const CACHE_TTL_SECONDS = 3000;
export const PARAM_REUSE_COOLDOWN_SECONDS = 3600;
export const FRESH_USE_LIMIT = 2;

export interface SqliteStoreOptions {
  filename?: string;
  cacheTtlSeconds?: number;
  cooldownSeconds?: number;
  freshUseLimit?: number;
  now?: () => number;
}

interface CacheRow {
  value: Buffer;
  timestamp: number;
}

interface PoolRow {
  param: string;
  use_count: number;
  last_used: number;
}

interface CountRow {
  count: number;
}

interface StatsRow {
  total: number;
  available: number | null;
  cooling_down: number | null;
  reusable: number | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS cache (
    key TEXT PRIMARY KEY,
    value BLOB NOT NULL,
    timestamp INTEGER NOT NULL
  );
  CREATE TABLE IF NOT EXISTS pool (
    param TEXT PRIMARY KEY,
    use_count INTEGER NOT NULL DEFAULT 0,
    last_used INTEGER NOT NULL DEFAULT 0
  );
`;

// Allocation runs under BEGIN IMMEDIATE so processes sharing the file serialize on the write lock.
export class SqliteStore implements CacheClient, CredentialStore, PoolInspector {
  private readonly db: DatabaseType;
  private readonly cacheTtlSeconds: number;
  private readonly cooldownSeconds: number;
  private readonly freshUseLimit: number;
  private readonly now: () => number;

  private readonly selectCache: Statement<[string], CacheRow>;
  private readonly upsertCache: Statement<[string, Buffer, number]>;
  private readonly deleteExpiredCache: Statement<[number]>;
  private readonly insertParam: Statement<[string]>;
  private readonly countFresh: Statement<[number], CountRow>;
  private readonly selectFresh: Statement<[number], PoolRow>;
  private readonly selectCooled: Statement<[number, number], PoolRow>;
  private readonly markUsed: Statement<[number, string]>;
  private readonly selectParam: Statement<[string], PoolRow>;
  private readonly selectStats: Statement<[number, number, number, number, number], StatsRow>;

  constructor(options: SqliteStoreOptions = {}) {
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? CACHE_TTL_SECONDS;
    this.cooldownSeconds = options.cooldownSeconds ?? PARAM_REUSE_COOLDOWN_SECONDS;
    this.freshUseLimit = options.freshUseLimit ?? FRESH_USE_LIMIT;
    this.now = options.now ?? epochSecondsNow;

    const filename = options.filename ?? DEFAULT_DB_FILE;
    this.db = openDatabase(filename);

    this.selectCache = this.db.prepare<[string], CacheRow>('SELECT value, timestamp FROM cache WHERE key = ?');
    this.upsertCache = this.db.prepare<[string, Buffer, number]>(
      'INSERT OR REPLACE INTO cache (key, value, timestamp) VALUES (?, ?, ?)',
    );
    this.deleteExpiredCache = this.db.prepare<[number]>('DELETE FROM cache WHERE timestamp <= ?');
    this.insertParam = this.db.prepare<[string]>(
      'INSERT OR IGNORE INTO pool (param, use_count, last_used) VALUES (?, 0, 0)',
    );
    this.countFresh = this.db.prepare<[number], CountRow>('SELECT COUNT(*) AS count FROM pool WHERE use_count < ?');
    this.selectFresh = this.db.prepare<[number], PoolRow>(
      'SELECT param, use_count, last_used FROM pool WHERE use_count < ? ORDER BY use_count ASC, last_used ASC LIMIT 1',
    );
    this.selectCooled = this.db.prepare<[number, number], PoolRow>(
      `SELECT param, use_count, last_used FROM pool
       WHERE use_count >= ? AND last_used <= ?
       ORDER BY last_used ASC LIMIT 1`,
    );
    this.markUsed = this.db.prepare<[number, string]>(
      'UPDATE pool SET use_count = use_count + 1, last_used = ? WHERE param = ?',
    );
    this.selectParam = this.db.prepare<[string], PoolRow>(
      'SELECT param, use_count, last_used FROM pool WHERE param = ?',
    );
    this.selectStats = this.db.prepare<[number, number, number, number, number], StatsRow>(
      `SELECT
         COUNT(*) AS total,
         SUM(CASE WHEN use_count < ? THEN 1 ELSE 0 END) AS available,
         SUM(CASE WHEN use_count >= ? AND last_used > ? THEN 1 ELSE 0 END) AS cooling_down,
         SUM(CASE WHEN use_count >= ? AND last_used <= ? THEN 1 ELSE 0 END) AS reusable
       FROM pool`,
    );
  }

  async getCache(key: string): Promise<string | null> {
    const entry = this.run('read cache entry', () => this.readCacheEntry(key));
    if (!entry || this.now() - entry.storedAt >= this.cacheTtlSeconds) {
      return null;
    }
    return entry.value;
  }

  async setCache(key: string, value: string): Promise<void> {
    this.run('write cache entry', () => {
      this.upsertCache.run(key, Buffer.from(value, 'utf8'), this.now());
    });
  }

  async pruneCache(): Promise<number> {
    return this.run('prune cache', () => this.deleteExpiredCache.run(this.now() - this.cacheTtlSeconds).changes);
  }

  async addCredentials(params: Iterable<string>): Promise<number> {
    const unique = [...new Set(params)];
    if (unique.length === 0) {
      return 0;
    }

    const insertAll = this.db.transaction((values: string[]) => {
      let inserted = 0;
      for (const value of values) {
        inserted += this.insertParam.run(value).changes;
      }
      return inserted;
    });

    return this.run('insert credentials', () => insertAll(unique));
  }

  async countAvailable(): Promise<number> {
    return this.run('count credentials', () => this.countFresh.get(this.freshUseLimit)?.count ?? 0);
  }

  async allocate(): Promise<string | null> {
    const pick = this.db.transaction((now: number): string | null => {
      const row =
        this.selectFresh.get(this.freshUseLimit) ??
        this.selectCooled.get(this.freshUseLimit, now - this.cooldownSeconds);
      if (!row) {
        return null;
      }

      this.markUsed.run(now, row.param);
      return row.param;
    });

    return this.run('allocate credential', () => pick.immediate(this.now()));
  }

  async poolStats(): Promise<PoolStats> {
    const threshold = this.now() - this.cooldownSeconds;
    const limit = this.freshUseLimit;
    const row = this.run('read pool stats', () => this.selectStats.get(limit, limit, threshold, limit, threshold));
    return {
      total: row?.total ?? 0,
      available: row?.available ?? 0,
      coolingDown: row?.cooling_down ?? 0,
      reusable: row?.reusable ?? 0,
    };
  }

  async getCredentialRow(param: string): Promise<CredentialRow | null> {
    const row = this.run('read credential', () => this.selectParam.get(param));
    if (!row) {
      return null;
    }
    return { param: row.param, useCount: row.use_count, lastUsedAt: row.last_used };
  }

  close(): void {
    this.db.close();
  }

  private readCacheEntry(key: string): CacheEntry | null {
    const row = this.selectCache.get(key);
    if (!row) {
      return null;
    }
    return { key, value: row.value.toString('utf8'), storedAt: row.timestamp };
  }

  private run<T>(operation: string, action: () => T): T {
    try {
      return action();
    } catch (error) {
      throw new StoreError(`Failed to ${operation}.`, { cause: error });
    }
  }
}

function openDatabase(filename: string): DatabaseType {
  try {
    const db = new Database(filename);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new StoreError(`Failed to open store at ${filename}.`, { cause: error });
  }
}
