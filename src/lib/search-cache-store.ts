/**
 * Research Cache Stores
 *
 * Backing stores for the similarity cache. The SQLite store persists entries
 * in the `research_cache` table; the in-memory store serves tests and
 * single-process deployments. Both are safe under concurrent runs:
 * writes are last-writer-wins and duplicate population is not an error.
 *
 * @module search-cache-store
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "node:path";
import { CacheEntrySchema, type CacheEntry, type ResearchMode } from "./research/types";

export interface SearchCacheStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  totalHits: number;
  modeBreakdown: Partial<Record<ResearchMode, number>>;
  oldestEntry: number | null;
  newestEntry: number | null;
}

export interface SearchCacheStore {
  get(fingerprint: string): Promise<CacheEntry | null>;
  put(entry: CacheEntry): Promise<void>;
  delete(fingerprint: string): Promise<void>;
  /** Valid entries of one mode, newest first */
  listRecent(mode: ResearchMode, limit: number, now: number): Promise<CacheEntry[]>;
  deleteExpired(now: number): Promise<number>;
  incrementHits(fingerprint: string): Promise<void>;
  clear(): Promise<number>;
  stats(now: number): Promise<SearchCacheStats>;
  close(): Promise<void>;
}

// ============================================================================
// IN-MEMORY STORE
// ============================================================================

export class InMemorySearchCacheStore implements SearchCacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(fingerprint);
    return entry ? { ...entry } : null;
  }

  async put(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.fingerprint, { ...entry });
  }

  async delete(fingerprint: string): Promise<void> {
    this.entries.delete(fingerprint);
  }

  async listRecent(mode: ResearchMode, limit: number, now: number): Promise<CacheEntry[]> {
    return [...this.entries.values()]
      .filter((e) => e.mode === mode && e.expiresAt > now)
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, limit)
      .map((e) => ({ ...e }));
  }

  async deleteExpired(now: number): Promise<number> {
    let deleted = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async incrementHits(fingerprint: string): Promise<void> {
    const entry = this.entries.get(fingerprint);
    if (entry) entry.hits++;
  }

  async clear(): Promise<number> {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  async stats(now: number): Promise<SearchCacheStats> {
    const all = [...this.entries.values()];
    const valid = all.filter((e) => e.expiresAt > now);
    const modeBreakdown: Partial<Record<ResearchMode, number>> = {};
    for (const e of valid) {
      modeBreakdown[e.mode] = (modeBreakdown[e.mode] ?? 0) + 1;
    }
    const created = valid.map((e) => e.createdAt);
    return {
      totalEntries: all.length,
      validEntries: valid.length,
      expiredEntries: all.length - valid.length,
      totalHits: all.reduce((sum, e) => sum + e.hits, 0),
      modeBreakdown,
      oldestEntry: created.length > 0 ? Math.min(...created) : null,
      newestEntry: created.length > 0 ? Math.max(...created) : null,
    };
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

// ============================================================================
// SQLITE STORE
// ============================================================================

interface ResearchCacheRow {
  fingerprint: string;
  query_text: string;
  tokens_json: string; // JSON
  mode: string;
  results_json: string; // JSON
  created_at: number;
  expires_at: number;
  hits: number;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Rows are validated on the way out; a row that no longer matches the
 * entry schema is treated as absent.
 */
function rowToEntry(row: ResearchCacheRow): CacheEntry | null {
  const parsed = CacheEntrySchema.safeParse({
    fingerprint: row.fingerprint,
    queryText: row.query_text,
    tokens: parseJson(row.tokens_json),
    mode: row.mode,
    resultSet: parseJson(row.results_json),
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    hits: row.hits,
  });
  if (!parsed.success) {
    console.warn(`[Research-Cache] Discarding unreadable row ${row.fingerprint.substring(0, 12)}`);
    return null;
  }
  return parsed.data;
}

export class SqliteSearchCacheStore implements SearchCacheStore {
  private db: Database | null = null;
  private dbPromise: Promise<Database> | null = null;

  constructor(private readonly dbPath: string) {}

  private async getDb(): Promise<Database> {
    if (this.db) return this.db;
    if (!this.dbPromise) {
      this.dbPromise = (async () => {
        const inMemory = this.dbPath === ":memory:";
        const filename = inMemory ? this.dbPath : path.resolve(this.dbPath);
        console.log(`[Research-Cache] Opening database at ${filename}`);

        const instance = await open({
          filename,
          driver: sqlite3.Database,
        });

        if (!inMemory) {
          await instance.exec("PRAGMA journal_mode=WAL");
        }

        await instance.exec(`
          CREATE TABLE IF NOT EXISTS research_cache (
            fingerprint TEXT PRIMARY KEY,
            query_text TEXT NOT NULL,
            tokens_json TEXT NOT NULL,
            mode TEXT NOT NULL,
            results_json TEXT NOT NULL,
            created_at INTEGER NOT NULL,
            expires_at INTEGER NOT NULL,
            hits INTEGER NOT NULL DEFAULT 0
          );

          CREATE INDEX IF NOT EXISTS idx_research_cache_expires ON research_cache(expires_at);
          CREATE INDEX IF NOT EXISTS idx_research_cache_mode_created ON research_cache(mode, created_at);
        `);

        console.log("[Research-Cache] Database initialized");
        this.db = instance;
        return instance;
      })();
    }
    return this.dbPromise;
  }

  async get(fingerprint: string): Promise<CacheEntry | null> {
    const database = await this.getDb();
    const row = await database.get<ResearchCacheRow>(
      "SELECT * FROM research_cache WHERE fingerprint = ?",
      [fingerprint],
    );
    return row ? rowToEntry(row) : null;
  }

  async put(entry: CacheEntry): Promise<void> {
    const database = await this.getDb();
    await database.run(
      `INSERT OR REPLACE INTO research_cache
       (fingerprint, query_text, tokens_json, mode, results_json, created_at, expires_at, hits)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.fingerprint,
        entry.queryText,
        JSON.stringify(entry.tokens),
        entry.mode,
        JSON.stringify(entry.resultSet),
        entry.createdAt,
        entry.expiresAt,
        entry.hits,
      ],
    );
  }

  async delete(fingerprint: string): Promise<void> {
    const database = await this.getDb();
    await database.run("DELETE FROM research_cache WHERE fingerprint = ?", [fingerprint]);
  }

  async listRecent(mode: ResearchMode, limit: number, now: number): Promise<CacheEntry[]> {
    const database = await this.getDb();
    const rows = await database.all<ResearchCacheRow[]>(
      `SELECT * FROM research_cache
       WHERE mode = ? AND expires_at > ?
       ORDER BY created_at DESC
       LIMIT ?`,
      [mode, now, limit],
    );
    const out: CacheEntry[] = [];
    for (const row of rows) {
      const entry = rowToEntry(row);
      if (entry) out.push(entry);
    }
    return out;
  }

  async deleteExpired(now: number): Promise<number> {
    const database = await this.getDb();
    const result = await database.run("DELETE FROM research_cache WHERE expires_at <= ?", [now]);
    return result.changes ?? 0;
  }

  async incrementHits(fingerprint: string): Promise<void> {
    const database = await this.getDb();
    await database.run("UPDATE research_cache SET hits = hits + 1 WHERE fingerprint = ?", [fingerprint]);
  }

  async clear(): Promise<number> {
    const database = await this.getDb();
    const result = await database.run("DELETE FROM research_cache");
    return result.changes ?? 0;
  }

  async stats(now: number): Promise<SearchCacheStats> {
    const database = await this.getDb();

    const totalRow = await database.get<{ count: number; hits: number | null }>(
      "SELECT COUNT(*) as count, SUM(hits) as hits FROM research_cache",
    );
    const totalEntries = totalRow?.count ?? 0;

    const validRow = await database.get<{ count: number; oldest: number | null; newest: number | null }>(
      "SELECT COUNT(*) as count, MIN(created_at) as oldest, MAX(created_at) as newest FROM research_cache WHERE expires_at > ?",
      [now],
    );
    const validEntries = validRow?.count ?? 0;

    const modeRows = await database.all<Array<{ mode: string; count: number }>>(
      "SELECT mode, COUNT(*) as count FROM research_cache WHERE expires_at > ? GROUP BY mode",
      [now],
    );
    const modeBreakdown: Partial<Record<ResearchMode, number>> = {};
    for (const row of modeRows) {
      if (row.mode === "quick" || row.mode === "standard" || row.mode === "deep") {
        modeBreakdown[row.mode] = row.count;
      }
    }

    return {
      totalEntries,
      validEntries,
      expiredEntries: totalEntries - validEntries,
      totalHits: totalRow?.hits ?? 0,
      modeBreakdown,
      oldestEntry: validRow?.oldest ?? null,
      newestEntry: validRow?.newest ?? null,
    };
  }

  async close(): Promise<void> {
    const pending = this.dbPromise;
    this.db = null;
    this.dbPromise = null;
    if (pending) {
      const database = await pending;
      await database.close();
      console.log("[Research-Cache] Database closed");
    }
  }
}
