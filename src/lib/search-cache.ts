/**
 * Research Similarity Cache
 *
 * Caches a run's scored result set under a fingerprint of the normalized
 * query and mode. Lookup tries the exact fingerprint first, then compares
 * token sets against a bounded window of recent same-mode entries.
 *
 * Fingerprint: sha256(sorted content tokens + "|" + mode)
 *
 * Expired entries are misses and are evicted lazily on the next lookup or
 * store; `sweepIntervalMs > 0` adds a periodic sweep.
 *
 * @module search-cache
 */

import crypto from "node:crypto";
import type { CacheConfig } from "./config-schemas";
import type { SearchCacheStats, SearchCacheStore } from "./search-cache-store";
import { contentTokens, jaccardSimilarity } from "./research/text-utils";
import type { CacheEntry, CacheHit, ResearchMode, SourceRecord } from "./research/types";

// ============================================================================
// FINGERPRINTING
// ============================================================================

/**
 * Normalized, sorted token set of a query.
 */
export function normalizeQueryTokens(queryText: string): string[] {
  return [...contentTokens(queryText)].sort();
}

export function fingerprintTokens(tokens: readonly string[], mode: ResearchMode): string {
  return crypto.createHash("sha256").update(`${tokens.join(" ")}|${mode}`).digest("hex");
}

export function fingerprintQuery(queryText: string, mode: ResearchMode): string {
  return fingerprintTokens(normalizeQueryTokens(queryText), mode);
}

// ============================================================================
// CACHE
// ============================================================================

export class SimilarityCache {
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly backingStore: SearchCacheStore,
    private readonly config: CacheConfig,
    private readonly now: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  get similarityThreshold(): number {
    return this.config.similarityThreshold;
  }

  /**
   * Find a cached result set for this query and mode.
   * Store errors are logged and reported as a miss.
   */
  async lookup(queryText: string, mode: ResearchMode): Promise<CacheHit | null> {
    if (!this.config.enabled) return null;

    const tokens = normalizeQueryTokens(queryText);
    const fingerprint = fingerprintTokens(tokens, mode);
    const now = this.now();

    try {
      await this.evictExpired(now);

      const exact = await this.backingStore.get(fingerprint);
      if (exact && exact.expiresAt > now) {
        await this.backingStore.incrementHits(fingerprint);
        console.log(
          `[Research-Cache] ✅ Exact HIT for "${queryText.substring(0, 50)}" (${mode}, ${exact.resultSet.length} sources)`,
        );
        return { entry: exact, exact: true, similarity: 1 };
      }

      if (tokens.length === 0) return null;

      const recent = await this.backingStore.listRecent(mode, this.config.recentWindowSize, now);
      let best: CacheEntry | null = null;
      let bestSimilarity = 0;
      for (const candidate of recent) {
        const similarity = jaccardSimilarity(tokens, candidate.tokens);
        // Ties go to the newer entry (listRecent is newest first)
        if (similarity > bestSimilarity) {
          best = candidate;
          bestSimilarity = similarity;
        }
      }

      if (best && bestSimilarity >= this.config.similarityThreshold) {
        await this.backingStore.incrementHits(best.fingerprint);
        console.log(
          `[Research-Cache] ✅ Similar HIT for "${queryText.substring(0, 50)}" (${Math.round(bestSimilarity * 100)}% similar to "${best.queryText.substring(0, 50)}")`,
        );
        return { entry: best, exact: false, similarity: bestSimilarity };
      }

      return null;
    } catch (err) {
      console.error("[Research-Cache] Error reading cache:", err);
      return null;
    }
  }

  /**
   * Store a result set. Last writer wins; returns null when disabled or on store error.
   */
  async store(queryText: string, mode: ResearchMode, resultSet: readonly SourceRecord[]): Promise<CacheEntry | null> {
    if (!this.config.enabled) return null;

    const tokens = normalizeQueryTokens(queryText);
    const now = this.now();
    const entry: CacheEntry = {
      fingerprint: fingerprintTokens(tokens, mode),
      queryText,
      tokens,
      mode,
      resultSet: [...resultSet],
      createdAt: now,
      expiresAt: now + this.config.ttlHours * 60 * 60 * 1000,
      hits: 0,
    };

    try {
      await this.evictExpired(now);
      await this.backingStore.put(entry);
      console.log(
        `[Research-Cache] ✅ Cached ${resultSet.length} sources for "${queryText.substring(0, 50)}" (${mode}, TTL: ${this.config.ttlHours}h)`,
      );
      return entry;
    } catch (err) {
      console.error("[Research-Cache] Error writing cache:", err);
      return null;
    }
  }

  private async evictExpired(now: number): Promise<number> {
    const deleted = await this.backingStore.deleteExpired(now);
    if (deleted > 0) {
      console.log(`[Research-Cache] Evicted ${deleted} expired entries`);
    }
    return deleted;
  }

  // ==========================================================================
  // MAINTENANCE
  // ==========================================================================

  async cleanupExpired(): Promise<number> {
    try {
      return await this.evictExpired(this.now());
    } catch (err) {
      console.error("[Research-Cache] Error cleaning up cache:", err);
      return 0;
    }
  }

  async clear(): Promise<number> {
    const deleted = await this.backingStore.clear();
    console.log(`[Research-Cache] Cleared ${deleted} cache entries`);
    return deleted;
  }

  async getStats(): Promise<SearchCacheStats> {
    return this.backingStore.stats(this.now());
  }

  /**
   * Start the periodic sweep, when configured. The timer never keeps the process alive.
   */
  startSweep(): void {
    if (this.sweepTimer || this.config.sweepIntervalMs <= 0 || !this.config.enabled) return;
    this.sweepTimer = setInterval(() => {
      void this.cleanupExpired();
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  async close(): Promise<void> {
    this.stopSweep();
    await this.backingStore.close();
  }
}
