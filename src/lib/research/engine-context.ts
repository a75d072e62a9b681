/**
 * Engine context
 *
 * Everything runs share: configuration, the similarity cache, provider quota
 * counters, the circuit breaker, the provider registry, the text generator
 * and the writing collaborators. Built once per engine and passed explicitly;
 * nothing here lives in module-level state.
 *
 * @module research/engine-context
 */

import { loadEngineConfig } from "../config-loader";
import type { EngineConfig } from "../config-schemas";
import { ProviderQuotaTracker } from "../provider-quota";
import { SimilarityCache } from "../search-cache";
import { InMemorySearchCacheStore, SqliteSearchCacheStore, type SearchCacheStore } from "../search-cache-store";
import { SearchCircuitBreaker } from "../search-circuit-breaker";
import { createDefaultProviders, createProviderRegistry, type ProviderRegistry } from "../search-providers";
import type { SearchProvider } from "../web-search";
import { createDefaultCollaborators } from "./collaborators";
import { createDefaultGenerator, type TextGenerator } from "./llm";
import type { BudgetResolver, Collaborators } from "./types";

export interface EngineContext {
  readonly config: EngineConfig;
  readonly cache: SimilarityCache;
  readonly breaker: SearchCircuitBreaker;
  readonly quotas: ProviderQuotaTracker;
  readonly providers: ProviderRegistry;
  readonly generator: TextGenerator;
  readonly collaborators: Collaborators;
  /** Null: the tier comes from the caller's UserContext (default "free") */
  readonly budgetResolver: BudgetResolver | null;
  readonly now: () => number;
}

export interface EngineContextOptions {
  /** Defaults to `loadEngineConfig()` (file + environment) */
  config?: EngineConfig;
  /** Replaces the default provider set */
  providers?: readonly SearchProvider[];
  /** Defaults to SQLite at `cache.dbPath`; "memory" selects the in-process store */
  cacheStore?: SearchCacheStore | "memory";
  generator?: TextGenerator;
  collaborators?: Partial<Collaborators>;
  budgetResolver?: BudgetResolver;
  now?: () => number;
}

function createCacheStore(option: EngineContextOptions["cacheStore"], config: EngineConfig): SearchCacheStore {
  if (option === "memory") return new InMemorySearchCacheStore();
  if (option) return option;
  return new SqliteSearchCacheStore(config.cache.dbPath);
}

export function createEngineContext(options: EngineContextOptions = {}): EngineContext {
  const config = options.config ?? loadEngineConfig().config;
  const now = options.now ?? Date.now;

  const cache = new SimilarityCache(createCacheStore(options.cacheStore, config), config.cache, now);
  cache.startSweep();

  const defaults = createDefaultCollaborators(now);

  return {
    config,
    cache,
    breaker: new SearchCircuitBreaker(config.search.circuitBreaker, now),
    quotas: new ProviderQuotaTracker(config.search.quotaPerWindow, config.search.quotaWindowMs, now),
    providers: options.providers ? createProviderRegistry(options.providers) : createDefaultProviders(),
    generator: options.generator ?? createDefaultGenerator(config.pipeline),
    collaborators: { ...defaults, ...options.collaborators },
    budgetResolver: options.budgetResolver ?? null,
    now,
  };
}
