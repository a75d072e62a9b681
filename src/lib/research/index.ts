/**
 * Research engine public exports.
 *
 * @module research
 */

export { ResearchEngine, type RunHandle } from "./orchestrator";
export { createEngineContext, type EngineContext, type EngineContextOptions } from "./engine-context";
export { createDefaultCollaborators, InMemoryPublisher, composeExtractiveReport } from "./collaborators";
export {
  createAiSdkGenerator,
  createDefaultGenerator,
  createUnavailableGenerator,
  type GenerationConstraints,
  type TextGenerator,
} from "./llm";
export {
  CollaboratorError,
  GenerationError,
  NoSourcesFoundError,
  RunAbortedError,
  RunFailure,
  WordBudgetExceededError,
} from "./errors";
export { deriveBudget } from "./budgets";
export { scoreSource, scoreSourceDetailed, credibilityLevel, buildCredibilityReport } from "./source-scoring";
export { normalizeUrl, deduplicateSources } from "./source-deduplication";
export { expandResearchQuery } from "./query-processor";
export { fanOutSearch } from "./fan-out";
export type * from "./types";

export { loadEngineConfig } from "../config-loader";
export { DEFAULT_ENGINE_CONFIG, EngineConfigSchema, type EngineConfig } from "../config-schemas";
export { SimilarityCache, fingerprintQuery } from "../search-cache";
export { InMemorySearchCacheStore, SqliteSearchCacheStore, type SearchCacheStore } from "../search-cache-store";
export { SearchProviderError, type RawResult, type SearchProvider } from "../web-search";
export { createDefaultProviders, createProviderRegistry } from "../search-providers";
