/**
 * Configuration Schemas
 *
 * Zod schemas for validating and canonicalizing engine configuration.
 * One file-backed document (`configs/engine.default.json`) carries the
 * search, cache and pipeline sections; each section also has a code default.
 *
 * @module config-schemas
 * @version 1.0.0
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

export const SCHEMA_VERSION = "1.0.0" as const;

export const RESEARCH_MODES = ["quick", "standard", "deep"] as const;
export const TIERS = ["free", "premium"] as const;
export const PROVIDER_IDS = ["brave", "exa", "duckduckgo", "wikipedia", "serpapi", "google-cse"] as const;

export const ResearchModeSchema = z.enum(RESEARCH_MODES);
export const TierSchema = z.enum(TIERS);
export const ProviderIdSchema = z.enum(PROVIDER_IDS);

export type ResearchMode = z.infer<typeof ResearchModeSchema>;
export type Tier = z.infer<typeof TierSchema>;
export type ProviderId = z.infer<typeof ProviderIdSchema>;

export interface ValidationResult<T> {
  valid: boolean;
  errors: string[];
  warnings: string[];
  config?: T;
}

/**
 * Check if a string names a research mode
 */
export function isResearchMode(value: string): value is ResearchMode {
  return ResearchModeSchema.safeParse(value).success;
}

// ============================================================================
// SEARCH CONFIG SCHEMA
// ============================================================================

const DomainListSchema = z.array(z.string().regex(/^[a-z0-9.-]+$/i)).max(50);

// Ordered provider subsets; subset N+1 is only consulted when subset N falls short.
const PriorityListSchema = z.array(z.array(ProviderIdSchema).min(1)).min(1);

export const SearchConfigSchema = z.object({
  maxConcurrentSearches: z.number().int().min(1).max(32).describe("Worker pool size for one fan-out"),
  providerTimeoutMs: z.number().int().min(500).max(60000),
  fanOutTimeoutMs: z.number().int().min(1000).max(120000).describe("Wall-clock bound for one fan-out call"),
  minViableResults: z.number().int().min(1).max(50).describe("Escalate to the next subset below this count"),
  maxResultsPerProvider: z.number().int().min(1).max(20),
  maxVariantsPerRound: z.number().int().min(1).max(10),
  providerPriority: z.object({
    free: PriorityListSchema,
    premium: PriorityListSchema,
  }),
  quotaPerWindow: z.record(ProviderIdSchema, z.number().int().min(1)),
  quotaWindowMs: z.number().int().min(1000),
  domainWhitelist: DomainListSchema,
  domainBlacklist: DomainListSchema,
  circuitBreaker: z.object({
    enabled: z.boolean(),
    failureThreshold: z.number().int().min(1).max(20),
    resetTimeoutSec: z.number().int().min(1).max(3600),
  }),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  maxConcurrentSearches: 4,
  providerTimeoutMs: 10_000,
  fanOutTimeoutMs: 25_000,
  minViableResults: 1,
  maxResultsPerProvider: 10,
  maxVariantsPerRound: 3,
  providerPriority: {
    free: [["brave", "duckduckgo", "wikipedia"], ["exa"]],
    premium: [["serpapi", "google-cse"], ["brave", "exa"], ["duckduckgo", "wikipedia"]],
  },
  quotaPerWindow: {
    brave: 60,
    exa: 30,
    serpapi: 100,
    "google-cse": 100,
  },
  quotaWindowMs: 60_000,
  domainWhitelist: [],
  domainBlacklist: [],
  circuitBreaker: {
    enabled: true,
    failureThreshold: 3,
    resetTimeoutSec: 300,
  },
};

// ============================================================================
// CACHE CONFIG SCHEMA
// ============================================================================

export const CacheConfigSchema = z.object({
  enabled: z.boolean(),
  dbPath: z.string().min(1).describe("SQLite file path, or :memory:"),
  ttlHours: z.number().positive().max(24 * 90),
  similarityThreshold: z.number().min(0).max(1),
  recentWindowSize: z.number().int().min(1).max(10000),
  sweepIntervalMs: z.number().int().min(0).describe("0 disables the periodic sweep"),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  dbPath: "./research-cache.db",
  ttlHours: 24,
  similarityThreshold: 0.85,
  recentWindowSize: 200,
  sweepIntervalMs: 0,
};

// ============================================================================
// PIPELINE CONFIG SCHEMA
// ============================================================================

export const ModeConfigSchema = z.object({
  maxSources: z.number().int().min(1).max(100),
  maxWords: z.number().int().min(50).max(50000),
  maxIterations: z.number().int().min(1).max(20),
  maxWallTimeMs: z.number().int().min(1000),
  minCorroboration: z.number().int().min(1).max(10),
  premiumOnly: z.boolean(),
});

export type ModeConfig = z.infer<typeof ModeConfigSchema>;

export const TierConfigSchema = z.object({
  maxIterations: z.number().int().min(1).max(20).describe("Ceiling applied to every mode for this tier"),
  premiumFeatures: z.boolean(),
});

export type TierConfig = z.infer<typeof TierConfigSchema>;

export const PipelineConfigSchema = z.object({
  // === Model Selection ===
  llmProvider: z.enum(["anthropic", "openai", "google", "mistral"]).describe("Text-generation provider"),
  llmModel: z.string().min(1).optional().describe("Overrides the provider's default model"),
  llmTimeoutMs: z.number().int().min(1000).max(300000),
  llmMaxOutputTokens: z.number().int().min(64).max(32000),

  // === Coverage ===
  credibilityFloor: z.number().min(0).max(100).describe("Sources below this never corroborate"),
  subTopicMatchRatio: z.number().gt(0).max(1).describe("Share of sub-topic terms a source must mention"),
  maxSubTopics: z.number().int().min(1).max(10),
  compositeWeights: z.object({
    relevance: z.number().min(0).max(1),
    credibility: z.number().min(0).max(1),
  }),

  // === Stages ===
  verificationExtraRound: z.boolean(),
  collaboratorTimeoutMs: z.number().int().min(1000),
  runRetentionMs: z.number().int().min(0).describe("How long a finished run stays retrievable; 0 drops it once settled"),

  modes: z.object({
    quick: ModeConfigSchema,
    standard: ModeConfigSchema,
    deep: ModeConfigSchema,
  }),
  tiers: z.object({
    free: TierConfigSchema,
    premium: TierConfigSchema,
  }),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  llmProvider: "anthropic",
  llmTimeoutMs: 30_000,
  llmMaxOutputTokens: 1000,

  credibilityFloor: 40,
  subTopicMatchRatio: 0.5,
  maxSubTopics: 5,
  compositeWeights: {
    relevance: 0.6,
    credibility: 0.4,
  },

  verificationExtraRound: true,
  collaboratorTimeoutMs: 60_000,
  runRetentionMs: 600_000,

  modes: {
    quick: { maxSources: 2, maxWords: 500, maxIterations: 1, maxWallTimeMs: 60_000, minCorroboration: 1, premiumOnly: false },
    standard: { maxSources: 5, maxWords: 2000, maxIterations: 3, maxWallTimeMs: 180_000, minCorroboration: 2, premiumOnly: false },
    deep: { maxSources: 15, maxWords: 5000, maxIterations: 5, maxWallTimeMs: 600_000, minCorroboration: 3, premiumOnly: true },
  },
  tiers: {
    free: { maxIterations: 3, premiumFeatures: false },
    premium: { maxIterations: 5, premiumFeatures: true },
  },
};

// ============================================================================
// ENGINE CONFIG (all sections)
// ============================================================================

export const EngineConfigSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  search: SearchConfigSchema,
  cache: CacheConfigSchema,
  pipeline: PipelineConfigSchema,
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  schemaVersion: SCHEMA_VERSION,
  search: DEFAULT_SEARCH_CONFIG,
  cache: DEFAULT_CACHE_CONFIG,
  pipeline: DEFAULT_PIPELINE_CONFIG,
};

/**
 * Validate a parsed config document. Cross-field checks become warnings.
 */
export function validateEngineConfig(content: unknown): ValidationResult<EngineConfig> {
  const parsed = EngineConfigSchema.safeParse(content);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
      warnings: [],
    };
  }

  const config = parsed.data;
  const warnings: string[] = [];

  const weights = config.pipeline.compositeWeights;
  if (weights.relevance + weights.credibility === 0) {
    warnings.push("pipeline.compositeWeights: both weights are 0; ordering falls back to relevance then credibility");
  }
  if (config.search.fanOutTimeoutMs < config.search.providerTimeoutMs) {
    warnings.push("search.fanOutTimeoutMs is shorter than providerTimeoutMs; slow providers will always be cut off");
  }
  for (const mode of RESEARCH_MODES) {
    const m = config.pipeline.modes[mode];
    if (m.maxWallTimeMs < config.search.fanOutTimeoutMs) {
      warnings.push(`pipeline.modes.${mode}.maxWallTimeMs is shorter than one fan-out`);
    }
  }

  return { valid: true, errors: [], warnings, config };
}
