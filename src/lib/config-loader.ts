/**
 * Configuration Loader
 *
 * Loads the file-backed engine config, validates it, and applies
 * environment variable overrides on top.
 *
 * Resolution order:
 * 1. Environment variables (RE_*)
 * 2. Config file (RE_CONFIG_PATH, else configs/engine.default.json)
 * 3. Code defaults (DEFAULT_ENGINE_CONFIG)
 *
 * @module config-loader
 * @version 1.0.0
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_ENGINE_CONFIG,
  validateEngineConfig,
  type EngineConfig,
} from "./config-schemas";

// Re-export types for convenience
export type { EngineConfig, SearchConfig, CacheConfig, PipelineConfig } from "./config-schemas";
export { DEFAULT_ENGINE_CONFIG } from "./config-schemas";

const DEFAULT_CONFIG_PATH = fileURLToPath(new URL("../../configs/engine.default.json", import.meta.url));

export type ConfigSource = "file" | "default";

export interface LoadedEngineConfig {
  config: EngineConfig;
  source: ConfigSource;
  path: string;
  warnings: string[];
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

// ============================================================================
// FILE LOADING
// ============================================================================

function readConfigFile(filePath: string, warnings: string[]): EngineConfig | null {
  if (!fs.existsSync(filePath)) {
    warnings.push(`Config file not found at ${filePath}; using code defaults`);
    return null;
  }

  let content: unknown;
  try {
    content = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`[Config] Invalid JSON in ${filePath}: ${msg}`);
    warnings.push(`Config file ${filePath} is not valid JSON; using code defaults`);
    return null;
  }

  const result = validateEngineConfig(content);
  if (!result.valid || !result.config) {
    console.error(`[Config] Validation failed for ${filePath}:`, result.errors);
    warnings.push(`Config file ${filePath} failed validation (${result.errors.length} errors); using code defaults`);
    return null;
  }

  warnings.push(...result.warnings);
  return result.config;
}

// ============================================================================
// ENV OVERRIDES
// ============================================================================

function parseIntEnv(env: NodeJS.ProcessEnv, key: string, warnings: string[]): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value <= 0) {
    warnings.push(`${key}=${raw} ignored (expected a positive integer)`);
    return undefined;
  }
  return value;
}

function parseFloatEnv(env: NodeJS.ProcessEnv, key: string, warnings: string[]): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === "") return undefined;
  const value = Number.parseFloat(raw);
  if (!Number.isFinite(value)) {
    warnings.push(`${key}=${raw} ignored (expected a number)`);
    return undefined;
  }
  return value;
}

/**
 * Apply RE_* environment overrides. Returns a new config; the input is not mutated.
 */
export function applyEnvOverrides(
  base: EngineConfig,
  env: NodeJS.ProcessEnv,
  warnings: string[] = [],
): EngineConfig {
  const search = { ...base.search };
  const cache = { ...base.cache };
  const pipeline = { ...base.pipeline };

  const concurrency = parseIntEnv(env, "RE_MAX_CONCURRENT_SEARCHES", warnings);
  if (concurrency !== undefined) search.maxConcurrentSearches = Math.min(concurrency, 32);

  const fanOutTimeout = parseIntEnv(env, "RE_FANOUT_TIMEOUT_MS", warnings);
  if (fanOutTimeout !== undefined) search.fanOutTimeoutMs = fanOutTimeout;

  const providerTimeout = parseIntEnv(env, "RE_PROVIDER_TIMEOUT_MS", warnings);
  if (providerTimeout !== undefined) search.providerTimeoutMs = providerTimeout;

  const ttlHours = parseFloatEnv(env, "RE_CACHE_TTL_HOURS", warnings);
  if (ttlHours !== undefined && ttlHours > 0) cache.ttlHours = ttlHours;

  const threshold = parseFloatEnv(env, "RE_CACHE_SIMILARITY_THRESHOLD", warnings);
  if (threshold !== undefined) {
    if (threshold >= 0 && threshold <= 1) {
      cache.similarityThreshold = threshold;
    } else {
      warnings.push(`RE_CACHE_SIMILARITY_THRESHOLD=${threshold} ignored (expected 0..1)`);
    }
  }

  if (env.RE_CACHE_PATH) cache.dbPath = env.RE_CACHE_PATH;
  if (env.RE_CACHE_ENABLED !== undefined) cache.enabled = env.RE_CACHE_ENABLED !== "false";

  const provider = env.RE_LLM_PROVIDER?.toLowerCase().trim();
  if (provider) {
    if (provider === "anthropic" || provider === "openai" || provider === "google" || provider === "mistral") {
      pipeline.llmProvider = provider;
    } else {
      warnings.push(`RE_LLM_PROVIDER=${provider} ignored (unknown provider)`);
    }
  }
  if (env.RE_LLM_MODEL) pipeline.llmModel = env.RE_LLM_MODEL;

  return { ...base, search, cache, pipeline };
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load engine configuration from file + environment.
 */
export function loadEngineConfig(options: LoadConfigOptions = {}): LoadedEngineConfig {
  const env = options.env ?? process.env;
  const filePath = options.path ?? env.RE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const warnings: string[] = [];

  const fromFile = readConfigFile(filePath, warnings);
  const base = fromFile ?? DEFAULT_ENGINE_CONFIG;
  const config = applyEnvOverrides(base, env, warnings);

  for (const warning of warnings) {
    console.warn(`[Config] ${warning}`);
  }

  return {
    config,
    source: fromFile ? "file" : "default",
    path: filePath,
    warnings,
  };
}
