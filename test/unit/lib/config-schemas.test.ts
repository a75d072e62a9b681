/**
 * Tests for engine config schemas and file/env loading.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyEnvOverrides, loadEngineConfig } from "@/lib/config-loader";
import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  isResearchMode,
  validateEngineConfig,
} from "@/lib/config-schemas";

describe("EngineConfigSchema", () => {
  it("accepts the code defaults", () => {
    expect(EngineConfigSchema.safeParse(DEFAULT_ENGINE_CONFIG).success).toBe(true);
  });

  it("matches the shipped default config file", () => {
    const file = fileURLToPath(new URL("../../../configs/engine.default.json", import.meta.url));
    const content: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));

    expect(EngineConfigSchema.parse(content)).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  it("rejects an unknown provider in the priority list", () => {
    const broken = structuredClone(DEFAULT_ENGINE_CONFIG);
    const result = validateEngineConfig({
      ...broken,
      search: { ...broken.search, providerPriority: { free: [["bing"]], premium: broken.search.providerPriority.premium } },
    });

    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^search\.providerPriority\.free\.0\.0:/);
  });

  it("warns when both composite weights are zero", () => {
    const config = structuredClone(DEFAULT_ENGINE_CONFIG);
    config.pipeline.compositeWeights = { relevance: 0, credibility: 0 };

    const result = validateEngineConfig(config);

    expect(result.valid).toBe(true);
    expect(result.warnings).toContain(
      "pipeline.compositeWeights: both weights are 0; ordering falls back to relevance then credibility",
    );
  });

  it("recognizes research modes", () => {
    expect(isResearchMode("deep")).toBe(true);
    expect(isResearchMode("exhaustive")).toBe(false);
  });
});

describe("applyEnvOverrides", () => {
  it("applies valid overrides without mutating the base", () => {
    const warnings: string[] = [];
    const config = applyEnvOverrides(
      DEFAULT_ENGINE_CONFIG,
      {
        RE_MAX_CONCURRENT_SEARCHES: "64",
        RE_FANOUT_TIMEOUT_MS: "5000",
        RE_CACHE_SIMILARITY_THRESHOLD: "0.9",
        RE_CACHE_ENABLED: "false",
        RE_LLM_PROVIDER: "OpenAI",
      },
      warnings,
    );

    expect(config.search.maxConcurrentSearches).toBe(32);
    expect(config.search.fanOutTimeoutMs).toBe(5000);
    expect(config.cache.similarityThreshold).toBe(0.9);
    expect(config.cache.enabled).toBe(false);
    expect(config.pipeline.llmProvider).toBe("openai");
    expect(warnings).toEqual([]);
    expect(DEFAULT_ENGINE_CONFIG.search.maxConcurrentSearches).toBe(4);
  });

  it("ignores invalid values with a warning", () => {
    const warnings: string[] = [];
    const config = applyEnvOverrides(
      DEFAULT_ENGINE_CONFIG,
      { RE_PROVIDER_TIMEOUT_MS: "soon", RE_CACHE_SIMILARITY_THRESHOLD: "1.5", RE_LLM_PROVIDER: "acme" },
      warnings,
    );

    expect(config.search.providerTimeoutMs).toBe(DEFAULT_ENGINE_CONFIG.search.providerTimeoutMs);
    expect(config.cache.similarityThreshold).toBe(0.85);
    expect(warnings).toEqual([
      "RE_PROVIDER_TIMEOUT_MS=soon ignored (expected a positive integer)",
      "RE_CACHE_SIMILARITY_THRESHOLD=1.5 ignored (expected 0..1)",
      "RE_LLM_PROVIDER=acme ignored (unknown provider)",
    ]);
  });
});

describe("loadEngineConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads a valid file and layers env overrides on top", () => {
    const file = path.join(dir, "engine.json");
    const content = structuredClone(DEFAULT_ENGINE_CONFIG);
    content.cache.ttlHours = 6;
    fs.writeFileSync(file, JSON.stringify(content));

    const loaded = loadEngineConfig({ path: file, env: { RE_CACHE_PATH: "/tmp/test-cache.db" } });

    expect(loaded.source).toBe("file");
    expect(loaded.config.cache.ttlHours).toBe(6);
    expect(loaded.config.cache.dbPath).toBe("/tmp/test-cache.db");
  });

  it("falls back to code defaults for a missing file", () => {
    const file = path.join(dir, "missing.json");
    const loaded = loadEngineConfig({ path: file, env: {} });

    expect(loaded.source).toBe("default");
    expect(loaded.config).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(loaded.warnings).toEqual([`Config file not found at ${file}; using code defaults`]);
  });

  it("falls back to code defaults for invalid JSON", () => {
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ not json");

    const loaded = loadEngineConfig({ path: file, env: {} });

    expect(loaded.source).toBe("default");
    expect(loaded.warnings).toEqual([`Config file ${file} is not valid JSON; using code defaults`]);
  });

  it("takes the file path from RE_CONFIG_PATH", () => {
    const file = path.join(dir, "from-env.json");
    const content = structuredClone(DEFAULT_ENGINE_CONFIG);
    content.search.maxVariantsPerRound = 2;
    fs.writeFileSync(file, JSON.stringify(content));

    const loaded = loadEngineConfig({ env: { RE_CONFIG_PATH: file } });

    expect(loaded.path).toBe(file);
    expect(loaded.config.search.maxVariantsPerRound).toBe(2);
  });
});
