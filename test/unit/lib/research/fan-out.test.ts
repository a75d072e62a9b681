/**
 * Fan-out tests use in-process providers; nothing here reaches the network.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

import type { SearchConfig } from "@/lib/config-schemas";
import { ProviderQuotaTracker } from "@/lib/provider-quota";
import { SearchCircuitBreaker } from "@/lib/search-circuit-breaker";
import { createProviderRegistry } from "@/lib/search-providers";
import { SearchProviderError, type RawResult } from "@/lib/web-search";
import { createRunProviderState, fanOutSearch, type FanOutDependencies } from "@/lib/research/fan-out";
import {
  DEFAULT_WEIGHTS,
  FIXED_FETCHED_AT,
  fakeProvider,
  hangUntilAborted,
  rawResult,
  testEngineConfig,
  type FakeProvider,
} from "@test/helpers/test-helpers";

const START = Date.parse(FIXED_FETCHED_AT);

interface Harness {
  deps: FanOutDependencies;
  breaker: SearchCircuitBreaker;
  quotas: ProviderQuotaTracker;
  clock: { now: number };
}

function harness(
  providers: FakeProvider[],
  search: Partial<SearchConfig> = {},
  quotaLimits: Partial<Record<FakeProvider["id"], number>> = {},
): Harness {
  const clock = { now: START };
  const now = () => clock.now;
  const config = testEngineConfig({ search }).search;
  const breaker = new SearchCircuitBreaker({ enabled: true, failureThreshold: 1, resetTimeoutSec: 60 }, now);
  const quotas = new ProviderQuotaTracker(quotaLimits, 60_000, now);
  return {
    deps: { providers: createProviderRegistry(providers), breaker, quotas, config, weights: DEFAULT_WEIGHTS, now },
    breaker,
    quotas,
    clock,
  };
}

function after<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

const single = (provider: FakeProvider["id"], url: string): RawResult[] => [rawResult(provider, url, "Coral reefs", "Reefs host a quarter of marine species.")];

describe("fanOutSearch", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  // ============================================================================
  // DISPATCH
  // ============================================================================

  it("queries every provider of the first subset with at most maxVariantsPerRound variants", async () => {
    const brave = fakeProvider("brave", (o) => single("brave", `https://example.org/${o.query}`));
    const ddg = fakeProvider("duckduckgo", () => []);
    const { deps } = harness([brave, ddg]);

    const result = await fanOutSearch(deps, {
      variants: ["a", "b", "c", "d"],
      tier: "free",
      sourceQuota: 5,
      state: createRunProviderState(),
    });

    expect(brave.calls.map((c) => c.query)).toEqual(["a", "b", "c"]);
    expect(ddg.calls).toHaveLength(3);
    expect(brave.calls[0]).toMatchObject({ maxResults: 10, timeoutMs: 10_000 });
    expect(result.sources).toHaveLength(3);
    expect(result.subsetsTried).toBe(1);
    expect(result.attempted).toEqual(expect.arrayContaining(["brave", "duckduckgo"]));
    expect(result.timedOut).toBe(false);
  });

  it("returns the same sources whatever order providers answer in", async () => {
    const shared = "https://example.org/shared";
    const run = async (braveDelay: number, ddgDelay: number) => {
      const brave = fakeProvider("brave", () =>
        after(braveDelay, [...single("brave", "https://example.org/one"), ...single("brave", shared)]),
      );
      const ddg = fakeProvider("duckduckgo", () =>
        after(ddgDelay, [...single("duckduckgo", "https://example.org/two"), ...single("duckduckgo", shared)]),
      );
      const { deps } = harness([brave, ddg]);
      return fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });
    };

    const first = await run(30, 0);
    const second = await run(0, 30);

    expect(first.sources).toEqual(second.sources);
    expect(first.sources.find((s) => s.url === shared)?.providers).toEqual(["brave", "duckduckgo"]);
    expect(first.sources.find((s) => s.url === shared)?.originProvider).toBe("brave");
  });

  it("escalates to the next subset only while results are short", async () => {
    const brave = fakeProvider("brave", () => []);
    const exa = fakeProvider("exa", () => single("exa", "https://example.org/exa"));
    const { deps } = harness([brave, exa]);

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(result.subsetsTried).toBe(2);
    expect(result.sources.map((s) => s.originProvider)).toEqual(["exa"]);
  });

  it("stops at the remaining source quota when it is below minViableResults", async () => {
    const brave = fakeProvider("brave", () => single("brave", "https://example.org/a"));
    const exa = fakeProvider("exa", () => single("exa", "https://example.org/b"));
    const { deps } = harness([brave, exa], { minViableResults: 5 });

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 1, state: createRunProviderState() });

    expect(result.subsetsTried).toBe(1);
    expect(exa.calls).toHaveLength(0);
  });

  it("keeps escalating past a short subset until the source quota is met", async () => {
    const serpapi = fakeProvider("serpapi", () => []);
    const brave = fakeProvider("brave", () => single("brave", "https://example.org/brave"));
    const ddg = fakeProvider("duckduckgo", () =>
      [1, 2, 3, 4].flatMap((n) => single("duckduckgo", `https://example.org/ddg-${n}`)),
    );
    const { deps } = harness([serpapi, brave, ddg]);

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "premium", sourceQuota: 5, state: createRunProviderState() });

    expect(result.subsetsTried).toBe(3);
    expect(ddg.calls).toHaveLength(1);
    expect(result.sources).toHaveLength(5);
  });

  it("stops escalating once the source quota is met", async () => {
    const serpapi = fakeProvider("serpapi", () => []);
    const brave = fakeProvider("brave", () => [
      ...single("brave", "https://example.org/a"),
      ...single("brave", "https://example.org/b"),
    ]);
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/c"));
    const { deps } = harness([serpapi, brave, ddg]);

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "premium", sourceQuota: 2, state: createRunProviderState() });

    expect(result.subsetsTried).toBe(2);
    expect(ddg.calls).toHaveLength(0);
    expect(result.sources).toHaveLength(2);
  });

  it("skips keyed providers without credentials", async () => {
    const brave = fakeProvider("brave", () => single("brave", "https://example.org/a"), true);
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/b"));
    const { deps } = harness([brave, ddg]);

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(brave.calls).toHaveLength(0);
    expect(result.attempted).toEqual(["duckduckgo"]);
  });

  it("drops blacklisted domains", async () => {
    const brave = fakeProvider("brave", () => [
      ...single("brave", "https://blocked.example.com/x"),
      ...single("brave", "https://example.org/y"),
    ]);
    const { deps } = harness([brave], { domainBlacklist: ["example.com"] });

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(result.sources.map((s) => s.url)).toEqual(["https://example.org/y"]);
  });

  // ============================================================================
  // FAILURES
  // ============================================================================

  it("isolates a failing provider and records the failure", async () => {
    const brave = fakeProvider("brave", () => {
      throw new SearchProviderError("brave", "malformed", 500, "Brave HTTP 500: Server error");
    });
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/b"));
    const { deps, breaker } = harness([brave, ddg]);
    const state = createRunProviderState();

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state });

    expect(result.sources).toHaveLength(1);
    expect(result.failures).toEqual([
      { provider: "brave", variant: "coral", kind: "malformed", message: "Brave HTTP 500: Server error" },
    ]);
    expect(state.usage.get("brave")).toEqual({ provider: "brave", calls: 1, results: 0, failures: 1, demoted: false });
    expect(breaker.getStats("brave")?.state).toBe("open");
  });

  it("demotes a provider that reports quota exhaustion for the rest of the run", async () => {
    const brave = fakeProvider("brave", () => {
      throw new SearchProviderError("brave", "quota", 429, "Brave HTTP 429: Too Many Requests");
    });
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/b"));
    const { deps, quotas, breaker } = harness([brave, ddg], {}, { brave: 60 });
    const state = createRunProviderState();

    await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state });
    breaker.reset("brave");
    await fanOutSearch(deps, { variants: ["reef"], tier: "free", sourceQuota: 5, state });

    expect(brave.calls).toHaveLength(1);
    expect(state.demoted.has("brave")).toBe(true);
    expect(state.usage.get("brave")?.demoted).toBe(true);
    expect(quotas.snapshot("brave").remaining).toBe(0);
  });

  it("demotes a provider once its local quota window is spent", async () => {
    const brave = fakeProvider("brave", (o) => single("brave", `https://example.org/${o.query}`));
    const { deps } = harness([brave], { maxConcurrentSearches: 1 }, { brave: 1 });
    const state = createRunProviderState();

    const result = await fanOutSearch(deps, { variants: ["a", "b", "c"], tier: "free", sourceQuota: 5, state });

    expect(brave.calls).toHaveLength(1);
    expect(result.sources).toHaveLength(1);
    expect(state.usage.get("brave")).toEqual({ provider: "brave", calls: 1, results: 1, failures: 0, demoted: true });
  });

  // ============================================================================
  // CIRCUIT BREAKER
  // ============================================================================

  it("skips providers whose circuit is open", async () => {
    const brave = fakeProvider("brave", () => single("brave", "https://example.org/a"));
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/b"));
    const { deps, breaker } = harness([brave, ddg]);
    breaker.recordFailure("brave", "earlier outage");

    await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(brave.calls).toHaveLength(0);
    expect(ddg.calls).toHaveLength(1);
  });

  it("sends a single probe through a half-open circuit and closes it on success", async () => {
    const brave = fakeProvider("brave", (o) => single("brave", `https://example.org/${o.query}`));
    const { deps, breaker, clock } = harness([brave]);
    breaker.recordFailure("brave", "earlier outage");
    clock.now += 60_000;

    await fanOutSearch(deps, { variants: ["a", "b", "c"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(brave.calls.map((c) => c.query)).toEqual(["a"]);
    expect(breaker.getStats("brave")?.state).toBe("closed");
  });

  it("releases a half-open probe that the deadline kept from running", async () => {
    let braveCalls = 0;
    const brave = fakeProvider("brave", (o) => {
      braveCalls++;
      return braveCalls === 1 ? hangUntilAborted("brave", o.signal) : [];
    });
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/b"));
    const { deps, breaker, clock } = harness([brave, ddg], { maxConcurrentSearches: 1, fanOutTimeoutMs: 50 });
    breaker.recordFailure("duckduckgo", "earlier outage");
    clock.now += 60_000;

    const first = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(first.timedOut).toBe(true);
    expect(ddg.calls).toHaveLength(0);
    expect(breaker.getStats("duckduckgo")?.state).toBe("half_open");

    breaker.reset("brave");
    const second = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(ddg.calls).toHaveLength(1);
    expect(second.sources.map((s) => s.url)).toEqual(["https://example.org/b"]);
    expect(breaker.getStats("duckduckgo")?.state).toBe("closed");
  });

  // ============================================================================
  // DEADLINES
  // ============================================================================

  it("returns what it has when the fan-out deadline fires", async () => {
    const brave = fakeProvider("brave", (o) => hangUntilAborted("brave", o.signal));
    const ddg = fakeProvider("duckduckgo", () => single("duckduckgo", "https://example.org/b"));
    const { deps } = harness([brave, ddg], { fanOutTimeoutMs: 50 });

    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(result.timedOut).toBe(true);
    expect(result.sources.map((s) => s.url)).toEqual(["https://example.org/b"]);
    expect(result.subsetsTried).toBe(1);
  });

  it("bounds the call even when a provider ignores its signal", async () => {
    const brave = fakeProvider("brave", () => after(500, single("brave", "https://example.org/late")));
    const { deps } = harness([brave], { fanOutTimeoutMs: 50 });

    const started = Date.now();
    const result = await fanOutSearch(deps, { variants: ["coral"], tier: "free", sourceQuota: 5, state: createRunProviderState() });

    expect(Date.now() - started).toBeLessThan(400);
    expect(result.timedOut).toBe(true);
    expect(result.sources).toEqual([]);
  });

  it("dispatches nothing once the run is cancelled", async () => {
    const brave = fakeProvider("brave", () => single("brave", "https://example.org/a"));
    const { deps } = harness([brave]);
    const controller = new AbortController();
    controller.abort();

    const result = await fanOutSearch(deps, {
      variants: ["coral"],
      tier: "free",
      sourceQuota: 5,
      signal: controller.signal,
      state: createRunProviderState(),
    });

    expect(brave.calls).toHaveLength(0);
    expect(result.timedOut).toBe(true);
    expect(result.subsetsTried).toBe(0);
  });
});
