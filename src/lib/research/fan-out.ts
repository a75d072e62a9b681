/**
 * Multi-Provider Search Fan-out
 *
 * One logical search across the tier's ranked provider subsets:
 * - provider × variant tasks run through a p-limit pool of `maxConcurrentSearches`
 * - each task carries the provider timeout; the whole call is bounded by
 *   `fanOutTimeoutMs` regardless of how providers treat their signal
 * - a failing provider is isolated: it is logged, counted against its circuit,
 *   and demoted for the rest of the run on a quota error
 * - the second subset is consulted only when the first leaves unique results
 *   below `minViableResults` (or the source quota, if smaller); once
 *   escalating, later subsets are consulted until the source quota is met
 * - a half-open probe whose task was dropped at the deadline is released
 *
 * Outcomes are merged in priority order once a subset settles, so provider
 * arrival order never affects the returned list.
 *
 * @module research/fan-out
 */

import pLimit from "p-limit";
import type { SearchConfig } from "../config-schemas";
import { classifyError } from "../error-classification";
import type { ProviderQuotaTracker } from "../provider-quota";
import type { SearchCircuitBreaker } from "../search-circuit-breaker";
import { eligibleProviders, type ProviderRegistry } from "../search-providers";
import { applyDomainFilters, type RawResult, type SearchFailureKind } from "../web-search";
import { combineSignals, untilAborted } from "./abort";
import { deduplicateSources, toSourceRecord, type CompositeWeights } from "./source-deduplication";
import type { ProviderId, ProviderUsage, SourceRecord, Tier } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface FanOutDependencies {
  providers: ProviderRegistry;
  breaker: SearchCircuitBreaker;
  quotas: ProviderQuotaTracker;
  config: SearchConfig;
  weights: CompositeWeights;
  now: () => number;
}

/**
 * Per-run provider state the fan-out reads and updates across rounds.
 */
export interface RunProviderState {
  demoted: Set<ProviderId>;
  usage: Map<ProviderId, ProviderUsage>;
}

export interface FanOutRequest {
  variants: readonly string[];
  tier: Tier;
  /** Unique sources still wanted this round */
  sourceQuota: number;
  /** Run-level cancellation */
  signal?: AbortSignal;
  state: RunProviderState;
}

export interface ProviderFailure {
  provider: ProviderId;
  variant: string;
  kind: SearchFailureKind;
  message: string;
}

export interface FanOutResult {
  sources: SourceRecord[];
  /** Providers that were dispatched at least once */
  attempted: ProviderId[];
  failures: ProviderFailure[];
  subsetsTried: number;
  /** The fan-out deadline (or the run signal) cut the call short */
  timedOut: boolean;
}

interface TaskOutcome {
  provider: ProviderId;
  providerIndex: number;
  variantIndex: number;
  results: RawResult[];
}

export function createRunProviderState(): RunProviderState {
  return { demoted: new Set(), usage: new Map() };
}

function usageFor(state: RunProviderState, provider: ProviderId): ProviderUsage {
  const existing = state.usage.get(provider);
  if (existing) return existing;
  const created: ProviderUsage = { provider, calls: 0, results: 0, failures: 0, demoted: false };
  state.usage.set(provider, created);
  return created;
}

function demote(state: RunProviderState, provider: ProviderId, why: string): void {
  if (state.demoted.has(provider)) return;
  state.demoted.add(provider);
  usageFor(state, provider).demoted = true;
  console.warn(`[Fan-out] ${provider}: demoted for the rest of the run (${why})`);
}

// ============================================================================
// FAN-OUT
// ============================================================================

/**
 * Run one fan-out. Never throws for provider failures; returns whatever was
 * collected (possibly nothing).
 */
export async function fanOutSearch(deps: FanOutDependencies, request: FanOutRequest): Promise<FanOutResult> {
  const { config, providers, breaker, quotas } = deps;
  const deadline = AbortSignal.timeout(config.fanOutTimeoutMs);
  const signal = combineSignals(request.signal ? [request.signal, deadline] : [deadline]);
  const limit = pLimit(config.maxConcurrentSearches);
  const variants = request.variants.slice(0, config.maxVariantsPerRound);
  const priority = config.providerPriority[request.tier];
  const quota = Math.max(1, request.sourceQuota);
  const viable = Math.min(config.minViableResults, quota);
  const fetchedAt = new Date(deps.now()).toISOString();
  const eligible = new Set(eligibleProviders(providers));

  const attempted = new Set<ProviderId>();
  const failures: ProviderFailure[] = [];
  let collected: SourceRecord[] = [];
  let subsetsTried = 0;
  let timedOut = false;
  let escalating = false;

  for (const subset of priority) {
    if (signal.aborted) {
      timedOut = true;
      break;
    }
    subsetsTried++;

    const outcomes: TaskOutcome[] = [];
    const tasks: Array<Promise<void>> = [];
    const unstartedProbes = new Set<ProviderId>();

    subset.forEach((providerId, providerIndex) => {
      const provider = providers.get(providerId);
      if (!provider || !eligible.has(providerId)) return;
      if (request.state.demoted.has(providerId)) return;
      if (!breaker.isAvailable(providerId)) return;

      // A half-open circuit admits exactly one probe request
      const probing = breaker.getStats(providerId)?.state === "half_open";
      const providerVariants = probing ? variants.slice(0, 1) : variants;
      if (probing) unstartedProbes.add(providerId);

      providerVariants.forEach((variant, variantIndex) => {
        tasks.push(
          limit(async () => {
            unstartedProbes.delete(providerId);
            if (signal.aborted || request.state.demoted.has(providerId)) {
              if (probing) breaker.releaseProbe(providerId);
              return;
            }
            if (!quotas.tryAcquire(providerId)) {
              if (probing) breaker.releaseProbe(providerId);
              demote(request.state, providerId, "quota window exhausted");
              return;
            }

            attempted.add(providerId);
            const usage = usageFor(request.state, providerId);
            usage.calls++;
            try {
              const results = await provider.search({
                query: variant,
                maxResults: config.maxResultsPerProvider,
                timeoutMs: config.providerTimeoutMs,
                signal,
              });
              breaker.recordSuccess(providerId);
              usage.results += results.length;
              outcomes.push({ provider: providerId, providerIndex, variantIndex, results });
            } catch (err) {
              const classified = classifyError(err);
              usage.failures++;
              failures.push({ provider: providerId, variant, kind: classified.failureKind, message: classified.message });
              console.warn(`[Fan-out] ${providerId}: ${classified.failureKind} failure for "${variant.substring(0, 50)}": ${classified.message}`);

              if (request.signal?.aborted) {
                // Run cancelled; not the provider's fault
                if (probing) breaker.releaseProbe(providerId);
                return;
              }
              if (classified.shouldCountAsProviderFailure) {
                breaker.recordFailure(providerId, classified.message);
              } else if (probing) {
                breaker.releaseProbe(providerId);
              }
              if (classified.failureKind === "quota") {
                quotas.exhaust(providerId);
                demote(request.state, providerId, "provider reported quota exhaustion");
              }
            }
          }),
        );
      });
    });

    if (tasks.length === 0) {
      escalating = true;
      continue;
    }

    await Promise.race([Promise.all(tasks), untilAborted(signal)]);
    if (signal.aborted) {
      timedOut = true;
      limit.clearQueue();
      for (const providerId of unstartedProbes) breaker.releaseProbe(providerId);
    }

    // Snapshot: tasks that ignore the signal may still settle after the deadline
    const settled = [...outcomes].sort(
      (a, b) => a.providerIndex - b.providerIndex || a.variantIndex - b.variantIndex,
    );
    const fresh: SourceRecord[] = [];
    for (const outcome of settled) {
      const filtered = applyDomainFilters(outcome.results, config.domainWhitelist, config.domainBlacklist);
      for (const raw of filtered) {
        fresh.push(toSourceRecord(raw, fetchedAt, deps.weights));
      }
    }
    collected = deduplicateSources([...collected, ...fresh], deps.weights);

    console.log(
      `[Fan-out] Subset ${subsetsTried}/${priority.length} [${subset.join(", ")}]: ${collected.length} unique sources`,
    );

    if (timedOut || collected.length >= (escalating ? quota : viable)) break;
    escalating = true;
  }

  if (timedOut) {
    console.warn(`[Fan-out] Deadline reached; returning ${collected.length} collected sources`);
  }

  return {
    sources: collected,
    attempted: [...attempted],
    failures,
    subsetsTried,
    timedOut,
  };
}
