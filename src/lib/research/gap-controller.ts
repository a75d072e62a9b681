/**
 * Gap/Iteration Controller
 *
 * After each search round: merge the round's sources into the working set,
 * recompute per-sub-topic coverage, evict over-budget sources and decide
 * whether the run needs another, narrower round.
 *
 * States:
 * - SUFFICIENT: every sub-topic has at least `minCorroboration` corroborating sources
 * - NEEDS_MORE: coverage is short and iterations, time and source budget remain
 * - BUDGET_EXHAUSTED: coverage is short and the budget is spent (partial result)
 *
 * @module research/gap-controller
 */

import { checkIterationBudget, checkTimeBudget, type BudgetCheck, type BudgetTracker } from "./budgets";
import { deduplicateSources, rankSources, type CompositeWeights } from "./source-deduplication";
import { STOP_WORDS, contentTokens, words } from "./text-utils";
import type { Budget, CoverageEntry, CoverageMap, GapState, ResearchQuery, SourceRecord, WorkingSet } from "./types";

// ============================================================================
// TYPES
// ============================================================================

export interface CoverageOptions {
  /** Sources below this credibility never corroborate */
  credibilityFloor: number;
  /** Share of a sub-topic's terms a source must mention */
  subTopicMatchRatio: number;
}

export interface GapDecision {
  state: GapState;
  reason: string;
  /** Sub-topic with the weakest coverage, when coverage is short */
  worstSubTopic?: string;
  /** Narrowed query for the next round (NEEDS_MORE only) */
  refinedQuery?: string;
}

export interface GapEvaluationInput {
  workingSet: WorkingSet;
  query: ResearchQuery;
  budget: Budget;
  tracker: BudgetTracker;
  now: number;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

// ============================================================================
// COVERAGE
// ============================================================================

/**
 * True when the source mentions enough of the sub-topic's terms.
 * A sub-topic with no content terms is matched by every source.
 */
export function matchesSubTopic(source: SourceRecord, subTopic: string, ratio: number): boolean {
  const terms = contentTokens(subTopic);
  if (terms.length === 0) return true;
  const sourceTerms = new Set(contentTokens(`${source.title} ${source.snippet}`));
  const required = Math.max(1, Math.ceil(ratio * terms.length));
  const found = terms.filter((term) => sourceTerms.has(term)).length;
  return found >= required;
}

export function computeCoverage(
  sources: readonly SourceRecord[],
  subTopics: readonly string[],
  options: CoverageOptions,
): CoverageMap {
  const coverage: CoverageMap = {};
  for (const subTopic of subTopics) {
    const matching = sources.filter(
      (source) =>
        source.credibilityScore >= options.credibilityFloor &&
        matchesSubTopic(source, subTopic, options.subTopicMatchRatio),
    );
    const total = matching.reduce((sum, source) => sum + source.credibilityScore, 0);
    const entry: CoverageEntry = {
      subTopic,
      count: matching.length,
      averageScore: matching.length > 0 ? round1(total / matching.length) : 0,
      sourceUrls: matching.map((source) => source.normalizedUrl),
      domains: [...new Set(matching.map((source) => source.domain))],
    };
    coverage[subTopic] = entry;
  }
  return coverage;
}

export function isCoverageSufficient(
  coverage: CoverageMap,
  subTopics: readonly string[],
  minCorroboration: number,
): boolean {
  return subTopics.every((subTopic) => (coverage[subTopic]?.count ?? 0) >= minCorroboration);
}

/**
 * Lowest count first, then lowest average score, then sub-topic order.
 */
export function worstCoveredSubTopic(coverage: CoverageMap, subTopics: readonly string[]): string | null {
  let worst: string | null = null;
  let worstEntry: CoverageEntry | null = null;
  for (const subTopic of subTopics) {
    const entry = coverage[subTopic];
    if (!entry) return subTopic;
    if (
      !worstEntry ||
      entry.count < worstEntry.count ||
      (entry.count === worstEntry.count && entry.averageScore < worstEntry.averageScore)
    ) {
      worst = subTopic;
      worstEntry = entry;
    }
  }
  return worst;
}

/**
 * Narrow the query on one sub-topic: the sub-topic's terms first, then the
 * query's own terms, stop words dropped.
 */
export function refineQuery(query: ResearchQuery, subTopic: string): string {
  const terms = [...words(subTopic), ...words(query.normalized)].filter((w) => !STOP_WORDS.has(w));
  const refined = [...new Set(terms)].join(" ");
  return refined.length > 0 ? refined : query.normalized;
}

// ============================================================================
// EVICTION
// ============================================================================

function soleSupporters(coverage: CoverageMap): Set<string> {
  const sole = new Set<string>();
  for (const entry of Object.values(coverage)) {
    if (entry.sourceUrls.length === 1) sole.add(entry.sourceUrls[0]);
  }
  return sole;
}

/**
 * Evict lowest-composite sources until at most `maxSources` remain. A source
 * that is the only corroboration for a sub-topic goes last.
 */
export function evictToBudget(
  sources: readonly SourceRecord[],
  subTopics: readonly string[],
  maxSources: number,
  options: CoverageOptions,
): { kept: SourceRecord[]; evicted: SourceRecord[] } {
  let kept = rankSources(sources);
  const evicted: SourceRecord[] = [];

  while (kept.length > maxSources) {
    const sole = soleSupporters(computeCoverage(kept, subTopics, options));
    let victimIndex = kept.length - 1;
    for (let i = kept.length - 1; i >= 0; i--) {
      if (!sole.has(kept[i].normalizedUrl)) {
        victimIndex = i;
        break;
      }
    }
    evicted.push(kept[victimIndex]);
    kept = kept.filter((_, index) => index !== victimIndex);
  }

  if (evicted.length > 0) {
    console.log(`[Gap] Evicted ${evicted.length} lowest-ranked sources (limit ${maxSources})`);
  }
  return { kept, evicted };
}

/**
 * True when another round could still change the working set: free slots,
 * or at least one source that is not a sole corroborator.
 */
export function hasSourceBudget(workingSet: WorkingSet, maxSources: number): boolean {
  if (workingSet.sources.length < maxSources) return true;
  const sole = soleSupporters(workingSet.coverage);
  return workingSet.sources.some((source) => !sole.has(source.normalizedUrl));
}

// ============================================================================
// CONTROLLER
// ============================================================================

export function createWorkingSet(
  sources: readonly SourceRecord[],
  subTopics: readonly string[],
  maxSources: number,
  options: CoverageOptions,
): WorkingSet {
  const { kept } = evictToBudget(sources, subTopics, maxSources, options);
  return { sources: kept, coverage: computeCoverage(kept, subTopics, options) };
}

/**
 * Merge one round's sources into the working set. Existing records stay
 * (merged by normalized URL); over-budget records are evicted afterwards.
 */
export function mergeIntoWorkingSet(
  current: WorkingSet,
  incoming: readonly SourceRecord[],
  subTopics: readonly string[],
  maxSources: number,
  options: CoverageOptions & { weights: CompositeWeights },
): WorkingSet {
  const merged = deduplicateSources([...current.sources, ...incoming], options.weights);
  return createWorkingSet(merged, subTopics, maxSources, options);
}

/**
 * Whether one more refined round fits the budget: refinements and rounds
 * below `maxIterations`, wall time left, and source budget left.
 */
export function checkRefinementBudget(
  workingSet: WorkingSet,
  budget: Budget,
  tracker: BudgetTracker,
  now: number,
): BudgetCheck {
  if (tracker.refinements >= budget.maxIterations) {
    return { allowed: false, reason: `Refinement limit reached (${tracker.refinements}/${budget.maxIterations})` };
  }
  const iterationCheck = checkIterationBudget(tracker, budget);
  if (!iterationCheck.allowed) return iterationCheck;
  const timeCheck = checkTimeBudget(tracker, budget, now);
  if (!timeCheck.allowed) return timeCheck;
  if (!hasSourceBudget(workingSet, budget.maxSources)) {
    return {
      allowed: false,
      reason: `Source budget spent (${workingSet.sources.length}/${budget.maxSources}, all sole corroborators)`,
    };
  }
  return { allowed: true };
}

/**
 * Decide the next step. Budget is checked on every call; the controller never
 * allows more NEEDS_MORE transitions than `maxIterations`.
 */
export function evaluateGap(input: GapEvaluationInput): GapDecision {
  const { workingSet, query, budget, tracker, now } = input;

  if (isCoverageSufficient(workingSet.coverage, query.subTopics, budget.minCorroboration)) {
    return { state: "SUFFICIENT", reason: `All ${query.subTopics.length} sub-topics corroborated` };
  }

  const worstSubTopic = worstCoveredSubTopic(workingSet.coverage, query.subTopics) ?? query.normalized;

  const check = checkRefinementBudget(workingSet, budget, tracker, now);
  if (!check.allowed) {
    return { state: "BUDGET_EXHAUSTED", reason: check.reason ?? "Budget exhausted", worstSubTopic };
  }

  const count = workingSet.coverage[worstSubTopic]?.count ?? 0;
  return {
    state: "NEEDS_MORE",
    reason: `"${worstSubTopic}" has ${count}/${budget.minCorroboration} corroborating sources`,
    worstSubTopic,
    refinedQuery: refineQuery(query, worstSubTopic),
  };
}
