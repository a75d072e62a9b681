/**
 * Run budgets
 *
 * A Budget is derived once from tier + mode at run start and is read-only
 * afterwards. The tracker records what a run has consumed; `check*`
 * functions answer whether the next unit of work still fits.
 *
 * @module research/budgets
 */

import type { PipelineConfig } from "../config-schemas";
import type { Budget, BudgetStats, ResearchMode, Tier } from "./types";

// ============================================================================
// BUDGET DERIVATION
// ============================================================================

/**
 * Derive the run budget. The tier's iteration ceiling caps every mode;
 * `iterationsCapped` reports when that lowered the mode's own limit
 * (a Deep run on a tier without premium features).
 */
export function deriveBudget(tier: Tier, mode: ResearchMode, config: PipelineConfig): Budget {
  const modeConfig = config.modes[mode];
  const tierConfig = config.tiers[tier];
  const maxIterations = Math.min(modeConfig.maxIterations, tierConfig.maxIterations);

  return {
    tier,
    mode,
    maxSources: modeConfig.maxSources,
    maxWords: modeConfig.maxWords,
    maxIterations,
    maxWallTimeMs: modeConfig.maxWallTimeMs,
    minCorroboration: modeConfig.minCorroboration,
    premiumFeaturesEnabled: tierConfig.premiumFeatures,
    iterationsCapped: maxIterations < modeConfig.maxIterations,
  };
}

/**
 * True when the mode is reserved for premium tiers and this budget lacks them.
 */
export function isModeRestricted(budget: Budget, config: PipelineConfig): boolean {
  return config.modes[budget.mode].premiumOnly && !budget.premiumFeaturesEnabled;
}

// ============================================================================
// TRACKER
// ============================================================================

export interface BudgetTracker {
  /** Run start (epoch ms) */
  startedAt: number;

  /** Completed search rounds (NEEDS_MORE transitions included) */
  iterations: number;

  /** NEEDS_MORE transitions issued by the gap controller */
  refinements: number;

  /** Text-generation calls made */
  llmCalls: number;

  budgetExceeded: boolean;
  exceedReason?: string;
}

export function createBudgetTracker(startedAt: number): BudgetTracker {
  return {
    startedAt,
    iterations: 0,
    refinements: 0,
    llmCalls: 0,
    budgetExceeded: false,
  };
}

export type BudgetCheck = { allowed: boolean; reason?: string };

export function elapsedMs(tracker: BudgetTracker, now: number): number {
  return Math.max(0, now - tracker.startedAt);
}

export function remainingTimeMs(tracker: BudgetTracker, budget: Budget, now: number): number {
  return Math.max(0, budget.maxWallTimeMs - elapsedMs(tracker, now));
}

/**
 * Check whether another search round may start.
 */
export function checkIterationBudget(tracker: BudgetTracker, budget: Budget): BudgetCheck {
  if (tracker.iterations >= budget.maxIterations) {
    return {
      allowed: false,
      reason: `Iteration limit reached (${tracker.iterations}/${budget.maxIterations})`,
    };
  }
  return { allowed: true };
}

export function checkTimeBudget(tracker: BudgetTracker, budget: Budget, now: number): BudgetCheck {
  const remaining = remainingTimeMs(tracker, budget, now);
  if (remaining <= 0) {
    return {
      allowed: false,
      reason: `Wall time exhausted (${elapsedMs(tracker, now)}ms of ${budget.maxWallTimeMs}ms)`,
    };
  }
  return { allowed: true };
}

/**
 * Reject a draft that exceeds the word budget rather than truncating it.
 */
export function checkWordBudget(wordCount: number, budget: Budget): BudgetCheck {
  if (wordCount > budget.maxWords) {
    return {
      allowed: false,
      reason: `Draft has ${wordCount} words; limit is ${budget.maxWords}`,
    };
  }
  return { allowed: true };
}

export function recordIteration(tracker: BudgetTracker): void {
  tracker.iterations++;
}

export function recordRefinement(tracker: BudgetTracker): void {
  tracker.refinements++;
}

export function recordLLMCall(tracker: BudgetTracker): void {
  tracker.llmCalls++;
}

export function markBudgetExceeded(tracker: BudgetTracker, reason: string): void {
  tracker.budgetExceeded = true;
  tracker.exceedReason = reason;
  console.warn(`[Budget] Exceeded: ${reason}`);
}

export function getBudgetStats(tracker: BudgetTracker, budget: Budget, now: number): BudgetStats {
  return {
    iterations: tracker.iterations,
    maxIterations: budget.maxIterations,
    refinements: tracker.refinements,
    llmCalls: tracker.llmCalls,
    elapsedMs: elapsedMs(tracker, now),
    maxWallTimeMs: budget.maxWallTimeMs,
    budgetExceeded: tracker.budgetExceeded,
    exceedReason: tracker.exceedReason,
  };
}
