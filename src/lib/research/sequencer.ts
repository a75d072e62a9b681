/**
 * Stage Sequencer
 *
 * One ResearchRun drives one request through
 *   EXPANDING → SEARCHING (gap loop) → VERIFYING → FINALIZING → EDITING (premium)
 *   → CITING → PUBLISHED
 * or to FAILED with a typed reason. Every transition is emitted as a run
 * event and checked against the wall-time budget.
 *
 * `execute()` never rejects: every error becomes a terminal RunResult.
 *
 * @module research/sequencer
 */

import { PROVIDER_IDS, isResearchMode } from "../config-schemas";
import { combineSignals, raceAbort } from "./abort";
import {
  checkTimeBudget,
  checkWordBudget,
  createBudgetTracker,
  deriveBudget,
  elapsedMs,
  getBudgetStats,
  isModeRestricted,
  markBudgetExceeded,
  recordIteration,
  recordLLMCall,
  recordRefinement,
  type BudgetTracker,
} from "./budgets";
import { debugLog } from "./debug";
import type { EngineContext } from "./engine-context";
import { CollaboratorError, NoSourcesFoundError, RunAbortedError, RunFailure, WordBudgetExceededError, errorMessage } from "./errors";
import { createRunProviderState, fanOutSearch, type FanOutDependencies } from "./fan-out";
import {
  checkRefinementBudget,
  createWorkingSet,
  evaluateGap,
  isCoverageSufficient,
  mergeIntoWorkingSet,
  refineQuery,
  worstCoveredSubTopic,
  type CoverageOptions,
} from "./gap-controller";
import { expandResearchQuery } from "./query-processor";
import type { CompositeWeights } from "./source-deduplication";
import { RunEventChannel } from "./run-events";
import { buildCredibilityReport } from "./source-scoring";
import { countWords } from "./text-utils";
import type {
  Budget,
  CacheHit,
  CollaboratorOutputs,
  GapState,
  HandOff,
  ResearchMode,
  ResearchQuery,
  RunResult,
  RunStage,
  RunStatus,
  StageHistoryEntry,
  Tier,
  UserContext,
  VerificationReport,
  WorkingSet,
} from "./types";
import { verifyWorkingSet } from "./verification";

type CollaboratorName = CollaboratorError["collaborator"];

export interface RunInput {
  runId: string;
  queryText: string;
  mode: ResearchMode;
  user: UserContext;
}

const MAX_QUERY_CHARS = 2000;

export class ResearchRun {
  readonly events = new RunEventChannel();
  readonly startedAt: number;

  private readonly controller = new AbortController();
  private readonly tracker: BudgetTracker;
  private readonly stageHistory: StageHistoryEntry[] = [];
  private readonly providerState = createRunProviderState();

  private stage: RunStage | null = null;
  private stageEnteredAt = 0;
  private tier: Tier | null = null;
  private budget: Budget | null = null;
  private query: ResearchQuery | null = null;
  private workingSet: WorkingSet = { sources: [], coverage: {} };
  private gapState: GapState | null = null;
  private verification: VerificationReport | null = null;
  private outputs: CollaboratorOutputs = {};
  private cacheHit: CacheHit | null = null;
  private deadline: ReturnType<typeof setTimeout> | null = null;
  private finished = false;

  constructor(
    private readonly context: EngineContext,
    readonly input: RunInput,
  ) {
    this.startedAt = context.now();
    this.tracker = createBudgetTracker(this.startedAt);
  }

  get runId(): string {
    return this.input.runId;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  private get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Abort the run with reason `cancelled`. False when already finished or aborted.
   */
  cancel(): boolean {
    if (this.finished || this.signal.aborted) return false;
    console.log(`[Sequencer] Run ${this.runId}: cancellation requested`);
    this.controller.abort(new RunAbortedError("cancelled", "Run cancelled by caller"));
    return true;
  }

  // ==========================================================================
  // EVENTS
  // ==========================================================================

  private timestamp(): string {
    return new Date(this.context.now()).toISOString();
  }

  private transition(stage: RunStage, message: string): void {
    const now = this.context.now();
    const previous = this.stageHistory[this.stageHistory.length - 1];
    if (previous) previous.elapsedMs = Math.max(0, now - this.stageEnteredAt);

    this.stage = stage;
    this.stageEnteredAt = now;
    this.stageHistory.push({ stage, enteredAt: new Date(now).toISOString(), elapsedMs: 0 });
    this.events.emit({ runId: this.runId, stage, kind: "transition", message, timestamp: this.timestamp() });
    console.log(`[Sequencer] Run ${this.runId} → ${stage}: ${message}`);

    if (stage !== "FAILED" && stage !== "PUBLISHED") this.enforceDeadline();
  }

  private info(message: string, iteration?: number): void {
    if (!this.stage) return;
    this.events.emit({
      runId: this.runId,
      stage: this.stage,
      kind: "info",
      message,
      timestamp: this.timestamp(),
      ...(iteration !== undefined ? { iteration } : {}),
    });
  }

  // ==========================================================================
  // BUDGET / ABORT
  // ==========================================================================

  private enforceDeadline(): void {
    if (this.budget && !this.signal.aborted) {
      const check = checkTimeBudget(this.tracker, this.budget, this.context.now());
      if (!check.allowed) {
        markBudgetExceeded(this.tracker, check.reason ?? "Wall time exhausted");
        this.controller.abort(new RunAbortedError("timeout", check.reason ?? "Wall time exhausted"));
      }
    }
    this.signal.throwIfAborted();
  }

  private armDeadline(budget: Budget): void {
    const remaining = Math.max(0, budget.maxWallTimeMs - elapsedMs(this.tracker, this.context.now()));
    this.deadline = setTimeout(() => {
      markBudgetExceeded(this.tracker, `Wall time of ${budget.maxWallTimeMs}ms exceeded`);
      this.controller.abort(new RunAbortedError("timeout", `Run exceeded its ${budget.maxWallTimeMs}ms wall time`));
    }, remaining);
  }

  private toFailure(err: unknown): RunFailure {
    if (this.signal.aborted) {
      const reason: unknown = this.signal.reason;
      return reason instanceof RunFailure ? reason : new RunAbortedError("cancelled", errorMessage(reason));
    }
    if (err instanceof RunFailure) return err;
    console.error(`[Sequencer] Run ${this.runId}: unexpected error`, err);
    debugLog("[Sequencer] Unexpected error", {
      runId: this.runId,
      message: errorMessage(err),
      stack: err instanceof Error ? err.stack?.split("\n").slice(0, 15).join("\n") : undefined,
    });
    return new RunFailure("internal_error", errorMessage(err));
  }

  private coverageOptions(): CoverageOptions & { weights: CompositeWeights } {
    const pipeline = this.context.config.pipeline;
    return {
      credibilityFloor: pipeline.credibilityFloor,
      subTopicMatchRatio: pipeline.subTopicMatchRatio,
      weights: pipeline.compositeWeights,
    };
  }

  // ==========================================================================
  // RUN
  // ==========================================================================

  async execute(): Promise<RunResult> {
    try {
      this.transition("EXPANDING", `Run started: "${this.input.queryText.substring(0, 80)}" (${this.input.mode})`);

      const budget = await this.resolveBudget();
      const query = await this.expand(budget);
      await this.search(query, budget);
      const verification = await this.verify(query, budget);
      await this.cacheResults(query, budget);
      await this.finalize(query, budget, verification);

      const status: RunStatus = this.gapState === "SUFFICIENT" ? "SUFFICIENT" : "PARTIAL";
      this.transition("PUBLISHED", `Published ${this.outputs.publication?.reference ?? "draft"} (${status})`);
      return this.buildResult(status, null, this.workingSet);
    } catch (err) {
      const failure = this.toFailure(err);
      this.transition("FAILED", `${failure.reason}: ${failure.message}`);
      const keepPartial =
        this.input.user.allowPartialResults === true && (failure.reason === "timeout" || failure.reason === "cancelled");
      return this.buildResult("FAILED", failure, keepPartial ? this.workingSet : null);
    } finally {
      if (this.deadline) clearTimeout(this.deadline);
      this.finished = true;
      this.events.close();
    }
  }

  private async resolveBudget(): Promise<Budget> {
    const { queryText, mode, user } = this.input;
    if (queryText.trim().length === 0) {
      throw new RunFailure("invalid_query", "Query text is empty");
    }
    if (queryText.length > MAX_QUERY_CHARS) {
      throw new RunFailure("invalid_query", `Query text exceeds ${MAX_QUERY_CHARS} characters`);
    }
    if (!isResearchMode(mode)) {
      throw new RunFailure("invalid_query", `Unknown research mode "${String(mode)}"`);
    }

    let tier: Tier = user.tier ?? "free";
    const resolver = this.context.budgetResolver;
    if (resolver) {
      const timeoutMs = this.context.config.pipeline.collaboratorTimeoutMs;
      const timeout = AbortSignal.timeout(timeoutMs);
      try {
        const resolved = await raceAbort(resolver.resolveBudget(user.userId), combineSignals([this.signal, timeout]));
        tier = resolved.tier;
      } catch (err) {
        if (this.signal.aborted) throw err;
        const detail = timeout.aborted ? `timed out after ${timeoutMs}ms` : errorMessage(err);
        throw new RunFailure("budget_resolution_failed", `Budget resolution for ${user.userId} failed: ${detail}`);
      }
    }

    const pipeline = this.context.config.pipeline;
    const budget = deriveBudget(tier, mode, pipeline);
    this.tier = tier;
    this.budget = budget;
    this.armDeadline(budget);

    this.info(
      `Budget (${tier}/${mode}): ${budget.maxSources} sources, ${budget.maxWords} words, ` +
        `${budget.maxIterations} iterations, ${Math.round(budget.maxWallTimeMs / 1000)}s`,
    );
    if (budget.iterationsCapped || isModeRestricted(budget, pipeline)) {
      this.info(
        `${mode} mode is premium-only; running with iterations capped at ${budget.maxIterations} for the ${tier} tier`,
      );
    }
    return budget;
  }

  private async expand(budget: Budget): Promise<ResearchQuery> {
    const pipeline = this.context.config.pipeline;
    const query = await raceAbort(
      expandResearchQuery(this.input.queryText, {
        generator: this.context.generator,
        maxSubTopics: pipeline.maxSubTopics,
        signal: this.signal,
        maxOutputTokens: Math.min(500, pipeline.llmMaxOutputTokens),
        onGenerate: () => recordLLMCall(this.tracker),
      }),
      this.signal,
    );
    this.query = query;
    this.info(
      `Expanded to ${query.variants.length} variants and ${query.subTopics.length} sub-topics` +
        (query.subTopicSource === "fallback" ? " (fallback: query as sole sub-topic)" : ""),
    );
    debugLog(`[Sequencer] Run ${this.runId} budget`, budget);
    return query;
  }

  // ==========================================================================
  // SEARCHING
  // ==========================================================================

  private fanOutDependencies(): FanOutDependencies {
    const { providers, breaker, quotas, config, now } = this.context;
    return { providers, breaker, quotas, config: config.search, weights: config.pipeline.compositeWeights, now };
  }

  private async searchRound(variants: readonly string[], query: ResearchQuery, budget: Budget): Promise<void> {
    recordIteration(this.tracker);
    const iteration = this.tracker.iterations;
    this.info(`Round ${iteration}/${budget.maxIterations}: searching ${variants.length} variant(s)`, iteration);

    const result = await raceAbort(
      fanOutSearch(this.fanOutDependencies(), {
        variants,
        tier: budget.tier,
        sourceQuota: Math.max(1, budget.maxSources - this.workingSet.sources.length),
        signal: this.signal,
        state: this.providerState,
      }),
      this.signal,
    );

    this.workingSet = mergeIntoWorkingSet(
      this.workingSet,
      result.sources,
      query.subTopics,
      budget.maxSources,
      this.coverageOptions(),
    );
    const failed = new Set(result.failures.map((failure) => failure.provider)).size;
    this.info(
      `Round ${iteration}: ${result.sources.length} sources from ${result.attempted.length} providers` +
        (failed > 0 ? ` (${failed} failing)` : "") +
        (result.timedOut ? " (fan-out deadline reached)" : "") +
        `; working set ${this.workingSet.sources.length}/${budget.maxSources}`,
      iteration,
    );
  }

  private seedFromCache(hit: CacheHit, query: ResearchQuery, budget: Budget): void {
    this.cacheHit = hit;
    this.workingSet = createWorkingSet(hit.entry.resultSet, query.subTopics, budget.maxSources, this.coverageOptions());
    const sufficient = isCoverageSufficient(this.workingSet.coverage, query.subTopics, budget.minCorroboration);
    this.gapState = sufficient ? "SUFFICIENT" : "BUDGET_EXHAUSTED";
    this.info(
      hit.exact
        ? `Served from cache (exact match, ${hit.entry.resultSet.length} sources)`
        : `Served from cache, ${Math.round(hit.similarity * 100)}% similar to "${hit.entry.queryText}"`,
    );
  }

  private async search(query: ResearchQuery, budget: Budget): Promise<void> {
    this.transition("SEARCHING", `Searching ${query.variants.length} variants across ${query.subTopics.length} sub-topics`);
    const { cache } = this.context;

    const hit = await raceAbort(cache.lookup(query.normalized, budget.mode), this.signal);
    if (hit && hit.entry.resultSet.length > 0) {
      // A cache-served run never fans out
      this.seedFromCache(hit, query, budget);
      this.info(`Coverage ${this.gapState ?? "BUDGET_EXHAUSTED"}: served from cache`);
      return;
    }

    let variants: readonly string[] = query.variants;
    while (true) {
      await this.searchRound(variants, query, budget);
      const decision = evaluateGap({
        workingSet: this.workingSet,
        query,
        budget,
        tracker: this.tracker,
        now: this.context.now(),
      });
      this.gapState = decision.state;
      if (decision.state !== "NEEDS_MORE" || !decision.refinedQuery) {
        this.info(`Coverage ${decision.state}: ${decision.reason}`, this.tracker.iterations);
        break;
      }
      recordRefinement(this.tracker);
      this.info(`Refining on ${decision.reason}: "${decision.refinedQuery}"`, this.tracker.iterations);
      this.enforceDeadline();
      variants = [decision.refinedQuery];
    }

    if (this.workingSet.sources.length === 0) {
      await this.cacheFallback(query, budget);
    }
    if (this.workingSet.sources.length === 0) {
      throw new NoSourcesFoundError(`No sources for "${query.normalized}" from any provider or the cache`);
    }
  }

  /**
   * Last resort before no_sources: look up each remaining variant in the cache.
   */
  private async cacheFallback(query: ResearchQuery, budget: Budget): Promise<void> {
    for (const variant of query.variants.slice(1)) {
      const hit = await raceAbort(this.context.cache.lookup(variant, budget.mode), this.signal);
      if (hit && hit.entry.resultSet.length > 0) {
        this.seedFromCache(hit, query, budget);
        return;
      }
    }
  }

  // ==========================================================================
  // VERIFYING
  // ==========================================================================

  private runVerification(query: ResearchQuery, budget: Budget): Promise<VerificationReport> {
    const pipeline = this.context.config.pipeline;
    return raceAbort(
      verifyWorkingSet(query, this.workingSet, budget, {
        generator: this.context.generator,
        signal: this.signal,
        maxOutputTokens: Math.min(300, pipeline.llmMaxOutputTokens),
        onGenerate: () => recordLLMCall(this.tracker),
      }),
      this.signal,
    );
  }

  private async verify(query: ResearchQuery, budget: Budget): Promise<VerificationReport> {
    this.transition(
      "VERIFYING",
      `Verifying ${this.workingSet.sources.length} sources across ${query.subTopics.length} sub-topics`,
    );
    let report = await this.runVerification(query, budget);

    if (report.weakSubTopics.length > 0 && this.cacheHit) {
      this.info(`Weak sub-topics remain (${report.weakSubTopics.join("; ")}); served from cache`);
    } else if (report.weakSubTopics.length > 0 && this.context.config.pipeline.verificationExtraRound) {
      const check = checkRefinementBudget(this.workingSet, budget, this.tracker, this.context.now());
      if (check.allowed) {
        const target = worstCoveredSubTopic(this.workingSet.coverage, report.weakSubTopics) ?? query.normalized;
        recordRefinement(this.tracker);
        this.transition("SEARCHING", `Extra round for weakly corroborated sub-topic "${target}"`);
        await this.searchRound([refineQuery(query, target)], query, budget);

        const sufficient = isCoverageSufficient(this.workingSet.coverage, query.subTopics, budget.minCorroboration);
        this.gapState = sufficient ? "SUFFICIENT" : "BUDGET_EXHAUSTED";
        this.transition("VERIFYING", `Re-verifying ${this.workingSet.sources.length} sources`);
        report = await this.runVerification(query, budget);
      } else {
        this.info(`Weak sub-topics remain (${report.weakSubTopics.join("; ")}); ${check.reason ?? "no budget"}`);
      }
    }

    this.verification = report;
    this.info(`${report.facts.length} verified claims; ${report.weakSubTopics.length} weak sub-topics`);
    return report;
  }

  /**
   * Store the run's sources when this run searched; cache-served runs are not re-stored.
   */
  private async cacheResults(query: ResearchQuery, budget: Budget): Promise<void> {
    if (this.cacheHit || this.workingSet.sources.length === 0) return;
    await this.context.cache.store(query.normalized, budget.mode, this.workingSet.sources);
  }

  // ==========================================================================
  // FINALIZING / EDITING / CITING
  // ==========================================================================

  private handOff(query: ResearchQuery, budget: Budget, verification: VerificationReport, signal: AbortSignal): HandOff {
    return {
      runId: this.runId,
      query,
      workingSet: structuredClone(this.workingSet),
      budget,
      verification,
      signal,
    };
  }

  /**
   * Invoke one collaborator under the collaborator timeout and the run signal.
   */
  private async callCollaborator<T>(name: CollaboratorName, invoke: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = this.context.config.pipeline.collaboratorTimeoutMs;
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = combineSignals([this.signal, timeout]);
    try {
      return await raceAbort(Promise.resolve().then(() => invoke(signal)), signal);
    } catch (err) {
      if (this.signal.aborted || err instanceof RunFailure) throw err;
      if (timeout.aborted) throw new CollaboratorError(name, `timed out after ${timeoutMs}ms`);
      throw new CollaboratorError(name, errorMessage(err));
    }
  }

  private async finalize(query: ResearchQuery, budget: Budget, verification: VerificationReport): Promise<void> {
    const { writer, editor, citer, publisher } = this.context.collaborators;
    this.transition("FINALIZING", `Writing within ${budget.maxWords} words`);

    let draft = await this.callCollaborator("writer", (signal) =>
      writer.write({ ...this.handOff(query, budget, verification, signal), maxWords: budget.maxWords, attempt: 1 }),
    );
    let wordCount = countWords(draft);
    if (!checkWordBudget(wordCount, budget).allowed) {
      this.info(`Draft has ${wordCount} words (limit ${budget.maxWords}); requesting a shorter draft`);
      const feedback = `The previous draft had ${wordCount} words. The limit is ${budget.maxWords} words; stay within it.`;
      draft = await this.callCollaborator("writer", (signal) =>
        writer.write({
          ...this.handOff(query, budget, verification, signal),
          maxWords: budget.maxWords,
          attempt: 2,
          feedback,
        }),
      );
      wordCount = countWords(draft);
      const recheck = checkWordBudget(wordCount, budget);
      if (!recheck.allowed) {
        markBudgetExceeded(this.tracker, recheck.reason ?? "Word budget exceeded");
        throw new WordBudgetExceededError(wordCount, budget.maxWords);
      }
    }
    this.outputs.draft = draft;

    let text = draft;
    if (budget.premiumFeaturesEnabled) {
      this.transition("EDITING", "Editing draft");
      text = await this.callCollaborator("editor", (signal) =>
        editor.edit({ ...this.handOff(query, budget, verification, signal), draft }),
      );
      this.outputs.edited = text;
    }

    this.transition("CITING", `Attaching citations for ${this.workingSet.sources.length} sources`);
    const cited = await this.callCollaborator("citer", (signal) =>
      citer.cite({ ...this.handOff(query, budget, verification, signal), text }),
    );
    this.outputs.cited = cited;

    this.outputs.publication = await this.callCollaborator("publisher", (signal) =>
      publisher.publish({ ...this.handOff(query, budget, verification, signal), text: cited }),
    );
  }

  // ==========================================================================
  // RESULT
  // ==========================================================================

  private buildResult(status: RunStatus, failure: RunFailure | null, workingSet: WorkingSet | null): RunResult {
    const now = this.context.now();
    const usage = [...this.providerState.usage.values()].sort(
      (a, b) => PROVIDER_IDS.indexOf(a.provider) - PROVIDER_IDS.indexOf(b.provider),
    );

    return {
      status,
      workingSet,
      metadata: {
        runId: this.runId,
        queryText: this.input.queryText,
        mode: this.input.mode,
        tier: this.tier,
        query: this.query,
        budget: this.budget,
        budgetStats: this.budget ? getBudgetStats(this.tracker, this.budget, now) : null,
        fromCache: this.cacheHit !== null,
        cacheSimilarity: this.cacheHit?.similarity ?? null,
        cacheExact: this.cacheHit?.exact ?? null,
        iterations: this.tracker.iterations,
        elapsedMs: elapsedMs(this.tracker, now),
        finalStage: this.stage ?? "FAILED",
        gapState: this.gapState,
        failureReason: failure?.reason ?? null,
        failureMessage: failure?.message ?? null,
        stageHistory: this.stageHistory.map((entry) => ({ ...entry })),
        coverage: this.workingSet.coverage,
        verification: this.verification,
        credibilityReport: buildCredibilityReport(this.workingSet.sources),
        providerUsage: usage.map((entry) => ({ ...entry })),
        outputs: { ...this.outputs },
      },
    };
  }
}
