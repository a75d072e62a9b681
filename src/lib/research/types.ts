/**
 * Research Engine - Type Definitions
 *
 * Shared shapes for one research run: the expanded query, its budget,
 * scored sources, the working set and coverage map, run events and the
 * terminal result handed back to the caller.
 *
 * @module research/types
 */

import { z } from "zod";
import { ProviderIdSchema, ResearchModeSchema, type ProviderId, type ResearchMode, type Tier } from "../config-schemas";

export type { ProviderId, ResearchMode, Tier } from "../config-schemas";

// ============================================================================
// QUERY
// ============================================================================

export type QueryIntent =
  | "definition"
  | "how_to"
  | "why"
  | "comparison"
  | "pros_cons"
  | "examples"
  | "statistics"
  | "history"
  | "future"
  | "location"
  | "time"
  | "general";

/**
 * Output of expansion. Immutable for the rest of the run.
 */
export interface ResearchQuery {
  readonly raw: string;
  /** Typo-corrected, whitespace-collapsed text */
  readonly normalized: string;
  readonly keywords: readonly string[];
  readonly intent: QueryIntent;
  /** Ordered search variants; the first is always `normalized` */
  readonly variants: readonly string[];
  readonly subTopics: readonly string[];
  readonly synonyms: Readonly<Record<string, readonly string[]>>;
  /** "generated" when sub-topics came from the text generator */
  readonly subTopicSource: "generated" | "fallback";
}

// ============================================================================
// BUDGET
// ============================================================================

export interface Budget {
  readonly tier: Tier;
  readonly mode: ResearchMode;
  readonly maxSources: number;
  readonly maxWords: number;
  readonly maxIterations: number;
  readonly maxWallTimeMs: number;
  readonly minCorroboration: number;
  readonly premiumFeaturesEnabled: boolean;
  /** True when the mode's iteration limit was lowered to the tier ceiling */
  readonly iterationsCapped: boolean;
}

/**
 * What a run consumed against its budget.
 */
export interface BudgetStats {
  iterations: number;
  maxIterations: number;
  refinements: number;
  llmCalls: number;
  elapsedMs: number;
  maxWallTimeMs: number;
  budgetExceeded: boolean;
  exceedReason: string | undefined;
}

// ============================================================================
// SOURCES
// ============================================================================

export const SourceRecordSchema = z.object({
  originProvider: ProviderIdSchema,
  providers: z.array(ProviderIdSchema).min(1),
  url: z.string().min(1),
  /** Dedup key */
  normalizedUrl: z.string().min(1),
  domain: z.string(),
  title: z.string(),
  snippet: z.string(),
  fetchedAt: z.string(),
  publishedAt: z.string().optional(),
  author: z.string().optional(),
  credibilityScore: z.number().min(0).max(100),
  relevanceScore: z.number().min(0).max(1),
  compositeScore: z.number(),
});

export type SourceRecord = z.infer<typeof SourceRecordSchema>;

export const SourceRecordListSchema = z.array(SourceRecordSchema);

export interface CoverageEntry {
  subTopic: string;
  /** Corroborating sources at or above the credibility floor */
  count: number;
  averageScore: number;
  /** Normalized URLs of the corroborating sources */
  sourceUrls: string[];
  domains: string[];
}

export type CoverageMap = Record<string, CoverageEntry>;

export interface WorkingSet {
  sources: SourceRecord[];
  coverage: CoverageMap;
}

// ============================================================================
// CACHE
// ============================================================================

export const CacheEntrySchema = z.object({
  fingerprint: z.string(),
  queryText: z.string(),
  tokens: z.array(z.string()),
  mode: ResearchModeSchema,
  resultSet: SourceRecordListSchema,
  createdAt: z.number(),
  expiresAt: z.number(),
  hits: z.number().int().min(0),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export interface CacheHit {
  entry: CacheEntry;
  exact: boolean;
  /** 1 for exact hits, Jaccard similarity otherwise */
  similarity: number;
}

// ============================================================================
// VERIFICATION
// ============================================================================

export type FactConfidence = "high" | "medium" | "low";

export interface VerifiedFact {
  subTopic: string;
  claim: string;
  sourceUrl: string;
  domain: string;
  credibilityScore: number;
  /** Sources in the working set backing the same sub-topic */
  corroborations: number;
  independentDomains: number;
  confidence: FactConfidence;
}

export interface VerificationReport {
  facts: VerifiedFact[];
  /** Sub-topics without corroboration from independent domains */
  weakSubTopics: string[];
  note: string;
  noteSource: "generated" | "fallback";
}

// ============================================================================
// RUN STATE
// ============================================================================

export type RunStage =
  | "EXPANDING"
  | "SEARCHING"
  | "VERIFYING"
  | "FINALIZING"
  | "EDITING"
  | "CITING"
  | "PUBLISHED"
  | "FAILED";

export type GapState = "NEEDS_MORE" | "SUFFICIENT" | "BUDGET_EXHAUSTED";

export type RunStatus = "SUFFICIENT" | "PARTIAL" | "FAILED";

export type FailureReason =
  | "no_sources"
  | "timeout"
  | "cancelled"
  | "collaborator_failed"
  | "word_budget_exceeded"
  | "invalid_query"
  | "budget_resolution_failed"
  | "internal_error";

export interface RunEvent {
  runId: string;
  stage: RunStage;
  /** "transition" for stage changes, "info" for progress inside a stage */
  kind: "transition" | "info";
  message: string;
  timestamp: string;
  iteration?: number;
}

export interface StageHistoryEntry {
  stage: RunStage;
  enteredAt: string;
  elapsedMs: number;
}

export interface ProviderUsage {
  provider: ProviderId;
  calls: number;
  results: number;
  failures: number;
  demoted: boolean;
}

export interface CredibilityReport {
  totalSources: number;
  averageScore: number;
  medianScore: number;
  highCredibility: number;
  mediumCredibility: number;
  lowCredibility: number;
  highPercentage: number;
}

export interface CollaboratorOutputs {
  draft?: string;
  edited?: string;
  cited?: string;
  publication?: PublishReceipt;
}

export interface RunMetadata {
  runId: string;
  queryText: string;
  mode: ResearchMode;
  tier: Tier | null;
  query: ResearchQuery | null;
  budget: Budget | null;
  /** Null when the run failed before its budget was derived */
  budgetStats: BudgetStats | null;
  fromCache: boolean;
  /** Similarity of the served cache entry, when any */
  cacheSimilarity: number | null;
  cacheExact: boolean | null;
  iterations: number;
  elapsedMs: number;
  finalStage: RunStage;
  gapState: GapState | null;
  failureReason: FailureReason | null;
  failureMessage: string | null;
  stageHistory: StageHistoryEntry[];
  coverage: CoverageMap;
  verification: VerificationReport | null;
  credibilityReport: CredibilityReport;
  providerUsage: ProviderUsage[];
  outputs: CollaboratorOutputs;
}

export interface RunResult {
  status: RunStatus;
  /** Null for failed runs unless the caller opted into partial results */
  workingSet: WorkingSet | null;
  metadata: RunMetadata;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface UserContext {
  userId: string;
  /** Used when no budget resolver is configured */
  tier?: Tier;
  /** Return the accumulated working set on timeout/cancellation */
  allowPartialResults?: boolean;
}

export interface BudgetResolver {
  resolveBudget(userId: string): Promise<{ tier: Tier }>;
}

/**
 * Read-only view handed to writing collaborators.
 */
export interface HandOff {
  readonly runId: string;
  readonly query: ResearchQuery;
  readonly workingSet: Readonly<WorkingSet>;
  readonly budget: Budget;
  readonly verification: VerificationReport;
  readonly signal: AbortSignal;
}

export interface WriteRequest extends HandOff {
  readonly maxWords: number;
  readonly attempt: number;
  /** Set on the retry after an over-budget draft */
  readonly feedback?: string;
}

export interface PublishReceipt {
  reference: string;
  publishedAt: string;
}

export interface WriterCollaborator {
  write(request: WriteRequest): Promise<string>;
}

export interface EditorCollaborator {
  edit(input: HandOff & { readonly draft: string }): Promise<string>;
}

export interface CitationCollaborator {
  cite(input: HandOff & { readonly text: string }): Promise<string>;
}

export interface PublisherCollaborator {
  publish(input: HandOff & { readonly text: string }): Promise<PublishReceipt>;
}

export interface Collaborators {
  writer: WriterCollaborator;
  editor: EditorCollaborator;
  citer: CitationCollaborator;
  publisher: PublisherCollaborator;
}
