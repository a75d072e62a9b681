/**
 * Source Credibility Scoring
 *
 * Pure, deterministic scoring of a source from its metadata. No network calls.
 *
 * Components (0-100 each) and weights:
 * - Domain authority (40%): high/medium authority lists, then https
 * - Content quality (20%): quality indicators, length, capitalization
 * - Bias (15%, inverted): loaded phrases, excessive punctuation, shouting
 * - Citations and authorship (15%)
 * - Recency (10%): publishedAt relative to fetchedAt
 *
 * Missing metadata yields the neutral component score instead of failing.
 *
 * @module research/source-scoring
 */

import lexicon from "./data/credibility-lexicon.json";
import { extractDomain } from "./text-utils";
import type { CredibilityReport } from "./types";

// ============================================================================
// CONFIGURATION
// ============================================================================

export const NEUTRAL_COMPONENT_SCORE = 50;

export const SCORE_WEIGHTS = {
  domain: 0.4,
  content: 0.2,
  bias: 0.15,
  citations: 0.15,
  recency: 0.1,
} as const;

const HIGH_AUTHORITY_DOMAINS: readonly string[] = lexicon.highAuthorityDomains;
const MEDIUM_AUTHORITY_DOMAINS: readonly string[] = lexicon.mediumAuthorityDomains;
const BIAS_INDICATORS: readonly string[] = lexicon.biasIndicators;
const QUALITY_INDICATORS: readonly string[] = lexicon.qualityIndicators;

const CITATION_PATTERNS = [/\(\d{4}\)/g, /\[\d+\]/g, /et al\./g, /according to/g, /\bstud(?:y|ies)\b/g, /\bresearch\b/g];

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

export interface ScoringInput {
  url: string;
  title?: string | null;
  snippet?: string | null;
  fetchedAt?: string | null;
  publishedAt?: string | null;
  author?: string | null;
}

export interface ScoreBreakdown {
  domain: number;
  content: number;
  bias: number;
  citations: number;
  recency: number;
}

export type CredibilityLevel = "High" | "Medium" | "Low";

export interface ScoredSource {
  score: number;
  level: CredibilityLevel;
  domain: string | null;
  breakdown: ScoreBreakdown;
}

// ============================================================================
// COMPONENTS
// ============================================================================

function matchesAuthorityEntry(host: string, entry: string): boolean {
  if (entry.startsWith(".")) return host.endsWith(entry);
  return host === entry || host.endsWith(`.${entry}`);
}

export function scoreDomainAuthority(url: string): number {
  const host = extractDomain(url);
  if (!host) return 30;
  if (HIGH_AUTHORITY_DOMAINS.some((entry) => matchesAuthorityEntry(host, entry))) return 90;
  if (MEDIUM_AUTHORITY_DOMAINS.some((entry) => matchesAuthorityEntry(host, entry))) return 70;
  return url.toLowerCase().startsWith("https://") ? 50 : 30;
}

export function scoreContentQuality(snippet: string | null | undefined): number {
  if (!snippet || snippet.trim().length === 0) return NEUTRAL_COMPONENT_SCORE;

  const lower = snippet.toLowerCase();
  const qualityCount = QUALITY_INDICATORS.filter((indicator) => lower.includes(indicator)).length;

  const wordCount = snippet.trim().split(/\s+/).length;
  const lengthScore = Math.min((wordCount / 50) * 100, 100);

  const sentences = snippet
    .split(".")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  const capitalized = sentences.filter((s) => /^[A-Z0-9"'(]/.test(s)).length;
  const grammarScore = sentences.length > 0 ? (capitalized / sentences.length) * 100 : 0;

  return Math.min(qualityCount * 15 * 0.4 + lengthScore * 0.4 + grammarScore * 0.2, 100);
}

/**
 * Bias level, 0-100 where higher means more biased.
 */
export function scoreBias(title: string | null | undefined, snippet: string | null | undefined): number {
  const text = `${title ?? ""} ${snippet ?? ""}`.trim();
  if (text.length === 0) return NEUTRAL_COMPONENT_SCORE;

  const lower = text.toLowerCase();
  const biasCount = BIAS_INDICATORS.filter((indicator) => lower.includes(indicator)).length;
  const excessivePunct = (text.match(/[!?]{3,}/g) ?? []).length;

  const tokens = text.split(/\s+/);
  const shouting = tokens.filter((w) => w.length > 3 && /[A-Z]/.test(w) && w === w.toUpperCase()).length;
  const capsRatio = shouting / Math.max(tokens.length, 1);

  return Math.min(biasCount * 20 + excessivePunct * 15 + capsRatio * 100, 100);
}

export function scoreCitations(snippet: string | null | undefined, author: string | null | undefined): number {
  const authorBonus = author && author.trim().length > 0 ? 25 : 0;
  if (!snippet || snippet.trim().length === 0) {
    return Math.min(NEUTRAL_COMPONENT_SCORE + authorBonus, 100);
  }

  const lower = snippet.toLowerCase();
  const citationCount = CITATION_PATTERNS.reduce((sum, pattern) => sum + (lower.match(pattern) ?? []).length, 0);
  const wordCount = snippet.trim().split(/\s+/).length;
  const density = (citationCount / Math.max(wordCount, 1)) * 1000;

  return Math.min(density * 20 + authorBonus, 100);
}

export function scoreRecency(publishedAt: string | null | undefined, fetchedAt: string | null | undefined): number {
  if (!publishedAt) return NEUTRAL_COMPONENT_SCORE;
  const published = Date.parse(publishedAt);
  const reference = fetchedAt ? Date.parse(fetchedAt) : Number.NaN;
  if (Number.isNaN(published) || Number.isNaN(reference)) return NEUTRAL_COMPONENT_SCORE;

  const ageDays = (reference - published) / DAY_MS;
  if (ageDays < -1) return NEUTRAL_COMPONENT_SCORE; // dated in the future
  if (ageDays <= 365) return 100;
  if (ageDays <= 3 * 365) return 75;
  if (ageDays <= 10 * 365) return 50;
  return 25;
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function credibilityLevel(score: number): CredibilityLevel {
  if (score >= 80) return "High";
  if (score >= 60) return "Medium";
  return "Low";
}

export function scoreSourceDetailed(input: ScoringInput): ScoredSource {
  const breakdown: ScoreBreakdown = {
    domain: scoreDomainAuthority(input.url),
    content: scoreContentQuality(input.snippet),
    bias: scoreBias(input.title, input.snippet),
    citations: scoreCitations(input.snippet, input.author),
    recency: scoreRecency(input.publishedAt, input.fetchedAt),
  };

  const raw =
    breakdown.domain * SCORE_WEIGHTS.domain +
    breakdown.content * SCORE_WEIGHTS.content +
    (100 - breakdown.bias) * SCORE_WEIGHTS.bias +
    breakdown.citations * SCORE_WEIGHTS.citations +
    breakdown.recency * SCORE_WEIGHTS.recency;

  const score = Math.round(Math.min(100, Math.max(0, raw)) * 10) / 10;
  return {
    score,
    level: credibilityLevel(score),
    domain: extractDomain(input.url),
    breakdown,
  };
}

/**
 * Credibility score in [0, 100].
 */
export function scoreSource(input: ScoringInput): number {
  return scoreSourceDetailed(input).score;
}

/**
 * Combined ordering score in [0, 1]. Both weights 0 yields 0 for every
 * record, leaving order to the relevance/credibility tie-breakers.
 */
export function compositeScore(
  relevance: number,
  credibility: number,
  weights: { relevance: number; credibility: number },
): number {
  const total = weights.relevance + weights.credibility;
  if (total <= 0) return 0;
  return (weights.relevance * relevance + weights.credibility * (credibility / 100)) / total;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function buildCredibilityReport(sources: ReadonlyArray<{ credibilityScore: number }>): CredibilityReport {
  if (sources.length === 0) {
    return {
      totalSources: 0,
      averageScore: 0,
      medianScore: 0,
      highCredibility: 0,
      mediumCredibility: 0,
      lowCredibility: 0,
      highPercentage: 0,
    };
  }

  const scores = sources.map((s) => s.credibilityScore);
  const sorted = [...scores].sort((a, b) => a - b);
  const high = scores.filter((s) => credibilityLevel(s) === "High").length;
  const medium = scores.filter((s) => credibilityLevel(s) === "Medium").length;

  return {
    totalSources: sources.length,
    averageScore: round1(scores.reduce((sum, s) => sum + s, 0) / scores.length),
    medianScore: round1(sorted[Math.floor(sorted.length / 2)] ?? 0),
    highCredibility: high,
    mediumCredibility: medium,
    lowCredibility: scores.length - high - medium,
    highPercentage: round1((high / sources.length) * 100),
  };
}
