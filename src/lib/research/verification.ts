/**
 * Verification (VERIFYING stage)
 *
 * Builds verified facts from the working set: one claim per source per
 * sub-topic it corroborates, with confidence taken from the corroboration
 * count and the number of independent domains. Confidence describes document
 * agreement, not truth.
 *
 * The summary note is worded by the text generator (one retry with a
 * simplified prompt); when generation fails the note is built from the facts.
 *
 * @module research/verification
 */

import { GenerationError } from "./errors";
import { generateWithRetry, type TextGenerator } from "./llm";
import { normalizeWhitespace } from "./text-utils";
import type { Budget, FactConfidence, ResearchQuery, SourceRecord, VerificationReport, VerifiedFact, WorkingSet } from "./types";

const MAX_CLAIM_CHARS = 300;

// ============================================================================
// FACTS
// ============================================================================

/**
 * First sentence of the snippet, or the title when there is no snippet.
 */
export function extractClaim(source: Pick<SourceRecord, "title" | "snippet">): string {
  const snippet = normalizeWhitespace(source.snippet);
  if (snippet.length === 0) return normalizeWhitespace(source.title);
  const [first] = snippet.split(/(?<=[.!?])\s+/);
  const claim = first ?? snippet;
  return claim.length > MAX_CLAIM_CHARS ? `${claim.slice(0, MAX_CLAIM_CHARS - 3)}...` : claim;
}

export function factConfidence(corroborations: number, independentDomains: number, minCorroboration: number): FactConfidence {
  if (independentDomains >= Math.max(2, minCorroboration)) return "high";
  if (independentDomains >= 2 || corroborations >= minCorroboration) return "medium";
  return "low";
}

/**
 * Independent domains a sub-topic needs before it stops counting as weak.
 * Modes that accept a single source need one; all others need two.
 */
export function requiredIndependentDomains(minCorroboration: number): number {
  return Math.min(2, minCorroboration);
}

export function buildVerifiedFacts(workingSet: WorkingSet, subTopics: readonly string[], budget: Budget): VerifiedFact[] {
  const byUrl = new Map(workingSet.sources.map((source) => [source.normalizedUrl, source]));
  const facts: VerifiedFact[] = [];

  for (const subTopic of subTopics) {
    const entry = workingSet.coverage[subTopic];
    if (!entry) continue;
    const independentDomains = entry.domains.length;
    const confidence = factConfidence(entry.count, independentDomains, budget.minCorroboration);

    for (const url of entry.sourceUrls) {
      const source = byUrl.get(url);
      if (!source) continue;
      facts.push({
        subTopic,
        claim: extractClaim(source),
        sourceUrl: source.url,
        domain: source.domain,
        credibilityScore: source.credibilityScore,
        corroborations: entry.count,
        independentDomains,
        confidence,
      });
    }
  }
  return facts;
}

export function findWeakSubTopics(workingSet: WorkingSet, subTopics: readonly string[], budget: Budget): string[] {
  const required = requiredIndependentDomains(budget.minCorroboration);
  return subTopics.filter((subTopic) => (workingSet.coverage[subTopic]?.domains.length ?? 0) < required);
}

// ============================================================================
// NOTE
// ============================================================================

export function fallbackVerificationNote(facts: readonly VerifiedFact[], subTopics: readonly string[], weak: readonly string[]): string {
  const sources = new Set(facts.map((fact) => fact.sourceUrl)).size;
  const high = facts.filter((fact) => fact.confidence === "high").length;
  let note = `${facts.length} claims from ${sources} sources across ${subTopics.length} sub-topics; ${high} with high corroboration.`;
  if (weak.length > 0) {
    note += ` Lacking independent corroboration: ${weak.join("; ")}.`;
  }
  return note;
}

const NOTE_SYSTEM_PROMPT = `You summarize research verification results for an editor.
Write 2-3 plain sentences. State how well each sub-topic is corroborated. Do not add facts.`;

function notePrompt(query: ResearchQuery, facts: readonly VerifiedFact[], weak: readonly string[]): string {
  const lines = facts
    .slice(0, 20)
    .map((fact) => `- [${fact.subTopic}] (${fact.confidence}, ${fact.domain}) ${fact.claim}`);
  return [
    `Research question: ${query.normalized}`,
    `Sub-topics: ${query.subTopics.join("; ")}`,
    `Weakly corroborated: ${weak.length > 0 ? weak.join("; ") : "none"}`,
    "Claims:",
    ...lines,
  ].join("\n");
}

export interface VerifyOptions {
  generator: TextGenerator;
  signal?: AbortSignal;
  maxOutputTokens?: number;
  onGenerate?: () => void;
}

/**
 * Build the verification report. Generation failures only affect the note.
 */
export async function verifyWorkingSet(
  query: ResearchQuery,
  workingSet: WorkingSet,
  budget: Budget,
  options: VerifyOptions,
): Promise<VerificationReport> {
  const facts = buildVerifiedFacts(workingSet, query.subTopics, budget);
  const weakSubTopics = findWeakSubTopics(workingSet, query.subTopics, budget);

  const counting: TextGenerator = {
    generate: (prompt, constraints) => {
      options.onGenerate?.();
      return options.generator.generate(prompt, constraints);
    },
  };

  try {
    const note = await generateWithRetry(counting, {
      prompt: notePrompt(query, facts, weakSubTopics),
      simplifiedPrompt: `In two sentences, summarize: ${fallbackVerificationNote(facts, query.subTopics, weakSubTopics)}`,
      constraints: {
        system: NOTE_SYSTEM_PROMPT,
        maxOutputTokens: options.maxOutputTokens ?? 300,
        signal: options.signal,
      },
    });
    const trimmed = note.trim();
    if (trimmed.length > 0) {
      return { facts, weakSubTopics, note: trimmed, noteSource: "generated" };
    }
  } catch (err) {
    if (!(err instanceof GenerationError)) throw err;
    console.warn(`[Verify] Note generation unavailable, using deterministic note: ${err.message}`);
  }

  return {
    facts,
    weakSubTopics,
    note: fallbackVerificationNote(facts, query.subTopics, weakSubTopics),
    noteSource: "fallback",
  };
}
