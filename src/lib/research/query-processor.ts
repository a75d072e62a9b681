/**
 * Query Processing (EXPANDING stage)
 *
 * Turns raw query text into an immutable ResearchQuery:
 * 1. Auto-correct common typos
 * 2. Classify intent by pattern
 * 3. Extract keywords (stop words dropped, max 10)
 * 4. Build search variants from synonyms and intent (max 5)
 * 5. Generate sub-topics with the text generator (JSON array, line-list
 *    fallback, deterministic fallback when generation fails twice)
 *
 * @module research/query-processor
 */

import lexicon from "./data/query-lexicon.json";
import { debugLog } from "./debug";
import { GenerationError } from "./errors";
import { generateWithRetry, type TextGenerator } from "./llm";
import { STOP_WORDS, normalizeWhitespace, stem, words } from "./text-utils";
import type { QueryIntent, ResearchQuery } from "./types";

const MAX_KEYWORDS = 10;
const MAX_VARIANTS = 5;
const SYNONYMS_PER_KEYWORD = 2;

const CORRECTIONS: ReadonlyMap<string, string> = new Map(Object.entries(lexicon.corrections));
const SYNONYMS: ReadonlyMap<string, readonly string[]> = new Map(Object.entries(lexicon.synonyms));

// First match wins
const INTENT_PATTERNS: ReadonlyArray<[QueryIntent, RegExp]> = [
  ["definition", /^(what is|what are|define|meaning of)\b/],
  ["how_to", /^(how to|how do|how can)\b/],
  ["why", /^(why|what causes|what leads to)\b/],
  ["comparison", /\b(compare|comparison|difference between|versus|vs)\b/],
  ["pros_cons", /\b(advantages|disadvantages|pros|cons|benefits|drawbacks)\b/],
  ["examples", /\b(examples of|case studies|instances of)\b/],
  ["statistics", /\b(statistics|data|numbers|percentage)\b/],
  ["history", /\b(history of|evolution of|origin of)\b/],
  ["future", /\b(future of|trends in|predictions)\b/],
  ["location", /\b(where|location|place)\b/],
  ["time", /\b(when|timeline|date)\b/],
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function dedupe(items: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of items) {
    const key = item.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

// ============================================================================
// DETERMINISTIC STEPS
// ============================================================================

export function autoCorrect(text: string): string {
  let corrected = text;
  for (const [typo, correction] of CORRECTIONS) {
    corrected = corrected.replace(new RegExp(`\\b${escapeRegExp(typo)}\\b`, "gi"), correction);
  }
  return corrected;
}

export function classifyIntent(text: string): QueryIntent {
  const lower = text.toLowerCase().trim();
  for (const [intent, pattern] of INTENT_PATTERNS) {
    if (pattern.test(lower)) return intent;
  }
  return "general";
}

export function extractKeywords(text: string): string[] {
  const keywords = words(text).filter((w) => !STOP_WORDS.has(w) && w.length > 2);
  return dedupe(keywords).slice(0, MAX_KEYWORDS);
}

function synonymsFor(keyword: string): readonly string[] {
  return SYNONYMS.get(keyword) ?? SYNONYMS.get(stem(keyword)) ?? [];
}

/**
 * Keyword -> known synonyms, for keywords that have any.
 */
export function buildSynonymMap(keywords: readonly string[]): Record<string, string[]> {
  const map: Record<string, string[]> = {};
  for (const keyword of keywords) {
    const synonyms = synonymsFor(keyword);
    if (synonyms.length > 0) map[keyword] = [...synonyms];
  }
  return map;
}

/**
 * Query variants: the query itself, synonym substitutions, then
 * intent-driven additions. Deduplicated, at most five.
 */
export function expandQuery(text: string, keywords: readonly string[]): string[] {
  const expanded: string[] = [text];

  for (const keyword of keywords) {
    const pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`, "i");
    for (const synonym of synonymsFor(keyword).slice(0, SYNONYMS_PER_KEYWORD)) {
      const variant = text.replace(pattern, synonym);
      if (variant !== text) expanded.push(variant);
    }
  }

  const lower = text.toLowerCase();
  if (keywords.includes("impact")) {
    expanded.push(`${text} research`);
  }
  if (/\bai\b/.test(lower) || lower.includes("artificial intelligence")) {
    expanded.push(`${text} applications`, `${text} case studies`);
  }

  return dedupe(expanded).slice(0, MAX_VARIANTS);
}

/**
 * Engine-neutral phrasings that broaden recall.
 */
export function searchVariants(text: string): string[] {
  const variants = [text, `"${text}"`];
  if (!/^(what|how|why|when|where)\b/i.test(text)) {
    variants.push(`what is ${text}`);
  }
  variants.push(`${text} overview`, `${text} research studies`);
  return variants.slice(0, 4);
}

// ============================================================================
// SUB-TOPICS
// ============================================================================

const SUB_TOPIC_SYSTEM_PROMPT = `You are a research planning expert. Break down the given topic into 3-5 key sub-topics that should be researched.
Return ONLY a JSON array of strings, like: ["subtopic 1", "subtopic 2", "subtopic 3"]`;

/**
 * Parse a sub-topic list from generated text: a JSON array when present,
 * otherwise one sub-topic per line with bullets and numbering stripped.
 */
export function parseSubTopics(content: string, max: number): string[] {
  const start = content.indexOf("[");
  const end = content.lastIndexOf("]");
  if (start !== -1 && end > start) {
    try {
      const parsed: unknown = JSON.parse(content.slice(start, end + 1));
      if (Array.isArray(parsed)) {
        const topics = parsed
          .filter((item): item is string => typeof item === "string")
          .map((item) => normalizeWhitespace(item))
          .filter((item) => item.length > 0);
        if (topics.length > 0) return dedupe(topics).slice(0, max);
      }
    } catch {
      debugLog("[Query] Sub-topic output is not a JSON array; parsing lines");
    }
  }

  const lines = content
    .split("\n")
    .map((line) => normalizeWhitespace(line.replace(/^\s*(?:[-*•]+|\d+[.)])\s*/, "").replace(/^["']|["'],?$/g, "")))
    .filter((line) => line.length >= 4 && !line.startsWith("[") && !line.startsWith("]"));
  return dedupe(lines).slice(0, max);
}

/**
 * Deterministic sub-topics when generation is unavailable: the query itself.
 */
export function fallbackSubTopics(normalized: string): string[] {
  return [normalized];
}

export interface ExpandQueryOptions {
  generator: TextGenerator;
  maxSubTopics: number;
  signal?: AbortSignal;
  maxOutputTokens?: number;
  /** Called once per generation attempt (for budget tracking) */
  onGenerate?: () => void;
}

async function generateSubTopics(normalized: string, options: ExpandQueryOptions): Promise<string[] | null> {
  const counting: TextGenerator = {
    generate: (prompt, constraints) => {
      options.onGenerate?.();
      return options.generator.generate(prompt, constraints);
    },
  };

  try {
    const content = await generateWithRetry(counting, {
      prompt: `Break down this research topic into key sub-topics:\n\n${normalized}`,
      simplifiedPrompt: `List 3 sub-topics of "${normalized}" as a JSON array of strings.`,
      constraints: {
        system: SUB_TOPIC_SYSTEM_PROMPT,
        maxOutputTokens: options.maxOutputTokens ?? 500,
        signal: options.signal,
      },
    });
    const topics = parseSubTopics(content, options.maxSubTopics);
    return topics.length > 0 ? topics : null;
  } catch (err) {
    if (err instanceof GenerationError) {
      console.warn(`[Query] Sub-topic generation unavailable, using query as sole sub-topic: ${err.message}`);
      return null;
    }
    throw err;
  }
}

/**
 * Run the full expansion. Never fails on generation errors; the affected
 * step falls back to the raw query.
 */
export async function expandResearchQuery(raw: string, options: ExpandQueryOptions): Promise<ResearchQuery> {
  const normalized = normalizeWhitespace(autoCorrect(raw));
  const intent = classifyIntent(normalized);
  const keywords = extractKeywords(normalized);
  const variants = dedupe([...expandQuery(normalized, keywords), ...searchVariants(normalized)]).slice(0, MAX_VARIANTS);
  const generated = await generateSubTopics(normalized, options);

  const query: ResearchQuery = {
    raw,
    normalized,
    keywords,
    intent,
    variants,
    subTopics: generated ?? fallbackSubTopics(normalized),
    synonyms: buildSynonymMap(keywords),
    subTopicSource: generated ? "generated" : "fallback",
  };

  debugLog("[Query] Expanded query", {
    normalized,
    intent,
    keywords,
    variants,
    subTopics: query.subTopics,
  });
  return query;
}
