/**
 * Source normalization, deduplication and ordering.
 *
 * Raw provider results become SourceRecords here. Records are merged by
 * normalized URL; the merge and the final order depend only on record
 * content, never on which provider answered first.
 *
 * @module research/source-deduplication
 */

import { PROVIDER_IDS } from "../config-schemas";
import type { RawResult } from "../web-search";
import { compositeScore, scoreSource } from "./source-scoring";
import { extractDomain, normalizeWhitespace } from "./text-utils";
import type { ProviderId, SourceRecord } from "./types";

export type CompositeWeights = { relevance: number; credibility: number };

const TRACKING_PARAMS = new Set(["ref", "source", "fbclid", "gclid", "mc_cid", "mc_eid"]);

/**
 * Normalize a URL for deduplication:
 * - Remove tracking parameters (utm_*, ref, source, click ids)
 * - Remove hash fragments and trailing slashes
 * - Lowercase and remove www prefix
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url.trim());
    for (const key of [...parsed.searchParams.keys()]) {
      if (key.toLowerCase().startsWith("utm_") || TRACKING_PARAMS.has(key.toLowerCase())) {
        parsed.searchParams.delete(key);
      }
    }
    const host = parsed.host.toLowerCase().replace(/^www\./, "");
    const pathname = parsed.pathname.replace(/\/+$/, "");
    return `${parsed.protocol}//${host}${pathname}${parsed.search}`.toLowerCase();
  } catch {
    // If URL parsing fails, fall back to the lowercased original
    return url.trim().toLowerCase().replace(/#.*$/, "").replace(/\/+$/, "");
  }
}

function providerRank(provider: ProviderId): number {
  return PROVIDER_IDS.indexOf(provider);
}

function sortProviders(providers: Iterable<ProviderId>): ProviderId[] {
  return [...new Set(providers)].sort((a, b) => providerRank(a) - providerRank(b));
}

/**
 * Build a scored SourceRecord from a provider result.
 */
export function toSourceRecord(raw: RawResult, fetchedAt: string, weights: CompositeWeights): SourceRecord {
  const snippet = normalizeWhitespace(raw.snippet ?? "");
  const relevanceScore = Math.min(1, Math.max(0, raw.relevance));
  const credibilityScore = scoreSource({
    url: raw.url,
    title: raw.title,
    snippet,
    fetchedAt,
    publishedAt: raw.publishedAt,
    author: raw.author,
  });

  return {
    originProvider: raw.provider,
    providers: [raw.provider],
    url: raw.url,
    normalizedUrl: normalizeUrl(raw.url),
    domain: extractDomain(raw.url) ?? "",
    title: normalizeWhitespace(raw.title),
    snippet,
    fetchedAt,
    publishedAt: raw.publishedAt,
    author: raw.author,
    credibilityScore,
    relevanceScore,
    compositeScore: compositeScore(relevanceScore, credibilityScore, weights),
  };
}

/**
 * True when `a` should be the surviving record over `b`: longer snippet,
 * then provider rank, then URL.
 */
function isRicher(a: SourceRecord, b: SourceRecord): boolean {
  if (a.snippet.length !== b.snippet.length) return a.snippet.length > b.snippet.length;
  const rankDiff = providerRank(a.originProvider) - providerRank(b.originProvider);
  if (rankDiff !== 0) return rankDiff < 0;
  return a.url < b.url;
}

/**
 * Merge two records with the same normalized URL. The richer record's
 * content survives; relevance is the max of both; providers are unioned.
 */
export function mergeRecords(a: SourceRecord, b: SourceRecord, weights: CompositeWeights): SourceRecord {
  const [keep, other] = isRicher(a, b) ? [a, b] : [b, a];
  const relevanceScore = Math.max(a.relevanceScore, b.relevanceScore);
  const publishedAt = keep.publishedAt ?? other.publishedAt;
  const author = keep.author ?? other.author;
  const fetchedAt = a.fetchedAt < b.fetchedAt ? a.fetchedAt : b.fetchedAt;
  const credibilityScore = scoreSource({
    url: keep.url,
    title: keep.title,
    snippet: keep.snippet,
    fetchedAt,
    publishedAt,
    author,
  });

  return {
    ...keep,
    providers: sortProviders([...a.providers, ...b.providers]),
    fetchedAt,
    publishedAt,
    author,
    credibilityScore,
    relevanceScore,
    compositeScore: compositeScore(relevanceScore, credibilityScore, weights),
  };
}

/**
 * Deterministic order: composite, relevance, credibility (all descending),
 * then normalized URL.
 */
export function compareSources(a: SourceRecord, b: SourceRecord): number {
  return (
    b.compositeScore - a.compositeScore ||
    b.relevanceScore - a.relevanceScore ||
    b.credibilityScore - a.credibilityScore ||
    (a.normalizedUrl < b.normalizedUrl ? -1 : a.normalizedUrl > b.normalizedUrl ? 1 : 0)
  );
}

export function rankSources(records: readonly SourceRecord[]): SourceRecord[] {
  return [...records].sort(compareSources);
}

/**
 * Merge records sharing a normalized URL and return them ranked.
 */
export function deduplicateSources(records: readonly SourceRecord[], weights: CompositeWeights): SourceRecord[] {
  const byUrl = new Map<string, SourceRecord>();
  let merged = 0;
  for (const record of records) {
    const existing = byUrl.get(record.normalizedUrl);
    if (existing) {
      byUrl.set(record.normalizedUrl, mergeRecords(existing, record, weights));
      merged++;
    } else {
      byUrl.set(record.normalizedUrl, record);
    }
  }
  if (merged > 0) {
    console.log(`[Deduplicator] Merged ${merged} duplicate URLs`);
  }
  return rankSources([...byUrl.values()]);
}
