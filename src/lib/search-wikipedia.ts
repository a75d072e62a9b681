/**
 * Wikipedia Provider (MediaWiki search API)
 *
 * Keyless. https://www.mediawiki.org/wiki/API:Search
 */

import { z } from "zod";
import {
  fetchProviderJson,
  rankedRelevance,
  type RawResult,
  type SearchProvider,
  type WebSearchOptions,
} from "./web-search";

const WikipediaSearchResponseSchema = z.object({
  query: z.object({
    search: z.array(
      z.object({
        title: z.string(),
        snippet: z.string().default(""),
        timestamp: z.string().optional(),
      }),
    ),
  }),
});

const WIKIPEDIA_API_BASE = "https://en.wikipedia.org/w/api.php";
const WIKIPEDIA_BASE_RELEVANCE = 0.85;

const HTML_ENTITIES: Record<string, string> = {
  "&quot;": "\"",
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&#039;": "'",
  "&nbsp;": " ",
};

/**
 * Search snippets come back with `<span class="searchmatch">` markup and HTML entities.
 */
export function stripSnippetMarkup(html: string): string {
  return html
    .replace(/<[^>]+>/g, "")
    .replace(/&(quot|amp|lt|gt|#039|nbsp);/g, (entity) => HTML_ENTITIES[entity] ?? entity)
    .replace(/\s+/g, " ")
    .trim();
}

export function articleUrl(title: string): string {
  return `https://en.wikipedia.org/wiki/${encodeURIComponent(title.replace(/ /g, "_"))}`;
}

export async function searchWikipedia(options: WebSearchOptions): Promise<RawResult[]> {
  const params = new URLSearchParams({
    action: "query",
    list: "search",
    srsearch: options.query,
    srlimit: String(Math.min(options.maxResults, 20)),
    format: "json",
    utf8: "1",
  });

  const data = await fetchProviderJson(
    "wikipedia",
    "Wikipedia",
    `${WIKIPEDIA_API_BASE}?${params.toString()}`,
    { headers: { "Accept": "application/json" } },
    WikipediaSearchResponseSchema,
    options,
  );

  const out: RawResult[] = data.query.search.slice(0, options.maxResults).map((page, index): RawResult => ({
    provider: "wikipedia",
    url: articleUrl(page.title),
    title: page.title,
    snippet: stripSnippetMarkup(page.snippet) || null,
    publishedAt: page.timestamp,
    relevance: rankedRelevance(WIKIPEDIA_BASE_RELEVANCE, index),
  }));

  console.log(`[Search] Wikipedia: ✅ Returning ${out.length} results`);
  return out;
}

export const wikipediaProvider: SearchProvider = {
  id: "wikipedia",
  label: "Wikipedia",
  requiresKey: false,
  isConfigured: () => true,
  search: searchWikipedia,
};
