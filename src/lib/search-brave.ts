/**
 * Brave Search API Provider
 *
 * https://brave.com/search/api/
 */

import { z } from "zod";
import {
  fetchProviderJson,
  isUsableKey,
  rankedRelevance,
  type RawResult,
  type SearchProvider,
  type WebSearchOptions,
} from "./web-search";

const BraveSearchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
            page_age: z.string().optional(),
            age: z.string().optional(),
          }),
        )
        .optional(),
    })
    .optional(),
});

const BRAVE_API_BASE = "https://api.search.brave.com/res/v1/web/search";
const BRAVE_BASE_RELEVANCE = 0.9;

export async function searchBrave(options: WebSearchOptions): Promise<RawResult[]> {
  const apiKey = process.env.BRAVE_API_KEY;
  console.log(`[Search] Brave: Starting search for query: "${options.query.substring(0, 50)}..."`);

  if (!isUsableKey(apiKey)) {
    console.error("[Search] Brave: ❌ API key not configured");
    return [];
  }

  const params = new URLSearchParams({
    q: options.query,
    count: String(Math.min(options.maxResults, 20)), // Brave supports up to 20 results per request
  });

  const data = await fetchProviderJson(
    "brave",
    "Brave",
    `${BRAVE_API_BASE}?${params.toString()}`,
    {
      headers: {
        "Accept": "application/json",
        "Accept-Encoding": "gzip",
        "X-Subscription-Token": apiKey,
      },
    },
    BraveSearchResponseSchema,
    options,
  );

  const results = data.web?.results ?? [];
  if (results.length === 0) {
    console.warn(`[Search] Brave: ⚠️ No results in response`);
  }

  const out: RawResult[] = [];
  for (const r of results) {
    if (!r.url || !r.title) continue;
    out.push({
      provider: "brave",
      url: r.url,
      title: r.title,
      snippet: r.description ?? null,
      publishedAt: r.page_age,
      relevance: rankedRelevance(BRAVE_BASE_RELEVANCE, out.length),
    });
  }

  const truncated = out.slice(0, options.maxResults);
  console.log(`[Search] Brave: ✅ Returning ${truncated.length} valid results`);
  return truncated;
}

export const braveProvider: SearchProvider = {
  id: "brave",
  label: "Brave",
  requiresKey: true,
  isConfigured: () => isUsableKey(process.env.BRAVE_API_KEY),
  search: searchBrave,
};
