/**
 * SerpAPI Provider (Google results)
 *
 * https://serpapi.com/search-api
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

const SerpApiResponseSchema = z.object({
  error: z.string().optional(),
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
        date: z.string().optional(),
      }),
    )
    .optional(),
});

const SERPAPI_BASE = "https://serpapi.com/search.json";
const SERPAPI_BASE_RELEVANCE = 0.95;

export async function searchSerpApi(options: WebSearchOptions): Promise<RawResult[]> {
  const apiKey = process.env.SERPAPI_API_KEY;
  if (!isUsableKey(apiKey)) return [];

  const params = new URLSearchParams({
    engine: "google",
    q: options.query,
    api_key: apiKey,
    num: String(Math.min(options.maxResults, 20)),
  });

  const data = await fetchProviderJson(
    "serpapi",
    "SerpAPI",
    `${SERPAPI_BASE}?${params.toString()}`,
    {},
    SerpApiResponseSchema,
    options,
  );

  if (data.error) {
    // SerpAPI reports "no results" through the error field with a 200 status
    console.warn(`[Search] SerpAPI: ⚠️ ${data.error}`);
    return [];
  }

  const out: RawResult[] = [];
  for (const r of data.organic_results ?? []) {
    if (!r.link || !r.title) continue;
    out.push({
      provider: "serpapi",
      url: r.link,
      title: r.title,
      snippet: r.snippet ?? null,
      publishedAt: r.date,
      relevance: rankedRelevance(SERPAPI_BASE_RELEVANCE, out.length),
    });
  }

  return out.slice(0, options.maxResults);
}

export const serpApiProvider: SearchProvider = {
  id: "serpapi",
  label: "SerpAPI",
  requiresKey: true,
  isConfigured: () => isUsableKey(process.env.SERPAPI_API_KEY),
  search: searchSerpApi,
};
