/**
 * Exa Search API Provider
 *
 * https://docs.exa.ai/reference/search
 */

import { z } from "zod";
import {
  clampRelevance,
  fetchProviderJson,
  isUsableKey,
  type RawResult,
  type SearchProvider,
  type WebSearchOptions,
} from "./web-search";

const ExaSearchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullable().optional(),
        url: z.string().optional(),
        text: z.string().nullable().optional(),
        publishedDate: z.string().nullable().optional(),
        author: z.string().nullable().optional(),
        score: z.number().nullable().optional(),
      }),
    )
    .default([]),
});

const EXA_API_BASE = "https://api.exa.ai/search";
const EXA_DEFAULT_RELEVANCE = 0.8;
const MAX_SNIPPET_CHARS = 500;

export async function searchExa(options: WebSearchOptions): Promise<RawResult[]> {
  const apiKey = process.env.EXA_API_KEY;
  if (!isUsableKey(apiKey)) {
    console.error("[Search] Exa: ❌ API key not configured");
    return [];
  }

  const data = await fetchProviderJson(
    "exa",
    "Exa",
    EXA_API_BASE,
    {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": apiKey,
      },
      body: JSON.stringify({
        query: options.query,
        numResults: Math.min(options.maxResults, 25),
        type: "auto",
        contents: { text: true },
      }),
    },
    ExaSearchResponseSchema,
    options,
  );

  const out: RawResult[] = [];
  for (const r of data.results) {
    if (!r.url || !r.title) continue;
    out.push({
      provider: "exa",
      url: r.url,
      title: r.title,
      snippet: r.text ? r.text.substring(0, MAX_SNIPPET_CHARS) : null,
      publishedAt: r.publishedDate ?? undefined,
      author: r.author ?? undefined,
      relevance: clampRelevance(r.score ?? EXA_DEFAULT_RELEVANCE),
    });
  }

  console.log(`[Search] Exa: ✅ Returning ${Math.min(out.length, options.maxResults)} results`);
  return out.slice(0, options.maxResults);
}

export const exaProvider: SearchProvider = {
  id: "exa",
  label: "Exa",
  requiresKey: true,
  isConfigured: () => isUsableKey(process.env.EXA_API_KEY),
  search: searchExa,
};
