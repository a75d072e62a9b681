/**
 * Google Custom Search JSON API Provider
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

const GoogleCseResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
});

const GOOGLE_CSE_BASE = "https://www.googleapis.com/customsearch/v1";
const GOOGLE_CSE_BASE_RELEVANCE = 0.95;

export async function searchGoogleCse(options: WebSearchOptions): Promise<RawResult[]> {
  const apiKey = process.env.GOOGLE_CSE_API_KEY;
  const cx = process.env.GOOGLE_CSE_ID;
  if (!isUsableKey(apiKey) || !cx) return [];

  const params = new URLSearchParams({
    key: apiKey,
    cx,
    q: options.query,
    num: String(Math.min(options.maxResults, 10)),
  });

  const data = await fetchProviderJson(
    "google-cse",
    "Google-CSE",
    `${GOOGLE_CSE_BASE}?${params.toString()}`,
    {},
    GoogleCseResponseSchema,
    options,
  );

  const out: RawResult[] = [];
  for (const r of data.items ?? []) {
    if (!r.link || !r.title) continue;
    out.push({
      provider: "google-cse",
      url: r.link,
      title: r.title,
      snippet: r.snippet ?? null,
      relevance: rankedRelevance(GOOGLE_CSE_BASE_RELEVANCE, out.length),
    });
  }

  return out;
}

export const googleCseProvider: SearchProvider = {
  id: "google-cse",
  label: "Google-CSE",
  requiresKey: true,
  isConfigured: () => isUsableKey(process.env.GOOGLE_CSE_API_KEY) && Boolean(process.env.GOOGLE_CSE_ID),
  search: searchGoogleCse,
};
