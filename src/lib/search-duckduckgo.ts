/**
 * DuckDuckGo Instant Answer Provider
 *
 * Keyless. The instant answer API returns an abstract plus related topics
 * rather than ranked web results, so coverage is thin but always available.
 * https://api.duckduckgo.com/?q=...&format=json
 */

import { z } from "zod";
import {
  fetchProviderJson,
  rankedRelevance,
  type RawResult,
  type SearchProvider,
  type WebSearchOptions,
} from "./web-search";

const TopicSchema = z.object({
  FirstURL: z.string().optional(),
  Text: z.string().optional(),
});

const TopicGroupSchema = z.object({
  Name: z.string().optional(),
  Topics: z.array(TopicSchema),
});

const DuckDuckGoResponseSchema = z.object({
  Heading: z.string().optional(),
  AbstractText: z.string().optional(),
  AbstractURL: z.string().optional(),
  AbstractSource: z.string().optional(),
  RelatedTopics: z.array(z.union([TopicGroupSchema, TopicSchema])).default([]),
});

type DuckDuckGoTopic = z.infer<typeof TopicSchema>;

const DUCKDUCKGO_API_BASE = "https://api.duckduckgo.com/";
const DUCKDUCKGO_BASE_RELEVANCE = 0.7;

/**
 * Related-topic text reads "Title - description"; split it where possible.
 */
export function splitTopicText(text: string): { title: string; snippet: string } {
  const sep = text.indexOf(" - ");
  if (sep > 0) {
    return { title: text.substring(0, sep).trim(), snippet: text.substring(sep + 3).trim() };
  }
  return { title: text.length > 80 ? `${text.substring(0, 77)}...` : text, snippet: text };
}

function flattenTopics(entries: Array<z.infer<typeof TopicGroupSchema> | DuckDuckGoTopic>): DuckDuckGoTopic[] {
  const out: DuckDuckGoTopic[] = [];
  for (const entry of entries) {
    if ("Topics" in entry) {
      out.push(...entry.Topics);
    } else {
      out.push(entry);
    }
  }
  return out;
}

export async function searchDuckDuckGo(options: WebSearchOptions): Promise<RawResult[]> {
  const params = new URLSearchParams({
    q: options.query,
    format: "json",
    no_html: "1",
    skip_disambig: "1",
  });

  const data = await fetchProviderJson(
    "duckduckgo",
    "DuckDuckGo",
    `${DUCKDUCKGO_API_BASE}?${params.toString()}`,
    { headers: { "Accept": "application/json" } },
    DuckDuckGoResponseSchema,
    options,
  );

  const out: RawResult[] = [];
  if (data.AbstractURL && data.AbstractText) {
    out.push({
      provider: "duckduckgo",
      url: data.AbstractURL,
      title: data.Heading || data.AbstractSource || data.AbstractURL,
      snippet: data.AbstractText,
      relevance: rankedRelevance(DUCKDUCKGO_BASE_RELEVANCE, 0),
    });
  }

  for (const topic of flattenTopics(data.RelatedTopics)) {
    if (out.length >= options.maxResults) break;
    if (!topic.FirstURL || !topic.Text) continue;
    const { title, snippet } = splitTopicText(topic.Text);
    out.push({
      provider: "duckduckgo",
      url: topic.FirstURL,
      title,
      snippet,
      relevance: rankedRelevance(DUCKDUCKGO_BASE_RELEVANCE, out.length),
    });
  }

  console.log(`[Search] DuckDuckGo: ✅ Returning ${out.length} results`);
  return out.slice(0, options.maxResults);
}

export const duckDuckGoProvider: SearchProvider = {
  id: "duckduckgo",
  label: "DuckDuckGo",
  requiresKey: false,
  isConfigured: () => true,
  search: searchDuckDuckGo,
};
