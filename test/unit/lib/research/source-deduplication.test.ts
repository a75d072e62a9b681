import { describe, expect, it } from "vitest";
import {
  deduplicateSources,
  mergeRecords,
  normalizeUrl,
  rankSources,
  toSourceRecord,
} from "@/lib/research/source-deduplication";
import { DEFAULT_WEIGHTS, FIXED_FETCHED_AT, makeSource, rawResult } from "@test/helpers/test-helpers";

describe("normalizeUrl", () => {
  it("drops tracking parameters, fragments, www and trailing slashes", () => {
    expect(normalizeUrl("https://WWW.Example.com/Path/?utm_source=x&id=3#frag")).toBe("https://example.com/path?id=3");
    expect(normalizeUrl("https://example.com/page?fbclid=abc&ref=home")).toBe("https://example.com/page");
    expect(normalizeUrl("https://example.com/")).toBe("https://example.com");
  });

  it("falls back to a lowercased string for unparseable input", () => {
    expect(normalizeUrl("Not A URL/#section")).toBe("not a url");
  });
});

describe("toSourceRecord", () => {
  it("scores and normalizes a provider result", () => {
    const record = toSourceRecord(
      rawResult("wikipedia", "https://en.wikipedia.org/wiki/Coral_reef", "  Coral   reef ", "  Reefs  are built by corals. ", 1.4),
      FIXED_FETCHED_AT,
      DEFAULT_WEIGHTS,
    );

    expect(record.originProvider).toBe("wikipedia");
    expect(record.providers).toEqual(["wikipedia"]);
    expect(record.normalizedUrl).toBe("https://en.wikipedia.org/wiki/coral_reef");
    expect(record.domain).toBe("en.wikipedia.org");
    expect(record.title).toBe("Coral reef");
    expect(record.snippet).toBe("Reefs are built by corals.");
    expect(record.relevanceScore).toBe(1);
    expect(record.fetchedAt).toBe(FIXED_FETCHED_AT);
  });
});

describe("mergeRecords", () => {
  const rich = makeSource({
    provider: "duckduckgo",
    url: "https://www.nih.gov/vaccine-efficacy?utm_source=x",
    title: "Vaccine efficacy",
    snippet: "Phase three trials measured vaccine efficacy in adults.",
    relevance: 0.6,
  });
  const thin = makeSource({
    provider: "brave",
    url: "https://nih.gov/vaccine-efficacy",
    title: "Vaccine efficacy",
    snippet: "Trials.",
    relevance: 0.9,
    author: "NIH staff",
  });

  it("keeps the richer record's content and the best relevance", () => {
    const merged = mergeRecords(rich, thin, DEFAULT_WEIGHTS);

    expect(merged.url).toBe(rich.url);
    expect(merged.snippet).toBe(rich.snippet);
    expect(merged.originProvider).toBe("duckduckgo");
    expect(merged.providers).toEqual(["brave", "duckduckgo"]);
    expect(merged.relevanceScore).toBe(0.9);
    expect(merged.author).toBe("NIH staff");
  });

  it("is symmetric", () => {
    expect(mergeRecords(thin, rich, DEFAULT_WEIGHTS)).toEqual(mergeRecords(rich, thin, DEFAULT_WEIGHTS));
  });

  it("breaks snippet-length ties by provider rank", () => {
    const a = makeSource({ provider: "wikipedia", url: "https://example.org/x", snippet: "Same text." });
    const b = makeSource({ provider: "brave", url: "https://example.org/x/", snippet: "Same text." });

    expect(mergeRecords(a, b, DEFAULT_WEIGHTS).originProvider).toBe("brave");
  });
});

describe("deduplicateSources", () => {
  const sources = [
    makeSource({ provider: "brave", url: "https://example.com/a", title: "A", snippet: "Alpha.", relevance: 0.5 }),
    makeSource({ provider: "exa", url: "https://example.com/b", title: "B", snippet: "Beta.", relevance: 0.9 }),
    makeSource({ provider: "wikipedia", url: "https://www.example.com/a/", title: "A", snippet: "Alpha, longer.", relevance: 0.7 }),
  ];

  it("merges by normalized URL and ranks by composite score", () => {
    const deduped = deduplicateSources(sources, DEFAULT_WEIGHTS);

    expect(deduped.map((s) => s.normalizedUrl)).toEqual(["https://example.com/b", "https://example.com/a"]);
    expect(deduped[1].providers).toEqual(["brave", "wikipedia"]);
    expect(deduped[1].snippet).toBe("Alpha, longer.");
  });

  it("does not depend on arrival order", () => {
    expect(deduplicateSources([...sources].reverse(), DEFAULT_WEIGHTS)).toEqual(
      deduplicateSources(sources, DEFAULT_WEIGHTS),
    );
  });
});

describe("rankSources", () => {
  it("orders by URL when every score ties", () => {
    const a = makeSource({ url: "https://example.com/b", snippet: "Same." });
    const b = makeSource({ url: "https://example.com/a", snippet: "Same." });

    expect(rankSources([a, b]).map((s) => s.url)).toEqual(["https://example.com/a", "https://example.com/b"]);
  });
});
