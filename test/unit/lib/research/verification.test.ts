import { beforeEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_PIPELINE_CONFIG } from "@/lib/config-schemas";
import { deriveBudget } from "@/lib/research/budgets";
import { createWorkingSet } from "@/lib/research/gap-controller";
import {
  buildVerifiedFacts,
  extractClaim,
  factConfidence,
  fallbackVerificationNote,
  findWeakSubTopics,
  verifyWorkingSet,
} from "@/lib/research/verification";
import { failingGenerator, makeQuery, makeSource, scriptedGenerator } from "@test/helpers/test-helpers";

const SUB_TOPICS = ["reef bleaching", "ocean acidification"];
const OPTIONS = { credibilityFloor: 40, subTopicMatchRatio: 0.5 };

const noaa = makeSource({
  url: "https://www.noaa.gov/reef-bleaching",
  title: "Reef bleaching events",
  snippet: "Mass bleaching hit the reef in 2024. Recovery takes a decade.",
  relevance: 0.9,
});
const explainer = makeSource({
  url: "https://example.org/reef",
  title: "Reef bleaching explained",
  snippet: "Bleaching follows marine heatwaves.",
  relevance: 0.8,
});
const chemistry = makeSource({
  url: "https://example.edu/chemistry",
  title: "Ocean acidification",
  snippet: "Carbon dioxide lowers seawater pH.",
  relevance: 0.1,
});

const workingSet = createWorkingSet([noaa, explainer, chemistry], SUB_TOPICS, 5, OPTIONS);
const standard = deriveBudget("free", "standard", DEFAULT_PIPELINE_CONFIG);
const quick = deriveBudget("free", "quick", DEFAULT_PIPELINE_CONFIG);
const query = makeQuery("coral reef health", SUB_TOPICS);

const EXPECTED_NOTE =
  "3 claims from 3 sources across 2 sub-topics; 2 with high corroboration. " +
  "Lacking independent corroboration: ocean acidification.";

describe("extractClaim", () => {
  it("takes the first sentence of the snippet", () => {
    expect(extractClaim(noaa)).toBe("Mass bleaching hit the reef in 2024.");
  });

  it("uses the title when there is no snippet", () => {
    expect(extractClaim({ title: "  Reef   survey ", snippet: "" })).toBe("Reef survey");
  });

  it("truncates long claims", () => {
    const claim = extractClaim({ title: "t", snippet: "a".repeat(400) });

    expect(claim).toHaveLength(300);
    expect(claim.endsWith("...")).toBe(true);
  });
});

describe("factConfidence", () => {
  it("grades by independent domains first, then corroboration count", () => {
    expect(factConfidence(2, 2, 2)).toBe("high");
    expect(factConfidence(2, 2, 3)).toBe("medium");
    expect(factConfidence(3, 1, 3)).toBe("medium");
    expect(factConfidence(1, 1, 3)).toBe("low");
    expect(factConfidence(1, 1, 1)).toBe("medium");
  });
});

describe("buildVerifiedFacts", () => {
  it("emits one claim per corroborating source per sub-topic", () => {
    const facts = buildVerifiedFacts(workingSet, SUB_TOPICS, standard);

    expect(facts.map((f) => [f.subTopic, f.sourceUrl, f.confidence])).toEqual([
      ["reef bleaching", noaa.url, "high"],
      ["reef bleaching", explainer.url, "high"],
      ["ocean acidification", chemistry.url, "low"],
    ]);
    expect(facts[0]).toMatchObject({ domain: "noaa.gov", corroborations: 2, independentDomains: 2 });
  });
});

describe("findWeakSubTopics", () => {
  it("flags sub-topics without two independent domains", () => {
    expect(findWeakSubTopics(workingSet, SUB_TOPICS, standard)).toEqual(["ocean acidification"]);
  });

  it("accepts a single domain when the mode needs one corroboration", () => {
    expect(findWeakSubTopics(workingSet, SUB_TOPICS, quick)).toEqual([]);
  });
});

describe("verifyWorkingSet", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the generated note", async () => {
    const generator = scriptedGenerator(() => "  Reef bleaching is well corroborated.  ");
    const onGenerate = vi.fn();

    const report = await verifyWorkingSet(query, workingSet, standard, { generator, onGenerate });

    expect(report.note).toBe("Reef bleaching is well corroborated.");
    expect(report.noteSource).toBe("generated");
    expect(report.weakSubTopics).toEqual(["ocean acidification"]);
    expect(report.facts).toHaveLength(3);
    expect(onGenerate).toHaveBeenCalledTimes(1);
    expect(generator.prompts[0]).toBe(
      [
        "Research question: coral reef health",
        "Sub-topics: reef bleaching; ocean acidification",
        "Weakly corroborated: ocean acidification",
        "Claims:",
        "- [reef bleaching] (high, noaa.gov) Mass bleaching hit the reef in 2024.",
        "- [reef bleaching] (high, example.org) Bleaching follows marine heatwaves.",
        "- [ocean acidification] (low, example.edu) Carbon dioxide lowers seawater pH.",
      ].join("\n"),
    );
  });

  it("falls back to the deterministic note after both attempts fail", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const generator = failingGenerator();
    const onGenerate = vi.fn();

    const report = await verifyWorkingSet(query, workingSet, standard, { generator, onGenerate });

    expect(report.note).toBe(EXPECTED_NOTE);
    expect(report.noteSource).toBe("fallback");
    expect(onGenerate).toHaveBeenCalledTimes(2);
    expect(generator.prompts[1]).toBe(`In two sentences, summarize: ${EXPECTED_NOTE}`);
  });

  it("falls back when the generated note is blank", async () => {
    const report = await verifyWorkingSet(query, workingSet, standard, { generator: scriptedGenerator(() => "   ") });

    expect(report.noteSource).toBe("fallback");
  });
});

describe("fallbackVerificationNote", () => {
  it("omits the weak list when every sub-topic is corroborated", () => {
    expect(fallbackVerificationNote([], ["a"], [])).toBe("0 claims from 0 sources across 1 sub-topics; 0 with high corroboration.");
  });
});
