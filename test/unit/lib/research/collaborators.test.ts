import { describe, expect, it } from "vitest";

import { DEFAULT_PIPELINE_CONFIG } from "@/lib/config-schemas";
import { deriveBudget } from "@/lib/research/budgets";
import {
  InMemoryPublisher,
  composeExtractiveReport,
  createDefaultCollaborators,
  sourceListCiter,
  tidyEditor,
} from "@/lib/research/collaborators";
import { createWorkingSet } from "@/lib/research/gap-controller";
import { countWords } from "@/lib/research/text-utils";
import type { HandOff } from "@/lib/research/types";
import { buildVerifiedFacts } from "@/lib/research/verification";
import { FIXED_FETCHED_AT, makeQuery, makeSource } from "@test/helpers/test-helpers";

const SUB_TOPICS = ["reef bleaching", "ocean acidification"];
const budget = deriveBudget("free", "standard", DEFAULT_PIPELINE_CONFIG);

const workingSet = createWorkingSet(
  [
    makeSource({
      url: "https://www.noaa.gov/reef-bleaching",
      title: "Reef bleaching events",
      snippet: "Mass bleaching hit the reef in 2024.",
      relevance: 0.9,
    }),
    makeSource({
      url: "https://example.org/reef",
      title: "Reef bleaching explained",
      snippet: "Bleaching follows marine heatwaves.",
      relevance: 0.8,
    }),
    makeSource({
      url: "https://example.edu/chemistry",
      title: "Ocean acidification",
      snippet: "Carbon dioxide lowers seawater pH.",
      relevance: 0.1,
    }),
  ],
  SUB_TOPICS,
  5,
  { credibilityFloor: 40, subTopicMatchRatio: 0.5 },
);

const handOff: HandOff = {
  runId: "run-1",
  query: makeQuery("coral reef health", SUB_TOPICS),
  workingSet,
  budget,
  verification: {
    facts: buildVerifiedFacts(workingSet, SUB_TOPICS, budget),
    weakSubTopics: ["ocean acidification"],
    note: "Short note.",
    noteSource: "fallback",
  },
  signal: new AbortController().signal,
};

describe("composeExtractiveReport", () => {
  it("lists claims under their sub-topics with citation markers", () => {
    const report = composeExtractiveReport({ ...handOff, maxWords: 2000, attempt: 1 });

    expect(report).toBe(
      [
        "# coral reef health",
        "## reef bleaching",
        "Mass bleaching hit the reef in 2024. [1] Bleaching follows marine heatwaves. [2]",
        "## ocean acidification",
        "Carbon dioxide lowers seawater pH. [3]",
        "",
        "Short note.",
      ].join("\n"),
    );
  });

  it("skips blocks that would exceed the word limit", () => {
    const report = composeExtractiveReport({ ...handOff, maxWords: 12, attempt: 1 });

    expect(report).toBe("# coral reef health\n## reef bleaching\nBleaching follows marine heatwaves. [2]");
    expect(countWords(report)).toBeLessThanOrEqual(12);
  });
});

describe("tidyEditor", () => {
  it("trims trailing spaces and collapses blank runs", async () => {
    expect(await tidyEditor.edit({ ...handOff, draft: "Intro  \n\n\n\nBody  " })).toBe("Intro\n\nBody");
  });
});

describe("sourceListCiter", () => {
  it("appends a numbered source list matching the markers", async () => {
    const cited = await sourceListCiter.cite({ ...handOff, text: "Body" });

    expect(cited).toBe(
      [
        "Body",
        "",
        "## Sources",
        "[1] Reef bleaching events. https://www.noaa.gov/reef-bleaching",
        "[2] Reef bleaching explained. https://example.org/reef",
        "[3] Ocean acidification. https://example.edu/chemistry",
      ].join("\n"),
    );
  });

  it("leaves the text alone without sources", async () => {
    const empty = { ...handOff, workingSet: { sources: [], coverage: {} } };

    expect(await sourceListCiter.cite({ ...empty, text: "Body" })).toBe("Body");
  });
});

describe("InMemoryPublisher", () => {
  it("stores the text under a run reference", async () => {
    const publisher = new InMemoryPublisher(() => Date.parse(FIXED_FETCHED_AT));

    const receipt = await publisher.publish({ ...handOff, text: "Final text" });

    expect(receipt).toEqual({ reference: "research-run-1", publishedAt: FIXED_FETCHED_AT });
    expect(publisher.get("research-run-1")).toBe("Final text");
    expect(publisher.size).toBe(1);
  });

  it("drops the oldest text beyond its capacity", async () => {
    const publisher = new InMemoryPublisher(Date.now, 2);

    for (const runId of ["run-a", "run-b", "run-c"]) {
      await publisher.publish({ ...handOff, runId, text: `Text for ${runId}` });
    }

    expect(publisher.size).toBe(2);
    expect(publisher.get("research-run-a")).toBeUndefined();
    expect(publisher.get("research-run-c")).toBe("Text for run-c");
  });
});

describe("createDefaultCollaborators", () => {
  it("wires every stage", () => {
    const collaborators = createDefaultCollaborators();

    expect(collaborators.writer).toBeDefined();
    expect(collaborators.editor).toBe(tidyEditor);
    expect(collaborators.citer).toBe(sourceListCiter);
    expect(collaborators.publisher).toBeInstanceOf(InMemoryPublisher);
  });
});
