/**
 * Default writing collaborators.
 *
 * Deployments plug in their own writer, editor, citer and publisher; these
 * defaults keep the pipeline usable without a model. The writer is
 * extractive: it assembles verified claims under their sub-topics, with
 * `[n]` markers pointing into the working set, and never exceeds the word
 * limit it is given.
 *
 * @module research/collaborators
 */

import { countWords } from "./text-utils";
import type {
  CitationCollaborator,
  Collaborators,
  EditorCollaborator,
  HandOff,
  PublishReceipt,
  PublisherCollaborator,
  WriteRequest,
  WriterCollaborator,
} from "./types";

/**
 * 1-based citation number of a source URL within the working set.
 */
function citationIndex(handOff: HandOff, url: string): number {
  return handOff.workingSet.sources.findIndex((source) => source.url === url) + 1;
}

// ============================================================================
// WRITER
// ============================================================================

/**
 * Compose a report from verified facts within `maxWords`. Blocks that would
 * exceed the limit are skipped, so the result is never truncated mid-sentence.
 */
export function composeExtractiveReport(request: WriteRequest): string {
  const blocks: string[] = [];
  let used = 0;

  const tryAdd = (block: string): boolean => {
    const n = countWords(block);
    if (used + n > request.maxWords) return false;
    blocks.push(block);
    used += n;
    return true;
  };

  tryAdd(`# ${request.query.normalized}`);

  for (const subTopic of request.query.subTopics) {
    const facts = request.verification.facts.filter((fact) => fact.subTopic === subTopic);
    if (facts.length === 0) continue;
    if (!tryAdd(`\n## ${subTopic}\n`)) break;
    for (const fact of facts) {
      const marker = citationIndex(request, fact.sourceUrl);
      tryAdd(marker > 0 ? `${fact.claim} [${marker}]` : fact.claim);
    }
  }

  if (request.verification.note.length > 0) {
    tryAdd(`\n\n${request.verification.note}`);
  }

  return blocks.join(" ").replace(/ \n/g, "\n").replace(/\n /g, "\n").trim();
}

export const extractiveWriter: WriterCollaborator = {
  async write(request) {
    return composeExtractiveReport(request);
  },
};

// ============================================================================
// EDITOR / CITER / PUBLISHER
// ============================================================================

/**
 * Whitespace tidy-up only; content is left as written.
 */
export const tidyEditor: EditorCollaborator = {
  async edit({ draft }) {
    return draft
      .split("\n")
      .map((line) => line.trimEnd())
      .join("\n")
      .replace(/\n{3,}/g, "\n\n")
      .trim();
  },
};

export function formatSourceList(handOff: HandOff): string {
  return handOff.workingSet.sources
    .map((source, index) => `[${index + 1}] ${source.title || source.domain}. ${source.url}`)
    .join("\n");
}

export const sourceListCiter: CitationCollaborator = {
  async cite(input) {
    if (input.workingSet.sources.length === 0) return input.text;
    return `${input.text}\n\n## Sources\n${formatSourceList(input)}`;
  },
};

/**
 * Keeps the most recent `maxEntries` published texts in memory, keyed by
 * reference. The oldest entry is dropped first.
 */
export class InMemoryPublisher implements PublisherCollaborator {
  private readonly published = new Map<string, string>();

  constructor(
    private readonly now: () => number = Date.now,
    private readonly maxEntries = 100,
  ) {}

  async publish(input: HandOff & { readonly text: string }): Promise<PublishReceipt> {
    const reference = `research-${input.runId}`;
    this.published.delete(reference);
    this.published.set(reference, input.text);
    while (this.published.size > this.maxEntries) {
      const oldest = this.published.keys().next();
      if (oldest.done) break;
      this.published.delete(oldest.value);
    }
    return { reference, publishedAt: new Date(this.now()).toISOString() };
  }

  get(reference: string): string | undefined {
    return this.published.get(reference);
  }

  get size(): number {
    return this.published.size;
  }
}

export function createDefaultCollaborators(now: () => number = Date.now): Collaborators {
  return {
    writer: extractiveWriter,
    editor: tidyEditor,
    citer: sourceListCiter,
    publisher: new InMemoryPublisher(now),
  };
}
