/**
 * Run-level error types.
 *
 * Provider failures use `SearchProviderError` (web-search.ts) and never reach
 * this layer. Everything here is caught by the sequencer and turned into a
 * terminal status; callers never receive these as exceptions.
 *
 * @module research/errors
 */

import type { FailureReason } from "./types";

/**
 * Text generation failed (after its own retry, when thrown by `generateWithRetry`).
 */
export class GenerationError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = "GenerationError";
  }
}

/**
 * Terminal run failure carrying its typed reason.
 */
export class RunFailure extends Error {
  constructor(
    public readonly reason: FailureReason,
    message: string,
  ) {
    super(message);
    this.name = "RunFailure";
  }
}

export class NoSourcesFoundError extends RunFailure {
  constructor(message = "No usable sources from any provider or the cache") {
    super("no_sources", message);
    this.name = "NoSourcesFoundError";
  }
}

export class CollaboratorError extends RunFailure {
  constructor(
    public readonly collaborator: "writer" | "editor" | "citer" | "publisher",
    message: string,
  ) {
    super("collaborator_failed", `${collaborator}: ${message}`);
    this.name = "CollaboratorError";
  }
}

export class WordBudgetExceededError extends RunFailure {
  constructor(
    public readonly wordCount: number,
    public readonly maxWords: number,
  ) {
    super("word_budget_exceeded", `Draft still has ${wordCount} words after retry; limit is ${maxWords}`);
    this.name = "WordBudgetExceededError";
  }
}

/**
 * Abort reason attached to a run's AbortController.
 */
export class RunAbortedError extends RunFailure {
  constructor(reason: "timeout" | "cancelled", message: string) {
    super(reason, message);
    this.name = "RunAbortedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
