/**
 * Error Classification
 *
 * Maps arbitrary thrown values onto search failure kinds, and decides whether
 * they should count against a provider's health (circuit breaker) and whether
 * a retry makes sense.
 *
 * @module error-classification
 */

import { SearchProviderError, type SearchFailureKind } from "./web-search";

export type ErrorCategory = "provider_outage" | "rate_limit" | "malformed" | "timeout" | "unknown";
export type ErrorSource = "search" | "llm";

export type ClassifiedError = {
  category: ErrorCategory;
  /** Provider failure kind the fan-out records for this error */
  failureKind: SearchFailureKind;
  source: ErrorSource | null;
  message: string;
  retriable: boolean;
  shouldCountAsProviderFailure: boolean;
};

/** Patterns indicating provider rate limiting or outage */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

function fromSearchProviderError(error: SearchProviderError): ClassifiedError {
  switch (error.kind) {
    case "timeout":
      return {
        category: "timeout",
        failureKind: "timeout",
        source: "search",
        message: error.message,
        retriable: true,
        shouldCountAsProviderFailure: true,
      };
    case "quota":
      return {
        category: "rate_limit",
        failureKind: "quota",
        source: "search",
        message: error.message,
        retriable: false,
        shouldCountAsProviderFailure: true,
      };
    case "malformed":
      return {
        category: error.status !== null && error.status >= 500 ? "provider_outage" : "malformed",
        failureKind: "malformed",
        source: "search",
        message: error.message,
        retriable: false,
        shouldCountAsProviderFailure: true,
      };
  }
}

function statusOf(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return null;
}

/**
 * Classify an error to determine its category and whether it should
 * count against provider health.
 */
export function classifyError(error: unknown): ClassifiedError {
  // SearchProviderError: already classified by the search layer
  if (error instanceof SearchProviderError) {
    return fromSearchProviderError(error);
  }

  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  // Timeout errors: retriable, not a provider failure
  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(msg))) {
    return {
      category: "timeout",
      failureKind: "timeout",
      source: null,
      message: msg,
      retriable: true,
      shouldCountAsProviderFailure: false,
    };
  }

  // Auth errors: provider misconfiguration
  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return {
      category: "provider_outage",
      failureKind: "quota",
      source: "llm",
      message: msg,
      retriable: false,
      shouldCountAsProviderFailure: true,
    };
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return {
      category: "rate_limit",
      failureKind: "quota",
      source: "llm",
      message: msg,
      retriable: true,
      shouldCountAsProviderFailure: true,
    };
  }

  // Status code on the error object (AI SDK pattern)
  const statusCode = statusOf(error);
  if (statusCode !== null) {
    if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
      return {
        category: "rate_limit",
        failureKind: "quota",
        source: "llm",
        message: msg,
        retriable: true,
        shouldCountAsProviderFailure: true,
      };
    }
    if (statusCode === 401 || statusCode === 403) {
      return {
        category: "provider_outage",
        failureKind: "quota",
        source: "llm",
        message: msg,
        retriable: false,
        shouldCountAsProviderFailure: true,
      };
    }
  }

  return {
    category: "unknown",
    failureKind: "malformed",
    source: null,
    message: msg,
    retriable: false,
    shouldCountAsProviderFailure: false,
  };
}
