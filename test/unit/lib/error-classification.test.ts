/**
 * Tests for error classification.
 */
import { describe, it, expect } from "vitest";
import { classifyError } from "@/lib/error-classification";
import { SearchProviderError } from "@/lib/web-search";

describe("classifyError", () => {
  describe("SearchProviderError", () => {
    it("keeps the provider's own failure kind", () => {
      const timeout = classifyError(new SearchProviderError("brave", "timeout", null, "Brave request timed out"));
      expect(timeout.failureKind).toBe("timeout");
      expect(timeout.category).toBe("timeout");
      expect(timeout.shouldCountAsProviderFailure).toBe(true);

      const quota = classifyError(new SearchProviderError("exa", "quota", 429, "Exa HTTP 429"));
      expect(quota.failureKind).toBe("quota");
      expect(quota.category).toBe("rate_limit");
      expect(quota.retriable).toBe(false);
    });

    it("reports 5xx malformed responses as an outage", () => {
      const outage = classifyError(new SearchProviderError("wikipedia", "malformed", 502, "Wikipedia HTTP 502"));
      expect(outage.category).toBe("provider_outage");
      expect(outage.failureKind).toBe("malformed");

      const badBody = classifyError(new SearchProviderError("wikipedia", "malformed", 200, "schema mismatch"));
      expect(badBody.category).toBe("malformed");
    });
  });

  describe("other errors", () => {
    it("treats AbortError as a timeout that is not the provider's fault", () => {
      const err = new Error("This operation was aborted");
      err.name = "AbortError";
      const classified = classifyError(err);

      expect(classified.failureKind).toBe("timeout");
      expect(classified.shouldCountAsProviderFailure).toBe(false);
      expect(classified.retriable).toBe(true);
    });

    it("detects rate limiting from the message", () => {
      const classified = classifyError(new Error("Too many requests, slow down"));

      expect(classified.category).toBe("rate_limit");
      expect(classified.failureKind).toBe("quota");
      expect(classified.shouldCountAsProviderFailure).toBe(true);
    });

    it("detects auth problems from the message", () => {
      const classified = classifyError(new Error("Invalid API key provided"));

      expect(classified.category).toBe("provider_outage");
      expect(classified.retriable).toBe(false);
    });

    it("uses a status code on the error object", () => {
      const classified = classifyError({ message: "overflow", status: 529 });

      expect(classified.category).toBe("rate_limit");
      expect(classified.message).toBe("[object Object]");
    });

    it("falls back to unknown for anything else", () => {
      const classified = classifyError("boom");

      expect(classified).toEqual({
        category: "unknown",
        failureKind: "malformed",
        source: null,
        message: "boom",
        retriable: false,
        shouldCountAsProviderFailure: false,
      });
    });
  });
});
