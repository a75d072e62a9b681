/**
 * Web Search Provider Layer
 *
 * Shared types and HTTP handling for every search provider. Providers
 * normalize their responses into `RawResult` at the boundary and report
 * failures as `SearchProviderError`.
 *
 * @module web-search
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { ProviderId } from "./config-schemas";

export type { ProviderId } from "./config-schemas";

export type RawResult = {
  provider: ProviderId;
  url: string;
  title: string;
  snippet: string | null;
  publishedAt?: string;
  author?: string;
  /** Provider-assigned relevance in [0, 1] */
  relevance: number;
};

export type WebSearchOptions = {
  query: string;
  maxResults: number;
  timeoutMs?: number;
  /** Run-level or fan-out-level cancellation */
  signal?: AbortSignal;
};

export type SearchFailureKind = "timeout" | "quota" | "malformed";

/**
 * Error thrown by a provider client. Absorbed by the fan-out; never surfaced to callers.
 */
export class SearchProviderError extends Error {
  constructor(
    public readonly provider: ProviderId,
    public readonly kind: SearchFailureKind,
    public readonly status: number | null,
    message: string,
  ) {
    super(message);
    this.name = "SearchProviderError";
  }
}

export interface SearchProvider {
  id: ProviderId;
  /** Display name used in log prefixes */
  label: string;
  requiresKey: boolean;
  isConfigured(): boolean;
  search(options: WebSearchOptions): Promise<RawResult[]>;
}

const DEFAULT_PROVIDER_TIMEOUT_MS = 12_000;

// ============================================================================
// REQUEST HELPERS
// ============================================================================

/**
 * Combine the caller's signal with a per-request timeout.
 */
export function requestSignal(options: WebSearchOptions): AbortSignal {
  const timeout = AbortSignal.timeout(options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS);
  if (!options.signal) return timeout;
  if (typeof AbortSignal.any === "function") return AbortSignal.any([options.signal, timeout]);
  return options.signal;
}

function isAbortLike(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

const QUOTA_BODY_PATTERN = /quota|rate\s*limit|too\s*many\s*requests/i;

/**
 * Fetch a provider endpoint and validate the JSON body against `schema`.
 *
 * HTTP 429/402/403 (or a quota message in the body) becomes a `quota` failure;
 * an aborted or timed-out request becomes `timeout`; any other non-2xx status
 * or a body that does not match the schema becomes `malformed`.
 */
export async function fetchProviderJson<T>(
  provider: ProviderId,
  label: string,
  url: string,
  init: RequestInit,
  schema: ZodType<T, ZodTypeDef, unknown>,
  options: WebSearchOptions,
): Promise<T> {
  let res: Response;
  const startTime = Date.now();
  try {
    res = await fetch(url, { ...init, signal: requestSignal(options) });
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    if (isAbortLike(error)) {
      console.warn(`[Search] ${label}: Request aborted after ${Date.now() - startTime}ms`);
      throw new SearchProviderError(provider, "timeout", null, `${label} request timed out: ${msg}`);
    }
    console.error(`[Search] ${label}: ❌ Fetch failed: ${msg}`);
    throw new SearchProviderError(provider, "malformed", null, `${label} fetch failed: ${msg}`);
  }

  console.log(`[Search] ${label}: Response received in ${Date.now() - startTime}ms - Status: ${res.status}`);

  if (!res.ok) {
    let errorBody = "";
    try {
      errorBody = await res.text();
    } catch (e) {
      console.warn(`[Search] ${label}: Could not read error body: ${e instanceof Error ? e.message : String(e)}`);
    }
    const detail = errorBody.substring(0, 200) || res.statusText;
    if (res.status === 429 || res.status === 402 || res.status === 403 || QUOTA_BODY_PATTERN.test(errorBody)) {
      console.error(`[Search] ${label}: ❌ Quota or rate limit: HTTP ${res.status}`);
      throw new SearchProviderError(provider, "quota", res.status, `${label} HTTP ${res.status}: ${detail}`);
    }
    console.error(`[Search] ${label}: ❌ HTTP error: ${res.status} ${res.statusText}`);
    throw new SearchProviderError(provider, "malformed", res.status, `${label} HTTP ${res.status}: ${detail}`);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    if (isAbortLike(error)) {
      throw new SearchProviderError(provider, "timeout", res.status, `${label} body read timed out`);
    }
    throw new SearchProviderError(provider, "malformed", res.status, `${label} returned invalid JSON`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown shape";
    throw new SearchProviderError(provider, "malformed", res.status, `${label} response did not match schema (${where})`);
  }
  return parsed.data;
}

/**
 * Position-decayed relevance. Providers that return no score of their own
 * rank by position, starting from a per-provider base.
 */
export function rankedRelevance(base: number, index: number): number {
  const value = Math.max(0.1, base - index * 0.02);
  return Math.round(value * 10000) / 10000;
}

export function clampRelevance(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * API keys pasted from docs sometimes still carry placeholder text.
 */
export function isUsableKey(key: string | undefined): key is string {
  return typeof key === "string" && key.trim().length > 0 && !key.includes("PASTE");
}

// ============================================================================
// DOMAIN FILTERS
// ============================================================================

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Keep only whitelisted hosts (when a whitelist is set) and drop blacklisted ones.
 * Results whose URL does not parse are dropped.
 */
export function applyDomainFilters(
  results: RawResult[],
  whitelist: readonly string[] = [],
  blacklist: readonly string[] = [],
): RawResult[] {
  if (whitelist.length === 0 && blacklist.length === 0) return results;
  const allowed = whitelist.map((d) => d.toLowerCase().replace(/^www\./, ""));
  const blocked = blacklist.map((d) => d.toLowerCase().replace(/^www\./, ""));

  return results.filter((r) => {
    let host: string;
    try {
      host = new URL(r.url).hostname.toLowerCase().replace(/^www\./, "");
    } catch {
      return false;
    }
    if (blocked.some((d) => hostMatches(host, d))) return false;
    if (allowed.length > 0 && !allowed.some((d) => hostMatches(host, d))) return false;
    return true;
  });
}
