/**
 * Per-provider request quotas, shared by all runs of one engine.
 *
 * Fixed windows: each provider gets `limit` dispatches per `windowMs`.
 * Providers without a configured limit are unmetered.
 *
 * @module provider-quota
 */

import type { ProviderId } from "./config-schemas";

interface QuotaWindow {
  windowStart: number;
  used: number;
}

export interface QuotaSnapshot {
  provider: ProviderId;
  limit: number | null;
  used: number;
  remaining: number | null;
}

export class ProviderQuotaTracker {
  private readonly windows = new Map<ProviderId, QuotaWindow>();

  constructor(
    private readonly limits: Partial<Record<ProviderId, number>>,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  private currentWindow(provider: ProviderId): QuotaWindow {
    const now = this.now();
    const existing = this.windows.get(provider);
    if (existing && now - existing.windowStart < this.windowMs) return existing;
    const fresh = { windowStart: now, used: 0 };
    this.windows.set(provider, fresh);
    return fresh;
  }

  /**
   * Reserve one dispatch. Returns false when the provider is over quota.
   */
  tryAcquire(provider: ProviderId): boolean {
    const limit = this.limits[provider];
    const window = this.currentWindow(provider);
    if (limit !== undefined && window.used >= limit) {
      console.warn(`[Quota] ${provider}: window quota exhausted (${window.used}/${limit})`);
      return false;
    }
    window.used++;
    return true;
  }

  /**
   * Mark a provider exhausted for the rest of the current window
   * (it reported a quota error itself).
   */
  exhaust(provider: ProviderId): void {
    const limit = this.limits[provider];
    const window = this.currentWindow(provider);
    window.used = Math.max(window.used, limit ?? Number.MAX_SAFE_INTEGER);
  }

  snapshot(provider: ProviderId): QuotaSnapshot {
    const limit = this.limits[provider] ?? null;
    const window = this.currentWindow(provider);
    return {
      provider,
      limit,
      used: window.used,
      remaining: limit === null ? null : Math.max(0, limit - window.used),
    };
  }
}
