/**
 * Provider registry.
 *
 * @module search-providers
 */

import type { ProviderId } from "./config-schemas";
import type { SearchProvider } from "./web-search";
import { braveProvider } from "./search-brave";
import { duckDuckGoProvider } from "./search-duckduckgo";
import { exaProvider } from "./search-exa";
import { googleCseProvider } from "./search-google-cse";
import { serpApiProvider } from "./search-serpapi";
import { wikipediaProvider } from "./search-wikipedia";

export type ProviderRegistry = ReadonlyMap<ProviderId, SearchProvider>;

export function createDefaultProviders(): ProviderRegistry {
  const providers = [
    braveProvider,
    exaProvider,
    duckDuckGoProvider,
    wikipediaProvider,
    serpApiProvider,
    googleCseProvider,
  ];
  return new Map(providers.map((p) => [p.id, p]));
}

/**
 * Build a registry from explicit providers (tests, custom deployments).
 * Later entries replace earlier ones with the same id.
 */
export function createProviderRegistry(providers: readonly SearchProvider[]): ProviderRegistry {
  return new Map(providers.map((p) => [p.id, p]));
}

/**
 * Providers that can serve a request right now: keyless ones always,
 * keyed ones only when their credentials are set.
 */
export function eligibleProviders(registry: ProviderRegistry): ProviderId[] {
  const out: ProviderId[] = [];
  for (const [id, provider] of registry) {
    if (!provider.requiresKey || provider.isConfigured()) out.push(id);
  }
  return out;
}
