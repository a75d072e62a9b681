/**
 * Search Provider Circuit Breaker
 *
 * Tracks provider health across runs and prevents cascading failures.
 * When a provider fails repeatedly, its circuit "opens" and fan-outs skip it temporarily.
 *
 * States:
 * - CLOSED: Normal operation, provider is healthy
 * - OPEN: Provider is failing, skip it temporarily
 * - HALF_OPEN: Testing if provider has recovered (exactly one probe)
 *
 * One breaker instance lives in the engine context and is shared by every run.
 *
 * @module search-circuit-breaker
 */

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerConfig {
  enabled: boolean;
  failureThreshold: number; // Consecutive failures before opening
  resetTimeoutSec: number; // Seconds before attempting retry
}

interface ProviderCircuitState {
  state: CircuitState;
  failures: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  halfOpenProbeInFlight: boolean;
}

export interface ProviderStats {
  provider: string;
  state: CircuitState;
  consecutiveFailures: number;
  totalRequests: number;
  totalFailures: number;
  totalSuccesses: number;
  successRate: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 3,
  resetTimeoutSec: 300,
};

export class SearchCircuitBreaker {
  private readonly circuits = new Map<string, ProviderCircuitState>();

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_CIRCUIT_BREAKER_CONFIG,
    private readonly now: () => number = Date.now,
  ) {}

  private getCircuitState(provider: string): ProviderCircuitState {
    const existing = this.circuits.get(provider);
    if (existing) return existing;
    const created: ProviderCircuitState = {
      state: "closed",
      failures: 0,
      lastFailureTime: null,
      lastSuccessTime: null,
      totalRequests: 0,
      totalFailures: 0,
      totalSuccesses: 0,
      halfOpenProbeInFlight: false,
    };
    this.circuits.set(provider, created);
    return created;
  }

  // ==========================================================================
  // CIRCUIT OPERATIONS
  // ==========================================================================

  /**
   * Check if a provider may be called (circuit not open).
   * If the circuit is half-open, allow one probe request; this call claims it.
   */
  isAvailable(provider: string): boolean {
    if (!this.config.enabled) return true;

    const state = this.getCircuitState(provider);

    if (state.state === "closed") return true;

    if (state.state === "half_open") {
      if (state.halfOpenProbeInFlight) {
        console.log(`[Circuit-Breaker] ${provider}: HALF_OPEN probe already in flight, skipping concurrent request`);
        return false;
      }
      state.halfOpenProbeInFlight = true;
      return true;
    }

    // OPEN: check whether the cooldown has elapsed
    const timeSinceFailure = state.lastFailureTime !== null ? this.now() - state.lastFailureTime : Infinity;
    const resetTimeoutMs = this.config.resetTimeoutSec * 1000;

    if (timeSinceFailure >= resetTimeoutMs) {
      state.state = "half_open";
      state.halfOpenProbeInFlight = true;
      console.log(`[Circuit-Breaker] ${provider}: OPEN → HALF_OPEN (timeout elapsed, attempting recovery)`);
      return true;
    }

    const remainingSec = Math.ceil((resetTimeoutMs - timeSinceFailure) / 1000);
    console.log(`[Circuit-Breaker] ${provider}: Circuit OPEN, skipping (retry in ${remainingSec}s)`);
    return false;
  }

  recordSuccess(provider: string): void {
    if (!this.config.enabled) return;

    const state = this.getCircuitState(provider);
    state.totalRequests++;
    state.totalSuccesses++;
    state.lastSuccessTime = this.now();
    state.failures = 0;

    if (state.state === "half_open") {
      state.state = "closed";
      state.halfOpenProbeInFlight = false;
      console.log(
        `[Circuit-Breaker] ${provider}: HALF_OPEN → CLOSED (recovery successful, ${state.totalSuccesses}/${state.totalRequests} success rate)`,
      );
    }
  }

  recordFailure(provider: string, error?: string): void {
    if (!this.config.enabled) return;

    const state = this.getCircuitState(provider);
    state.totalRequests++;
    state.totalFailures++;
    state.failures++;
    state.lastFailureTime = this.now();

    console.warn(
      `[Circuit-Breaker] ${provider}: Failure recorded (${state.failures}/${this.config.failureThreshold}, error: ${error || "unknown"})`,
    );

    if (state.state === "half_open") {
      state.state = "open";
      state.halfOpenProbeInFlight = false;
      console.error(`[Circuit-Breaker] ${provider}: HALF_OPEN → OPEN (recovery failed, circuit reopened)`);
      return;
    }

    if (state.state === "closed" && state.failures >= this.config.failureThreshold) {
      state.state = "open";
      console.error(
        `[Circuit-Breaker] ${provider}: CLOSED → OPEN (threshold reached: ${state.failures} consecutive failures)`,
      );
    }
  }

  /**
   * Release a half-open probe that was claimed but never dispatched
   * (e.g. the fan-out deadline fired first).
   */
  releaseProbe(provider: string): void {
    const state = this.circuits.get(provider);
    if (state && state.state === "half_open") state.halfOpenProbeInFlight = false;
  }

  reset(provider: string): void {
    const state = this.getCircuitState(provider);
    state.state = "closed";
    state.failures = 0;
    state.halfOpenProbeInFlight = false;
    console.log(`[Circuit-Breaker] ${provider}: Circuit manually reset to CLOSED`);
  }

  resetAll(): void {
    this.circuits.clear();
    console.log("[Circuit-Breaker] All circuits reset");
  }

  // ==========================================================================
  // STATISTICS
  // ==========================================================================

  getStats(provider: string): ProviderStats | null {
    const state = this.circuits.get(provider);
    if (!state) return null;

    return {
      provider,
      state: state.state,
      consecutiveFailures: state.failures,
      totalRequests: state.totalRequests,
      totalFailures: state.totalFailures,
      totalSuccesses: state.totalSuccesses,
      successRate: state.totalRequests > 0 ? state.totalSuccesses / state.totalRequests : 0,
      lastFailureTime: state.lastFailureTime,
      lastSuccessTime: state.lastSuccessTime,
    };
  }

  getAllStats(): ProviderStats[] {
    const stats: ProviderStats[] = [];
    for (const provider of this.circuits.keys()) {
      const stat = this.getStats(provider);
      if (stat) stats.push(stat);
    }
    return stats;
  }
}
