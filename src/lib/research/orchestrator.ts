/**
 * Research Engine
 *
 * Public entry point. Starts runs, streams their events, hands back terminal
 * results and cancels on request. Runs execute concurrently and share only
 * what the EngineContext holds (cache, quota counters, circuit breaker).
 *
 * @example
 * const engine = ResearchEngine.create();
 * const handle = engine.startRun("vaccine efficacy", "standard", { userId: "u-1" });
 * for await (const event of engine.streamEvents(handle)) console.log(event.stage, event.message);
 * const result = await engine.getResult(handle);
 *
 * @module research/orchestrator
 */

import { randomUUID } from "node:crypto";
import { createEngineContext, type EngineContext, type EngineContextOptions } from "./engine-context";
import { ResearchRun } from "./sequencer";
import type { ResearchMode, RunEvent, RunResult, UserContext } from "./types";

export interface RunHandle {
  readonly runId: string;
  readonly queryText: string;
  readonly mode: ResearchMode;
  readonly startedAt: string;
}

interface TrackedRun {
  run: ResearchRun;
  result: Promise<RunResult>;
}

export class ResearchEngine {
  private readonly runs = new Map<string, TrackedRun>();
  private readonly evictionTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private closed = false;

  constructor(readonly context: EngineContext) {}

  static create(options: EngineContextOptions = {}): ResearchEngine {
    return new ResearchEngine(createEngineContext(options));
  }

  /**
   * Start a run. Returns immediately; the run proceeds in the background.
   * Throws only when the engine is closed.
   */
  startRun(queryText: string, mode: ResearchMode, user: UserContext): RunHandle {
    if (this.closed) {
      throw new Error("ResearchEngine is closed");
    }
    const runId = randomUUID();
    const run = new ResearchRun(this.context, { runId, queryText, mode, user });
    const result = run.execute().then((settled) => {
      this.scheduleEviction(runId);
      return settled;
    });
    this.runs.set(runId, { run, result });

    return {
      runId,
      queryText,
      mode,
      startedAt: new Date(run.startedAt).toISOString(),
    };
  }

  /**
   * Events from run start until its terminal stage. One-shot per run.
   */
  streamEvents(handle: RunHandle): AsyncIterable<RunEvent> {
    return this.track(handle).run.events.subscribe();
  }

  /**
   * Resolves with the terminal result; never rejects.
   */
  getResult(handle: RunHandle): Promise<RunResult> {
    return this.track(handle).result;
  }

  /**
   * Cancel a run. False when it already finished.
   */
  cancelRun(handle: RunHandle): boolean {
    return this.track(handle).run.cancel();
  }

  activeRunCount(): number {
    let active = 0;
    for (const { run } of this.runs.values()) {
      if (!run.isFinished) active++;
    }
    return active;
  }

  /**
   * Cancel active runs, wait for them to settle and release the cache.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const pending = [...this.runs.values()];
    for (const { run } of pending) run.cancel();
    await Promise.all(pending.map(({ result }) => result));
    for (const timer of this.evictionTimers.values()) clearTimeout(timer);
    this.evictionTimers.clear();
    this.runs.clear();
    await this.context.cache.close();
    console.log("[Engine] Closed");
  }

  /**
   * Finished runs stay retrievable for `runRetentionMs`, then their state is dropped.
   */
  private scheduleEviction(runId: string): void {
    if (this.closed) return;
    const retentionMs = this.context.config.pipeline.runRetentionMs;
    if (retentionMs === 0) {
      this.runs.delete(runId);
      return;
    }
    const timer = setTimeout(() => {
      this.evictionTimers.delete(runId);
      this.runs.delete(runId);
    }, retentionMs);
    timer.unref();
    this.evictionTimers.set(runId, timer);
  }

  private track(handle: RunHandle): TrackedRun {
    const tracked = this.runs.get(handle.runId);
    if (!tracked) {
      throw new Error(`Unknown run ${handle.runId} (never started or already evicted)`);
    }
    return tracked;
  }
}
