/**
 * Run event channel
 *
 * Buffers every event from run start so a late subscriber still sees the
 * full history. One subscription per run; the stream ends when the run
 * reaches a terminal stage.
 *
 * @module research/run-events
 */

import type { RunEvent } from "./types";

export class RunEventChannel {
  private readonly pending: RunEvent[] = [];
  private readonly history: RunEvent[] = [];
  private wake: (() => void) | null = null;
  private closed = false;
  private subscribed = false;

  emit(event: RunEvent): void {
    if (this.closed) return;
    this.pending.push(event);
    this.history.push(event);
    this.notify();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.notify();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Every event emitted so far, regardless of subscription.
   */
  events(): readonly RunEvent[] {
    return this.history;
  }

  /**
   * Consume the stream. A second call throws.
   */
  subscribe(): AsyncIterable<RunEvent> {
    if (this.subscribed) {
      throw new Error("Run events already consumed; streamEvents is one-shot");
    }
    this.subscribed = true;
    return this.drain();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private async *drain(): AsyncGenerator<RunEvent, void, undefined> {
    while (true) {
      const next = this.pending.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }
}
