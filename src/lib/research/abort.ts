/**
 * Abort signal helpers for run deadlines and cancellation.
 *
 * @module research/abort
 */

/**
 * One signal that aborts when any input does. Falls back to the first
 * signal where `AbortSignal.any` is unavailable.
 */
export function combineSignals(signals: readonly AbortSignal[]): AbortSignal {
  if (signals.length === 1) return signals[0];
  if (typeof AbortSignal.any === "function") return AbortSignal.any([...signals]);
  return signals[0];
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it
 * aborts, whichever comes first. Work that ignores its signal is left to
 * finish in the background; its outcome is discarded.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    // Always subscribed, so a late rejection is never unhandled
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Resolves once the signal aborts; never rejects.
 */
export function untilAborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
