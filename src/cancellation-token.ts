/**
 * Cancellation Token
 *
 * Cooperative cancellation for the long-running loops (broker reconnect
 * loop, per-session drain loop). Wraps an AbortController so that timers
 * and fetch() calls can be aborted through the same token.
 */

import { setTimeout as delay } from "timers/promises";

export class CancellationToken {
  private readonly abortController = new AbortController();

  /**
   * AbortSignal for abort-aware APIs.
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  abort(): void {
    this.abortController.abort();
  }

  isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Resolve once the token is cancelled.
   */
  whenCancelled(): Promise<void> {
    if (this.isCancelled()) return Promise.resolve();
    return new Promise((resolve) => {
      this.signal.addEventListener("abort", () => resolve(), { once: true });
    });
  }
}

/**
 * AbortError is what timers and fetch() throw when their signal fires.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Wait for `ms`, returning early (without throwing) when the signal aborts.
 */
export async function sleepUnlessCancelled(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!isAbortError(err)) throw err;
  }
}
