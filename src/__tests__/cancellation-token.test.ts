import { describe, it, expect } from "vitest";
import { CancellationToken, isAbortError, sleepUnlessCancelled } from "../cancellation-token.js";

describe("CancellationToken", () => {
  it("reports cancellation through its signal", () => {
    const token = new CancellationToken();
    expect(token.isCancelled()).toBe(false);

    token.abort();

    expect(token.isCancelled()).toBe(true);
    expect(token.signal.aborted).toBe(true);
  });

  it("resolves whenCancelled on abort", async () => {
    const token = new CancellationToken();
    const cancelled = token.whenCancelled();

    token.abort();

    await expect(cancelled).resolves.toBeUndefined();
  });

  it("resolves whenCancelled immediately once aborted", async () => {
    const token = new CancellationToken();
    token.abort();
    await expect(token.whenCancelled()).resolves.toBeUndefined();
  });
});

describe("sleepUnlessCancelled", () => {
  it("returns early when the signal aborts", async () => {
    const token = new CancellationToken();
    const started = Date.now();

    const sleeping = sleepUnlessCancelled(5000, token.signal);
    token.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it("returns at once for an aborted signal", async () => {
    const token = new CancellationToken();
    token.abort();
    await expect(sleepUnlessCancelled(5000, token.signal)).resolves.toBeUndefined();
  });
});

describe("isAbortError", () => {
  it("matches errors named AbortError", () => {
    const err = new Error("aborted");
    err.name = "AbortError";
    expect(isAbortError(err)).toBe(true);
    expect(isAbortError(new Error("other"))).toBe(false);
    expect(isAbortError("AbortError")).toBe(false);
  });
});
