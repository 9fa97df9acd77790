import { describe, it, expect, beforeEach, vi } from "vitest";
import { CancellationToken } from "../cancellation-token.js";
import { DeliveryQueue } from "../delivery-queue.js";
import { OutputDeliveryThrottle } from "../output-throttle.js";
import { FakeTTS, RecordingTransport, createTestLogger } from "./helpers.js";

describe("OutputDeliveryThrottle", () => {
  let queue: DeliveryQueue;
  let tts: FakeTTS;
  let transport: RecordingTransport;
  let logger: ReturnType<typeof createTestLogger>;

  function createThrottle(batchSize = 3) {
    return new OutputDeliveryThrottle({
      sessionId: "sat-1",
      queue,
      tts,
      sampleRate: 22050,
      transport,
      batchSize,
      idleDelayMs: 10,
      logger,
    });
  }

  beforeEach(() => {
    queue = new DeliveryQueue({ sessionId: "sat-1" });
    tts = new FakeTTS();
    transport = new RecordingTransport();
    logger = createTestLogger();
  });

  it("delivers at most one batch per activation", async () => {
    for (let i = 0; i < 10; i++) queue.push({ text: `message ${i}`, alert: null });

    const processed = await createThrottle().drainOnce();

    expect(processed).toBe(3);
    expect(transport.sent).toHaveLength(3);
    expect(queue.size).toBe(7);
    expect(tts.calls.map((c) => c.text)).toEqual(["message 0", "message 1", "message 2"]);
  });

  it("synthesizes at the session sample rate", async () => {
    queue.push({ text: "hello", alert: null });

    await createThrottle().drainOnce();

    expect(tts.calls).toEqual([{ text: "hello", sampleRate: 22050 }]);
    expect(transport.sent).toEqual([{ kind: "binary", data: Buffer.from([1, 0, 2, 0]) }]);
  });

  it("sends the alert cue before the audio", async () => {
    queue.push({ text: "doorbell", alert: { play_before: true } });

    await createThrottle().drainOnce();

    expect(transport.sent).toEqual([
      { kind: "text", text: "alert_default" },
      { kind: "binary", data: Buffer.from([1, 0, 2, 0]) },
    ]);
  });

  it("skips the cue when play_before is false", async () => {
    queue.push({ text: "quiet", alert: { play_before: false } });

    await createThrottle().drainOnce();

    expect(transport.sent.map((f) => f.kind)).toEqual(["binary"]);
  });

  it("moves on when TTS yields nothing", async () => {
    tts.audio = null;
    queue.push({ text: "one", alert: null });
    queue.push({ text: "two", alert: null });

    const processed = await createThrottle().drainOnce();

    expect(processed).toBe(2);
    expect(transport.sent).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      "[OutputThrottle] No audio returned from TTS, skipping response",
    );
  });

  it("stops the batch once the transport is closed", async () => {
    transport.close(1000, "gone");
    queue.push({ text: "one", alert: null });
    queue.push({ text: "two", alert: null });

    const processed = await createThrottle().drainOnce();

    expect(processed).toBe(1);
    expect(queue.size).toBe(1);
  });

  it("reports delivered messages", async () => {
    const onDelivered = vi.fn();
    const throttle = new OutputDeliveryThrottle({
      sessionId: "sat-1",
      queue,
      tts,
      sampleRate: 16000,
      transport,
      onDelivered,
    });
    queue.push({ text: "hi", alert: null });

    await throttle.drainOnce();

    expect(onDelivered).toHaveBeenCalledWith({ text: "hi", alert: null });
  });

  it("drains the queue over several activations and exits on cancel", async () => {
    for (let i = 0; i < 7; i++) queue.push({ text: `m${i}`, alert: null });
    const token = new CancellationToken();

    const loop = createThrottle().run(token);
    await vi.waitFor(() => expect(transport.sent).toHaveLength(7));
    token.abort();
    await loop;

    expect(queue.size).toBe(0);
  });
});
