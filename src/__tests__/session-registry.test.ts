import { describe, it, expect, beforeEach, vi } from "vitest";
import { DeliveryQueue } from "../delivery-queue.js";
import { SessionRegistry, type SubscriptionTracker } from "../session-registry.js";
import { SatelliteCloseCode, type SatelliteSessionInfo } from "../types.js";

function handle(sessionId: string, room?: string) {
  return {
    sessionId,
    close: vi.fn(),
    getInfo: (): SatelliteSessionInfo => ({
      sessionId,
      room,
      connectedAt: 1,
      audioChunksReceived: 0,
      responsesDelivered: 0,
    }),
  };
}

class TrackingSubscriptions implements SubscriptionTracker {
  readonly topics = new Set<string>();
  subscribe = vi.fn(async (topic: string) => {
    this.topics.add(topic);
  });
  unsubscribe = vi.fn((topic: string) => {
    this.topics.delete(topic);
  });
}

describe("SessionRegistry", () => {
  let subscriptions: TrackingSubscriptions;
  let registry: SessionRegistry;

  beforeEach(() => {
    subscriptions = new TrackingSubscriptions();
    registry = new SessionRegistry({ subscriptions });
  });

  it("rejects a duplicate session id", () => {
    expect(registry.register(handle("s1"))).toBe(true);
    expect(registry.register(handle("s1"))).toBe(false);
    expect(registry.size).toBe(1);
  });

  it("subscribes the output topic when a queue is attached", async () => {
    registry.register(handle("s1"));
    const queue = new DeliveryQueue({ sessionId: "s1" });
    await registry.attachOutput("s1", "assistant/kitchen/output", queue);

    expect(subscriptions.subscribe).toHaveBeenCalledWith("assistant/kitchen/output");
    expect(registry.queuesForTopic("assistant/kitchen/output")).toEqual([queue]);
  });

  it("rejects attaching output for an unknown session", async () => {
    const queue = new DeliveryQueue({ sessionId: "ghost" });
    await expect(registry.attachOutput("ghost", "assistant/x/output", queue)).rejects.toThrow(
      "Session ghost is not registered",
    );
  });

  it("tears down idempotently", async () => {
    registry.register(handle("s1"));
    const queue = new DeliveryQueue({ sessionId: "s1" });
    await registry.attachOutput("s1", "assistant/kitchen/output", queue);

    expect(registry.deregister("s1")).toBe(true);
    expect(registry.deregister("s1")).toBe(false);

    expect(registry.has("s1")).toBe(false);
    expect(queue.isClosed()).toBe(true);
    expect(registry.outputTopics()).toEqual([]);
    expect(subscriptions.unsubscribe).toHaveBeenCalledTimes(1);
  });

  it("keeps a shared room subscribed until its last session leaves", async () => {
    const first = new DeliveryQueue({ sessionId: "s1" });
    const second = new DeliveryQueue({ sessionId: "s2" });
    registry.register(handle("s1"));
    registry.register(handle("s2"));
    await registry.attachOutput("s1", "assistant/kitchen/output", first);
    await registry.attachOutput("s2", "assistant/kitchen/output", second);

    registry.deregister("s1");
    expect(registry.queuesForTopic("assistant/kitchen/output")).toEqual([second]);
    expect(subscriptions.topics.has("assistant/kitchen/output")).toBe(true);

    registry.deregister("s2");
    expect(registry.queuesForTopic("assistant/kitchen/output")).toEqual([]);
    expect(subscriptions.topics.has("assistant/kitchen/output")).toBe(false);
  });

  it("keeps subscriptions equal to the routed topics", async () => {
    const rooms = ["kitchen", "office", "kitchen", "garage"];
    for (const [i, room] of rooms.entries()) {
      registry.register(handle(`s${i}`));
      await registry.attachOutput(`s${i}`, `assistant/${room}/output`, new DeliveryQueue({ sessionId: `s${i}` }));
    }
    registry.deregister("s1");
    registry.deregister("s2");

    expect([...subscriptions.topics].sort()).toEqual(registry.outputTopics().sort());
    expect(registry.outputTopics().sort()).toEqual(["assistant/garage/output", "assistant/kitchen/output"]);
  });

  it("lists broadcast queues without duplicates", async () => {
    const queue = new DeliveryQueue({ sessionId: "s1" });
    registry.register(handle("s1"));
    await registry.attachOutput("s1", "assistant/kitchen/output", queue);

    expect(registry.broadcastQueues()).toEqual([queue]);
  });

  it("closes every session with the given code", () => {
    const a = handle("s1");
    const b = handle("s2");
    registry.register(a);
    registry.register(b);

    const closed = registry.closeAll(SatelliteCloseCode.UpstreamUnavailable, "Broker connection lost");

    expect(closed).toBe(2);
    expect(a.close).toHaveBeenCalledWith(1013, "Broker connection lost");
    expect(b.close).toHaveBeenCalledWith(1013, "Broker connection lost");
  });

  it("reports session info", () => {
    registry.register(handle("s1", "kitchen"));
    expect(registry.getSessionInfo("s1")?.room).toBe("kitchen");
    expect(registry.listSessions()).toHaveLength(1);
  });
});
