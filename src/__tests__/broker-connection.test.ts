import { describe, it, expect, afterEach, vi } from "vitest";
import {
  BrokerConnectionManager,
  NotConnectedError,
  ReconnectBackoff,
} from "../broker-connection.js";
import { FakeBrokerFactory, createTestLogger } from "./helpers.js";

const POLICY = { initialDelayMs: 5000, maxDelayMs: 60000, factor: 2 };

function createManager(factory: FakeBrokerFactory, delays: number[] = []) {
  const logger = createTestLogger();
  const manager = new BrokerConnectionManager({
    connect: { host: "broker.test", port: 1883, clientId: "station-1", connectTimeoutMs: 1000 },
    clientFactory: factory.connect,
    reconnect: POLICY,
    permanentTopics: ["assistant/broadcast"],
    logger,
    sleep: async (ms) => {
      delays.push(ms);
    },
  });
  return { manager, logger };
}

describe("ReconnectBackoff", () => {
  it("doubles from 5s and caps at 60s", () => {
    const backoff = new ReconnectBackoff(POLICY);
    const delays = Array.from({ length: 7 }, () => backoff.next());
    expect(delays).toEqual([5000, 10000, 20000, 40000, 60000, 60000, 60000]);
  });

  it("starts over after reset", () => {
    const backoff = new ReconnectBackoff(POLICY);
    backoff.next();
    backoff.next();
    backoff.reset();
    expect(backoff.next()).toBe(5000);
  });
});

describe("BrokerConnectionManager", () => {
  let manager: BrokerConnectionManager | undefined;

  afterEach(async () => {
    await manager?.stop();
    manager = undefined;
  });

  it("retries failed connects with exponential backoff", async () => {
    const factory = new FakeBrokerFactory();
    factory.failures = 6;
    const delays: number[] = [];
    ({ manager } = createManager(factory, delays));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));

    expect(delays).toEqual([5000, 10000, 20000, 40000, 60000, 60000]);
    expect(factory.attempts).toHaveLength(7);
  });

  it("resets the backoff after a successful connect", async () => {
    const factory = new FakeBrokerFactory();
    factory.failures = 2;
    const delays: number[] = [];
    ({ manager } = createManager(factory, delays));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    factory.current?.drop();
    await vi.waitFor(() => expect(factory.clients).toHaveLength(2));

    expect(delays).toEqual([5000, 10000, 5000]);
  });

  it("logs the retry delay", async () => {
    const factory = new FakeBrokerFactory();
    factory.failures = 1;
    const created = createManager(factory);
    manager = created.manager;

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));

    expect(created.logger.error).toHaveBeenCalledWith(
      "[BrokerConnection] MQTT connection lost: ECONNREFUSED. Reconnecting in 5 seconds...",
    );
    expect(created.logger.info).toHaveBeenCalledWith(
      "[BrokerConnection] MQTT connected and subscriptions restored",
    );
  });

  it("subscribes to the broadcast topic on connect", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));

    await vi.waitFor(() => expect(factory.current?.subscribeCalls).toEqual(["assistant/broadcast"]));
  });

  it("restores every tracked topic after reconnecting", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    await manager.subscribe("assistant/kitchen/output");
    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    await manager.subscribe("assistant/office/output");

    factory.current?.drop();
    await vi.waitFor(() => expect(factory.clients).toHaveLength(2));
    await vi.waitFor(() => expect(manager?.connected).toBe(true));

    await vi.waitFor(() =>
      expect(factory.clients[1]?.subscribeCalls).toEqual([
        "assistant/broadcast",
        "assistant/kitchen/output",
        "assistant/office/output",
      ]),
    );
  });

  it("never drops the broadcast topic", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    manager.unsubscribe("assistant/broadcast");

    expect(manager.getSubscriptions()).toEqual(["assistant/broadcast"]);
    expect(factory.current?.unsubscribeCalls).toEqual([]);
  });

  it("unsubscribes output topics at the broker", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    await manager.subscribe("assistant/kitchen/output");
    manager.unsubscribe("assistant/kitchen/output");

    expect(manager.getSubscriptions()).toEqual(["assistant/broadcast"]);
    await vi.waitFor(() =>
      expect(factory.current?.unsubscribeCalls).toEqual(["assistant/kitchen/output"]),
    );
  });

  it("rejects publish while disconnected", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    await expect(manager.publish("assistant/input", "{}")).rejects.toBeInstanceOf(NotConnectedError);
  });

  it("publishes at QoS 1 while connected", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    await manager.publish("station/input", '{"text":"hi"}');

    expect(factory.current?.published).toEqual([
      { topic: "station/input", payload: '{"text":"hi"}', qos: 1 },
    ]);
  });

  it("dispatches inbound messages in arrival order", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));
    const seen: string[] = [];
    manager.onMessage((topic, payload) => seen.push(`${topic}:${payload.toString()}`));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    factory.current?.deliver("a", "1");
    factory.current?.deliver("b", "2");

    expect(seen).toEqual(["a:1", "b:2"]);
  });

  it("runs the connection-lost hook before retrying", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));
    const lost = vi.fn();
    manager.onConnectionLost(lost);

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    factory.current?.drop();
    await vi.waitFor(() => expect(lost).toHaveBeenCalledTimes(1));
  });

  it("ends the client on stop", async () => {
    const factory = new FakeBrokerFactory();
    ({ manager } = createManager(factory));

    manager.start();
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    const client = factory.current;
    await manager.stop();

    expect(client?.ended).toBe(true);
    expect(manager.getState()).toBe("stopped");
  });

  it("reconnects when the connection drops while subscriptions are being restored", async () => {
    const factory = new FakeBrokerFactory();
    factory.hangingClients = 1;
    const delays: number[] = [];
    ({ manager } = createManager(factory, delays));
    const lost = vi.fn();
    manager.onConnectionLost(lost);

    manager.start();
    await vi.waitFor(() => expect(factory.current?.subscribeCalls).toEqual(["assistant/broadcast"]));
    factory.current?.drop();

    await vi.waitFor(() => expect(factory.clients).toHaveLength(2));
    await vi.waitFor(() => expect(manager?.connected).toBe(true));
    expect(lost).toHaveBeenCalledTimes(1);
    expect(factory.clients[0]?.ended).toBe(true);
    expect(delays).toEqual([5000]);
  });

  it("stops while a subscription restore is still pending", async () => {
    const factory = new FakeBrokerFactory();
    factory.hangingClients = 1;
    ({ manager } = createManager(factory));

    manager.start();
    await vi.waitFor(() => expect(factory.current?.subscribeCalls).toHaveLength(1));
    const client = factory.current;
    await manager.stop();

    expect(client?.ended).toBe(true);
    expect(manager.getState()).toBe("stopped");
  });
});
