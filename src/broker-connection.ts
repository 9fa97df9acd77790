/**
 * Broker Connection Manager
 *
 * Owns the single MQTT connection for the process:
 * - connects and re-subscribes every tracked topic on each (re)connect
 * - reconnects forever with exponential backoff
 * - tells the bridge when the connection drops so sessions can be closed
 *
 * All publish/subscribe traffic goes through this class; sessions never
 * touch the client directly.
 */

import type { Logger } from "./bridge.js";
import {
  CancellationToken,
  sleepUnlessCancelled,
} from "./cancellation-token.js";
import type { SubscriptionTracker } from "./session-registry.js";

export type QoS = 0 | 1 | 2;

export type BrokerConnectionState =
  | "disconnected"
  | "connecting"
  | "connected"
  | "stopped";

/**
 * Connection parameters handed to the client factory.
 */
export interface BrokerConnectOptions {
  host: string;
  port: number;
  clientId: string;
  username?: string;
  password?: string;
  connectTimeoutMs: number;
}

/**
 * Minimal broker client (injected).
 */
export interface BrokerClient {
  subscribe(topic: string, qos: QoS): Promise<void>;
  unsubscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string, qos: QoS): Promise<void>;
  onMessage(handler: (topic: string, payload: Buffer) => void): void;
  /** Called once when the connection is lost */
  onClose(handler: (error?: Error) => void): void;
  end(): Promise<void>;
}

/**
 * Opens a connection; rejects if the broker is unreachable.
 */
export type BrokerClientFactory = (options: BrokerConnectOptions) => Promise<BrokerClient>;

export interface ReconnectPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

/**
 * Error thrown when publishing while the broker is disconnected.
 */
export class NotConnectedError extends Error {
  constructor(message = "Broker not connected") {
    super(message);
    this.name = "NotConnectedError";
  }
}

/**
 * Exponential backoff: initial, initial×factor, … capped at maxDelayMs.
 */
export class ReconnectBackoff {
  private current: number;

  constructor(private readonly policy: ReconnectPolicy) {
    this.current = policy.initialDelayMs;
  }

  /**
   * Delay to wait now; grows the delay for the next failure.
   */
  next(): number {
    const delayMs = Math.min(this.current, this.policy.maxDelayMs);
    this.current = Math.min(this.current * this.policy.factor, this.policy.maxDelayMs);
    return delayMs;
  }

  reset(): void {
    this.current = this.policy.initialDelayMs;
  }
}

export interface BrokerConnectionOptions {
  connect: BrokerConnectOptions;
  clientFactory: BrokerClientFactory;
  reconnect: ReconnectPolicy;
  /** Topics that stay subscribed for the life of the process */
  permanentTopics?: string[];
  logger?: Logger;
  /** Override for tests */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

type ConnectionEnd =
  | { kind: "closed"; error?: Error }
  | { kind: "cancelled" };

export class BrokerConnectionManager implements SubscriptionTracker {
  private readonly connectOptions: BrokerConnectOptions;
  private readonly clientFactory: BrokerClientFactory;
  private readonly backoff: ReconnectBackoff;
  private readonly permanentTopics: Set<string>;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private logger?: Logger;

  private subscriptionSet = new Set<string>();
  private client: BrokerClient | null = null;
  private state: BrokerConnectionState = "disconnected";
  private token: CancellationToken | null = null;
  private loop: Promise<void> | null = null;

  private messageHandler: ((topic: string, payload: Buffer) => void) | null = null;
  private connectionLostHandler: (() => void) | null = null;

  constructor(options: BrokerConnectionOptions) {
    this.connectOptions = options.connect;
    this.clientFactory = options.clientFactory;
    this.backoff = new ReconnectBackoff(options.reconnect);
    this.permanentTopics = new Set(options.permanentTopics ?? []);
    this.sleep = options.sleep ?? sleepUnlessCancelled;
    this.logger = options.logger;

    for (const topic of this.permanentTopics) {
      this.subscriptionSet.add(topic);
    }
  }

  /**
   * True while a broker connection is established.
   */
  get connected(): boolean {
    return this.state === "connected" && this.client !== null;
  }

  getState(): BrokerConnectionState {
    return this.state;
  }

  /**
   * Topics that are (re-)subscribed on every connect, in insertion order.
   */
  getSubscriptions(): string[] {
    return [...this.subscriptionSet];
  }

  /**
   * Set the handler for inbound messages. Invoked sequentially, in arrival order.
   */
  onMessage(handler: (topic: string, payload: Buffer) => void): void {
    this.messageHandler = handler;
  }

  /**
   * Set the callback run after the connection drops, before the backoff wait.
   */
  onConnectionLost(handler: () => void): void {
    this.connectionLostHandler = handler;
  }

  /**
   * Start the connect/listen/reconnect loop in the background.
   */
  start(): void {
    if (this.loop) return;
    const token = new CancellationToken();
    this.token = token;
    this.loop = this.run(token).catch((err) => {
      this.logger?.error("[BrokerConnection] Connection loop crashed:", err);
      this.state = "stopped";
    });
  }

  /**
   * Stop the loop and close the connection.
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop || !this.token) return;
    this.token.abort();
    await loop;
    this.loop = null;
    this.token = null;
  }

  /**
   * Publish a payload.
   *
   * @throws NotConnectedError when the broker is disconnected
   */
  async publish(topic: string, payload: string, qos: QoS = 1): Promise<void> {
    const client = this.client;
    if (!client || this.state !== "connected") {
      throw new NotConnectedError(`Cannot publish to ${topic}: broker not connected`);
    }
    await client.publish(topic, payload, qos);
  }

  /**
   * Track a topic and subscribe to it now if connected.
   * Otherwise it is picked up on the next successful connect.
   */
  async subscribe(topic: string): Promise<void> {
    this.subscriptionSet.add(topic);

    const client = this.client;
    if (!client || this.state !== "connected") {
      this.logger?.debug(`[BrokerConnection] Deferred subscription to ${topic} until reconnect`);
      return;
    }

    try {
      await client.subscribe(topic, 1);
      this.logger?.debug(`[BrokerConnection] Subscribed to ${topic}`);
    } catch (err) {
      // Restored on the next reconnect
      this.logger?.warn(`[BrokerConnection] Subscribe to ${topic} failed:`, err);
    }
  }

  /**
   * Stop tracking a topic. The broker-level unsubscribe is best effort.
   */
  unsubscribe(topic: string): void {
    if (this.permanentTopics.has(topic)) return;
    if (!this.subscriptionSet.delete(topic)) return;

    const client = this.client;
    if (!client || this.state !== "connected") return;

    client.unsubscribe(topic).catch((err: unknown) => {
      this.logger?.debug(`[BrokerConnection] Unsubscribe from ${topic} failed:`, err);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection loop
  // ─────────────────────────────────────────────────────────────────────────────

  private async run(token: CancellationToken): Promise<void> {
    const { host, port } = this.connectOptions;

    while (!token.isCancelled()) {
      this.state = "connecting";
      this.logger?.info(`[BrokerConnection] Connecting to MQTT broker at ${host}:${port}`);

      let client: BrokerClient;
      try {
        client = await this.clientFactory(this.connectOptions);
      } catch (err) {
        this.state = "disconnected";
        if (token.isCancelled()) break;
        await this.waitBeforeRetry(token, err);
        continue;
      }

      if (token.isCancelled()) {
        await this.endClient(client);
        break;
      }

      const closed = new Promise<ConnectionEnd>((resolve) => {
        client.onClose((error) => resolve({ kind: "closed", error }));
      });
      client.onMessage((topic, payload) => this.dispatch(topic, payload));

      this.client = client;
      this.state = "connected";

      const cancelled = token.whenCancelled().then((): ConnectionEnd => ({ kind: "cancelled" }));
      // A close or stop during the restore ends this connection even if a subscribe never settles
      const restoring = this.restoreSubscriptions(client).then(
        (): null => null,
        (err: unknown): ConnectionEnd => ({
          kind: "closed",
          error: err instanceof Error ? err : new Error(String(err)),
        }),
      );

      let end: ConnectionEnd;
      const interrupted = await Promise.race([restoring, closed, cancelled]);
      if (interrupted === null) {
        this.backoff.reset();
        this.logger?.info("[BrokerConnection] MQTT connected and subscriptions restored");
        end = await Promise.race([closed, cancelled]);
      } else {
        end = interrupted;
        if (end.kind === "closed") await this.endClient(client);
      }

      this.client = null;
      this.state = "disconnected";

      if (end.kind === "cancelled") {
        await this.endClient(client);
        break;
      }

      this.handleConnectionLost();
      if (token.isCancelled()) break;
      await this.waitBeforeRetry(token, end.error);
    }

    this.client = null;
    this.state = "stopped";
    this.logger?.info("[BrokerConnection] Stopped");
  }

  private async restoreSubscriptions(client: BrokerClient): Promise<void> {
    for (const topic of [...this.subscriptionSet]) {
      await client.subscribe(topic, 1);
      this.logger?.debug(`[BrokerConnection] Subscribed to MQTT topic: ${topic}`);
    }
  }

  private handleConnectionLost(): void {
    try {
      this.connectionLostHandler?.();
    } catch (err) {
      this.logger?.error("[BrokerConnection] Connection-lost handler failed:", err);
    }
  }

  private async waitBeforeRetry(token: CancellationToken, cause: unknown): Promise<void> {
    const delayMs = this.backoff.next();
    const reason = cause instanceof Error ? cause.message : String(cause ?? "connection closed");
    this.logger?.error(
      `[BrokerConnection] MQTT connection lost: ${reason}. Reconnecting in ${delayMs / 1000} seconds...`,
    );
    await this.sleep(delayMs, token.signal);
  }

  private dispatch(topic: string, payload: Buffer): void {
    try {
      this.messageHandler?.(topic, payload);
    } catch (err) {
      this.logger?.error(`[BrokerConnection] Message handler failed for ${topic}:`, err);
    }
  }

  private async endClient(client: BrokerClient): Promise<void> {
    try {
      await client.end();
    } catch (err) {
      this.logger?.debug("[BrokerConnection] Error closing MQTT client:", err);
    }
  }
}
