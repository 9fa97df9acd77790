import { vi } from "vitest";
import type { Logger, STTProvider, STTResult, TTSProvider } from "../bridge.js";
import type {
  BrokerClient,
  BrokerClientFactory,
  BrokerConnectOptions,
  QoS,
} from "../broker-connection.js";
import type { SatelliteCloseCode, SatelliteTransport } from "../types.js";

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ─────────────────────────────────────────────────────────────────────────────
// Broker
// ─────────────────────────────────────────────────────────────────────────────

export interface PublishedMessage {
  topic: string;
  payload: string;
  qos: QoS;
}

/**
 * In-process stand-in for an MQTT connection.
 */
export class FakeBrokerClient implements BrokerClient {
  readonly subscribeCalls: string[] = [];
  readonly unsubscribeCalls: string[] = [];
  readonly published: PublishedMessage[] = [];
  ended = false;
  publishError: Error | null = null;
  /** Leave every subscribe pending forever */
  subscribeHangs = false;

  private messageHandler: ((topic: string, payload: Buffer) => void) | null = null;
  private closeHandler: ((error?: Error) => void) | null = null;

  subscribe(topic: string): Promise<void> {
    this.subscribeCalls.push(topic);
    if (this.subscribeHangs) return new Promise<void>(() => undefined);
    return Promise.resolve();
  }

  async unsubscribe(topic: string): Promise<void> {
    this.unsubscribeCalls.push(topic);
  }

  async publish(topic: string, payload: string, qos: QoS): Promise<void> {
    if (this.publishError) throw this.publishError;
    this.published.push({ topic, payload, qos });
  }

  onMessage(handler: (topic: string, payload: Buffer) => void): void {
    this.messageHandler = handler;
  }

  onClose(handler: (error?: Error) => void): void {
    this.closeHandler = handler;
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  /** Simulate the broker delivering a message */
  deliver(topic: string, payload: string | object): void {
    const text = typeof payload === "string" ? payload : JSON.stringify(payload);
    this.messageHandler?.(topic, Buffer.from(text, "utf8"));
  }

  /** Simulate the connection dropping */
  drop(error = new Error("connection reset")): void {
    this.closeHandler?.(error);
  }
}

/**
 * Factory that fails the first `failures` attempts, then hands out fresh clients.
 */
export class FakeBrokerFactory {
  readonly clients: FakeBrokerClient[] = [];
  readonly attempts: BrokerConnectOptions[] = [];
  failures = 0;
  /** Number of upcoming clients whose subscribes never settle */
  hangingClients = 0;

  readonly connect: BrokerClientFactory = async (options) => {
    this.attempts.push(options);
    if (this.failures > 0) {
      this.failures--;
      throw new Error("ECONNREFUSED");
    }
    const client = new FakeBrokerClient();
    if (this.hangingClients > 0) {
      this.hangingClients--;
      client.subscribeHangs = true;
    }
    this.clients.push(client);
    return client;
  };

  get current(): FakeBrokerClient | undefined {
    return this.clients[this.clients.length - 1];
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Speech services
// ─────────────────────────────────────────────────────────────────────────────

export class FakeSTT implements STTProvider {
  readonly calls: Buffer[] = [];
  result: STTResult | null = { text: "turn on lights", message: "ok" };
  error: Error | null = null;

  async transcribe(audio: Buffer): Promise<STTResult | null> {
    this.calls.push(audio);
    if (this.error) throw this.error;
    return this.result;
  }
}

export class FakeTTS implements TTSProvider {
  readonly calls: Array<{ text: string; sampleRate: number }> = [];
  audio: Buffer | null = Buffer.from([1, 0, 2, 0]);

  async synthesize(text: string, sampleRate: number): Promise<Buffer | null> {
    this.calls.push({ text, sampleRate });
    return this.audio;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

export type SentFrame = { kind: "text"; text: string } | { kind: "binary"; data: Buffer };

export class RecordingTransport implements SatelliteTransport {
  readonly sent: SentFrame[] = [];
  closed: { code: SatelliteCloseCode; reason: string } | null = null;

  async sendText(text: string): Promise<void> {
    if (this.closed) throw new Error("WebSocket is not open");
    this.sent.push({ kind: "text", text });
  }

  async sendBinary(data: Buffer): Promise<void> {
    if (this.closed) throw new Error("WebSocket is not open");
    this.sent.push({ kind: "binary", data });
  }

  close(code: SatelliteCloseCode, reason: string): void {
    this.closed ??= { code, reason };
  }

  isOpen(): boolean {
    return this.closed === null;
  }
}
