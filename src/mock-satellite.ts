/**
 * Mock Satellite for Testing
 *
 * WebSocket client that behaves like a satellite: sends a config frame,
 * control signals and PCM audio, and records what the ground station
 * sends back.
 */

import WebSocket, { type RawData } from "ws";
import { chunkAudio } from "./audio-utils.js";
import type { ControlSignal } from "./types.js";

/**
 * Configuration for the mock satellite.
 */
export interface MockSatelliteConfig {
  /** Host to connect to (default: localhost) */
  host?: string;
  /** Port to connect to */
  port: number;
  /** WebSocket path (default: /satellite) */
  path?: string;
}

/**
 * Config frame sent after connecting.
 */
export interface MockSessionConfig {
  samplerate: number;
  input_channels: number;
  output_channels: number;
  chunk_size: number;
  room: string;
}

/**
 * Frame received from the ground station.
 */
export type ReceivedFrame =
  | { kind: "text"; text: string; timestamp: number }
  | { kind: "binary"; data: Buffer; timestamp: number };

export interface CloseEvent {
  code: number;
  reason: string;
}

export class MockSatellite {
  private config: Required<MockSatelliteConfig>;
  private ws: WebSocket | null = null;
  private closeEvent: CloseEvent | null = null;
  private waiters: Array<() => void> = [];

  /** Frames received from the ground station */
  public receivedFrames: ReceivedFrame[] = [];

  constructor(config: MockSatelliteConfig) {
    this.config = {
      host: config.host ?? "localhost",
      port: config.port,
      path: config.path ?? "/satellite",
    };
  }

  /**
   * Connect to the ground station.
   */
  async connect(): Promise<void> {
    const url = `ws://${this.config.host}:${this.config.port}${this.config.path}`;
    const ws = new WebSocket(url);
    this.ws = ws;

    ws.on("message", (data: RawData, isBinary: boolean) => {
      const buffer = Buffer.isBuffer(data)
        ? data
        : Array.isArray(data)
          ? Buffer.concat(data)
          : Buffer.from(data);
      this.receivedFrames.push(
        isBinary
          ? { kind: "binary", data: buffer, timestamp: Date.now() }
          : { kind: "text", text: buffer.toString("utf8"), timestamp: Date.now() },
      );
      this.notify();
    });

    ws.on("close", (code, reason) => {
      this.closeEvent = { code, reason: reason.toString("utf8") };
      this.notify();
    });

    await new Promise<void>((resolve, reject) => {
      const connectTimeout = setTimeout(() => {
        reject(new Error("Connection timeout"));
        ws.terminate();
      }, 5000);

      ws.once("open", () => {
        clearTimeout(connectTimeout);
        resolve();
      });
      ws.once("error", (error) => {
        clearTimeout(connectTimeout);
        reject(error);
      });
    });
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  /**
   * Close the connection.
   */
  async stop(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) return;
    await new Promise<void>((resolve) => {
      ws.once("close", () => resolve());
      ws.close(1000, "Client closing");
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Simulation methods (what a satellite would send)
  // ─────────────────────────────────────────────────────────────────────────────

  sendConfig(config: Partial<MockSessionConfig> = {}): Promise<void> {
    return this.sendText(
      JSON.stringify({
        samplerate: 16000,
        input_channels: 1,
        output_channels: 1,
        chunk_size: 1024,
        room: "kitchen",
        ...config,
      }),
    );
  }

  sendControl(signal: ControlSignal): Promise<void> {
    return this.sendText(signal);
  }

  /**
   * Stream audio in chunks (default 2048 bytes).
   */
  async sendAudio(audio: Buffer, chunkSize = 2048): Promise<void> {
    for (const chunk of chunkAudio(audio, chunkSize)) {
      await this.send(chunk, true);
    }
  }

  sendText(text: string): Promise<void> {
    return this.send(text, false);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Assertion helpers
  // ─────────────────────────────────────────────────────────────────────────────

  textFrames(): string[] {
    return this.receivedFrames.flatMap((frame) => (frame.kind === "text" ? [frame.text] : []));
  }

  binaryFrames(): Buffer[] {
    return this.receivedFrames.flatMap((frame) => (frame.kind === "binary" ? [frame.data] : []));
  }

  /**
   * Resolve once at least `count` frames have been received.
   */
  waitForFrames(count: number, timeoutMs = 2000): Promise<ReceivedFrame[]> {
    return this.waitFor(() => this.receivedFrames.length >= count, timeoutMs, `${count} frames`).then(
      () => this.receivedFrames,
    );
  }

  /**
   * Resolve with the close code and reason once the server closes the socket.
   */
  async waitForClose(timeoutMs = 2000): Promise<CloseEvent> {
    await this.waitFor(() => this.closeEvent !== null, timeoutMs, "close");
    return this.closeEvent ?? { code: 0, reason: "" };
  }

  private waitFor(predicate: () => boolean, timeoutMs: number, what: string): Promise<void> {
    if (predicate()) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((waiter) => waiter !== check);
        reject(new Error(`Timed out waiting for ${what}`));
      }, timeoutMs);
      const check = () => {
        if (!predicate()) return;
        clearTimeout(timer);
        this.waiters = this.waiters.filter((waiter) => waiter !== check);
        resolve();
      };
      this.waiters.push(check);
    });
  }

  private notify(): void {
    for (const waiter of [...this.waiters]) waiter();
  }

  private send(data: string | Buffer, binary: boolean): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error("Not connected to ground station"));
    }
    return new Promise((resolve, reject) => {
      ws.send(data, { binary }, (err) => (err ? reject(err) : resolve()));
    });
  }
}

/**
 * Create a mock satellite with default test configuration.
 */
export function createTestMockSatellite(
  port: number,
  options?: Partial<MockSatelliteConfig>,
): MockSatellite {
  return new MockSatellite({ port, ...options });
}
