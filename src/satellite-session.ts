/**
 * Satellite Session
 *
 * One WebSocket connection from a satellite, from handshake to teardown:
 * - first frame: JSON session config
 * - then text frames (control signals) and binary frames (16-bit PCM)
 *
 * Inbound frames are handled strictly one at a time. A drain loop runs
 * alongside and speaks queued backend responses.
 */

import type { RawData, WebSocket } from "ws";
import { AudioCaptureStateMachine, type CaptureLimits } from "./audio-capture.js";
import type { BrokerLink, Logger, STTProvider, TTSProvider } from "./bridge.js";
import { CancellationToken } from "./cancellation-token.js";
import { SessionConfigError, parseSessionConfig } from "./config.js";
import { DeliveryQueue } from "./delivery-queue.js";
import { OutputDeliveryThrottle } from "./output-throttle.js";
import type { RegisteredSession, SessionRegistry } from "./session-registry.js";
import {
  SatelliteCloseCode,
  type ClientRequest,
  type EndReason,
  type SatelliteSessionInfo,
  type SatelliteTransport,
  type SessionConfig,
} from "./types.js";

/**
 * SatelliteTransport over a ws WebSocket.
 */
export class WebSocketTransport implements SatelliteTransport {
  constructor(private readonly ws: WebSocket) {}

  isOpen(): boolean {
    return this.ws.readyState === this.ws.OPEN;
  }

  sendText(text: string): Promise<void> {
    return this.send(text, false);
  }

  sendBinary(data: Buffer): Promise<void> {
    return this.send(data, true);
  }

  close(code: SatelliteCloseCode, reason: string): void {
    if (this.ws.readyState === this.ws.OPEN || this.ws.readyState === this.ws.CONNECTING) {
      this.ws.close(code, reason);
    }
  }

  private send(data: string | Buffer, binary: boolean): Promise<void> {
    if (!this.isOpen()) {
      return Promise.reject(new Error(`WebSocket is not open (state ${this.ws.readyState})`));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(data, { binary }, (err) => (err ? reject(err) : resolve()));
    });
  }
}

export interface SatelliteSessionOptions {
  sessionId: string;
  transport: SatelliteTransport;
  registry: SessionRegistry;
  broker: BrokerLink;
  stt: STTProvider;
  tts: TTSProvider;
  inputTopic: string;
  capture: CaptureLimits;
  delivery: { batchSize: number; idleDelayMs: number };
  handshakeTimeoutMs: number;
  logger?: Logger;
  onReady?: (info: SatelliteSessionInfo) => void;
  onEnded?: (info: SatelliteSessionInfo, reason: EndReason) => void;
  onRequestPublished?: (sessionId: string, request: ClientRequest) => void;
}

export class SatelliteSession implements RegisteredSession {
  readonly sessionId: string;
  readonly connectedAt = Date.now();
  private readonly options: SatelliteSessionOptions;
  private readonly transport: SatelliteTransport;
  private logger?: Logger;

  private config: SessionConfig | null = null;
  private capture: AudioCaptureStateMachine | null = null;
  private drainToken: CancellationToken | null = null;
  private drainTask: Promise<void> | null = null;
  private handshakeTimer: NodeJS.Timeout | null = null;

  private inbound: Promise<void> = Promise.resolve();
  private teardownPromise: Promise<void> | null = null;
  private endReason: EndReason | null = null;

  private audioChunksReceived = 0;
  private responsesDelivered = 0;

  constructor(options: SatelliteSessionOptions) {
    this.options = options;
    this.sessionId = options.sessionId;
    this.transport = options.transport;
    this.logger = options.logger;
  }

  /**
   * Begin waiting for the config frame.
   */
  start(): void {
    this.handshakeTimer = setTimeout(() => {
      this.handshakeTimer = null;
      if (this.config || this.teardownPromise) return;
      this.logger?.error(`[SatelliteSession] ${this.sessionId} sent no configuration in time`);
      this.close(SatelliteCloseCode.ConfigError, "Configuration timeout", "config-error");
    }, this.options.handshakeTimeoutMs);
  }

  /**
   * Queue an inbound frame for serial processing.
   */
  receive(data: Buffer | string, isBinary: boolean): void {
    if (this.teardownPromise) return;
    this.inbound = this.inbound
      .then(() => this.handleFrame(data, isBinary))
      .catch((err: unknown) => this.fail(err));
  }

  /**
   * Transport closed by the satellite.
   */
  handleTransportClosed(): void {
    void this.teardown("disconnected");
  }

  /**
   * Close the transport and tear the session down.
   */
  close(code: SatelliteCloseCode, reason: string, endReason: EndReason = reasonForCode(code)): void {
    try {
      this.transport.close(code, reason);
    } catch (err) {
      this.logger?.warn(`[SatelliteSession] Error closing transport for ${this.sessionId}:`, err);
    }
    void this.teardown(endReason);
  }

  /**
   * Stop the drain loop and release registry entries.
   * Idempotent; never rejects.
   */
  teardown(reason: EndReason): Promise<void> {
    if (this.teardownPromise) return this.teardownPromise;
    this.endReason = reason;
    this.teardownPromise = this.runTeardown(reason);
    return this.teardownPromise;
  }

  getConfig(): SessionConfig | null {
    return this.config;
  }

  getCapture(): AudioCaptureStateMachine | null {
    return this.capture;
  }

  getInfo(): SatelliteSessionInfo {
    return {
      sessionId: this.sessionId,
      room: this.config?.room,
      outputTopic: this.config?.output_topic,
      connectedAt: this.connectedAt,
      audioChunksReceived: this.audioChunksReceived,
      responsesDelivered: this.responsesDelivered,
    };
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internal methods
  // ─────────────────────────────────────────────────────────────────────────────

  private async handleFrame(data: Buffer | string, isBinary: boolean): Promise<void> {
    if (this.teardownPromise) return;

    if (!this.config) {
      await this.handshake(data, isBinary);
      return;
    }

    const capture = this.capture;
    if (!capture) return;

    if (isBinary) {
      this.audioChunksReceived++;
      await capture.handleAudioChunk(typeof data === "string" ? Buffer.from(data) : data);
    } else {
      await capture.handleControlSignal(typeof data === "string" ? data : data.toString("utf8"));
    }
  }

  private async handshake(data: Buffer | string, isBinary: boolean): Promise<void> {
    let config: SessionConfig;
    try {
      if (isBinary) {
        throw new SessionConfigError("Expected a JSON configuration frame, got binary data");
      }
      config = parseSessionConfig(typeof data === "string" ? data : data.toString("utf8"));
    } catch (err) {
      if (!(err instanceof SessionConfigError)) throw err;
      this.logger?.error(`[SatelliteSession] Configuration error: ${err.message}`);
      this.close(SatelliteCloseCode.ConfigError, "Invalid configuration", "config-error");
      return;
    }

    if (this.handshakeTimer) {
      clearTimeout(this.handshakeTimer);
      this.handshakeTimer = null;
    }

    const { registry, broker, stt, tts, logger } = this.options;
    this.config = config;

    const queue = new DeliveryQueue({ sessionId: this.sessionId, logger });
    this.capture = new AudioCaptureStateMachine({
      sessionId: this.sessionId,
      session: config,
      limits: this.options.capture,
      inputTopic: this.options.inputTopic,
      stt,
      publisher: broker,
      transport: this.transport,
      logger,
      onPublished: (request) => this.options.onRequestPublished?.(this.sessionId, request),
    });

    await registry.attachOutput(this.sessionId, config.output_topic, queue);
    if (this.teardownPromise) return;

    const throttle = new OutputDeliveryThrottle({
      sessionId: this.sessionId,
      queue,
      tts,
      sampleRate: config.samplerate,
      transport: this.transport,
      batchSize: this.options.delivery.batchSize,
      idleDelayMs: this.options.delivery.idleDelayMs,
      logger,
      onDelivered: () => {
        this.responsesDelivered++;
      },
    });
    const token = new CancellationToken();
    this.drainToken = token;
    this.drainTask = throttle.run(token).catch((err: unknown) => {
      this.logger?.error(`[SatelliteSession] Error processing MQTT responses for ${this.sessionId}:`, err);
    });

    this.logger?.info(
      `[SatelliteSession] ${this.sessionId} configured for room ${config.room} (${config.samplerate}Hz)`,
    );
    this.options.onReady?.(this.getInfo());
  }

  private fail(err: unknown): void {
    this.logger?.error(`[SatelliteSession] Unexpected error on ${this.sessionId}:`, err);
    this.close(SatelliteCloseCode.InternalError, "Internal error", "error");
  }

  private async runTeardown(reason: EndReason): Promise<void> {
    try {
      if (this.handshakeTimer) {
        clearTimeout(this.handshakeTimer);
        this.handshakeTimer = null;
      }

      this.drainToken?.abort();
      if (this.drainTask) {
        await this.drainTask;
      }

      this.options.registry.deregister(this.sessionId);
      this.logger?.info(`[SatelliteSession] ${this.sessionId} ended (${reason})`);
      this.options.onEnded?.(this.getInfo(), this.endReason ?? reason);
    } catch (err) {
      this.logger?.error(`[SatelliteSession] Teardown error for ${this.sessionId}:`, err);
      this.options.registry.deregister(this.sessionId);
    }
  }
}

function reasonForCode(code: SatelliteCloseCode): EndReason {
  switch (code) {
    case SatelliteCloseCode.Normal:
      return "disconnected";
    case SatelliteCloseCode.Shutdown:
      return "shutdown";
    case SatelliteCloseCode.ConfigError:
      return "config-error";
    case SatelliteCloseCode.Duplicate:
      return "duplicate";
    case SatelliteCloseCode.UpstreamUnavailable:
      return "upstream-unavailable";
    case SatelliteCloseCode.InternalError:
      return "error";
  }
}

/**
 * Normalize ws message data to a Buffer.
 */
export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
