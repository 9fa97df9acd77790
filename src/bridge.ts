/**
 * Satellite Bridge
 *
 * WebSocket server that accepts satellite connections. Each connection
 * becomes a SatelliteSession: spoken commands go to STT and out to the
 * broker, backend responses come back as TTS audio.
 */

import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { IncomingMessage, Server } from "http";
import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import type { CaptureLimits } from "./audio-capture.js";
import { SatelliteSession, WebSocketTransport, rawDataToBuffer } from "./satellite-session.js";
import type { SessionRegistry } from "./session-registry.js";
import {
  SatelliteCloseCode,
  type ClientRequest,
  type EndReason,
  type SatelliteSessionInfo,
} from "./types.js";

/**
 * Logger interface for injected logging.
 */
export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

/**
 * Transcription returned by the STT service.
 */
export interface STTResult {
  text: string;
  message: string;
}

/**
 * STT provider interface (injected).
 * Resolves null when the service could not produce a transcription.
 */
export interface STTProvider {
  transcribe(audio: Buffer): Promise<STTResult | null>;
}

/**
 * TTS provider interface (injected).
 * Resolves null when no usable audio came back.
 */
export interface TTSProvider {
  synthesize(text: string, sampleRate: number): Promise<Buffer | null>;
}

/**
 * The part of the broker connection sessions depend on.
 */
export interface BrokerLink {
  readonly connected: boolean;
  publish(topic: string, payload: string): Promise<void>;
}

/**
 * Bridge configuration.
 */
export interface BridgeConfig {
  /** Existing HTTP server to attach to; otherwise the bridge listens on port */
  server?: Server;
  /** Port to listen on when no server is given */
  port?: number;
  /** Bind address (default: 0.0.0.0) */
  bind?: string;
  /** WebSocket path (default: /satellite) */
  path?: string;
  /** Concurrent session limit (default: 50) */
  maxConnections?: number;
  /** Time allowed for the config frame (default: 10000ms) */
  handshakeTimeoutMs?: number;
  /** Keepalive ping interval (default: 30000ms) */
  pingIntervalMs?: number;
  /** Topic transcribed requests are published to */
  inputTopic: string;
  capture: CaptureLimits;
  delivery: { batchSize: number; idleDelayMs: number };
  logger?: Logger;
}

export interface BridgeDependencies {
  registry: SessionRegistry;
  broker: BrokerLink;
  stt: STTProvider;
  tts: TTSProvider;
}

/** Payload of the `sessionEnded` event */
export interface SessionEndedEvent {
  sessionId: string;
  room?: string;
  reason: EndReason;
}

/** Payload of the `sessionRejected` event */
export interface SessionRejectedEvent {
  remote: string;
  reason: "upstream-unavailable" | "capacity" | "duplicate";
}

/** Payload of the `requestPublished` event */
export interface RequestPublishedEvent {
  sessionId: string;
  request: ClientRequest;
}

/** Max inbound frame size in bytes (1MB) */
const MAX_MESSAGE_SIZE = 1024 * 1024;

/**
 * Satellite Bridge - WebSocket server for satellite connections.
 *
 * Events:
 * - `sessionStarted` (SatelliteSessionInfo): config frame accepted
 * - `sessionEnded` (SessionEndedEvent)
 * - `sessionRejected` (SessionRejectedEvent): refused at accept time
 * - `requestPublished` (RequestPublishedEvent): spoken command sent to the broker
 */
export class SatelliteBridge extends EventEmitter {
  private wss: WebSocketServer | null = null;
  private readonly config: BridgeConfig;
  private readonly deps: BridgeDependencies;
  private readonly sessions = new Map<string, SatelliteSession>();
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private logger?: Logger;

  // Ping interval for health monitoring
  private pingInterval?: NodeJS.Timeout;

  constructor(config: BridgeConfig, deps: BridgeDependencies) {
    super();
    this.config = config;
    this.deps = deps;
    this.logger = config.logger;
  }

  /**
   * Start accepting satellite connections.
   */
  async start(): Promise<void> {
    const path = this.config.path ?? "/satellite";

    await new Promise<void>((resolve, reject) => {
      const wss = this.config.server
        ? new WebSocketServer({ server: this.config.server, path, maxPayload: MAX_MESSAGE_SIZE })
        : new WebSocketServer({
            port: this.config.port ?? 8000,
            host: this.config.bind ?? "0.0.0.0",
            path,
            maxPayload: MAX_MESSAGE_SIZE,
          });
      this.wss = wss;

      wss.on("connection", (ws, req) => {
        this.handleConnection(ws, req);
      });

      wss.on("error", (error) => {
        reject(error);
      });

      if (this.config.server) {
        resolve();
      } else {
        wss.on("listening", () => resolve());
      }
    });

    this.pingInterval = setInterval(() => {
      this.wss?.clients.forEach((ws) => {
        if (this.alive.get(ws) === false) {
          this.logger?.warn("[SatelliteBridge] Terminating unresponsive WebSocket");
          ws.terminate();
          return;
        }
        this.alive.set(ws, false);
        ws.ping();
      });
    }, this.config.pingIntervalMs ?? 30000);

    this.logger?.info(`[SatelliteBridge] Accepting satellites on ${path}`);
  }

  /**
   * Close every session and stop the WebSocket server.
   */
  async stop(): Promise<void> {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = undefined;
    }

    const pending = [...this.sessions.values()].map((session) => {
      session.close(SatelliteCloseCode.Shutdown, "Server shutting down");
      return session.teardown("shutdown");
    });
    await Promise.all(pending);
    this.sessions.clear();

    const wss = this.wss;
    if (wss) {
      this.wss = null;
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }
  }

  /**
   * Close every session because the broker went away.
   */
  closeAllSessions(code: SatelliteCloseCode, reason: string): number {
    const closed = this.deps.registry.closeAll(code, reason);
    if (closed > 0) {
      this.logger?.warn(`[SatelliteBridge] Closed ${closed} sessions: ${reason}`);
    }
    return closed;
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  getSession(sessionId: string): SatelliteSession | undefined {
    return this.sessions.get(sessionId);
  }

  listSessions(): SatelliteSessionInfo[] {
    return [...this.sessions.values()].map((session) => session.getInfo());
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Internal methods
  // ─────────────────────────────────────────────────────────────────────────────

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const sessionId = `sat-${randomUUID()}`;
    const remote = req.socket.remoteAddress ?? "unknown";

    if (!this.deps.broker.connected) {
      this.logger?.warn(`[SatelliteBridge] Rejecting ${remote}: broker not connected`);
      ws.close(SatelliteCloseCode.UpstreamUnavailable, "Broker unavailable");
      this.emitRejected({ remote, reason: "upstream-unavailable" });
      return;
    }

    if (this.sessions.size >= (this.config.maxConnections ?? 50)) {
      this.logger?.warn(`[SatelliteBridge] Rejecting ${remote}: connection limit reached`);
      ws.close(SatelliteCloseCode.UpstreamUnavailable, "Too many connections");
      this.emitRejected({ remote, reason: "capacity" });
      return;
    }

    const session = new SatelliteSession({
      sessionId,
      transport: new WebSocketTransport(ws),
      registry: this.deps.registry,
      broker: this.deps.broker,
      stt: this.deps.stt,
      tts: this.deps.tts,
      inputTopic: this.config.inputTopic,
      capture: this.config.capture,
      delivery: this.config.delivery,
      handshakeTimeoutMs: this.config.handshakeTimeoutMs ?? 10000,
      logger: this.logger,
      onReady: (info) => this.emit("sessionStarted", info),
      onEnded: (info, reason) => this.handleSessionEnded(info, reason),
      onRequestPublished: (id, request) => {
        const event: RequestPublishedEvent = { sessionId: id, request };
        this.emit("requestPublished", event);
      },
    });

    if (!this.deps.registry.register(session)) {
      this.logger?.error(`[SatelliteBridge] Connection ${sessionId} already exists`);
      ws.close(SatelliteCloseCode.Duplicate, "Connection already exists");
      this.emitRejected({ remote, reason: "duplicate" });
      return;
    }

    this.sessions.set(sessionId, session);
    this.logger?.info(`[SatelliteBridge] Satellite connected: ${sessionId} from ${remote}`);

    this.alive.set(ws, true);
    ws.on("pong", () => {
      this.alive.set(ws, true);
    });

    ws.on("message", (data: RawData, isBinary: boolean) => {
      session.receive(rawDataToBuffer(data), isBinary);
    });

    ws.on("close", (code) => {
      this.logger?.info(`[SatelliteBridge] Satellite disconnected: ${sessionId} (${code})`);
      session.handleTransportClosed();
    });

    ws.on("error", (error) => {
      this.logger?.error(`[SatelliteBridge] WebSocket error on ${sessionId}:`, error);
    });

    session.start();
  }

  private handleSessionEnded(info: SatelliteSessionInfo, reason: EndReason): void {
    this.sessions.delete(info.sessionId);
    const event: SessionEndedEvent = { sessionId: info.sessionId, room: info.room, reason };
    this.emit("sessionEnded", event);
  }

  private emitRejected(event: SessionRejectedEvent): void {
    this.emit("sessionRejected", event);
  }
}
