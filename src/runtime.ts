/**
 * Ground Station Runtime
 *
 * Creates and wires the ground station components:
 * - BrokerConnectionManager (MQTT connect/reconnect loop)
 * - TopicRouter (broker messages into session queues)
 * - SatelliteBridge (WebSocket server for satellites)
 * - HTTP STT/TTS providers
 * - HTTP endpoints (health, readiness, text ingestion)
 */

import { createServer, type Server } from "http";
import {
  SatelliteBridge,
  type Logger,
  type RequestPublishedEvent,
  type SessionEndedEvent,
  type SessionRejectedEvent,
  type STTProvider,
  type TTSProvider,
} from "./bridge.js";
import {
  BrokerConnectionManager,
  type BrokerClientFactory,
} from "./broker-connection.js";
import { getInputTopic, type GroundStationConfig } from "./config.js";
import { createHttpApp } from "./http-server.js";
import { connectMqttBroker } from "./providers/broker-mqtt.js";
import { HttpSTTProvider } from "./providers/stt-http.js";
import { HttpTTSProvider } from "./providers/tts-http.js";
import { SessionRegistry } from "./session-registry.js";
import { TopicRouter } from "./topic-router.js";
import { SatelliteCloseCode, type SatelliteSessionInfo } from "./types.js";

/**
 * Runtime initialization parameters.
 */
export interface GroundStationRuntimeParams {
  config: GroundStationConfig;
  logger?: Logger;
  /** Broker client factory (default: mqtt.js) */
  clientFactory?: BrokerClientFactory;
  stt?: STTProvider;
  tts?: TTSProvider;
  /** Override for tests */
  brokerSleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Runtime instance containing all components.
 */
export interface GroundStationRuntime {
  config: GroundStationConfig;
  inputTopic: string;
  registry: SessionRegistry;
  broker: BrokerConnectionManager;
  router: TopicRouter;
  bridge: SatelliteBridge;
  server: Server;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createGroundStationRuntime(params: GroundStationRuntimeParams): GroundStationRuntime {
  const { config, logger } = params;
  const inputTopic = getInputTopic(config);

  const broker = new BrokerConnectionManager({
    connect: {
      host: config.broker.host,
      port: config.broker.port,
      clientId: config.clientId,
      username: config.broker.username,
      password: config.broker.password,
      connectTimeoutMs: config.broker.connectTimeoutMs,
    },
    clientFactory: params.clientFactory ?? connectMqttBroker,
    reconnect: config.reconnect,
    permanentTopics: [config.broadcastTopic],
    logger,
    sleep: params.brokerSleep,
  });

  const registry = new SessionRegistry({ logger, subscriptions: broker });
  const router = new TopicRouter({ registry, broadcastTopic: config.broadcastTopic, logger });

  const stt =
    params.stt ??
    new HttpSTTProvider({
      url: config.speech.transcriptionUrl,
      token: config.speech.transcriptionToken,
      timeoutMs: config.speech.timeoutMs,
      logger,
    });
  const tts =
    params.tts ??
    new HttpTTSProvider({
      url: config.speech.synthesisUrl,
      token: config.speech.synthesisToken,
      timeoutMs: config.speech.timeoutMs,
      logger,
    });

  const server = createServer();
  const bridge = new SatelliteBridge(
    {
      server,
      path: config.serve.path,
      maxConnections: config.serve.maxConnections,
      handshakeTimeoutMs: config.serve.handshakeTimeoutMs,
      inputTopic,
      capture: config.capture,
      delivery: config.delivery,
      logger,
    },
    { registry, broker, stt, tts },
  );

  server.on(
    "request",
    createHttpApp({
      sessions: bridge,
      broker,
      inputTopic,
      maxConnections: config.serve.maxConnections,
      textEndpointAuthToken: config.textEndpointAuthToken,
      logger,
    }),
  );

  bridge.on("sessionStarted", (info: SatelliteSessionInfo) => {
    logger?.info(`[GroundStation] Satellite ${info.sessionId} ready in room ${info.room ?? "?"}`);
  });
  bridge.on("sessionEnded", (event: SessionEndedEvent) => {
    logger?.info(
      `[GroundStation] Satellite ${event.sessionId} left room ${event.room ?? "?"} (${event.reason})`,
    );
  });
  bridge.on("sessionRejected", (event: SessionRejectedEvent) => {
    logger?.debug(`[GroundStation] Refused satellite from ${event.remote} (${event.reason})`);
  });
  bridge.on("requestPublished", (event: RequestPublishedEvent) => {
    logger?.info(
      `[GroundStation] Request ${event.request.id} from ${event.request.room} published to ${inputTopic}`,
    );
  });

  broker.onMessage((topic, payload) => {
    router.route(topic, payload);
  });
  broker.onConnectionLost(() => {
    bridge.closeAllSessions(SatelliteCloseCode.UpstreamUnavailable, "Broker connection lost");
  });

  let started = false;

  return {
    config,
    inputTopic,
    registry,
    broker,
    router,
    bridge,
    server,

    async start() {
      if (started) return;
      started = true;

      broker.start();
      await bridge.start();
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.serve.port, config.serve.bind, () => {
          server.off("error", reject);
          resolve();
        });
      });

      logger?.info(
        `[GroundStation] Listening on ${config.serve.bind}:${config.serve.port}${config.serve.path}, publishing to ${inputTopic}`,
      );
    },

    async stop() {
      if (!started) return;
      started = false;

      await bridge.stop();
      await broker.stop();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      logger?.info("[GroundStation] Stopped");
    },
  };
}
