/**
 * HTTP Endpoints
 *
 * Served on the same port as the satellite WebSocket:
 * - GET /health              liveness
 * - GET /acceptsConnections  readiness and session count
 * - PUT /text                inject a typed request without audio
 */

import express, { type Express, type Request, type Response } from "express";
import { timingSafeEqual } from "crypto";
import { z } from "zod";
import type { BrokerLink, Logger } from "./bridge.js";
import { buildClientRequest, serializeClientRequest } from "./broker-messages.js";
import { outputTopicForRoom } from "./config.js";

export const TextMessageRequestSchema = z.object({
  text: z.string().min(1),
  device_id: z.string().trim().min(1),
});

export type TextMessageRequest = z.infer<typeof TextMessageRequestSchema>;

export interface HttpAppOptions {
  sessions: { getActiveSessionCount(): number };
  broker: BrokerLink;
  inputTopic: string;
  maxConnections: number;
  /** Bearer token required by PUT /text */
  textEndpointAuthToken: string;
  logger?: Logger;
}

export function createHttpApp(options: HttpAppOptions): Express {
  const { sessions, broker, inputTopic, maxConnections, logger } = options;
  const app = express();
  app.use(express.json({ limit: "64kb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "healthy" });
  });

  app.get("/acceptsConnections", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ready",
      active_connections: sessions.getActiveSessionCount(),
      max_connections: maxConnections,
    });
  });

  app.put("/text", (req: Request, res: Response) => {
    if (!isAuthorized(req.headers.authorization, options.textEndpointAuthToken)) {
      logger?.warn("[HttpServer] Rejected /text request with invalid token");
      res.status(401).json({ detail: "Invalid authentication token" });
      return;
    }

    const parsed = TextMessageRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ detail: parsed.error.issues[0]?.message ?? "Invalid request body" });
      return;
    }

    if (!broker.connected) {
      res.status(503).json({ detail: "Broker unavailable" });
      return;
    }

    const { text, device_id } = parsed.data;
    const request = buildClientRequest(text, {
      room: device_id,
      output_topic: outputTopicForRoom(device_id),
    });

    broker
      .publish(inputTopic, serializeClientRequest(request))
      .then(() => {
        logger?.info(`[HttpServer] Published text request ${request.id} for ${device_id}`);
        res.status(200).json({ status: "accepted", request_id: request.id });
      })
      .catch((err: unknown) => {
        logger?.error("[HttpServer] Failed to publish text request:", err);
        res.status(503).json({ detail: "Failed to publish request" });
      });
  });

  return app;
}

/**
 * Constant-time check of an `Authorization: Bearer <token>` header.
 */
export function isAuthorized(header: string | undefined, expected: string): boolean {
  if (!header) return false;
  const match = /^Bearer\s+(.+)$/i.exec(header);
  const token = match?.[1];
  if (!token) return false;

  const provided = Buffer.from(token);
  const wanted = Buffer.from(expected);
  return provided.length === wanted.length && timingSafeEqual(provided, wanted);
}
