/**
 * Broker Message Parsing and Serialization
 *
 * Handles JSON encoding/decoding for the MQTT payloads exchanged
 * with the assistant backend.
 */

import { randomUUID } from "crypto";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { BrokerMessage, ClientRequest, SessionConfig } from "./types.js";

/**
 * Error thrown when a broker payload cannot be decoded.
 */
export class MessageParseError extends Error {
  constructor(
    message: string,
    public readonly rawMessage?: string,
  ) {
    super(message);
    this.name = "MessageParseError";
  }
}

/** Max payload size in bytes (1MB) */
const MAX_PAYLOAD_SIZE = 1024 * 1024;

/**
 * Schema for responses coming from the backend.
 */
export const BrokerMessageSchema = Type.Object({
  text: Type.String(),
  alert: Type.Optional(
    Type.Union([Type.Object({ play_before: Type.Boolean() }), Type.Null()]),
  ),
});

type BrokerMessagePayload = Static<typeof BrokerMessageSchema>;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Decode raw payload bytes as UTF-8 text.
 *
 * @throws MessageParseError on invalid UTF-8 or oversized payloads
 */
export function decodePayload(payload: Buffer | string): string {
  if (typeof payload === "string") return payload;

  if (payload.length > MAX_PAYLOAD_SIZE) {
    throw new MessageParseError("Payload too large");
  }

  try {
    return utf8.decode(payload);
  } catch {
    throw new MessageParseError("Payload is not valid UTF-8");
  }
}

/**
 * Parse a backend response.
 *
 * @param raw JSON string from the broker
 * @throws MessageParseError if the payload is not a valid BrokerMessage
 */
export function parseBrokerMessage(raw: string): BrokerMessage {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new MessageParseError("Invalid JSON", raw);
  }

  if (!Value.Check(BrokerMessageSchema, json)) {
    const first = Value.Errors(BrokerMessageSchema, json).First();
    const where = first?.path || "(root)";
    throw new MessageParseError(
      `Message failed validation at ${where}: ${first?.message ?? "unknown error"}`,
      raw,
    );
  }

  return toBrokerMessage(json);
}

function toBrokerMessage(payload: BrokerMessagePayload): BrokerMessage {
  return {
    text: payload.text,
    alert: payload.alert ? { play_before: payload.alert.play_before } : null,
  };
}

/**
 * Copy a message so each session queue owns its own instance.
 */
export function cloneBrokerMessage(message: BrokerMessage): BrokerMessage {
  return toBrokerMessage(message);
}

/**
 * Build a request for transcribed text from a satellite session.
 */
export function buildClientRequest(
  text: string,
  session: Pick<SessionConfig, "room" | "output_topic">,
): ClientRequest {
  return Object.freeze({
    id: randomUUID(),
    text,
    room: session.room,
    output_topic: session.output_topic,
  });
}

/**
 * Serialize a request to JSON.
 */
export function serializeClientRequest(request: ClientRequest): string {
  return JSON.stringify({
    id: request.id,
    text: request.text,
    room: request.room,
    output_topic: request.output_topic,
  });
}
