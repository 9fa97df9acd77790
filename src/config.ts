/**
 * Ground Station Configuration
 *
 * Defines Zod schemas for the service configuration and the
 * per-satellite session configuration.
 */

import { readFile } from "fs/promises";
import { hostname } from "os";
import { z } from "zod";
import type { SessionConfig } from "./types.js";

/**
 * WebSocket/HTTP server configuration.
 */
export const ServeConfigSchema = z.object({
  /** Port to listen on (default: 8000) */
  port: z.number().int().min(0).max(65535).default(8000),
  /** Bind address (default: 0.0.0.0) */
  bind: z.string().default("0.0.0.0"),
  /** Satellite WebSocket path (default: /satellite) */
  path: z.string().default("/satellite"),
  /** Max concurrent satellite sessions (default: 50) */
  maxConnections: z.number().int().min(1).max(10000).default(50),
  /** Time allowed for the satellite to send its config frame */
  handshakeTimeoutMs: z.number().int().min(100).max(60000).default(10000),
});

/**
 * MQTT broker configuration.
 */
export const BrokerConfigSchema = z.object({
  host: z.string().default("localhost"),
  port: z.number().int().min(1).max(65535).default(1883),
  username: z.string().optional(),
  password: z.string().optional(),
  /** Connect timeout per attempt in ms (default: 10000) */
  connectTimeoutMs: z.number().int().min(100).max(120000).default(10000),
});

/**
 * Reconnect backoff configuration.
 */
export const ReconnectConfigSchema = z.object({
  initialDelayMs: z.number().int().min(1).default(5000),
  maxDelayMs: z.number().int().min(1).default(60000),
  factor: z.number().min(1).default(2),
});

/**
 * Speech (STT/TTS) endpoint configuration.
 */
export const SpeechConfigSchema = z.object({
  transcriptionUrl: z.string().url().default("http://localhost:8000/transcribe"),
  transcriptionToken: z.string().optional(),
  synthesisUrl: z.string().url().default("http://localhost:8080/synthesizeSpeech"),
  synthesisToken: z.string().optional(),
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs: z.number().int().min(100).max(120000).default(10000),
});

/**
 * Audio capture limits.
 */
export const CaptureConfigSchema = z.object({
  /** Longest command a satellite may stream before a forced flush */
  maxCommandInputSeconds: z.number().int().min(1).max(600).default(30),
  /** Largest buffered command in bytes (default: 1MB) */
  maxBufferBytes: z.number().int().min(1024).default(1024 * 1024),
});

/**
 * Output delivery throttle settings.
 */
export const DeliveryConfigSchema = z.object({
  /** Messages drained per activation (default: 3) */
  batchSize: z.number().int().min(1).max(50).default(3),
  /** Pause between activations when the queue is empty */
  idleDelayMs: z.number().int().min(1).max(1000).default(10),
});

/**
 * Complete ground station configuration.
 */
export const GroundStationConfigSchema = z.object({
  /** Identifier of this ground station (default: hostname) */
  clientId: z.string().min(1).default(() => hostname()),
  broadcastTopic: z.string().min(1).default("assistant/broadcast"),
  clientTopicOverride: z.string().min(1).optional(),
  inputTopicOverride: z.string().min(1).optional(),
  /** Token required by PUT /text */
  textEndpointAuthToken: z.string().min(1).default("DEBUG"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),

  serve: ServeConfigSchema.default({}),
  broker: BrokerConfigSchema.default({}),
  reconnect: ReconnectConfigSchema.default({}),
  speech: SpeechConfigSchema.default({}),
  capture: CaptureConfigSchema.default({}),
  delivery: DeliveryConfigSchema.default({}),
});

/**
 * Inferred TypeScript type for the config.
 */
export type GroundStationConfig = z.infer<typeof GroundStationConfigSchema>;

/**
 * Validate and parse a raw config object.
 */
export function parseGroundStationConfig(raw: unknown): GroundStationConfig {
  return GroundStationConfigSchema.parse(raw ?? {});
}

/**
 * Topic under which this ground station publishes.
 */
export function getClientTopic(config: GroundStationConfig): string {
  return config.clientTopicOverride ?? `assistant/ground_station/all/${config.clientId}`;
}

/**
 * Topic that receives every transcribed request.
 */
export function getInputTopic(config: GroundStationConfig): string {
  return config.inputTopicOverride ?? `${getClientTopic(config)}/input`;
}

/**
 * Output topic for a room.
 */
export function outputTopicForRoom(room: string): string {
  return `assistant/${room}/output`;
}

export const OUTPUT_TOPIC_SUFFIX = "/output";

/**
 * Load config from a JSON file and apply environment overrides.
 *
 * A missing file yields the defaults.
 */
export async function loadGroundStationConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<GroundStationConfig> {
  let raw: Record<string, unknown> = {};
  try {
    const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      raw = { ...parsed };
    } else {
      throw new Error(`Config file ${path} must contain a JSON object`);
    }
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }

  return parseGroundStationConfig(applyEnvOverrides(raw, env));
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const broker: Record<string, unknown> = isRecord(raw.broker) ? { ...raw.broker } : {};
  if (env.MQTT_HOST) broker.host = env.MQTT_HOST;
  if (env.MQTT_PORT) broker.port = Number(env.MQTT_PORT);
  if (env.MQTT_USERNAME) broker.username = env.MQTT_USERNAME;
  if (env.MQTT_PASSWORD) broker.password = env.MQTT_PASSWORD;

  const result: Record<string, unknown> = { ...raw, broker };
  if (env.LOG_LEVEL) result.logLevel = normalizeLogLevel(env.LOG_LEVEL);
  return result;
}

const LOG_LEVEL_ALIASES: Record<string, string> = {
  warning: "warn",
  critical: "error",
  fatal: "error",
};

function normalizeLogLevel(level: string): string {
  const lower = level.trim().toLowerCase();
  return LOG_LEVEL_ALIASES[lower] ?? lower;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ─────────────────────────────────────────────────────────────────────────────
// Satellite session config
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Config frame a satellite sends after connecting.
 */
export const SessionConfigSchema = z.object({
  samplerate: z.number().int().positive(),
  input_channels: z.number().int().positive(),
  output_channels: z.number().int().positive(),
  chunk_size: z.number().int().positive(),
  room: z.string().trim().min(1),
});

/**
 * Error thrown when a satellite's config frame is invalid.
 */
export class SessionConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "SessionConfigError";
  }
}

/**
 * Validate a satellite config frame and compute its output topic.
 *
 * @throws SessionConfigError if the frame is not valid JSON or fails validation
 */
export function parseSessionConfig(raw: string): SessionConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new SessionConfigError("Session config is not valid JSON");
  }

  const result = SessionConfigSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new SessionConfigError(`Invalid session config: ${issues.join("; ")}`, issues);
  }

  return {
    ...result.data,
    output_topic: outputTopicForRoom(result.data.room),
  };
}
