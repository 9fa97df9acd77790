/**
 * Pino-backed implementation of the bridge Logger interface.
 *
 * Components log as `logger.warn("[Component] message", err)`. Trailing
 * arguments become structured fields: an Error goes under `err`, anything
 * else under `details`.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import type { Logger } from "./bridge.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface CreateLoggerOptions {
  level?: LogLevel;
  /** Output stream (default: stdout) */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const instance = pino(
    {
      level: options.level ?? "info",
      base: { service: "ground-station" },
      redact: {
        paths: ["password", "token", "*.password", "*.token", "details.password", "details.token"],
        censor: "[REDACTED]",
      },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.destination,
  );
  return fromPino(instance);
}

/**
 * Wrap an existing pino logger.
 */
export function fromPino(instance: PinoLogger): Logger {
  return {
    debug: (msg, ...args) => instance.debug(toFields(args), msg),
    info: (msg, ...args) => instance.info(toFields(args), msg),
    warn: (msg, ...args) => instance.warn(toFields(args), msg),
    error: (msg, ...args) => instance.error(toFields(args), msg),
  };
}

function toFields(args: unknown[]): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  const details: unknown[] = [];

  for (const arg of args) {
    if (arg instanceof Error && !("err" in fields)) {
      fields.err = arg;
    } else {
      details.push(arg);
    }
  }

  if (details.length === 1) {
    fields.details = details[0];
  } else if (details.length > 1) {
    fields.details = details;
  }
  return fields;
}
