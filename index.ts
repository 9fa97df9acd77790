#!/usr/bin/env node
/**
 * Ground Station
 *
 * Bridges satellite audio sessions to the assistant backend:
 * satellites stream spoken commands over WebSocket, the ground station
 * transcribes them, publishes the text to MQTT and speaks the replies.
 */

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { loadGroundStationConfig } from "./src/config.js";
import { createLogger } from "./src/logger.js";
import { createGroundStationRuntime } from "./src/runtime.js";

export { createGroundStationRuntime, type GroundStationRuntime } from "./src/runtime.js";
export { loadGroundStationConfig, parseGroundStationConfig, type GroundStationConfig } from "./src/config.js";
export { createLogger, fromPino } from "./src/logger.js";

async function main(): Promise<void> {
  const configPath = process.env.GROUND_STATION_CONFIG_PATH ?? "local_config.json";
  const config = await loadGroundStationConfig(configPath);
  const logger = createLogger({ level: config.logLevel });

  const runtime = createGroundStationRuntime({ config, logger });
  await runtime.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`[GroundStation] Received ${signal}, shutting down`);
    runtime.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("[GroundStation] Error during shutdown:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main().catch((err: unknown) => {
    console.error("[GroundStation] Failed to start:", err);
    process.exit(1);
  });
}
