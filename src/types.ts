/**
 * Ground Station Types
 *
 * Type definitions for the broker wire messages and the satellite
 * WebSocket protocol.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Broker messages
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Alert attached to a backend response.
 */
export interface BrokerAlert {
  /** Play the alert cue before speaking the response */
  play_before: boolean;
}

/**
 * Response from the backend (backend → ground station).
 */
export interface BrokerMessage {
  text: string;
  alert?: BrokerAlert | null;
}

/**
 * Transcribed request published to the backend (ground station → backend).
 */
export interface ClientRequest {
  readonly id: string;
  readonly text: string;
  readonly room: string;
  readonly output_topic: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Satellite protocol
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Audio and routing settings sent once by a satellite after connecting.
 */
export interface SessionConfig {
  samplerate: number;
  input_channels: number;
  output_channels: number;
  chunk_size: number;
  room: string;
  /** Computed from the room, never taken from the satellite */
  output_topic: string;
}

/**
 * Control signals a satellite sends as text frames.
 */
export type ControlSignal = "START_COMMAND" | "END_COMMAND" | "CANCEL_COMMAND";

export const CONTROL_SIGNALS: readonly ControlSignal[] = [
  "START_COMMAND",
  "END_COMMAND",
  "CANCEL_COMMAND",
];

/**
 * Text frame sent to a satellite to play its alert sound.
 */
export const ALERT_CUE = "alert_default";

/**
 * WebSocket close codes sent to satellites.
 */
export const SatelliteCloseCode = {
  Normal: 1000,
  Shutdown: 1001,
  ConfigError: 1002,
  Duplicate: 1008,
  InternalError: 1011,
  UpstreamUnavailable: 1013,
} as const;

export type SatelliteCloseCode =
  (typeof SatelliteCloseCode)[keyof typeof SatelliteCloseCode];

/**
 * Why a satellite session ended.
 */
export type EndReason =
  | "disconnected"
  | "config-error"
  | "duplicate"
  | "upstream-unavailable"
  | "error"
  | "shutdown";

/**
 * Outbound transport for a single satellite.
 *
 * Send methods reject when the transport is already closed.
 */
export interface SatelliteTransport {
  sendText(text: string): Promise<void>;
  sendBinary(data: Buffer): Promise<void>;
  close(code: SatelliteCloseCode, reason: string): void;
  isOpen(): boolean;
}

/**
 * Snapshot of an active satellite session.
 */
export interface SatelliteSessionInfo {
  sessionId: string;
  room?: string;
  outputTopic?: string;
  connectedAt: number;
  audioChunksReceived: number;
  responsesDelivered: number;
}
