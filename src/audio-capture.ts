/**
 * Audio Capture State Machine
 *
 * Per-session capture of a spoken command:
 *
 *   IDLE ──START_COMMAND──▶ COLLECTING_AUDIO ──END_COMMAND──▶ PROCESSING_STT ──▶ IDLE
 *                                 │
 *                                 └──CANCEL_COMMAND──▶ IDLE
 *
 * The buffer is flushed early when it would exceed maxBufferBytes or
 * when it holds more than maxCommandInputSeconds of audio.
 */

import { pcm16ToFloat32, generateErrorBeep, getAudioDurationMs, sampleCount } from "./audio-utils.js";
import type { Logger, STTProvider } from "./bridge.js";
import { buildClientRequest, serializeClientRequest } from "./broker-messages.js";
import {
  CONTROL_SIGNALS,
  type ClientRequest,
  type ControlSignal,
  type SatelliteTransport,
  type SessionConfig,
} from "./types.js";

export type CaptureState = "IDLE" | "COLLECTING_AUDIO" | "PROCESSING_STT";

/**
 * Publishes transcribed requests to the broker.
 */
export interface RequestPublisher {
  publish(topic: string, payload: string): Promise<void>;
}

export interface CaptureLimits {
  maxCommandInputSeconds: number;
  maxBufferBytes: number;
}

export interface AudioCaptureOptions {
  sessionId: string;
  session: Pick<SessionConfig, "samplerate" | "room" | "output_topic">;
  limits: CaptureLimits;
  /** Topic every transcribed request is published to */
  inputTopic: string;
  stt: STTProvider;
  publisher: RequestPublisher;
  transport: Pick<SatelliteTransport, "sendBinary">;
  logger?: Logger;
  /** Called after a request has been published */
  onPublished?: (request: ClientRequest) => void;
}

export function isControlSignal(value: string): value is ControlSignal {
  return CONTROL_SIGNALS.some((signal) => signal === value);
}

export class AudioCaptureStateMachine {
  private state: CaptureState = "IDLE";
  private chunks: Buffer[] = [];
  private bufferedBytes = 0;
  private bufferedSamples = 0;

  private readonly sessionId: string;
  private readonly session: AudioCaptureOptions["session"];
  private readonly maxSamples: number;
  private readonly maxBufferBytes: number;
  private readonly options: AudioCaptureOptions;
  private logger?: Logger;

  constructor(options: AudioCaptureOptions) {
    this.options = options;
    this.sessionId = options.sessionId;
    this.session = options.session;
    this.maxSamples = options.limits.maxCommandInputSeconds * options.session.samplerate;
    this.maxBufferBytes = options.limits.maxBufferBytes;
    this.logger = options.logger;
  }

  getState(): CaptureState {
    return this.state;
  }

  getBufferedBytes(): number {
    return this.bufferedBytes;
  }

  /**
   * Handle a control signal (text frame) from the satellite.
   */
  async handleControlSignal(raw: string): Promise<void> {
    const signal = raw.trim();
    this.logger?.debug(`[AudioCapture] ${this.sessionId} received control signal: ${signal}`);

    if (!isControlSignal(signal)) {
      this.logger?.warn(`[AudioCapture] Unknown control signal: ${signal}`);
      return;
    }

    switch (signal) {
      case "START_COMMAND":
        this.startCollection();
        return;
      case "END_COMMAND":
        await this.endCollection();
        return;
      case "CANCEL_COMMAND":
        this.cancelCollection();
        return;
      default: {
        const unhandled: never = signal;
        this.logger?.warn(`[AudioCapture] Unhandled control signal: ${String(unhandled)}`);
      }
    }
  }

  /**
   * Handle an audio chunk (binary frame) from the satellite.
   */
  async handleAudioChunk(chunk: Buffer): Promise<void> {
    if (this.state !== "COLLECTING_AUDIO") {
      this.logger?.warn("[AudioCapture] Received audio data while not collecting audio, ignoring");
      return;
    }

    if (this.bufferedBytes + chunk.length > this.maxBufferBytes) {
      this.logger?.warn("[AudioCapture] Audio buffer size limit reached, processing current audio");
      await this.processCollectedAudio();
      return;
    }

    this.chunks.push(chunk);
    this.bufferedBytes += chunk.length;
    this.bufferedSamples += sampleCount(chunk.length);

    if (this.bufferedSamples > this.maxSamples) {
      this.logger?.info("[AudioCapture] Maximum audio duration reached, processing current audio");
      await this.processCollectedAudio();
    }
  }

  private startCollection(): void {
    if (this.state !== "IDLE") {
      this.logger?.warn(`[AudioCapture] Cannot start audio collection in state ${this.state}`);
      return;
    }
    this.resetBuffer();
    this.state = "COLLECTING_AUDIO";
    this.logger?.info(`[AudioCapture] ${this.sessionId} started collecting audio`);
  }

  private async endCollection(): Promise<void> {
    if (this.state !== "COLLECTING_AUDIO") {
      this.logger?.warn("[AudioCapture] Cannot end audio collection, not currently collecting");
      return;
    }
    await this.processCollectedAudio();
  }

  private cancelCollection(): void {
    if (this.state !== "COLLECTING_AUDIO") {
      this.logger?.warn("[AudioCapture] Nothing to cancel, not currently collecting");
      return;
    }
    this.logger?.info(`[AudioCapture] ${this.sessionId} cancelled audio collection`);
    this.resetBuffer();
    this.state = "IDLE";
  }

  private async processCollectedAudio(): Promise<void> {
    if (this.chunks.length === 0) {
      this.logger?.warn("[AudioCapture] No audio data to process");
      this.resetBuffer();
      this.state = "IDLE";
      return;
    }

    this.state = "PROCESSING_STT";

    try {
      const pcm = Buffer.concat(this.chunks, this.bufferedBytes);
      this.resetBuffer();
      this.logger?.info(
        `[AudioCapture] Processing ${pcm.length} bytes of audio (${getAudioDurationMs(pcm, this.session.samplerate)}ms)`,
      );

      const result = await this.options.stt.transcribe(pcm16ToFloat32(pcm));
      if (!result) {
        this.logger?.error("[AudioCapture] Failed to get STT response");
        await this.sendErrorFeedback();
        return;
      }

      this.logger?.info(`[AudioCapture] STT result: ${result.text}`);

      const request = buildClientRequest(result.text, this.session);
      await this.options.publisher.publish(this.options.inputTopic, serializeClientRequest(request));
      this.logger?.info(`[AudioCapture] Published request ${request.id} to ${this.options.inputTopic}`);
      this.options.onPublished?.(request);
    } catch (err) {
      this.logger?.error("[AudioCapture] Error processing audio:", err);
      await this.sendErrorFeedback();
    } finally {
      this.resetBuffer();
      this.state = "IDLE";
    }
  }

  private async sendErrorFeedback(): Promise<void> {
    try {
      await this.options.transport.sendBinary(generateErrorBeep(this.session.samplerate));
      this.logger?.debug("[AudioCapture] Sent error beep to satellite");
    } catch (err) {
      this.logger?.error("[AudioCapture] Failed to send error feedback:", err);
    }
  }

  private resetBuffer(): void {
    this.chunks = [];
    this.bufferedBytes = 0;
    this.bufferedSamples = 0;
  }
}
