/**
 * Output Delivery Throttle
 *
 * Drains a session's delivery queue in small batches so a burst of
 * backend responses cannot starve the session's audio input. Each
 * response is synthesized via TTS and written to the satellite.
 */

import type { Logger, TTSProvider } from "./bridge.js";
import { type CancellationToken, sleepUnlessCancelled } from "./cancellation-token.js";
import type { DeliveryQueue } from "./delivery-queue.js";
import { ALERT_CUE, type BrokerMessage, type SatelliteTransport } from "./types.js";

export interface OutputThrottleOptions {
  sessionId: string;
  queue: DeliveryQueue;
  tts: TTSProvider;
  /** Sample rate requested from TTS */
  sampleRate: number;
  transport: Pick<SatelliteTransport, "sendText" | "sendBinary">;
  /** Messages per activation (default: 3) */
  batchSize?: number;
  /** Pause after an activation that found the queue empty (default: 10ms) */
  idleDelayMs?: number;
  logger?: Logger;
  /** Called after a response has been written to the satellite */
  onDelivered?: (message: BrokerMessage) => void;
}

export class OutputDeliveryThrottle {
  private readonly options: OutputThrottleOptions;
  private readonly batchSize: number;
  private readonly idleDelayMs: number;
  private logger?: Logger;

  constructor(options: OutputThrottleOptions) {
    this.options = options;
    this.batchSize = options.batchSize ?? 3;
    this.idleDelayMs = options.idleDelayMs ?? 10;
    this.logger = options.logger;
  }

  /**
   * One activation: deliver up to batchSize queued messages without
   * waiting for new ones. Stops early when the transport is closed.
   *
   * @returns number of messages taken off the queue
   */
  async drainOnce(token?: CancellationToken): Promise<number> {
    const { queue, sessionId } = this.options;
    let processed = 0;

    while (processed < this.batchSize) {
      if (token?.isCancelled()) break;

      const message = queue.tryShift();
      if (!message) break;
      processed++;

      if (!(await this.deliver(message))) {
        this.logger?.debug(`[OutputThrottle] Transport closed for ${sessionId}, stopping batch`);
        break;
      }
    }

    if (processed > 0) {
      this.logger?.debug(`[OutputThrottle] Processed ${processed} messages from output queue`);
    }
    return processed;
  }

  /**
   * Run activations until the token is cancelled.
   */
  async run(token: CancellationToken): Promise<void> {
    while (!token.isCancelled()) {
      const processed = await this.drainOnce(token);
      await sleepUnlessCancelled(processed === 0 ? this.idleDelayMs : 0, token.signal);
    }
  }

  /**
   * @returns false if the transport rejected a send
   */
  private async deliver(message: BrokerMessage): Promise<boolean> {
    const { transport, tts, sampleRate } = this.options;

    if (message.alert?.play_before) {
      try {
        await transport.sendText(ALERT_CUE);
      } catch (err) {
        this.logger?.warn("[OutputThrottle] Failed to send alert cue:", err);
        return false;
      }
    }

    let audio: Buffer | null;
    try {
      audio = await tts.synthesize(message.text, sampleRate);
    } catch (err) {
      this.logger?.error("[OutputThrottle] TTS synthesis failed:", err);
      return true;
    }

    if (!audio) {
      this.logger?.warn("[OutputThrottle] No audio returned from TTS, skipping response");
      return true;
    }

    try {
      await transport.sendBinary(audio);
    } catch (err) {
      this.logger?.warn("[OutputThrottle] Failed to send synthesized audio:", err);
      return false;
    }

    this.options.onDelivered?.(message);
    return true;
  }
}
