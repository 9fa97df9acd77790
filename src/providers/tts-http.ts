/**
 * HTTP TTS Provider
 *
 * Posts `{ text, sample_rate }` to the speech synthesis service and
 * returns the raw 16-bit PCM body.
 */

import type { Logger, TTSProvider } from "../bridge.js";

/**
 * HTTP TTS configuration.
 */
export interface HttpTTSConfig {
  /** Synthesis endpoint */
  url: string;
  /** Sent as the user-token header */
  token?: string;
  /** Request timeout (default: 10000ms) */
  timeoutMs?: number;
  logger?: Logger;
  /** fetch implementation (default: global fetch) */
  fetchImpl?: typeof fetch;
}

/** Bodies shorter than one 16-bit sample carry no audio */
const MIN_AUDIO_BYTES = 2;

export class HttpTTSProvider implements TTSProvider {
  private url: string;
  private token: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private logger?: Logger;

  constructor(config: HttpTTSConfig) {
    this.url = config.url;
    this.token = config.token ?? "";
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = config.logger;
  }

  /**
   * Generate speech audio from text at the session's sample rate.
   * Returns null on any failure.
   */
  async synthesize(text: string, sampleRate: number): Promise<Buffer | null> {
    this.logger?.debug(`[HttpTTS] Requesting TTS for text: ${text}`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "user-token": this.token,
        },
        body: JSON.stringify({ text, sample_rate: sampleRate }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      this.logger?.error(`[HttpTTS] TTS request failed: ${describeFetchError(err)}`);
      return null;
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      this.logger?.error(`[HttpTTS] TTS service error: ${response.status} ${body}`.trimEnd());
      return null;
    }

    let audio: Buffer;
    try {
      audio = Buffer.from(await response.arrayBuffer());
    } catch (err) {
      this.logger?.error(`[HttpTTS] Failed to read TTS audio: ${describeFetchError(err)}`);
      return null;
    }

    if (audio.length < MIN_AUDIO_BYTES) {
      this.logger?.warn("[HttpTTS] Insufficient audio data received from TTS");
      return null;
    }

    this.logger?.debug(`[HttpTTS] Received ${audio.length} bytes of audio`);
    return audio;
  }
}

/**
 * Readable cause for a rejected fetch, including timeouts.
 */
export function describeFetchError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === "TimeoutError") return "request timed out";
    return err.message;
  }
  return String(err);
}
