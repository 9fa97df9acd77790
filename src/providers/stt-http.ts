/**
 * HTTP STT Provider
 *
 * Uploads float32 PCM as a multipart `file` field to the transcription
 * service. The service answers `{ text, message }`.
 */

import { z } from "zod";
import type { Logger, STTProvider, STTResult } from "../bridge.js";
import { describeFetchError } from "./tts-http.js";

export const STTResponseSchema = z.object({
  text: z.string(),
  message: z.string(),
});

/**
 * HTTP STT configuration.
 */
export interface HttpSTTConfig {
  /** Transcription endpoint */
  url: string;
  /** Sent as the user-token header */
  token?: string;
  /** Request timeout (default: 10000ms) */
  timeoutMs?: number;
  logger?: Logger;
  /** fetch implementation (default: global fetch) */
  fetchImpl?: typeof fetch;
}

export class HttpSTTProvider implements STTProvider {
  private url: string;
  private token: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private logger?: Logger;

  constructor(config: HttpSTTConfig) {
    this.url = config.url;
    this.token = config.token ?? "";
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = config.logger;
  }

  /**
   * Transcribe float32 LE audio. Returns null on any failure.
   */
  async transcribe(audio: Buffer): Promise<STTResult | null> {
    const form = new FormData();
    form.append("file", new Blob([new Uint8Array(audio)]), "audio.raw");

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "user-token": this.token },
        body: form,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      this.logger?.error(`[HttpSTT] STT request failed: ${describeFetchError(err)}`);
      return null;
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      this.logger?.error(`[HttpSTT] STT service error: ${response.status} ${body}`.trimEnd());
      return null;
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      this.logger?.error("[HttpSTT] STT response is not JSON:", err);
      return null;
    }

    const parsed = STTResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.logger?.error(`[HttpSTT] Unexpected STT response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
      return null;
    }

    this.logger?.debug(`[HttpSTT] Transcription: ${parsed.data.text} (${parsed.data.message})`);
    return parsed.data;
  }
}
