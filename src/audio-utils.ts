/**
 * Audio Format Utilities
 *
 * Satellites stream 16-bit signed little-endian mono PCM. The STT
 * service expects 32-bit float little-endian samples in [-1, 1).
 */

/** Bytes per 16-bit PCM sample */
export const BYTES_PER_SAMPLE = 2;

/**
 * Number of whole 16-bit samples in a byte count.
 */
export function sampleCount(byteLength: number): number {
  return Math.floor(byteLength / BYTES_PER_SAMPLE);
}

/**
 * Convert 16-bit PCM to normalized 32-bit float PCM (divide by 32768).
 * A trailing odd byte is ignored.
 *
 * @param input Buffer containing 16-bit signed LE PCM
 * @returns Buffer containing float32 LE PCM
 */
export function pcm16ToFloat32(input: Buffer): Buffer {
  const samples = sampleCount(input.length);
  const output = Buffer.alloc(samples * 4);

  for (let i = 0; i < samples; i++) {
    output.writeFloatLE(input.readInt16LE(i * BYTES_PER_SAMPLE) / 32768, i * 4);
  }

  return output;
}

/**
 * Options for the error cue.
 */
export interface BeepOptions {
  /** Duration in milliseconds (default: 500) */
  durationMs?: number;
  /** Tone frequency in Hz (default: 800) */
  frequency?: number;
  /** Fade-in/out length in milliseconds (default: 50) */
  fadeMs?: number;
}

/**
 * Generate the audible error cue: a sine tone with linear fade-in and
 * fade-out to avoid clicks.
 *
 * @param sampleRate Session sample rate in Hz
 * @returns Buffer containing 16-bit signed LE PCM
 */
export function generateErrorBeep(sampleRate: number, options: BeepOptions = {}): Buffer {
  const { durationMs = 500, frequency = 800, fadeMs = 50 } = options;
  const samples = Math.floor((sampleRate * durationMs) / 1000);
  const fadeSamples = Math.min(Math.floor((sampleRate * fadeMs) / 1000), samples);
  const buffer = Buffer.alloc(samples * BYTES_PER_SAMPLE);

  for (let i = 0; i < samples; i++) {
    let value = Math.sin((2 * Math.PI * frequency * i) / sampleRate);

    if (fadeSamples > 1) {
      if (i < fadeSamples) {
        value *= i / (fadeSamples - 1);
      }
      const fromEnd = samples - 1 - i;
      if (fromEnd < fadeSamples) {
        value *= fromEnd / (fadeSamples - 1);
      }
    }

    buffer.writeInt16LE(Math.trunc(value * 32767), i * BYTES_PER_SAMPLE);
  }

  return buffer;
}

/**
 * Split audio buffer into fixed-size chunks.
 *
 * @param chunkSize Bytes per chunk (default: 2048 = 1024 samples)
 */
export function* chunkAudio(
  audio: Buffer,
  chunkSize = 2048,
): Generator<Buffer, void, unknown> {
  for (let i = 0; i < audio.length; i += chunkSize) {
    yield audio.subarray(i, Math.min(i + chunkSize, audio.length));
  }
}

/**
 * Calculate 16-bit PCM audio duration in milliseconds.
 */
export function getAudioDurationMs(buffer: Buffer, sampleRate: number): number {
  return (sampleCount(buffer.length) / sampleRate) * 1000;
}

/**
 * Generate a sine wave tone for testing.
 *
 * @param frequency Tone frequency in Hz (default: 440Hz, A4)
 * @param amplitude Amplitude 0-1 (default: 0.5)
 */
export function generateTone(
  sampleRate: number,
  durationMs: number,
  frequency = 440,
  amplitude = 0.5,
): Buffer {
  const samples = Math.floor((sampleRate * durationMs) / 1000);
  const buffer = Buffer.alloc(samples * BYTES_PER_SAMPLE);

  for (let i = 0; i < samples; i++) {
    const t = i / sampleRate;
    const sample = Math.sin(2 * Math.PI * frequency * t) * 0x7fff * amplitude;
    buffer.writeInt16LE(Math.round(sample), i * BYTES_PER_SAMPLE);
  }

  return buffer;
}

/**
 * Generate silence (zeros) for testing.
 */
export function generateSilence(sampleRate: number, durationMs: number): Buffer {
  const samples = Math.floor((sampleRate * durationMs) / 1000);
  return Buffer.alloc(samples * BYTES_PER_SAMPLE);
}
