export const TARGET_SAMPLE_RATE_HZ = 16000;

/** Output of a container decoder: planar channels at the file's own rate. */
export interface DecodedAudio {
  channels: Float32Array[];
  sampleRateHz: number;
}

/** Mono float PCM. Anything handed to an engine is non-empty and at 16 kHz. */
export interface AudioBuffer {
  samples: Float32Array;
  sampleRateHz: number;
}

export interface AudioDecoder {
  decode(input: Buffer): Promise<DecodedAudio>;
}

/** The bytes are not audio this decoder can interpret. */
export class AudioDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioDecodeError';
  }
}

export function durationSeconds(audio: AudioBuffer): number {
  return audio.sampleRateHz > 0 ? audio.samples.length / audio.sampleRateHz : 0;
}
