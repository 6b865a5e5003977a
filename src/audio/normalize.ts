import {
  AudioDecodeError,
  TARGET_SAMPLE_RATE_HZ,
  type AudioBuffer,
  type AudioDecoder,
  type DecodedAudio,
} from './types';

/** Arithmetic mean of all channels per frame. */
export function downmixToMono(channels: Float32Array[]): Float32Array {
  const [first] = channels;
  if (!first) return new Float32Array(0);
  if (channels.length === 1) return first;

  const frameCount = Math.min(...channels.map((channel) => channel.length));
  const mixed = new Float32Array(frameCount);
  for (let i = 0; i < frameCount; i += 1) {
    let sum = 0;
    for (const channel of channels) {
      sum += channel[i] ?? 0;
    }
    mixed[i] = sum / channels.length;
  }
  return mixed;
}

/**
 * Plain linear interpolation, no anti-alias filtering. The output length is
 * round(duration * outputRate), sampled at evenly spaced positions from the
 * first to the last input index.
 */
export function resampleLinear(
  samples: Float32Array,
  inputSampleRateHz: number,
  outputSampleRateHz: number,
): Float32Array {
  if (samples.length === 0) return samples;
  if (inputSampleRateHz <= 0 || outputSampleRateHz <= 0) {
    throw new Error(`invalid resample rates ${inputSampleRateHz}->${outputSampleRateHz}`);
  }
  if (inputSampleRateHz === outputSampleRateHz) return samples;

  const duration = samples.length / inputSampleRateHz;
  const outputLength = Math.round(duration * outputSampleRateHz);
  const output = new Float32Array(outputLength);
  if (outputLength === 0) return output;

  const lastIndex = samples.length - 1;
  const step = outputLength > 1 ? lastIndex / (outputLength - 1) : 0;
  for (let i = 0; i < outputLength; i += 1) {
    const position = i * step;
    const index = Math.floor(position);
    const nextIndex = Math.min(index + 1, lastIndex);
    const frac = position - index;
    const s0 = samples[index] ?? 0;
    const s1 = samples[nextIndex] ?? s0;
    output[i] = s0 + (s1 - s0) * frac;
  }
  return output;
}

export function toMono16k(decoded: DecodedAudio): AudioBuffer {
  const mono = downmixToMono(decoded.channels);
  const samples = resampleLinear(mono, decoded.sampleRateHz, TARGET_SAMPLE_RATE_HZ);
  if (samples.length === 0) {
    throw new AudioDecodeError('decoded audio is empty');
  }
  return { samples, sampleRateHz: TARGET_SAMPLE_RATE_HZ };
}

export async function normalizeAudio(input: Buffer, decoder: AudioDecoder): Promise<AudioBuffer> {
  if (input.length === 0) {
    throw new AudioDecodeError('audio file is empty');
  }
  const decoded = await decoder.decode(input);
  return toMono16k(decoded);
}
