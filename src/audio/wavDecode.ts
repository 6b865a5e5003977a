import { AudioDecodeError, type DecodedAudio } from './types';

const WAVE_FORMAT_PCM = 0x0001;
const WAVE_FORMAT_IEEE_FLOAT = 0x0003;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;
// Streaming writers (ffmpeg to a pipe) cannot seek back to patch sizes.
const UNKNOWN_CHUNK_SIZE = 0xffffffff;

export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRateHz: number;
  bitsPerSample: number;
}

export function looksLikeWav(buffer: Buffer): boolean {
  return (
    buffer.length >= 12 &&
    buffer.toString('ascii', 0, 4) === 'RIFF' &&
    buffer.toString('ascii', 8, 12) === 'WAVE'
  );
}

function readFormat(buffer: Buffer, chunkStart: number, chunkSize: number): WavFormat {
  if (chunkStart + 16 > buffer.length) {
    throw new AudioDecodeError('fmt chunk truncated');
  }
  let audioFormat = buffer.readUInt16LE(chunkStart);
  if (audioFormat === WAVE_FORMAT_EXTENSIBLE && chunkSize >= 40 && chunkStart + 26 <= buffer.length) {
    // First two bytes of the SubFormat GUID carry the real format tag.
    audioFormat = buffer.readUInt16LE(chunkStart + 24);
  }
  return {
    audioFormat,
    channels: buffer.readUInt16LE(chunkStart + 2),
    sampleRateHz: buffer.readUInt32LE(chunkStart + 4),
    bitsPerSample: buffer.readUInt16LE(chunkStart + 14),
  };
}

type SampleReader = (buffer: Buffer, offset: number) => number;

function sampleReader(format: WavFormat): SampleReader {
  if (format.audioFormat === WAVE_FORMAT_PCM) {
    switch (format.bitsPerSample) {
      case 8:
        return (buffer, offset) => ((buffer[offset] ?? 128) - 128) / 128;
      case 16:
        return (buffer, offset) => buffer.readInt16LE(offset) / 32768;
      case 24:
        return (buffer, offset) => buffer.readIntLE(offset, 3) / 8388608;
      case 32:
        return (buffer, offset) => buffer.readInt32LE(offset) / 2147483648;
      default:
        break;
    }
  }
  if (format.audioFormat === WAVE_FORMAT_IEEE_FLOAT) {
    if (format.bitsPerSample === 32) return (buffer, offset) => buffer.readFloatLE(offset);
    if (format.bitsPerSample === 64) return (buffer, offset) => buffer.readDoubleLE(offset);
  }
  throw new AudioDecodeError(
    `unsupported wav encoding format=${format.audioFormat} bits=${format.bitsPerSample}`,
  );
}

/**
 * Decodes a RIFF/WAVE file into planar float channels at its native rate.
 * A data chunk that claims more bytes than are present is read up to the end
 * of the buffer.
 */
export function decodeWav(buffer: Buffer): DecodedAudio {
  if (!looksLikeWav(buffer)) {
    throw new AudioDecodeError('missing RIFF/WAVE header');
  }

  let offset = 12;
  let format: WavFormat | null = null;
  let dataOffset: number | null = null;
  let dataBytes = 0;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString('ascii', offset, offset + 4);
    const chunkSize = buffer.readUInt32LE(offset + 4);
    const chunkStart = offset + 8;

    if (chunkId === 'fmt ') {
      format = readFormat(buffer, chunkStart, chunkSize);
    } else if (chunkId === 'data') {
      dataOffset = chunkStart;
      const available = buffer.length - chunkStart;
      if (chunkSize === UNKNOWN_CHUNK_SIZE || chunkSize === 0 || chunkSize > available) {
        dataBytes = available;
        break;
      }
      dataBytes = chunkSize;
    }

    const paddedSize = chunkSize + (chunkSize % 2);
    const nextOffset = chunkStart + paddedSize;
    if (nextOffset <= offset) {
      break;
    }
    offset = nextOffset;
  }

  if (!format) {
    throw new AudioDecodeError('missing fmt chunk');
  }
  if (dataOffset === null) {
    throw new AudioDecodeError('missing data chunk');
  }
  if (format.channels <= 0 || format.sampleRateHz <= 0 || format.bitsPerSample <= 0) {
    throw new AudioDecodeError('invalid wav format values');
  }

  const read = sampleReader(format);
  const bytesPerSample = format.bitsPerSample / 8;
  const bytesPerFrame = bytesPerSample * format.channels;
  const frameCount = Math.floor(dataBytes / bytesPerFrame);
  if (frameCount <= 0) {
    throw new AudioDecodeError('wav contains no audio frames');
  }

  const channels: Float32Array[] = [];
  for (let ch = 0; ch < format.channels; ch += 1) {
    channels.push(new Float32Array(frameCount));
  }

  for (let i = 0; i < frameCount; i += 1) {
    const frameOffset = dataOffset + i * bytesPerFrame;
    channels.forEach((channel, ch) => {
      channel[i] = read(buffer, frameOffset + ch * bytesPerSample);
    });
  }

  return { channels, sampleRateHz: format.sampleRateHz };
}

function clampInt16(n: number): number {
  if (n > 32767) return 32767;
  if (n < -32768) return -32768;
  return n | 0;
}

function wavHeader(pcmDataBytes: number, sampleRateHz: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRateHz * blockAlign;

  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcmDataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRateHz, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcmDataBytes, 40);
  return header;
}

/** Encodes mono float samples in [-1, 1] as a 16-bit PCM WAV file. */
export function encodeFloat32ToWav(samples: Float32Array, sampleRateHz: number): Buffer {
  const pcm = Buffer.alloc(samples.length * 2);
  samples.forEach((sample, i) => {
    pcm.writeInt16LE(clampInt16(Math.round(sample * 32767)), i * 2);
  });
  return Buffer.concat([wavHeader(pcm.length, sampleRateHz, 1), pcm]);
}
