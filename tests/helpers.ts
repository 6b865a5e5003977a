export interface PartSpec {
  name?: string;
  filename?: string;
  contentType?: string;
  body: string | Buffer;
}

export function buildMultipart(boundary: string, parts: PartSpec[]): Buffer {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let disposition = 'Content-Disposition: form-data';
    if (part.name !== undefined) disposition += `; name="${part.name}"`;
    if (part.filename !== undefined) disposition += `; filename="${part.filename}"`;
    let head = `--${boundary}\r\n${disposition}\r\n`;
    if (part.contentType) head += `Content-Type: ${part.contentType}\r\n`;
    head += '\r\n';
    chunks.push(Buffer.from(head, 'utf8'));
    chunks.push(typeof part.body === 'string' ? Buffer.from(part.body, 'utf8') : part.body);
    chunks.push(Buffer.from('\r\n', 'ascii'));
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`, 'ascii'));
  return Buffer.concat(chunks);
}

function riffHeader(formatTag: number, channels: number, sampleRate: number, bits: number, dataBytes: number): Buffer {
  const blockAlign = channels * (bits / 8);
  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(formatTag, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bits, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataBytes, 40);
  return header;
}

/** Interleaves int16 channel data into a PCM WAV file. */
export function makePcm16Wav(channels: number[][], sampleRate: number): Buffer {
  const frames = channels[0]?.length ?? 0;
  const data = Buffer.alloc(frames * channels.length * 2);
  for (let i = 0; i < frames; i += 1) {
    channels.forEach((channel, ch) => {
      data.writeInt16LE(channel[i] ?? 0, (i * channels.length + ch) * 2);
    });
  }
  return Buffer.concat([riffHeader(1, channels.length, sampleRate, 16, data.length), data]);
}

export function makeFloat32Wav(samples: number[], sampleRate: number): Buffer {
  const data = Buffer.alloc(samples.length * 4);
  samples.forEach((sample, i) => data.writeFloatLE(sample, i * 4));
  return Buffer.concat([riffHeader(3, 1, sampleRate, 32, data.length), data]);
}

export function makePcm8Wav(samples: number[], sampleRate: number): Buffer {
  return Buffer.concat([riffHeader(1, 1, sampleRate, 8, samples.length), Buffer.from(samples)]);
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function assertClose(actual: number | undefined, expected: number, epsilon = 1e-6): void {
  if (actual === undefined || Math.abs(actual - expected) > epsilon) {
    throw new Error(`expected ${String(actual)} to be within ${epsilon} of ${expected}`);
  }
}
