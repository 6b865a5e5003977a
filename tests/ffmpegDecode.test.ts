import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';
import { makePcm16Wav } from './helpers';

setTestEnv();

const MISSING_FFMPEG = { ffmpegPath: '/nonexistent/ffmpeg-for-tests', timeoutMs: 2000 };

test('decodeWithFfmpeg reports a missing binary as a plain error, not a decode error', async () => {
  const { decodeWithFfmpeg } = await import('../src/audio/ffmpegDecode');
  const { AudioDecodeError } = await import('../src/audio/types');

  await assert.rejects(decodeWithFfmpeg(Buffer.from('fLaC-not-really'), MISSING_FFMPEG), (error: unknown) => {
    assert.ok(error instanceof Error);
    assert.equal(error instanceof AudioDecodeError, false);
    assert.match(error.message, /^ffmpeg could not be started: /);
    return true;
  });
});

test('createAudioDecoder parses WAV in-process without touching ffmpeg', async () => {
  const { createAudioDecoder } = await import('../src/audio/decoder');

  const decoder = createAudioDecoder(MISSING_FFMPEG);
  const decoded = await decoder.decode(makePcm16Wav([[16384, -16384]], 44100));

  assert.equal(decoded.sampleRateHz, 44100);
  assert.deepEqual([...(decoded.channels[0] ?? [])], [0.5, -0.5]);
});

test('createAudioDecoder sends other containers to ffmpeg', async () => {
  const { createAudioDecoder } = await import('../src/audio/decoder');

  const decoder = createAudioDecoder(MISSING_FFMPEG);

  await assert.rejects(decoder.decode(Buffer.from('OggS-not-really')), /^Error: ffmpeg could not be started/);
});
