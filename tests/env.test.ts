import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('parseEnv fills defaults for an empty environment', async () => {
  const { parseEnv } = await import('../src/env');

  const parsed = parseEnv({});

  assert.equal(parsed.API_HOST, '127.0.0.1');
  assert.equal(parsed.API_PORT, 5000);
  assert.equal(parsed.MODEL_NAME, 'whisper-local');
  assert.equal(parsed.CONDITION_ON_PREVIOUS_TEXT, true);
  assert.equal(parsed.VAD_FILTER, false);
  assert.equal(parsed.WHISPER_URL, undefined);
  assert.equal(parsed.WHISPER_TIMEOUT_MS, 0);
  assert.equal(parsed.MAX_UPLOAD_BYTES, 104857600);
  assert.equal(parsed.METRICS_ENABLED, false);
});

test('parseEnv coerces strings and treats blanks as unset', async () => {
  const { parseEnv } = await import('../src/env');

  const parsed = parseEnv({
    API_PORT: '8080',
    VAD_FILTER: 'TRUE',
    CONDITION_ON_PREVIOUS_TEXT: 'false',
    MODEL_NAME: '   ',
    WHISPER_URL: 'http://127.0.0.1:9000/inference',
  });

  assert.equal(parsed.API_PORT, 8080);
  assert.equal(parsed.VAD_FILTER, true);
  assert.equal(parsed.CONDITION_ON_PREVIOUS_TEXT, false);
  assert.equal(parsed.MODEL_NAME, 'whisper-local');
  assert.equal(parsed.WHISPER_URL, 'http://127.0.0.1:9000/inference');
});

test('parseEnv lists every invalid variable', async () => {
  const { parseEnv } = await import('../src/env');

  assert.throws(
    () => parseEnv({ API_PORT: 'eighty', VAD_FILTER: 'maybe' }),
    (error: unknown) =>
      error instanceof Error &&
      error.message.startsWith('Invalid environment variables: ') &&
      error.message.includes('API_PORT: ') &&
      error.message.includes('VAD_FILTER: '),
  );
});

test('envModelOptionsProvider exposes a frozen snapshot of the model settings', async () => {
  const { envModelOptionsProvider } = await import('../src/config/modelOptions');

  const provider = envModelOptionsProvider({
    MODEL_NAME: 'small.en',
    CONDITION_ON_PREVIOUS_TEXT: false,
    VAD_FILTER: true,
  });
  const options = provider.getModelOptions();

  assert.deepEqual(options, { modelName: 'small.en', conditionOnPreviousText: false, vadFilter: true });
  assert.equal(Object.isFrozen(options), true);
  assert.equal(provider.getModelOptions(), options);
});
