import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ApiError } from '../src/api/errors';
import type { AudioBuffer } from '../src/audio/types';
import type { FormField, FormFields } from '../src/http/multipart';
import {
  buildTranscriptionRequest,
  parseOptionalFloat,
  readTranscriptionForm,
} from '../src/transcription/requestBuilder';

function fieldsOf(...fields: FormField[]): FormFields {
  return new Map(fields.map((field) => [field.name, field]));
}

const audio: AudioBuffer = { samples: new Float32Array([0.1, 0.2]), sampleRateHz: 16000 };
const fileField: FormField = { name: 'file', isFile: true, value: Buffer.from([1, 2, 3]), filename: 'a.wav' };

test('readTranscriptionForm requires the file field', () => {
  assert.throws(
    () => readTranscriptionForm(fieldsOf({ name: 'language', isFile: false, value: 'en' })),
    (error: unknown) =>
      error instanceof ApiError &&
      error.status === 400 &&
      error.message === 'Missing required field: file',
  );
});

test('readTranscriptionForm passes language and prompt through verbatim', () => {
  const form = readTranscriptionForm(
    fieldsOf(
      fileField,
      { name: 'language', isFile: false, value: 'en' },
      { name: 'prompt', isFile: false, value: 'Names: Ada, Grace.' },
    ),
  );

  assert.deepEqual(form, {
    file: Buffer.from([1, 2, 3]),
    filename: 'a.wav',
    language: 'en',
    prompt: 'Names: Ada, Grace.',
  });
});

test('parseOptionalFloat treats anything but a finite decimal as absent', () => {
  assert.equal(parseOptionalFloat('0.2'), 0.2);
  assert.equal(parseOptionalFloat(' 1e-1 '), 0.1);
  assert.equal(parseOptionalFloat('-0'), -0);
  assert.equal(parseOptionalFloat('.5'), 0.5);
  assert.equal(parseOptionalFloat(undefined), undefined);
  assert.equal(parseOptionalFloat(''), undefined);
  assert.equal(parseOptionalFloat('warm'), undefined);
  assert.equal(parseOptionalFloat('0x10'), undefined);
  assert.equal(parseOptionalFloat('Infinity'), undefined);
  assert.equal(parseOptionalFloat('1e999'), undefined);
});

test('readTranscriptionForm drops an unparseable temperature instead of failing', () => {
  const form = readTranscriptionForm(fieldsOf(fileField, { name: 'temperature', isFile: false, value: 'hot' }));

  assert.equal('temperature' in form, false);
});

test('buildTranscriptionRequest applies engine flag defaults when config leaves them unset', () => {
  const request = buildTranscriptionRequest({ file: Buffer.from([1]) }, audio, { modelName: 'base' });

  assert.deepEqual(request, { audio, conditionOnPreviousText: true, vadFilter: false });
});

test('buildTranscriptionRequest takes engine flags from config and fields from the form', () => {
  const request = buildTranscriptionRequest(
    { file: Buffer.from([1]), language: 'nl', prompt: 'hi', temperature: 0.4 },
    audio,
    { modelName: 'base', conditionOnPreviousText: false, vadFilter: true },
  );

  assert.deepEqual(request, {
    audio,
    language: 'nl',
    prompt: 'hi',
    temperature: 0.4,
    conditionOnPreviousText: false,
    vadFilter: true,
  });
});

test('buildTranscriptionRequest refuses audio that is not 16 kHz', () => {
  assert.throws(
    () =>
      buildTranscriptionRequest(
        { file: Buffer.from([1]) },
        { samples: new Float32Array([0]), sampleRateHz: 8000 },
        { modelName: 'base' },
      ),
    /engine audio must be non-empty 16000 Hz mono/,
  );
});
