import { invalidRequest } from '../api/errors';
import { TARGET_SAMPLE_RATE_HZ, type AudioBuffer } from '../audio/types';
import type { ModelOptions } from '../config/modelOptions';
import type { FormField, FormFields } from '../http/multipart';
import type { TranscriptionRequest } from './types';

export const DEFAULT_CONDITION_ON_PREVIOUS_TEXT = true;
export const DEFAULT_VAD_FILTER = false;

const DECIMAL_FLOAT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface TranscriptionForm {
  file: Buffer;
  filename?: string;
  language?: string;
  prompt?: string;
  temperature?: number;
}

/**
 * Best-effort numeric parsing: anything that is not a plain finite decimal
 * number is reported as absent rather than rejected.
 */
export function parseOptionalFloat(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!DECIMAL_FLOAT.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function textValue(field: FormField | undefined): string | undefined {
  if (!field) return undefined;
  return field.isFile ? field.value.toString('utf8') : field.value;
}

export function readTranscriptionForm(fields: FormFields): TranscriptionForm {
  const file = fields.get('file');
  if (!file) {
    throw invalidRequest('Missing required field: file');
  }

  const form: TranscriptionForm = {
    file: file.isFile ? file.value : Buffer.from(file.value, 'utf8'),
  };
  if (file.isFile && file.filename) form.filename = file.filename;

  const language = textValue(fields.get('language'));
  if (language !== undefined) form.language = language;

  const prompt = textValue(fields.get('prompt'));
  if (prompt !== undefined) form.prompt = prompt;

  const temperature = parseOptionalFloat(textValue(fields.get('temperature')));
  if (temperature !== undefined) form.temperature = temperature;

  return form;
}

export function buildTranscriptionRequest(
  form: TranscriptionForm,
  audio: AudioBuffer,
  options: ModelOptions,
): TranscriptionRequest {
  if (audio.sampleRateHz !== TARGET_SAMPLE_RATE_HZ || audio.samples.length === 0) {
    throw new Error(`engine audio must be non-empty ${TARGET_SAMPLE_RATE_HZ} Hz mono`);
  }

  const request: TranscriptionRequest = {
    audio,
    conditionOnPreviousText: options.conditionOnPreviousText ?? DEFAULT_CONDITION_ON_PREVIOUS_TEXT,
    vadFilter: options.vadFilter ?? DEFAULT_VAD_FILTER,
  };
  if (form.language !== undefined) request.language = form.language;
  if (form.prompt !== undefined) request.prompt = form.prompt;
  if (form.temperature !== undefined) request.temperature = form.temperature;
  return request;
}
