import { Blob } from 'buffer';
import { fetch as undiciFetch, FormData } from 'undici';

import { encodeFloat32ToWav } from '../../audio/wavDecode';
import { TARGET_SAMPLE_RATE_HZ } from '../../audio/types';
import { log } from '../../log';
import type {
  EngineOutput,
  EngineTranscribeOptions,
  TranscriptionEngine,
  TranscriptionInfo,
  TranscriptionSegment,
} from '../types';

const BODY_PREVIEW_CHARS = 500;

export interface WhisperHttpEngineOptions {
  url: string;
  id?: string;
  fetchImpl?: typeof undiciFetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readSegments(record: Record<string, unknown>): TranscriptionSegment[] | null {
  const segments = record.segments;
  if (!Array.isArray(segments)) return null;

  const out: TranscriptionSegment[] = [];
  for (const seg of segments) {
    if (!isRecord(seg) || typeof seg.text !== 'string') continue;
    const segment: TranscriptionSegment = { text: seg.text };
    const start = optionalNumber(seg.start);
    const end = optionalNumber(seg.end);
    if (start !== undefined) segment.start = start;
    if (end !== undefined) segment.end = end;
    out.push(segment);
  }
  return out;
}

/**
 * Whisper servers vary a lot:
 * - { text: "...", segments: [{ text: "..." }, ...] }  (verbose_json)
 * - { text: "..." }
 * - { transcription: "..." }
 * - { result: { text: "..." } }
 */
export function extractSegments(result: unknown): TranscriptionSegment[] {
  if (!isRecord(result)) return [];

  const segments = readSegments(result);
  if (segments && segments.length > 0) return segments;

  if (typeof result.text === 'string') return [{ text: result.text }];
  if (typeof result.transcription === 'string') return [{ text: result.transcription }];

  const nested = result.result;
  if (isRecord(nested)) {
    if (typeof nested.text === 'string') return [{ text: nested.text }];
    if (typeof nested.transcription === 'string') return [{ text: nested.transcription }];
  }

  return segments ?? [];
}

function extractInfo(result: unknown): TranscriptionInfo {
  if (!isRecord(result)) return {};
  const info: TranscriptionInfo = {};
  if (typeof result.language === 'string') info.language = result.language;
  const probability = optionalNumber(result.language_probability);
  if (probability !== undefined) info.languageProbability = probability;
  const duration = optionalNumber(result.duration);
  if (duration !== undefined) info.durationSeconds = duration;
  return info;
}

/**
 * Engine backed by a whisper-compatible inference server (whisper.cpp server,
 * faster-whisper servers). Audio is sent as 16 kHz 16-bit mono WAV.
 */
export class WhisperHttpEngine implements TranscriptionEngine {
  public readonly id: string;
  private readonly url: string;
  private readonly fetchImpl: typeof undiciFetch;

  constructor(options: WhisperHttpEngineOptions) {
    this.url = options.url;
    this.id = options.id ?? 'whisper_http';
    this.fetchImpl = options.fetchImpl ?? undiciFetch;
  }

  public async transcribe(audio: Float32Array, options: EngineTranscribeOptions): Promise<EngineOutput> {
    const wav = encodeFloat32ToWav(audio, TARGET_SAMPLE_RATE_HZ);

    const form = new FormData();
    form.append('file', new Blob([wav], { type: 'audio/wav' }), 'audio.wav');
    form.append('response_format', 'verbose_json');
    form.append('condition_on_previous_text', String(options.conditionOnPreviousText));
    form.append('vad_filter', String(options.vadFilter));
    if (options.language !== undefined) form.append('language', options.language);
    if (options.initialPrompt !== undefined) form.append('prompt', options.initialPrompt);
    if (options.temperature !== undefined) form.append('temperature', String(options.temperature));

    const startedAt = Date.now();
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { Accept: 'application/json, text/plain;q=0.9, */*;q=0.1' },
      body: form,
      signal: options.signal,
    });

    const contentType = response.headers.get('content-type') ?? '';
    const respText = await response.text();

    log.debug(
      {
        event: 'whisper_fetch_done',
        status: response.status,
        content_type: contentType,
        wav_bytes: wav.length,
        elapsed_ms: Date.now() - startedAt,
      },
      'whisper responded',
    );

    if (!response.ok) {
      const preview =
        respText.length > BODY_PREVIEW_CHARS ? `${respText.slice(0, BODY_PREVIEW_CHARS)}...` : respText;
      throw new Error(`whisper error ${response.status}: ${preview}`);
    }

    if (!contentType.includes('application/json')) {
      return { segments: [{ text: respText }], info: {} };
    }

    const data: unknown = JSON.parse(respText);
    return { segments: extractSegments(data), info: extractInfo(data) };
  }
}
