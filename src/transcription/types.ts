import type { AudioBuffer } from '../audio/types';

export interface TranscriptionRequest {
  /** Mono, 16 kHz, non-empty. */
  audio: AudioBuffer;
  language?: string;
  prompt?: string;
  temperature?: number;
  conditionOnPreviousText: boolean;
  vadFilter: boolean;
}

export interface TranscriptionResult {
  text: string;
}

export interface TranscriptionSegment {
  text: string;
  start?: number;
  end?: number;
}

export interface TranscriptionInfo {
  language?: string;
  languageProbability?: number;
  durationSeconds?: number;
}

export interface EngineTranscribeOptions {
  language?: string;
  initialPrompt?: string;
  conditionOnPreviousText: boolean;
  vadFilter: boolean;
  temperature?: number;
  signal?: AbortSignal;
}

/**
 * Segments may be produced lazily; the caller drains them while it still
 * holds exclusive access to the engine.
 */
export interface EngineOutput {
  segments: Iterable<TranscriptionSegment> | AsyncIterable<TranscriptionSegment>;
  info: TranscriptionInfo;
}

/** A loaded speech-to-text model. Not safe for overlapping calls. */
export interface TranscriptionEngine {
  readonly id: string;
  transcribe(audio: Float32Array, options: EngineTranscribeOptions): Promise<EngineOutput>;
}
