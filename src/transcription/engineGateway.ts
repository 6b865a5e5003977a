import { errorMessage, internalError, isApiError, serviceUnavailable } from '../api/errors';
import { log } from '../log';
import { incStageError, setEngineQueueDepth, startStageTimer } from '../metrics';
import type {
  EngineTranscribeOptions,
  TranscriptionEngine,
  TranscriptionRequest,
  TranscriptionResult,
} from './types';

export interface EngineGatewayOptions {
  /** Deadline per call, measured from submission. 0 or absent disables it. */
  timeoutMs?: number;
}

function toEngineOptions(request: TranscriptionRequest, signal: AbortSignal): EngineTranscribeOptions {
  const options: EngineTranscribeOptions = {
    conditionOnPreviousText: request.conditionOnPreviousText,
    vadFilter: request.vadFilter,
    signal,
  };
  if (request.language !== undefined) options.language = request.language;
  if (request.prompt !== undefined) options.initialPrompt = request.prompt;
  if (request.temperature !== undefined) options.temperature = request.temperature;
  return options;
}

/**
 * Owns the single shared engine. Calls are chained so that at most one is
 * inside the engine at any time, including while its segments are drained.
 * Work done before submit() (body reads, decoding) never waits on this queue.
 */
export class EngineGateway {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private closed = false;
  private readonly timeoutMs: number;

  constructor(
    private readonly engine: TranscriptionEngine | null,
    options: EngineGatewayOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  public get available(): boolean {
    return this.engine !== null && !this.closed;
  }

  /** Calls waiting for or holding the engine. */
  public get pending(): number {
    return this.queued;
  }

  public async transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
    const engine = this.engine;
    if (!engine || this.closed) {
      throw serviceUnavailable();
    }

    const controller = new AbortController();
    this.queued += 1;
    setEngineQueueDepth(this.queued);

    const slot = this.tail.then(() => this.invoke(engine, request, controller.signal));
    // A call that missed its deadline still holds the engine until it settles.
    const release = (): void => {
      this.queued -= 1;
      setEngineQueueDepth(this.queued);
    };
    // The next caller only needs to know the slot is free; this caller sees the outcome below.
    this.tail = slot.then(release, release);

    return this.withDeadline(slot, controller);
  }

  /** Refuses new work. Calls already queued still run. */
  public close(): void {
    this.closed = true;
  }

  /** Resolves once every call submitted so far has left the engine. */
  public whenIdle(): Promise<void> {
    return this.tail;
  }

  private async invoke(
    engine: TranscriptionEngine,
    request: TranscriptionRequest,
    signal: AbortSignal,
  ): Promise<TranscriptionResult> {
    if (signal.aborted) {
      throw internalError(`Transcription timed out after ${this.timeoutMs} ms`);
    }

    const endTimer = startStageTimer('engine');
    log.debug(
      { event: 'engine_invoke_started', engine_id: engine.id, queue_depth: this.queued },
      'engine invoke started',
    );

    try {
      const output = await engine.transcribe(request.audio.samples, toEngineOptions(request, signal));
      const parts: string[] = [];
      for await (const segment of output.segments) {
        parts.push(segment.text);
      }
      return { text: parts.join('').trim() };
    } catch (error) {
      incStageError('engine');
      if (isApiError(error)) throw error;
      throw internalError(`Transcription failed: ${errorMessage(error)}`, error);
    } finally {
      const durationMs = endTimer();
      log.debug(
        { event: 'engine_invoke_finished', engine_id: engine.id, duration_ms: Math.round(durationMs) },
        'engine invoke finished',
      );
    }
  }

  private withDeadline(
    slot: Promise<TranscriptionResult>,
    controller: AbortController,
  ): Promise<TranscriptionResult> {
    if (this.timeoutMs <= 0) {
      return slot;
    }

    return new Promise<TranscriptionResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(internalError(`Transcription timed out after ${this.timeoutMs} ms`));
      }, this.timeoutMs);

      slot.then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
